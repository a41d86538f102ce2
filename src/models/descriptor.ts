/**
 * Sensor descriptor structures.
 */

import type { SensorKind, UnitCode } from './enums';

/**
 * Maps a raw characteristic value to a physical quantity.
 */
export type SensorDecoder = (raw: Uint8Array) => number;

/**
 * Static definition of one sensor reading on the tag.
 */
export interface SensorDescriptor {
  readonly kind: SensorKind;

  /**
   * Bytes written to the config characteristic to enable the sensor,
   * or null when the value is readable without activation
   */
  readonly activationCommand: Uint8Array | null;

  readonly configHandle: string | null;
  readonly dataHandle: string;

  /**
   * Warm-up time between activation and a valid read
   */
  readonly settleDelayMs: number;

  readonly unit: UnitCode;

  /**
   * Exact byte length of the data characteristic value
   */
  readonly expectedLength: number;

  readonly decode: SensorDecoder;
}

/**
 * Raw value read for one descriptor, before decoding.
 */
export interface RawSample {
  readonly descriptor: SensorDescriptor;
  readonly raw: Uint8Array;
  readonly capturedAt: Date;
}
