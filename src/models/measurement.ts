/**
 * Measurement output structures.
 */

import type { SensorKind, UnitCode } from './enums';

/**
 * Stable tags identifying the device and site a measurement came from.
 */
export interface MeasurementIdentity {
  readonly assetId: string;
  readonly locationId: string;
}

/**
 * One decoded measurement, ready for publishing.
 */
export interface MeasurementRecord extends MeasurementIdentity {
  readonly sensorType: SensorKind;
  readonly value: number;
  readonly unit: UnitCode;

  /**
   * ISO-8601 UTC, second precision (e.g. "2026-10-19T08:15:00Z")
   */
  readonly timestamp: string;
}
