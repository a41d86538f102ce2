/**
 * Raw characteristic decoding.
 *
 * Each decoder checks the exact byte length of its layout and throws
 * DecodeError on a mismatch; none of them truncate or pad.
 */

import { DecodeError } from '../exceptions';
import { SensorKind } from '../models/enums';
import {
  BAROMETER_DATA_LENGTH,
  BAROMETER_PRESSURE_OFFSET,
  BATTERY_DATA_LENGTH,
  HUMIDITY_DATA_LENGTH,
  LUXOMETER_DATA_LENGTH,
} from './constants';

const HUMIDITY_STATUS_MASK = 0b11;

/**
 * Round to 2 decimal places.
 */
export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

function view(raw: Uint8Array, kind: SensorKind, expectedLength: number): DataView {
  if (raw.length !== expectedLength) {
    throw new DecodeError(kind, raw.length, expectedLength);
  }
  return new DataView(raw.buffer, raw.byteOffset, raw.byteLength);
}

/**
 * Decode HDC1000 temperature in °C.
 *
 * Format: [temp:u16le][humidity:u16le]
 */
export function decodeTemperature(raw: Uint8Array): number {
  const rawTemp = view(raw, SensorKind.TEMPERATURE, HUMIDITY_DATA_LENGTH).getUint16(0, true);
  return roundTo2((rawTemp / 65536) * 165 - 40);
}

/**
 * Decode HDC1000 relative humidity in %.
 *
 * The low 2 bits of the humidity field are status flags.
 */
export function decodeHumidity(raw: Uint8Array): number {
  const rawHumidity = view(raw, SensorKind.HUMIDITY, HUMIDITY_DATA_LENGTH).getUint16(2, true);
  return roundTo2(((rawHumidity & ~HUMIDITY_STATUS_MASK) / 65536) * 100);
}

/**
 * Decode OPT3001 illuminance in lux.
 *
 * Format: u16be, [exponent:4][mantissa:12]
 */
export function decodeIlluminance(raw: Uint8Array): number {
  const word = view(raw, SensorKind.ILLUMINANCE, LUXOMETER_DATA_LENGTH).getUint16(0, false);
  const exponent = (word >> 12) & 0x0f;
  const mantissa = word & 0x0fff;
  return roundTo2(mantissa * 0.01 * 2 ** exponent);
}

/**
 * Decode BMP280 pressure in hPa.
 *
 * Format: [temp:u24le][pressure:u24le]
 */
export function decodePressure(raw: Uint8Array): number {
  view(raw, SensorKind.PRESSURE, BAROMETER_DATA_LENGTH);
  const offset = BAROMETER_PRESSURE_OFFSET;
  const value = raw[offset] | (raw[offset + 1] << 8) | (raw[offset + 2] << 16);
  return roundTo2(value / 100);
}

/**
 * Decode battery level in %.
 */
export function decodeBatteryLevel(raw: Uint8Array): number {
  return view(raw, SensorKind.BATTERY, BATTERY_DATA_LENGTH).getUint8(0);
}
