/**
 * Sensor descriptor registry for the TI SensorTag CC2650.
 */

import { ConfigError } from '../exceptions';
import type { SensorDescriptor } from '../models/descriptor';
import { SensorKind, UnitCode } from '../models/enums';
import {
  decodeBatteryLevel,
  decodeHumidity,
  decodeIlluminance,
  decodePressure,
  decodeTemperature,
} from './codecs';
import {
  BAROMETER_CONFIG_UUID,
  BAROMETER_DATA_LENGTH,
  BAROMETER_DATA_UUID,
  BAROMETER_SETTLE_MS,
  BATTERY_DATA_LENGTH,
  BATTERY_LEVEL_UUID,
  HUMIDITY_CONFIG_UUID,
  HUMIDITY_DATA_LENGTH,
  HUMIDITY_DATA_UUID,
  HUMIDITY_SETTLE_MS,
  LUXOMETER_CONFIG_UUID,
  LUXOMETER_DATA_LENGTH,
  LUXOMETER_DATA_UUID,
  LUXOMETER_SETTLE_MS,
  SENSOR_ENABLE,
} from './constants';

/**
 * Default read sequence. Temperature and humidity come from one HDC1000
 * read, so they are adjacent and share handles.
 */
const SENSORTAG_DESCRIPTORS: readonly SensorDescriptor[] = [
  {
    kind: SensorKind.TEMPERATURE,
    activationCommand: SENSOR_ENABLE,
    configHandle: HUMIDITY_CONFIG_UUID,
    dataHandle: HUMIDITY_DATA_UUID,
    settleDelayMs: HUMIDITY_SETTLE_MS,
    unit: UnitCode.CELSIUS,
    expectedLength: HUMIDITY_DATA_LENGTH,
    decode: decodeTemperature,
  },
  {
    kind: SensorKind.HUMIDITY,
    activationCommand: SENSOR_ENABLE,
    configHandle: HUMIDITY_CONFIG_UUID,
    dataHandle: HUMIDITY_DATA_UUID,
    settleDelayMs: HUMIDITY_SETTLE_MS,
    unit: UnitCode.PERCENT,
    expectedLength: HUMIDITY_DATA_LENGTH,
    decode: decodeHumidity,
  },
  {
    kind: SensorKind.PRESSURE,
    activationCommand: SENSOR_ENABLE,
    configHandle: BAROMETER_CONFIG_UUID,
    dataHandle: BAROMETER_DATA_UUID,
    settleDelayMs: BAROMETER_SETTLE_MS,
    unit: UnitCode.HECTOPASCAL,
    expectedLength: BAROMETER_DATA_LENGTH,
    decode: decodePressure,
  },
  {
    kind: SensorKind.ILLUMINANCE,
    activationCommand: SENSOR_ENABLE,
    configHandle: LUXOMETER_CONFIG_UUID,
    dataHandle: LUXOMETER_DATA_UUID,
    settleDelayMs: LUXOMETER_SETTLE_MS,
    unit: UnitCode.LUX,
    expectedLength: LUXOMETER_DATA_LENGTH,
    decode: decodeIlluminance,
  },
  {
    kind: SensorKind.BATTERY,
    activationCommand: null,
    configHandle: null,
    dataHandle: BATTERY_LEVEL_UUID,
    settleDelayMs: 0,
    unit: UnitCode.PERCENT,
    expectedLength: BATTERY_DATA_LENGTH,
    decode: decodeBatteryLevel,
  },
];

/**
 * Build the ordered, read-only descriptor sequence.
 *
 * @param kinds - Optional subset of sensor kinds to poll (registry order is kept)
 * @throws {ConfigError} If a requested kind has no descriptor
 */
export function createSensorRegistry(
  kinds?: readonly SensorKind[]
): readonly SensorDescriptor[] {
  let selected = SENSORTAG_DESCRIPTORS;

  if (kinds) {
    const known = new Set(SENSORTAG_DESCRIPTORS.map((d) => d.kind));
    const unknown = kinds.filter((kind) => !known.has(kind));
    if (unknown.length > 0) {
      throw new ConfigError(`No descriptor for sensor kind(s): ${unknown.join(', ')}`);
    }
    const wanted = new Set(kinds);
    selected = SENSORTAG_DESCRIPTORS.filter((d) => wanted.has(d.kind));
  }

  return Object.freeze(selected.map((d) => Object.freeze({ ...d })));
}

/**
 * Whether two descriptors are served by the same activate/read.
 */
export function sharesRead(a: SensorDescriptor, b: SensorDescriptor): boolean {
  return (
    a.dataHandle === b.dataHandle &&
    a.configHandle === b.configHandle &&
    sameBytes(a.activationCommand, b.activationCommand)
  );
}

function sameBytes(a: Uint8Array | null, b: Uint8Array | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}
