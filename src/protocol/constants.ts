/**
 * BLE protocol constants for the TI SensorTag CC2650.
 *
 * Characteristic identifiers use noble's normalized UUID form
 * (lowercase hex, no dashes).
 */

/**
 * Expand a 16-bit TI sensor id into the SensorTag 128-bit base UUID.
 */
function tiUuid(shortId: number): string {
  return `f000${shortId.toString(16).padStart(4, '0')}04514000b000000000000000`;
}

// HDC1000 - temperature + humidity
export const HUMIDITY_DATA_UUID = tiUuid(0xaa21);
export const HUMIDITY_CONFIG_UUID = tiUuid(0xaa22);

// BMP280 - barometric pressure
export const BAROMETER_DATA_UUID = tiUuid(0xaa41);
export const BAROMETER_CONFIG_UUID = tiUuid(0xaa42);

// OPT3001 - illuminance
export const LUXOMETER_DATA_UUID = tiUuid(0xaa71);
export const LUXOMETER_CONFIG_UUID = tiUuid(0xaa72);

// Standard GATT battery service
export const BATTERY_LEVEL_UUID = '2a19';

/**
 * Written to a sensor config characteristic to start measuring.
 */
export const SENSOR_ENABLE = Uint8Array.of(0x01);

// Settle delays (milliseconds)
export const HUMIDITY_SETTLE_MS = 1800;
export const BAROMETER_SETTLE_MS = 1000;
export const LUXOMETER_SETTLE_MS = 800;

// Data characteristic lengths (bytes)
export const HUMIDITY_DATA_LENGTH = 4;
export const BAROMETER_DATA_LENGTH = 6;
export const LUXOMETER_DATA_LENGTH = 2;
export const BATTERY_DATA_LENGTH = 1;

/**
 * Leading temperature-compensation block skipped in barometer data.
 */
export const BAROMETER_PRESSURE_OFFSET = 3;
