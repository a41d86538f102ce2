/**
 * Enums for SensorTag measurements.
 */

/**
 * Sensor types. The value doubles as the type identifier in payloads and topics.
 */
export enum SensorKind {
  TEMPERATURE = 'Temperature',
  HUMIDITY = 'Humidity',
  PRESSURE = 'Pressure',
  ILLUMINANCE = 'Illuminance',
  BATTERY = 'Battery',
}

/**
 * UN/CEFACT common codes for measurement units.
 */
export enum UnitCode {
  CELSIUS = 'CEL',
  PERCENT = 'P1',
  HECTOPASCAL = 'A97',
  LUX = 'LUX',
}
