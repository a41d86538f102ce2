/**
 * Models layer exports for SensorTag structures.
 */

export * from './enums';
export * from './descriptor';
export * from './measurement';
