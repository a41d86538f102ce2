/**
 * Protocol layer exports for SensorTag BLE communication.
 */

export * from './constants';
export * from './codecs';
export * from './registry';
