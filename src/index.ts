/**
 * sensortag-mqtt-bridge - TI SensorTag BLE sensors to MQTT
 *
 * Main entry point exporting the public API.
 */

// Acquisition pipeline
export { DeviceSession, DEFAULT_RETRY_POLICY } from './session';
export type { RetryPolicy, DeviceSessionOptions } from './session';
export { buildMeasurementBatch, deriveAssetId, formatTimestamp } from './batch';
export {
  MeasurementPublisher,
  buildPayload,
  connectBroker,
  topicFor,
  PUBLISH_QOS,
  PUBLISH_RETAIN,
} from './publisher';
export type {
  BrokerClient,
  BrokerOptions,
  ObservationPayload,
  PublishReport,
} from './publisher';
export { AcquisitionLoop, DEFAULT_CYCLE_INTERVAL_MS } from './acquisition';
export type { AcquisitionLoopOptions, CycleResult } from './acquisition';
export { PeriodicScheduler, sleep, isAbortError } from './scheduler';
export type { Sleeper } from './scheduler';
export { loadConfig } from './config';
export type { BridgeConfig } from './config';

// Transport
export { NobleTransport } from './transport/noble-transport';
export type { NobleTransportOptions } from './transport/noble-transport';
export type { GattTransport } from './transport/types';

// Protocol, models and types
export * from './protocol';
export * from './models';

// Exceptions
export * from './exceptions';
