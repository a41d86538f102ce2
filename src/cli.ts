#!/usr/bin/env node
/**
 * Command-line entry point: poll a SensorTag and publish to MQTT until
 * interrupted.
 *
 * Usage: sensortag-bridge [hardware-address]
 */

import { AcquisitionLoop } from './acquisition';
import { loadConfig } from './config';
import { createSensorRegistry } from './protocol/registry';
import { MeasurementPublisher, connectBroker } from './publisher';
import { PeriodicScheduler } from './scheduler';
import { DeviceSession } from './session';
import { NobleTransport } from './transport/noble-transport';

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  const config = loadConfig(process.env, argv);

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`\nReceived ${signal}, stopping measurement`);
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  const client = await connectBroker(config.broker);
  try {
    const session = new DeviceSession(
      new NobleTransport({
        scanTimeoutMs: config.scanTimeoutMs,
        connectTimeoutMs: config.connectTimeoutMs,
        gattTimeoutMs: config.gattTimeoutMs,
      }),
      {
        registry: createSensorRegistry(config.sensors),
        retry: config.retry,
      }
    );
    const loop = new AcquisitionLoop({
      session,
      publisher: new MeasurementPublisher(client, config.broker.topicRoot),
      address: config.address,
      locationId: config.locationId,
      scheduler: new PeriodicScheduler(config.intervalMs),
    });

    await loop.run(controller.signal);
  } finally {
    process.removeListener('SIGINT', shutdown);
    process.removeListener('SIGTERM', shutdown);
    await client.endAsync();
  }
}

if (require.main === module) {
  main().then(
    () => process.exit(0),
    (error: unknown) => {
      console.error('Fatal:', error);
      process.exit(1);
    }
  );
}
