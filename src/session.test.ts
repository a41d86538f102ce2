import { beforeEach, describe, expect, it, vi } from 'vitest';
import { buildMeasurementBatch } from './batch';
import {
  ConnectionError,
  DisconnectError,
  LinkLostError,
  ProtocolError,
} from './exceptions';
import { SensorKind } from './models/enums';
import {
  BAROMETER_CONFIG_UUID,
  HUMIDITY_CONFIG_UUID,
  HUMIDITY_DATA_UUID,
  LUXOMETER_CONFIG_UUID,
  LUXOMETER_DATA_UUID,
} from './protocol/constants';
import { createSensorRegistry } from './protocol/registry';
import { DeviceSession } from './session';
import {
  FakeTransport,
  TAG_ADDRESS,
  recordingSleeper,
  steppingClock,
} from './testing/fakes';

const IDENTITY = { assetId: 'TI-SensorTag-27F186', locationId: 'Lab' };
const FIXED_CLOCK = () => new Date('2026-10-19T08:00:00.000Z');

describe('DeviceSession', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('activates, settles and reads every sensor in order', async () => {
    const transport = new FakeTransport();
    const { sleep, delays } = recordingSleeper();
    const session = new DeviceSession(transport, {
      registry: createSensorRegistry(),
      sleep,
      now: steppingClock(),
    });

    const samples = await session.acquire(TAG_ADDRESS);

    expect(samples.map((s) => s.descriptor.kind)).toEqual([
      SensorKind.TEMPERATURE,
      SensorKind.HUMIDITY,
      SensorKind.PRESSURE,
      SensorKind.ILLUMINANCE,
      SensorKind.BATTERY,
    ]);
    expect(transport.writes).toEqual([
      { handle: HUMIDITY_CONFIG_UUID, data: [0x01], withResponse: true },
      { handle: BAROMETER_CONFIG_UUID, data: [0x01], withResponse: true },
      { handle: LUXOMETER_CONFIG_UUID, data: [0x01], withResponse: true },
    ]);
    expect(delays).toEqual([1800, 1000, 800]);
    expect(transport.connects).toBe(1);
    expect(transport.disconnects).toBe(1);
  });

  it('reads temperature and humidity once with a shared timestamp', async () => {
    const transport = new FakeTransport();
    const session = new DeviceSession(transport, {
      registry: createSensorRegistry(),
      sleep: recordingSleeper().sleep,
      now: steppingClock(),
    });

    const [temperature, humidity, pressure, illuminance, battery] =
      await session.acquire(TAG_ADDRESS);

    expect(transport.reads.filter((h) => h === HUMIDITY_DATA_UUID)).toHaveLength(1);
    expect(humidity.raw).toBe(temperature.raw);
    expect(humidity.capturedAt).toBe(temperature.capturedAt);
    expect(temperature.capturedAt.toISOString()).toBe('2026-10-19T08:00:00.000Z');
    expect(pressure.capturedAt.toISOString()).toBe('2026-10-19T08:00:01.000Z');
    expect(illuminance.capturedAt.toISOString()).toBe('2026-10-19T08:00:02.000Z');
    expect(battery.capturedAt.toISOString()).toBe('2026-10-19T08:00:03.000Z');
  });

  it('restarts the whole sequence after a disconnect', async () => {
    const transport = new FakeTransport();
    transport.dropOnRead.set(1, LUXOMETER_DATA_UUID);
    const { sleep, delays } = recordingSleeper();
    const session = new DeviceSession(transport, {
      registry: createSensorRegistry(),
      retry: { retryDelayMs: 1000 },
      sleep,
      now: FIXED_CLOCK,
    });

    const samples = await session.acquire(TAG_ADDRESS);

    expect(samples).toHaveLength(5);
    expect(transport.writes.map((w) => w.handle)).toEqual([
      HUMIDITY_CONFIG_UUID,
      BAROMETER_CONFIG_UUID,
      LUXOMETER_CONFIG_UUID,
      HUMIDITY_CONFIG_UUID,
      BAROMETER_CONFIG_UUID,
      LUXOMETER_CONFIG_UUID,
    ]);
    expect(delays).toEqual([1800, 1000, 800, 1000, 1800, 1000, 800]);
    expect(transport.connects).toBe(2);
    expect(transport.disconnects).toBe(2);
    expect(transport.doubleReleases).toBe(0);
  });

  it('yields the same batch whether or not a retry happened', async () => {
    const clean = new FakeTransport();
    const flaky = new FakeTransport();
    flaky.dropOnRead.set(1, HUMIDITY_DATA_UUID);
    const options = {
      registry: createSensorRegistry(),
      retry: { retryDelayMs: 0 },
      sleep: recordingSleeper().sleep,
      now: FIXED_CLOCK,
    };

    const fromClean = await new DeviceSession(clean, options).acquire(TAG_ADDRESS);
    const fromFlaky = await new DeviceSession(flaky, options).acquire(TAG_ADDRESS);

    expect(buildMeasurementBatch(fromFlaky, IDENTITY)).toEqual(
      buildMeasurementBatch(fromClean, IDENTITY)
    );
  });

  it('fails with DisconnectError when every attempt disconnects', async () => {
    const transport = new FakeTransport();
    transport.dropOnRead.set(1, LUXOMETER_DATA_UUID);
    transport.dropOnRead.set(2, LUXOMETER_DATA_UUID);
    const session = new DeviceSession(transport, {
      registry: createSensorRegistry(),
      sleep: recordingSleeper().sleep,
    });

    const error = await session.acquire(TAG_ADDRESS).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DisconnectError);
    expect(error).toMatchObject({ attempts: 2 });
    expect(error).toHaveProperty('cause', expect.any(LinkLostError));
    expect(transport.connects).toBe(2);
    expect(transport.disconnects).toBe(2);
    expect(transport.doubleReleases).toBe(0);
  });

  it('does not retry when the policy allows no retries', async () => {
    const transport = new FakeTransport();
    transport.dropOnRead.set(1, HUMIDITY_DATA_UUID);
    const session = new DeviceSession(transport, {
      registry: createSensorRegistry(),
      retry: { maxRetries: 0 },
      sleep: recordingSleeper().sleep,
    });

    await expect(session.acquire(TAG_ADDRESS)).rejects.toMatchObject({
      name: 'DisconnectError',
      attempts: 1,
    });
    expect(transport.connects).toBe(1);
  });

  it('does not retry a failed connect', async () => {
    const transport = new FakeTransport();
    transport.connectError = new Error('adapter busy');
    const session = new DeviceSession(transport, {
      registry: createSensorRegistry(),
      sleep: recordingSleeper().sleep,
    });

    const error = await session.acquire(TAG_ADDRESS).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toHaveProperty(
      'message',
      `Failed to connect to ${TAG_ADDRESS}: adapter busy`
    );
    expect(transport.disconnects).toBe(0);
  });

  it('passes ConnectionError from the transport through unchanged', async () => {
    const transport = new FakeTransport();
    const original = new ConnectionError('Device not found');
    transport.connectError = original;
    const session = new DeviceSession(transport, {
      registry: createSensorRegistry(),
      sleep: recordingSleeper().sleep,
    });

    await expect(session.acquire(TAG_ADDRESS)).rejects.toBe(original);
  });

  it('propagates other errors without retrying and still releases', async () => {
    const transport = new FakeTransport();
    transport.readError = new ProtocolError('Characteristic not found');
    const session = new DeviceSession(transport, {
      registry: createSensorRegistry(),
      sleep: recordingSleeper().sleep,
    });

    await expect(session.acquire(TAG_ADDRESS)).rejects.toBe(transport.readError);
    expect(transport.connects).toBe(1);
    expect(transport.disconnects).toBe(1);
  });

  it('releases the connection when cancelled during a settle delay', async () => {
    const transport = new FakeTransport();
    const controller = new AbortController();
    const session = new DeviceSession(transport, {
      registry: createSensorRegistry(),
      sleep: async (_ms, signal) => {
        controller.abort();
        signal?.throwIfAborted();
      },
    });

    await expect(session.acquire(TAG_ADDRESS, controller.signal)).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(transport.reads).toEqual([]);
    expect(transport.disconnects).toBe(1);
  });

  it('stops without reconnecting when cancelled during the retry pause', async () => {
    const transport = new FakeTransport();
    transport.dropOnRead.set(1, LUXOMETER_DATA_UUID);
    const controller = new AbortController();
    const session = new DeviceSession(transport, {
      registry: createSensorRegistry(),
      retry: { retryDelayMs: 1234 },
      sleep: async (ms, signal) => {
        if (ms === 1234) {
          controller.abort();
        }
        signal?.throwIfAborted();
      },
    });

    await expect(session.acquire(TAG_ADDRESS, controller.signal)).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(transport.connects).toBe(1);
    expect(transport.disconnects).toBe(1);
    expect(transport.doubleReleases).toBe(0);
  });

  it('does not connect when already cancelled', async () => {
    const transport = new FakeTransport();
    const controller = new AbortController();
    controller.abort();
    const session = new DeviceSession(transport, { registry: createSensorRegistry() });

    await expect(session.acquire(TAG_ADDRESS, controller.signal)).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(transport.connects).toBe(0);
  });

  it('logs a failed release without masking the result', async () => {
    const transport = new FakeTransport();
    transport.disconnectError = new Error('already gone');
    const session = new DeviceSession(transport, {
      registry: createSensorRegistry([SensorKind.BATTERY]),
      sleep: recordingSleeper().sleep,
    });

    const samples = await session.acquire(TAG_ADDRESS);

    expect(samples).toHaveLength(1);
    expect(console.warn).toHaveBeenCalledWith(
      `Failed to release connection to ${TAG_ADDRESS}:`,
      transport.disconnectError
    );
  });
});
