/**
 * SensorTag acquisition session.
 */

import { ConnectionError, DisconnectError, LinkLostError } from './exceptions';
import type { RawSample, SensorDescriptor } from './models/descriptor';
import { sharesRead } from './protocol/registry';
import { isAbortError, sleep, type Sleeper } from './scheduler';
import type { GattTransport } from './transport/types';

/**
 * Whole-sequence retry on a dropped link.
 */
export interface RetryPolicy {
  /**
   * Extra attempts after the first one (default: 1)
   */
  maxRetries: number;

  /**
   * Pause before reconnecting, lets the radio link settle (default: 1000)
   */
  retryDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxRetries: 1,
  retryDelayMs: 1000,
};

export interface DeviceSessionOptions {
  registry: readonly SensorDescriptor[];
  retry?: Partial<RetryPolicy>;

  /**
   * Timed wait for settle and retry delays (default: real timers)
   */
  sleep?: Sleeper;

  /**
   * Clock used for capture timestamps
   */
  now?: () => Date;
}

/**
 * Reads every descriptor of a registry over one BLE connection.
 *
 * Each descriptor is activated, given its settle delay and read, strictly
 * in registry order. Adjacent descriptors on the same characteristic share
 * one read and one capture timestamp. When the link drops the partial
 * result is discarded and the whole sequence restarts on a fresh
 * connection, up to `retry.maxRetries` times.
 *
 * @example
 * ```typescript
 * const session = new DeviceSession(new NobleTransport(), {
 *   registry: createSensorRegistry(),
 * });
 * const samples = await session.acquire('98:07:2D:27:F1:86');
 * ```
 */
export class DeviceSession {
  private readonly registry: readonly SensorDescriptor[];
  private readonly retry: RetryPolicy;
  private readonly sleep: Sleeper;
  private readonly now: () => Date;

  constructor(
    private readonly transport: GattTransport,
    options: DeviceSessionOptions
  ) {
    this.registry = options.registry;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Acquire one raw sample per descriptor.
   *
   * The connection is released before this resolves or rejects, on every
   * attempt.
   *
   * @param address - Hardware address of the tag
   * @param signal - Aborts connecting, settle and retry waits
   * @throws {ConnectionError} If the link cannot be established
   * @throws {DisconnectError} If the link drops on every attempt
   */
  async acquire(address: string, signal?: AbortSignal): Promise<RawSample[]> {
    const maxAttempts = this.retry.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.acquireOnce(address, signal);
      } catch (error) {
        if (!(error instanceof LinkLostError)) {
          throw error;
        }
        if (attempt >= maxAttempts) {
          throw new DisconnectError(
            `Link to ${address} lost on ${attempt} of ${maxAttempts} attempt(s): ${error.message}`,
            attempt,
            { cause: error }
          );
        }

        console.warn(
          `Disconnected during read (attempt ${attempt}/${maxAttempts}), ` +
            `retrying in ${this.retry.retryDelayMs}ms`
        );
        await this.sleep(this.retry.retryDelayMs, signal);
      }
    }
  }

  private async acquireOnce(address: string, signal?: AbortSignal): Promise<RawSample[]> {
    signal?.throwIfAborted();

    try {
      await this.transport.connect(address, signal);
    } catch (error) {
      if (error instanceof ConnectionError || isAbortError(error, signal)) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConnectionError(`Failed to connect to ${address}: ${reason}`, {
        cause: error,
      });
    }

    try {
      return await this.readAll(signal);
    } finally {
      await this.release(address);
    }
  }

  private async readAll(signal?: AbortSignal): Promise<RawSample[]> {
    const samples: RawSample[] = [];

    let start = 0;
    while (start < this.registry.length) {
      const lead = this.registry[start];
      let end = start + 1;
      while (end < this.registry.length && sharesRead(lead, this.registry[end])) {
        end++;
      }

      const { raw, capturedAt } = await this.readSensor(lead, signal);
      for (const descriptor of this.registry.slice(start, end)) {
        samples.push({ descriptor, raw, capturedAt });
      }
      start = end;
    }

    return samples;
  }

  /**
   * Activate, wait for the sensor to settle, then read.
   */
  private async readSensor(
    descriptor: SensorDescriptor,
    signal?: AbortSignal
  ): Promise<{ raw: Uint8Array; capturedAt: Date }> {
    signal?.throwIfAborted();

    if (descriptor.activationCommand && descriptor.configHandle) {
      await this.transport.write(descriptor.configHandle, descriptor.activationCommand, true);
      await this.sleep(descriptor.settleDelayMs, signal);
    }

    const raw = await this.transport.read(descriptor.dataHandle);
    const capturedAt = this.now();

    console.debug(`Read ${descriptor.kind}: ${raw.length} bytes`);
    return { raw, capturedAt };
  }

  private async release(address: string): Promise<void> {
    try {
      await this.transport.disconnect();
    } catch (error) {
      console.warn(`Failed to release connection to ${address}:`, error);
    }
  }
}
