/**
 * noble connection wrapper for SensorTag devices.
 *
 * Provides the GattTransport operations over a local BLE adapter:
 * - Adapter power-on wait and address-filtered scanning
 * - Characteristic lookup by UUID
 * - Disconnect detection during reads and writes
 * - Deadlines on connect, discovery and GATT operations
 */

import noble from '@abandonware/noble';
import type { Characteristic, Peripheral } from '@abandonware/noble';
import { ConnectionError, LinkLostError, ProtocolError } from '../exceptions';
import { isAbortError } from '../scheduler';
import type { GattTransport } from './types';

/**
 * Connection options for the noble transport.
 */
export interface NobleTransportOptions {
  /**
   * How long to wait for the adapter and the advertisement (default: 20000)
   */
  scanTimeoutMs?: number;

  /**
   * Bound on connecting and discovering characteristics (default: 30000)
   */
  connectTimeoutMs?: number;

  /**
   * Bound on a single characteristic read or write (default: 10000)
   */
  gattTimeoutMs?: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Settle with `op`, or reject with `onTimeout()` after `ms`, or with the
 * signal's reason when it aborts first.
 */
async function withDeadline<T>(
  op: Promise<T>,
  ms: number,
  onTimeout: () => Error,
  signal?: AbortSignal
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const expired = new Promise<never>((_, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    timeoutId = setTimeout(() => reject(onTimeout()), ms);
    if (signal) {
      onAbort = () => reject(signal.reason);
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([op, expired]);
  } finally {
    clearTimeout(timeoutId);
    if (signal && onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * BLE connection manager for one SensorTag at a time.
 */
export class NobleTransport implements GattTransport {
  static readonly DEFAULT_SCAN_TIMEOUT_MS = 20000;
  static readonly DEFAULT_CONNECT_TIMEOUT_MS = 30000;
  static readonly DEFAULT_GATT_TIMEOUT_MS = 10000;

  private readonly scanTimeoutMs: number;
  private readonly connectTimeoutMs: number;
  private readonly gattTimeoutMs: number;
  private peripheral: Peripheral | null = null;
  private characteristics = new Map<string, Characteristic>();
  private disconnectHandler: (() => void) | null = null;

  constructor(options: NobleTransportOptions = {}) {
    this.scanTimeoutMs = options.scanTimeoutMs ?? NobleTransport.DEFAULT_SCAN_TIMEOUT_MS;
    this.connectTimeoutMs =
      options.connectTimeoutMs ?? NobleTransport.DEFAULT_CONNECT_TIMEOUT_MS;
    this.gattTimeoutMs = options.gattTimeoutMs ?? NobleTransport.DEFAULT_GATT_TIMEOUT_MS;
  }

  /**
   * Check if currently connected to a device.
   */
  get isConnected(): boolean {
    return this.peripheral?.state === 'connected';
  }

  /**
   * Scan for the device, connect and discover its characteristics.
   *
   * @param signal - Aborts scanning, connecting and discovery
   * @throws {ConnectionError} If the device is not found, or connecting or
   *   discovery fails or times out
   */
  async connect(address: string, signal?: AbortSignal): Promise<void> {
    if (this.peripheral) {
      throw new ConnectionError('Already connected; disconnect first');
    }

    try {
      const peripheral = await withDeadline(
        this.findPeripheral(address),
        this.scanTimeoutMs + this.connectTimeoutMs,
        () => new ConnectionError(`Scan for ${address} did not finish`),
        signal
      );
      this.peripheral = peripheral;

      await withDeadline(
        peripheral.connectAsync(),
        this.connectTimeoutMs,
        () =>
          new ConnectionError(
            `Connection to ${address} timed out after ${this.connectTimeoutMs}ms`
          ),
        signal
      );

      this.disconnectHandler = this.handleDisconnect.bind(this);
      peripheral.once('disconnect', this.disconnectHandler);

      const { characteristics } = await withDeadline(
        peripheral.discoverAllServicesAndCharacteristicsAsync(),
        this.connectTimeoutMs,
        () =>
          new ConnectionError(
            `Discovery on ${address} timed out after ${this.connectTimeoutMs}ms`
          ),
        signal
      );
      for (const characteristic of characteristics) {
        this.characteristics.set(characteristic.uuid, characteristic);
      }

      console.log(
        `Connected to ${peripheral.advertisement.localName || address} ` +
          `(${characteristics.length} characteristics)`
      );
    } catch (error) {
      await this.abandon();
      if (error instanceof ConnectionError || isAbortError(error, signal)) {
        throw error;
      }
      throw new ConnectionError(
        `Failed to connect to ${address}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Disconnect from the device.
   */
  async disconnect(): Promise<void> {
    const peripheral = this.peripheral;
    try {
      if (peripheral && peripheral.state !== 'disconnected') {
        await peripheral.disconnectAsync();
      }
    } finally {
      this.cleanup();
    }
  }

  /**
   * Drop a half-open connection after a failed connect.
   */
  private async abandon(): Promise<void> {
    if (this.peripheral?.state === 'connecting') {
      this.peripheral.cancelConnect();
      this.cleanup();
      return;
    }
    await this.disconnect();
  }

  async write(handle: string, data: Uint8Array, withResponse: boolean): Promise<void> {
    const characteristic = this.requireCharacteristic(handle);
    await this.guarded(`write ${handle}`, () =>
      characteristic.writeAsync(Buffer.from(data), !withResponse)
    );
  }

  async read(handle: string): Promise<Uint8Array> {
    const characteristic = this.requireCharacteristic(handle);
    return this.guarded(`read ${handle}`, () => characteristic.readAsync());
  }

  /**
   * Run a GATT operation, failing with LinkLostError if the peripheral
   * disconnects or stays silent past the GATT timeout.
   */
  private async guarded<T>(what: string, op: () => Promise<T>): Promise<T> {
    const peripheral = this.requirePeripheral(what);

    let onDisconnect: (() => void) | undefined;
    const lost = new Promise<never>((_, reject) => {
      onDisconnect = () => reject(new LinkLostError(`Link lost during ${what}`));
      peripheral.once('disconnect', onDisconnect);
    });

    try {
      return await withDeadline(
        Promise.race([op(), lost]),
        this.gattTimeoutMs,
        () => new LinkLostError(`No reply to ${what} within ${this.gattTimeoutMs}ms`)
      );
    } catch (error) {
      if (error instanceof LinkLostError) {
        throw error;
      }
      if (peripheral.state !== 'connected') {
        throw new LinkLostError(`Link lost during ${what}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
      throw new ProtocolError(`Failed to ${what}: ${errorMessage(error)}`, { cause: error });
    } finally {
      if (onDisconnect) {
        peripheral.removeListener('disconnect', onDisconnect);
      }
    }
  }

  private requirePeripheral(what: string): Peripheral {
    if (!this.peripheral) {
      throw new ConnectionError(`Cannot ${what}: not connected to device`);
    }
    if (this.peripheral.state !== 'connected') {
      throw new LinkLostError(`Cannot ${what}: link is ${this.peripheral.state}`);
    }
    return this.peripheral;
  }

  private requireCharacteristic(handle: string): Characteristic {
    this.requirePeripheral(`access ${handle}`);
    const characteristic = this.characteristics.get(handle);
    if (!characteristic) {
      throw new ProtocolError(`Characteristic ${handle} not found on device`);
    }
    return characteristic;
  }

  /**
   * Scan until a peripheral with the given address advertises.
   */
  private async findPeripheral(address: string): Promise<Peripheral> {
    await this.waitForPoweredOn();

    const target = address.toLowerCase();
    let onDiscover: ((peripheral: Peripheral) => void) | undefined;
    let timeoutId: NodeJS.Timeout | undefined;

    const found = new Promise<Peripheral>((resolve, reject) => {
      onDiscover = (peripheral: Peripheral) => {
        if (peripheral.address.toLowerCase() === target) {
          resolve(peripheral);
        }
      };
      noble.on('discover', onDiscover);
      timeoutId = setTimeout(() => {
        reject(
          new ConnectionError(
            `Device ${address} not found within ${this.scanTimeoutMs}ms`
          )
        );
      }, this.scanTimeoutMs);
    });

    try {
      console.debug(`Scanning for ${address}`);
      const [, peripheral] = await Promise.all([
        noble.startScanningAsync([], false),
        found,
      ]);
      return peripheral;
    } finally {
      clearTimeout(timeoutId);
      if (onDiscover) {
        noble.removeListener('discover', onDiscover);
      }
      await noble.stopScanningAsync();
    }
  }

  private async waitForPoweredOn(): Promise<void> {
    if (noble._state === 'poweredOn') {
      return;
    }

    let onStateChange: ((state: string) => void) | undefined;
    let timeoutId: NodeJS.Timeout | undefined;

    try {
      await new Promise<void>((resolve, reject) => {
        onStateChange = (state: string) => {
          if (state === 'poweredOn') {
            resolve();
          }
        };
        noble.on('stateChange', onStateChange);
        timeoutId = setTimeout(() => {
          reject(
            new ConnectionError(
              `Bluetooth adapter not powered on within ${this.scanTimeoutMs}ms ` +
                `(state: ${noble._state})`
            )
          );
        }, this.scanTimeoutMs);
      });
    } finally {
      clearTimeout(timeoutId);
      if (onStateChange) {
        noble.removeListener('stateChange', onStateChange);
      }
    }
  }

  /**
   * Handle device disconnection.
   */
  private handleDisconnect(): void {
    console.log('Device disconnected');
    this.disconnectHandler = null;
  }

  /**
   * Clean up resources and reset state.
   */
  private cleanup(): void {
    if (this.peripheral && this.disconnectHandler) {
      this.peripheral.removeListener('disconnect', this.disconnectHandler);
    }
    this.disconnectHandler = null;
    this.characteristics.clear();
    this.peripheral = null;
  }
}
