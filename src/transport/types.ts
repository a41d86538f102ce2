/**
 * BLE transport boundary used by the device session.
 */

/**
 * GATT operations on one peripheral.
 *
 * Implementations throw LinkLostError when the link drops during an
 * operation, and ConnectionError when connect() cannot establish it.
 */
export interface GattTransport {
  /**
   * Connect to the peripheral with the given hardware address.
   *
   * Rejects with the signal's reason when it aborts before the link is up.
   */
  connect(address: string, signal?: AbortSignal): Promise<void>;

  /**
   * Write a characteristic value.
   *
   * @param handle - Characteristic identifier
   * @param data - Value to write
   * @param withResponse - Wait for the peripheral's write acknowledgment
   */
  write(handle: string, data: Uint8Array, withResponse: boolean): Promise<void>;

  /**
   * Read a characteristic value.
   */
  read(handle: string): Promise<Uint8Array>;

  /**
   * Release the link. Safe to call when not connected.
   */
  disconnect(): Promise<void>;
}
