/**
 * Measurement batch assembly.
 */

import type { RawSample } from './models/descriptor';
import type { MeasurementIdentity, MeasurementRecord } from './models/measurement';

const ASSET_PREFIX = 'TI-SensorTag-';

/**
 * Derive the asset id from a hardware address.
 *
 * @example
 * ```typescript
 * deriveAssetId('98:07:2D:27:F1:86'); // 'TI-SensorTag-27F186'
 * ```
 */
export function deriveAssetId(address: string): string {
  return ASSET_PREFIX + address.replace(/:/g, '').slice(-6);
}

/**
 * Format a capture time as ISO-8601 UTC with second precision.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Decode raw samples into measurement records, preserving order.
 *
 * All-or-nothing: the first DecodeError aborts the batch, since a malformed
 * sample means the read sequence is out of step with the device.
 *
 * @throws {DecodeError} If any sample does not match its descriptor's layout
 */
export function buildMeasurementBatch(
  samples: readonly RawSample[],
  identity: MeasurementIdentity
): MeasurementRecord[] {
  const records = samples.map(({ descriptor, raw, capturedAt }) =>
    Object.freeze<MeasurementRecord>({
      assetId: identity.assetId,
      locationId: identity.locationId,
      sensorType: descriptor.kind,
      value: descriptor.decode(raw),
      unit: descriptor.unit,
      timestamp: formatTimestamp(capturedAt),
    })
  );
  return records;
}
