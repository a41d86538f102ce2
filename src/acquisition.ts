/**
 * Periodic acquisition and publication.
 */

import { buildMeasurementBatch, deriveAssetId } from './batch';
import { SensorTagError } from './exceptions';
import type { MeasurementRecord } from './models/measurement';
import type { MeasurementPublisher, PublishReport } from './publisher';
import { PeriodicScheduler, isAbortError } from './scheduler';
import type { DeviceSession } from './session';

export const DEFAULT_CYCLE_INTERVAL_MS = 60000;

export type CycleResult =
  | { ok: true; records: MeasurementRecord[]; report: PublishReport }
  | { ok: false; error: SensorTagError };

export interface AcquisitionLoopOptions {
  session: DeviceSession;
  publisher: MeasurementPublisher;

  /**
   * Hardware address of the tag
   */
  address: string;

  locationId: string;

  /**
   * Defaults to a 60 s PeriodicScheduler
   */
  scheduler?: PeriodicScheduler;
}

/**
 * Drives acquisition cycles: read all sensors, build the batch, publish it.
 *
 * A failed cycle is logged and the loop carries on with the next one; only
 * aborting the signal stops it.
 */
export class AcquisitionLoop {
  private readonly scheduler: PeriodicScheduler;
  private readonly assetId: string;

  constructor(private readonly options: AcquisitionLoopOptions) {
    this.scheduler =
      options.scheduler ?? new PeriodicScheduler(DEFAULT_CYCLE_INTERVAL_MS);
    this.assetId = deriveAssetId(options.address);
  }

  /**
   * Run one acquisition cycle.
   *
   * Connection, disconnect, decode and other device errors end the cycle
   * and are returned as a failed result.
   *
   * @throws Abort reasons and unexpected (non-SensorTagError) errors
   */
  async runCycle(signal?: AbortSignal): Promise<CycleResult> {
    const { session, publisher, address, locationId } = this.options;

    let records: MeasurementRecord[];
    try {
      const samples = await session.acquire(address, signal);
      records = buildMeasurementBatch(samples, { assetId: this.assetId, locationId });
    } catch (error) {
      if (!(error instanceof SensorTagError)) {
        throw error;
      }
      console.error(`Acquisition cycle failed: ${error.name}: ${error.message}`, {
        cause: error.cause,
      });
      return { ok: false, error };
    }

    for (const record of records) {
      console.log(
        `${record.timestamp} ${record.sensorType} = ${record.value} ${record.unit}`
      );
    }

    const report = await publisher.publishBatch(records);
    console.log(
      `Published ${report.published}/${records.length} measurements to ${publisher.topicRoot}`
    );

    return { ok: true, records, report };
  }

  /**
   * Run cycles until the signal aborts.
   */
  async run(signal: AbortSignal): Promise<void> {
    console.log(
      `Starting acquisition for ${this.assetId} every ${this.scheduler.intervalMs}ms`
    );

    await this.scheduler.run(async () => {
      try {
        await this.runCycle(signal);
      } catch (error) {
        if (isAbortError(error, signal)) {
          return;
        }
        throw error;
      }
    }, signal);

    console.log('Acquisition stopped');
  }
}
