/**
 * MQTT publishing of measurement records.
 */

import { connectAsync, type MqttClient } from 'mqtt';
import { PublishError } from './exceptions';
import type { MeasurementRecord } from './models/measurement';

/**
 * Publish policy: fire-and-forget delivery, last value retained per topic.
 */
export const PUBLISH_QOS = 0;
export const PUBLISH_RETAIN = true;

/**
 * The broker capability the publisher needs. Satisfied by mqtt's MqttClient.
 */
export interface BrokerClient {
  publishAsync(
    topic: string,
    message: string,
    opts: { qos: 0 | 1 | 2; retain: boolean }
  ): Promise<unknown>;
}

/**
 * Broker connection settings.
 */
export interface BrokerOptions {
  host: string;
  port: number;
  clientId: string;

  /**
   * Keepalive interval in seconds
   */
  keepalive: number;
}

/**
 * Observation payload published per measurement.
 */
export interface ObservationPayload {
  Observation: {
    AssetID: string;
    SensorTypeCode: string;
    LocationID: string;
    MeasureContent: number;
    MeasureUnitCode: string;
    DateTime: string;
  };
}

/**
 * Outcome of publishing one batch.
 */
export interface PublishReport {
  published: number;
  failed: PublishError[];
}

/**
 * Build the topic for a sensor type: `{root}/{sensorTypeNoSpaces}`.
 */
export function topicFor(root: string, sensorType: string): string {
  return `${root}/${sensorType.replace(/\s+/g, '')}`;
}

export function buildPayload(record: MeasurementRecord): ObservationPayload {
  return {
    Observation: {
      AssetID: record.assetId,
      SensorTypeCode: record.sensorType,
      LocationID: record.locationId,
      MeasureContent: record.value,
      MeasureUnitCode: record.unit,
      DateTime: record.timestamp,
    },
  };
}

/**
 * Open the long-lived broker connection shared by all cycles.
 */
export async function connectBroker(options: BrokerOptions): Promise<MqttClient> {
  const url = `mqtt://${options.host}:${options.port}`;
  console.log(`Connecting to broker ${url} as ${options.clientId}`);
  return connectAsync(url, {
    clientId: options.clientId,
    keepalive: options.keepalive,
  });
}

/**
 * Publishes measurement records, one message per record.
 */
export class MeasurementPublisher {
  constructor(
    private readonly client: BrokerClient,
    readonly topicRoot: string
  ) {}

  /**
   * Publish every record. A failed publish is logged and reported; it does
   * not stop the remaining records.
   */
  async publishBatch(records: readonly MeasurementRecord[]): Promise<PublishReport> {
    const report: PublishReport = { published: 0, failed: [] };

    for (const record of records) {
      const topic = topicFor(this.topicRoot, record.sensorType);
      try {
        await this.client.publishAsync(topic, JSON.stringify(buildPayload(record)), {
          qos: PUBLISH_QOS,
          retain: PUBLISH_RETAIN,
        });
        report.published++;
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        const failure = new PublishError(`Failed to publish to ${topic}: ${reason}`, topic, {
          cause: error,
        });
        console.error(failure.message);
        report.failed.push(failure);
      }
    }

    return report;
  }
}
