/**
 * Runtime configuration from environment variables and CLI arguments.
 */

import { z } from 'zod';
import { ConfigError } from './exceptions';
import { SensorKind } from './models/enums';

export const DEFAULT_ADDRESS = '98:07:2D:27:F1:86';
export const DEFAULT_LOCATION_ID = 'Labor_ColorSorter_Umgebung';
export const DEFAULT_TOPIC_ROOT = 'Factory/ColorSorter/ConditionMonitoring';

const MAC_ADDRESS = /^([0-9A-Fa-f]{2}:){5}[0-9A-Fa-f]{2}$/;

const intFrom = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const sensorList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  )
  .pipe(z.array(z.nativeEnum(SensorKind)).min(1));

const EnvSchema = z.object({
  SENSORTAG_ADDRESS: z.string().regex(MAC_ADDRESS).default(DEFAULT_ADDRESS),
  SENSORTAG_LOCATION_ID: z.string().min(1).default(DEFAULT_LOCATION_ID),
  SENSORTAG_SENSORS: sensorList.optional(),
  SENSORTAG_INTERVAL_MS: intFrom(60000, 1),
  SENSORTAG_SCAN_TIMEOUT_MS: intFrom(20000, 1),
  SENSORTAG_CONNECT_TIMEOUT_MS: intFrom(30000, 1),
  SENSORTAG_GATT_TIMEOUT_MS: intFrom(10000, 1),
  SENSORTAG_RETRY_DELAY_MS: intFrom(1000, 0),
  SENSORTAG_MAX_RETRIES: intFrom(1, 0),
  MQTT_HOST: z.string().min(1).default('localhost'),
  MQTT_PORT: z.coerce.number().int().min(1).max(65535).default(1883),
  MQTT_TOPIC_ROOT: z.string().min(1).default(DEFAULT_TOPIC_ROOT),
  MQTT_CLIENT_ID: z.string().min(1).default('colorsorter-sensor-01'),
  MQTT_KEEPALIVE: intFrom(60, 0),
});

export interface BridgeConfig {
  address: string;
  locationId: string;

  /**
   * Subset of sensors to poll; all when undefined
   */
  sensors?: SensorKind[];

  intervalMs: number;
  scanTimeoutMs: number;
  connectTimeoutMs: number;
  gattTimeoutMs: number;
  retry: { maxRetries: number; retryDelayMs: number };
  broker: {
    host: string;
    port: number;
    topicRoot: string;
    clientId: string;
    keepalive: number;
  };
}

/**
 * Load configuration. The first CLI argument, when given, overrides the
 * configured hardware address.
 *
 * @param env - Environment variables (usually process.env)
 * @param argv - CLI arguments after the script name
 * @throws {ConfigError} If any value is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined>,
  argv: readonly string[] = []
): BridgeConfig {
  const input = { ...env };
  if (argv.length > 0) {
    input.SENSORTAG_ADDRESS = argv[0];
  }

  // Blank variables count as unset
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined && value.trim() === '') {
      delete input[key];
    }
  }

  const result = EnvSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const parsed = result.data;
  return {
    address: parsed.SENSORTAG_ADDRESS,
    locationId: parsed.SENSORTAG_LOCATION_ID,
    sensors: parsed.SENSORTAG_SENSORS,
    intervalMs: parsed.SENSORTAG_INTERVAL_MS,
    scanTimeoutMs: parsed.SENSORTAG_SCAN_TIMEOUT_MS,
    connectTimeoutMs: parsed.SENSORTAG_CONNECT_TIMEOUT_MS,
    gattTimeoutMs: parsed.SENSORTAG_GATT_TIMEOUT_MS,
    retry: {
      maxRetries: parsed.SENSORTAG_MAX_RETRIES,
      retryDelayMs: parsed.SENSORTAG_RETRY_DELAY_MS,
    },
    broker: {
      host: parsed.MQTT_HOST,
      port: parsed.MQTT_PORT,
      topicRoot: parsed.MQTT_TOPIC_ROOT,
      clientId: parsed.MQTT_CLIENT_ID,
      keepalive: parsed.MQTT_KEEPALIVE,
    },
  };
}
