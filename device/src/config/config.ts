export interface DeviceConfig {
  serverUrl: string;
  deviceId: string;
  sampleIntervalMs: number;
  uploadIntervalMs: number;
  displayIntervalMs: number;
  uploadTimeoutMs: number;
  maxUploadAttempts: number;
  gasWarmupMs: number;
  wifiDropRate: number;
  logLevel: string;
}

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function rateFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value || '');
  return Number.isFinite(parsed) && parsed >= 0 && parsed <= 1 ? parsed : fallback;
}

/**
 * Read device settings from the environment (after dotenv has loaded .env).
 */
export function loadDeviceConfig(env: NodeJS.ProcessEnv = process.env): DeviceConfig {
  const config: DeviceConfig = {
    serverUrl: (env.SERVER_URL || 'http://localhost:5001').replace(/\/+$/, ''),
    deviceId: env.DEVICE_ID?.trim() || 'esp32-sim',
    sampleIntervalMs: intFromEnv(env.SAMPLE_INTERVAL_MS, 2000),
    uploadIntervalMs: intFromEnv(env.UPLOAD_INTERVAL_MS, 10000),
    displayIntervalMs: intFromEnv(env.DISPLAY_INTERVAL_MS, 3000),
    uploadTimeoutMs: intFromEnv(env.UPLOAD_TIMEOUT_MS, 1500),
    maxUploadAttempts: intFromEnv(env.MAX_UPLOAD_ATTEMPTS, 3),
    gasWarmupMs: intFromEnv(env.GAS_WARMUP_MS, 60000),
    wifiDropRate: rateFromEnv(env.WIFI_DROP_RATE, 0.02),
    logLevel: env.LOG_LEVEL || 'info',
  };

  if (config.uploadTimeoutMs >= config.sampleIntervalMs) {
    throw new Error(
      `UPLOAD_TIMEOUT_MS (${config.uploadTimeoutMs}) must be shorter than SAMPLE_INTERVAL_MS (${config.sampleIntervalMs})`
    );
  }
  return config;
}
