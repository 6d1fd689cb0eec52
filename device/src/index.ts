// Load environment variables FIRST before any other imports
import dotenv from 'dotenv';
dotenv.config();

import { loadDeviceConfig } from './config/config';
import { SensorReader } from './sensors/SensorReader';
import { SimulatedClimateSensor, SimulatedGasSensor } from './sensors/SimulatedSensors';
import { SimulatedWifiLink } from './net/WifiLink';
import { AxiosIngestionClient } from './net/IngestionClient';
import { UplinkAgent } from './uplink/UplinkAgent';
import { StatusDisplay } from './display/StatusDisplay';
import { ConsoleDisplay } from './display/ConsoleDisplay';
import { CooperativeScheduler, systemClock } from './scheduler/CooperativeScheduler';
import { log, logger } from './utils/logger';

const config = loadDeviceConfig();
logger.setLogLevel(config.logLevel);

const bootedAt = systemClock.now();
const reader = new SensorReader(new SimulatedClimateSensor(), new SimulatedGasSensor(), {
  bootedAt,
  gasWarmupMs: config.gasWarmupMs,
});
const uplink = new UplinkAgent(
  reader,
  new AxiosIngestionClient({
    baseUrl: config.serverUrl,
    timeoutMs: config.uploadTimeoutMs,
    deviceId: config.deviceId,
  }),
  new SimulatedWifiLink(config.wifiDropRate),
  { deviceId: config.deviceId, maxAttempts: config.maxUploadAttempts }
);
const display = new StatusDisplay(reader, uplink.getTracker(), new ConsoleDisplay());

const scheduler = new CooperativeScheduler(systemClock);
scheduler.addTask({
  name: 'sample',
  intervalMs: config.sampleIntervalMs,
  timeoutMs: Math.floor(config.sampleIntervalMs / 2),
  run: (now) => reader.sample(now),
});
scheduler.addTask({
  name: 'uplink',
  intervalMs: config.uploadIntervalMs,
  timeoutMs: config.uploadTimeoutMs,
  run: (now) => uplink.tick(now),
});
scheduler.addTask({
  name: 'display',
  intervalMs: config.displayIntervalMs,
  timeoutMs: 250,
  run: (now) => {
    display.tick(now);
  },
});

log.important(` envtrack device "${config.deviceId}" started`, 'index');
log.info(` Uploading to ${config.serverUrl} every ${config.uploadIntervalMs}ms`, 'index');
if (config.gasWarmupMs > 0) {
  log.info(` Gas sensor warming up for ${Math.round(config.gasWarmupMs / 1000)}s`, 'index');
}
scheduler.start();

async function shutdown(signal: string): Promise<void> {
  log.info(` Received ${signal}, stopping device loop...`, 'index');
  await scheduler.stop();
  const state = uplink.getTracker().snapshot();
  log.info(
    ` Uploads: ${state.totalUploadsSucceeded}/${state.totalUploadsAttempted} ok, ${state.totalUploadsDropped} dropped`,
    'index'
  );
  process.exit(0);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
