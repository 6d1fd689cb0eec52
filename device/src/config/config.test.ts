import { describe, expect, it } from 'vitest';
import { loadDeviceConfig } from './config';

describe('loadDeviceConfig', () => {
  it('uses the reference cadence by default', () => {
    expect(loadDeviceConfig({})).toEqual({
      serverUrl: 'http://localhost:5001',
      deviceId: 'esp32-sim',
      sampleIntervalMs: 2000,
      uploadIntervalMs: 10000,
      displayIntervalMs: 3000,
      uploadTimeoutMs: 1500,
      maxUploadAttempts: 3,
      gasWarmupMs: 60000,
      wifiDropRate: 0.02,
      logLevel: 'info',
    });
  });

  it('reads overrides and strips trailing slashes from the server URL', () => {
    const config = loadDeviceConfig({
      SERVER_URL: 'http://192.168.1.20:5001/',
      DEVICE_ID: ' greenhouse-1 ',
      UPLOAD_INTERVAL_MS: '30000',
      MAX_UPLOAD_ATTEMPTS: '5',
      WIFI_DROP_RATE: '0',
    });

    expect(config.serverUrl).toBe('http://192.168.1.20:5001');
    expect(config.deviceId).toBe('greenhouse-1');
    expect(config.uploadIntervalMs).toBe(30000);
    expect(config.maxUploadAttempts).toBe(5);
    expect(config.wifiDropRate).toBe(0);
  });

  it('ignores malformed numbers', () => {
    const config = loadDeviceConfig({ SAMPLE_INTERVAL_MS: 'soon', WIFI_DROP_RATE: '2' });

    expect(config.sampleIntervalMs).toBe(2000);
    expect(config.wifiDropRate).toBe(0.02);
  });

  it('requires the upload timeout to be shorter than the sampling interval', () => {
    expect(() => loadDeviceConfig({ UPLOAD_TIMEOUT_MS: '2000' })).toThrowError(
      'UPLOAD_TIMEOUT_MS (2000) must be shorter than SAMPLE_INTERVAL_MS (2000)'
    );
  });
});
