import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import axios, { AxiosInstance } from 'axios';
import { Server } from 'http';
import { createApp } from './app';
import { IngestionService } from './services/IngestionService';
import { AggregationEngine } from './services/AggregationEngine';
import { MemoryTimeSeriesStore } from './store/MemoryTimeSeriesStore';
import { TimeSeriesStore } from './store/TimeSeriesStore';
import { StoredReading } from './types/reading';
import { StorageFailure } from './utils/errors';

class UnavailableStore extends MemoryTimeSeriesStore {
  public override async query(): Promise<StoredReading[]> {
    throw new StorageFailure('query', new Error('connection refused'));
  }
}

async function startApp(store: TimeSeriesStore): Promise<{ server: Server; client: AxiosInstance }> {
  const ingestion = new IngestionService(store);
  const aggregation = new AggregationEngine(store);
  const app = createApp({ ingestion, aggregation }, { defaultQueryLimit: 100, maxQueryLimit: 1000 });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  const { port } = address;
  const client = axios.create({
    baseURL: `http://127.0.0.1:${port}`,
    timeout: 2000,
    validateStatus: () => true,
  });
  return { server, client };
}

const first = { temperature: 23.0, humidity: 80.1, gas_raw: 197, gas_digital: true };
const second = { temperature: null, humidity: 80.0, gas_raw: 200, gas_digital: true };

describe('HTTP API', () => {
  let server: Server;
  let api: AxiosInstance;

  beforeEach(async () => {
    ({ server, client: api } = await startApp(new MemoryTimeSeriesStore()));
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('answers health checks', async () => {
    const res = await api.get('/health');
    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({ status: 'healthy', service: 'envtrack-backend' });
  });

  it('stores a reading and returns 201 with the row id', async () => {
    const res = await api.post('/api/sensor-data', first);
    expect(res.status).toBe(201);
    expect(res.data).toEqual({ row_id: 1, epoch: 1 });
  });

  it('rejects an out-of-range gas value with a machine-readable reason', async () => {
    const res = await api.post('/api/sensor-data', { ...first, gas_raw: 2000 });
    expect(res.status).toBe(400);
    expect(res.data.error).toBe('validation_failed');
    expect(res.data.reason).toBe('gas_raw_out_of_range');

    const info = await api.get('/api/store');
    expect(info.data).toEqual({ epoch: 1, row_count: 0, last_row_id: null });
  });

  it('rejects malformed JSON', async () => {
    const res = await api.post('/api/sensor-data', '{"temperature":', {
      headers: { 'Content-Type': 'application/json' },
      transformRequest: [(data) => data],
    });
    expect(res.status).toBe(400);
    expect(res.data.reason).toBe('invalid_json');
  });

  it('lists readings newest first and serves the latest one', async () => {
    await api.post('/api/sensor-data', first);
    await api.post('/api/sensor-data', second);

    const list = await api.get('/api/sensor-data', { params: { limit: 2 } });
    expect(list.status).toBe(200);
    expect(list.data.map((r: StoredReading) => r.row_id)).toEqual([2, 1]);
    expect(list.data[0]).toMatchObject({ temperature: null, humidity: 80, gas_raw: 200, gas_digital: true });

    const latest = await api.get('/api/latest');
    expect(latest.data.row_id).toBe(2);
  });

  it('returns at most limit readings from a range, the newest first', async () => {
    const start = new Date(Date.now() - 60_000).toISOString();
    for (let i = 0; i < 3; i++) {
      await api.post('/api/sensor-data', { ...first, gas_raw: 100 + i });
    }

    const res = await api.get('/api/sensor-data', { params: { start, limit: 2 } });
    expect(res.status).toBe(200);
    expect(res.data.map((r: StoredReading) => r.row_id)).toEqual([3, 2]);
  });

  it('stores a reading whose timestamp is null with the receive time', async () => {
    const res = await api.post('/api/sensor-data', { ...first, timestamp: null });
    expect(res.status).toBe(201);

    const latest = await api.get('/api/latest');
    expect(latest.data.timestamp).toBe(latest.data.received_at);
  });

  it('returns 404 from /api/latest when the store is empty', async () => {
    const res = await api.get('/api/latest');
    expect(res.status).toBe(404);
    expect(res.data).toEqual({ message: 'No data available' });
  });

  it('computes stats over all readings', async () => {
    await api.post('/api/sensor-data', first);
    await api.post('/api/sensor-data', second);

    const res = await api.get('/api/stats', { params: { window: 'all' } });
    expect(res.status).toBe(200);
    expect(res.data.status).toBe('ok');
    expect(res.data.metrics.temperature.mean).toBe(23);
    expect(res.data.metrics.gas_raw.mean).toBe(198.5);
    expect(res.data.correlation.temperature_humidity.value).toBeNull();
  });

  it('reports no_data stats for an empty store', async () => {
    const res = await api.get('/api/stats', { params: { window: 'all' } });
    expect(res.data).toEqual({ status: 'no_data', window: { kind: 'all' }, epoch: 1 });
  });

  it('rejects a malformed stats window', async () => {
    const res = await api.get('/api/stats', { params: { last: 'abc' } });
    expect(res.status).toBe(400);
    expect(res.data.reason).toBe('last_invalid');
  });

  it('rejects a duration no Date can represent', async () => {
    const res = await api.get('/api/stats', { params: { duration: '200000000d' } });
    expect(res.status).toBe(400);
    expect(res.data.reason).toBe('duration_invalid');
  });

  it('requires confirmation before clearing the store', async () => {
    await api.post('/api/sensor-data', first);
    await api.post('/api/sensor-data', first);

    const refused = await api.delete('/api/sensor-data');
    expect(refused.status).toBe(400);
    expect(refused.data.reason).toBe('confirmation_required');

    const cleared = await api.delete('/api/sensor-data', { params: { confirm: 'true' } });
    expect(cleared.status).toBe(200);
    expect(cleared.data).toEqual({ removed: 2, epoch: 2 });

    const again = await api.delete('/api/sensor-data', { params: { confirm: 'true' } });
    expect(again.data).toEqual({ removed: 0, epoch: 3 });
  });

  it('exports readings as CSV', async () => {
    await api.post('/api/sensor-data', { ...first, device_id: 'esp-test' });

    const res = await api.get('/api/sensor-data/export.csv', { responseType: 'text' });
    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toContain('text/csv');
    const lines = String(res.data).split('\r\n');
    expect(lines[0]).toBe('row_id,timestamp,received_at,device_id,temperature,humidity,gas_raw,gas_digital');
    expect(lines[1]).toMatch(/^1,.+,esp-test,23,80\.1,197,true$/);
  });
});

describe('HTTP API with a failing store', () => {
  it('maps StorageFailure to 503', async () => {
    const { server, client } = await startApp(new UnavailableStore());
    try {
      const res = await client.get('/api/sensor-data');
      expect(res.status).toBe(503);
      expect(res.data).toEqual({ error: 'storage_unavailable', reason: 'query' });
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});
