// Device-side reading and wire types

export interface Reading {
  sampleNumber: number; // increments on every successful sample
  sampledAt: Date;
  uptimeMs: number;
  temperature: number | null; // °C, null on sensor fault
  humidity: number | null; // % RH, null on sensor fault
  gasRaw: number; // ADC counts, 0-1023
  gasDigital: boolean;
  gasWarmingUp: boolean; // gas value is low-confidence until warm-up ends
}

/** JSON body accepted by POST /api/sensor-data */
export interface ReadingPayload {
  device_id: string;
  temperature: number | null;
  humidity: number | null;
  gas_raw: number;
  gas_digital: boolean;
  timestamp: string;
  uptime_ms: number;
}

export function toPayload(reading: Reading, deviceId: string): ReadingPayload {
  return {
    device_id: deviceId,
    temperature: reading.temperature,
    humidity: reading.humidity,
    gas_raw: reading.gasRaw,
    gas_digital: reading.gasDigital,
    timestamp: reading.sampledAt.toISOString(),
    uptime_ms: Math.round(reading.uptimeMs),
  };
}
