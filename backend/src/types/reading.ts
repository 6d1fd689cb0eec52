// Reading-related type definitions

/**
 * One sampled snapshot as accepted by the ingestion endpoint.
 * `temperature` / `humidity` are null when the climate sensor faulted.
 */
export interface Reading {
  timestamp: Date | null; // device-local time, null when the device sent none
  device_id: string;
  temperature: number | null; // °C
  humidity: number | null; // % RH
  gas_raw: number; // ADC counts, 0-1023
  gas_digital: boolean;
  uptime_ms: number | null;
}

export interface StoredReading {
  row_id: number;
  timestamp: string; // device timestamp, or received_at when absent
  received_at: string;
  device_id: string;
  temperature: number | null;
  humidity: number | null;
  gas_raw: number;
  gas_digital: boolean;
  uptime_ms: number | null;
}

export interface StoreInfo {
  epoch: number;
  row_count: number;
  last_row_id: number | null;
}

export interface TruncateResult {
  removed: number;
  epoch: number;
}

export interface AppendResult {
  reading: StoredReading;
  epoch: number;
}

/** Rows and the epoch they belong to, read from one consistent state. */
export interface StoreSnapshot {
  rows: StoredReading[];
  epoch: number;
}
