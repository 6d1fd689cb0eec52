import axios, { AxiosAdapter, AxiosInstance, AxiosResponse, isAxiosError } from 'axios';
import { ReadingPayload } from '../types/reading';
import { UploadFailure } from '../utils/errors';

export interface IngestionResult {
  status: number;
  rowId: number | null;
}

export interface IngestionClient {
  /** Resolves on 2xx; rejects with UploadFailure otherwise. */
  send(payload: ReadingPayload): Promise<IngestionResult>;
}

export interface AxiosIngestionClientOptions {
  baseUrl: string;
  timeoutMs: number;
  deviceId: string;
  adapter?: AxiosAdapter;
}

const INGEST_PATH = '/api/sensor-data';

function rowIdFrom(data: unknown): number | null {
  if (typeof data === 'object' && data !== null && 'row_id' in data && typeof data.row_id === 'number') {
    return data.row_id;
  }
  return null;
}

function reasonFrom(data: unknown): string | null {
  if (typeof data === 'object' && data !== null && 'reason' in data && typeof data.reason === 'string') {
    return data.reason;
  }
  return null;
}

export class AxiosIngestionClient implements IngestionClient {
  private api: AxiosInstance;

  constructor(options: AxiosIngestionClientOptions) {
    this.api = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: { 'Content-Type': 'application/json', 'X-Device-Id': options.deviceId },
      // Status handling happens in send()
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  public async send(payload: ReadingPayload): Promise<IngestionResult> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.api.post<unknown>(INGEST_PATH, payload);
    } catch (error) {
      if (isAxiosError(error)) {
        const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
        throw new UploadFailure(
          timedOut ? `Upload timed out: ${error.message}` : `Upload failed: ${error.message}`,
          null,
          timedOut
        );
      }
      throw error;
    }

    if (response.status < 200 || response.status >= 300) {
      const reason = reasonFrom(response.data);
      throw new UploadFailure(
        `Server answered ${response.status}${reason ? ` (${reason})` : ''}`,
        response.status
      );
    }
    return { status: response.status, rowId: rowIdFrom(response.data) };
  }
}
