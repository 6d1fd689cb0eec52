import { IngestionClient } from '../net/IngestionClient';
import { WifiLink } from '../net/WifiLink';
import { Reading, toPayload } from '../types/reading';
import { ConnectivityLoss, UploadFailure, errorMessage } from '../utils/errors';
import { ConnectivityTracker } from './ConnectivityState';
import { log } from '../utils/logger';

// 4xx: the server refused this body, so resending it cannot succeed
function isRejection(failure: UploadFailure): boolean {
  return failure.status !== null && failure.status >= 400 && failure.status < 500;
}

export interface UploadRecord {
  sequence: number;
  reading: Reading;
  attempts: number;
}

export interface UplinkAgentOptions {
  deviceId: string;
  maxAttempts: number;
}

export interface LatestReadingSource {
  latest(): Reading | null;
}

/**
 * Forwards the latest reading to the collection service, one attempt per tick.
 *
 * A failed record is retried on later ticks until `maxAttempts`, then dropped.
 * A 4xx reply drops it at once: resending the same body gets the same answer.
 * While WiFi is down no attempt is made and no counter moves; the pending
 * record (if any) waits for the link to come back.
 */
export class UplinkAgent {
  private pending: UploadRecord | null = null;
  private nextSequence = 1;
  private lastHandledSample = 0;
  private linkUp: boolean | null = null;

  constructor(
    private source: LatestReadingSource,
    private client: IngestionClient,
    private wifi: WifiLink,
    private options: UplinkAgentOptions,
    private tracker: ConnectivityTracker = new ConnectivityTracker()
  ) {}

  public getTracker(): ConnectivityTracker {
    return this.tracker;
  }

  public getPending(): Readonly<UploadRecord> | null {
    return this.pending;
  }

  public async tick(now: number): Promise<void> {
    if (!this.checkLink()) {
      return;
    }

    const record = this.pending ?? this.takeLatest();
    if (!record) {
      this.tracker.setUploadState('idle');
      return;
    }

    record.attempts++;
    this.tracker.recordAttempt();

    try {
      const result = await this.client.send(toPayload(record.reading, this.options.deviceId));
      this.tracker.recordSuccess(result.status, result.rowId, now);
      this.pending = null;
      log.info(
        `Upload #${record.sequence} stored as row ${result.rowId ?? '?'} (HTTP ${result.status})`,
        'UplinkAgent'
      );
    } catch (error) {
      this.handleFailure(record, error);
    }
  }

  /**
   * Returns true when uploads may proceed. Logs each link transition once.
   */
  private checkLink(): boolean {
    const connected = this.wifi.isConnected();
    this.tracker.setLink(connected, connected ? this.wifi.signalStrength() : null);

    if (!connected) {
      if (this.linkUp !== false) {
        const loss = new ConnectivityLoss();
        this.tracker.recordFault(loss);
        log.warn(`${loss.message} - uploads suspended`, 'UplinkAgent');
      }
      this.linkUp = false;
      this.tracker.setUploadState('disconnected');
      return false;
    }

    if (this.linkUp === false) {
      log.info('WiFi reconnected - resuming uploads', 'UplinkAgent');
    }
    this.linkUp = true;
    return true;
  }

  private takeLatest(): UploadRecord | null {
    const reading = this.source.latest();
    if (!reading || reading.sampleNumber <= this.lastHandledSample) {
      return null;
    }
    this.lastHandledSample = reading.sampleNumber;
    return { sequence: this.nextSequence++, reading, attempts: 0 };
  }

  private handleFailure(record: UploadRecord, error: unknown): void {
    const failure = error instanceof UploadFailure ? error : new UploadFailure(errorMessage(error), null);
    this.tracker.recordFailure(failure.status);
    this.tracker.recordFault(failure);

    if (isRejection(failure)) {
      this.pending = null;
      this.tracker.recordDrop();
      log.warn(
        `Upload #${record.sequence} rejected with ${failure.status}, dropped: ${failure.message}`,
        'UplinkAgent'
      );
      return;
    }
    if (record.attempts >= this.options.maxAttempts) {
      this.pending = null;
      this.tracker.recordDrop();
      log.warn(
        `Upload #${record.sequence} dropped after ${record.attempts} attempts: ${failure.message}`,
        'UplinkAgent'
      );
      return;
    }

    this.pending = record;
    log.warn(
      `Upload #${record.sequence} attempt ${record.attempts}/${this.options.maxAttempts} failed: ${failure.message}`,
      'UplinkAgent'
    );
  }
}
