import { DeviceFault } from '../utils/errors';

export type UploadState = 'idle' | 'sending' | 'success' | 'failed' | 'disconnected';

export interface ConnectivityState {
  wifiConnected: boolean;
  signalStrength: number | null; // dBm
  uploadState: UploadState;
  totalUploadsAttempted: number;
  totalUploadsSucceeded: number;
  totalUploadsDropped: number;
  lastHttpStatus: number | null;
  lastRowId: number | null;
  lastUploadAt: number | null; // epoch ms of the last successful upload
  lastFault: { kind: DeviceFault['kind']; message: string } | null;
}

export interface ConnectivitySource {
  snapshot(): Readonly<ConnectivityState>;
}

/**
 * Process-wide connectivity state. UplinkAgent is the only writer; the
 * display and anything else read it through `snapshot()`.
 */
export class ConnectivityTracker implements ConnectivitySource {
  private state: ConnectivityState = {
    wifiConnected: false,
    signalStrength: null,
    uploadState: 'idle',
    totalUploadsAttempted: 0,
    totalUploadsSucceeded: 0,
    totalUploadsDropped: 0,
    lastHttpStatus: null,
    lastRowId: null,
    lastUploadAt: null,
    lastFault: null,
  };

  public snapshot(): Readonly<ConnectivityState> {
    return Object.freeze({ ...this.state });
  }

  public setLink(connected: boolean, signalStrength: number | null): void {
    this.state.wifiConnected = connected;
    this.state.signalStrength = connected ? signalStrength : null;
  }

  public setUploadState(uploadState: UploadState): void {
    this.state.uploadState = uploadState;
  }

  public recordAttempt(): void {
    this.state.totalUploadsAttempted++;
    this.state.uploadState = 'sending';
  }

  public recordSuccess(status: number, rowId: number | null, at: number): void {
    this.state.totalUploadsSucceeded++;
    this.state.lastHttpStatus = status;
    this.state.lastRowId = rowId;
    this.state.lastUploadAt = at;
    this.state.uploadState = 'success';
    this.state.lastFault = null;
  }

  public recordFailure(status: number | null): void {
    if (status !== null) {
      this.state.lastHttpStatus = status;
    }
    this.state.uploadState = 'failed';
  }

  public recordDrop(): void {
    this.state.totalUploadsDropped++;
  }

  public recordFault(fault: DeviceFault): void {
    this.state.lastFault = { kind: fault.kind, message: fault.message };
  }
}
