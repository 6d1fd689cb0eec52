import { ReadingSource } from '../sensors/SensorReader';
import { ConnectivitySource, UploadState } from '../uplink/ConnectivityState';
import { DisplayFrame, DisplaySink, DisplayView } from './ConsoleDisplay';
import { gasBand } from './gasLevel';

export const LCD_COLUMNS = 16;

export const DEFAULT_VIEWS: readonly DisplayView[] = ['climate', 'gas', 'network', 'counters'];

const STATE_LABELS: Record<UploadState, string> = {
  idle: 'idle',
  sending: 'send',
  success: 'ok',
  failed: 'fail',
  disconnected: 'off',
};

/** Truncate or right-pad to the display width. */
export function fit(text: string, width: number = LCD_COLUMNS): string {
  return text.slice(0, width).padEnd(width);
}

/** Left-align `left` and right-align `right` on one line. */
export function twoCol(left: string, right: string, width: number = LCD_COLUMNS): string {
  const gap = width - left.length - right.length;
  if (gap < 1) {
    return fit(`${left} ${right}`, width);
  }
  return left + ' '.repeat(gap) + right;
}

function formatValue(value: number | null): string {
  return value === null ? '--.-' : value.toFixed(1);
}

/**
 * Rotates through fixed-format views on each tick. Reads the sensor reader
 * and the connectivity snapshot only; it never mutates either.
 */
export class StatusDisplay {
  private index = 0;

  constructor(
    private reader: ReadingSource,
    private connectivity: ConnectivitySource,
    private sink: DisplaySink,
    private views: readonly DisplayView[] = DEFAULT_VIEWS
  ) {
    if (views.length === 0) {
      throw new Error('StatusDisplay needs at least one view');
    }
  }

  public currentView(): DisplayView {
    return this.views[this.index % this.views.length];
  }

  /** Render the current view, write it to the sink, advance to the next one. */
  public tick(now: number): DisplayFrame {
    const view = this.currentView();
    const frame = this.render(view, now);
    this.sink.write(frame, view);
    this.index = (this.index + 1) % this.views.length;
    return frame;
  }

  public render(view: DisplayView, now: number): DisplayFrame {
    switch (view) {
      case 'climate':
        return this.renderClimate(now);
      case 'gas':
        return this.renderGas(now);
      case 'network':
        return this.renderNetwork();
      case 'counters':
        return this.renderCounters();
    }
  }

  private renderClimate(now: number): DisplayFrame {
    const reading = this.reader.latest();
    if (!reading) {
      return [fit('No reading yet'), fit('')];
    }
    const ok = reading.temperature !== null && reading.humidity !== null;
    const ageSeconds = Math.max(0, Math.floor((now - reading.sampledAt.getTime()) / 1000));
    return [
      twoCol(`T:${formatValue(reading.temperature)}C`, `H:${formatValue(reading.humidity)}%`),
      twoCol(ok ? 'DHT ok' : 'DHT fault', `${ageSeconds}s ago`),
    ];
  }

  private renderGas(now: number): DisplayFrame {
    const reading = this.reader.latest();
    if (!reading) {
      return [fit('No reading yet'), fit('')];
    }
    const first = twoCol(`Gas ${reading.gasRaw}`, gasBand(reading.gasRaw).toUpperCase());
    if (this.reader.isGasWarmingUp(now)) {
      return [first, fit(`Warm-up ${Math.ceil(this.reader.gasWarmupRemainingMs(now) / 1000)}s`)];
    }
    return [first, fit(`Digital ${reading.gasDigital ? 'ALARM' : 'clear'}`)];
  }

  private renderNetwork(): DisplayFrame {
    const state = this.connectivity.snapshot();
    const first =
      state.wifiConnected && state.signalStrength !== null
        ? twoCol('WiFi up', `${state.signalStrength}dBm`)
        : fit(state.wifiConnected ? 'WiFi up' : 'WiFi down');
    return [first, twoCol(`HTTP ${state.lastHttpStatus ?? '---'}`, STATE_LABELS[state.uploadState])];
  }

  private renderCounters(): DisplayFrame {
    const state = this.connectivity.snapshot();
    return [
      fit(`Sent ${state.totalUploadsSucceeded}/${state.totalUploadsAttempted}`),
      fit(`Dropped ${state.totalUploadsDropped}`),
    ];
  }
}
