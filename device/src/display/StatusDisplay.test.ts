import { describe, expect, it } from 'vitest';
import { StatusDisplay, fit, twoCol } from './StatusDisplay';
import { DisplayFrame, DisplaySink, DisplayView } from './ConsoleDisplay';
import { gasBand } from './gasLevel';
import { ReadingSource } from '../sensors/SensorReader';
import { ConnectivityTracker } from '../uplink/ConnectivityState';
import { Reading } from '../types/reading';

class RecordingSink implements DisplaySink {
  public frames: Array<{ view: DisplayView; frame: DisplayFrame }> = [];

  public write(frame: DisplayFrame, view: DisplayView): void {
    this.frames.push({ view, frame });
  }
}

class FixedSource implements ReadingSource {
  constructor(public current: Reading | null, private warmupEndsAt = 0) {}

  public latest(): Reading | null {
    return this.current;
  }

  public isGasWarmingUp(now: number): boolean {
    return this.gasWarmupRemainingMs(now) > 0;
  }

  public gasWarmupRemainingMs(now: number): number {
    return Math.max(0, this.warmupEndsAt - now);
  }
}

const NOW = 1_700_000_010_000;

function reading(values: Partial<Reading> = {}): Reading {
  return {
    sampleNumber: 1,
    sampledAt: new Date(NOW - 3000),
    uptimeMs: 90_000,
    temperature: 23.0,
    humidity: 80.1,
    gasRaw: 197,
    gasDigital: false,
    gasWarmingUp: false,
    ...values,
  };
}

describe('layout helpers', () => {
  it('pads and truncates to the display width', () => {
    expect(fit('abc')).toBe('abc             ');
    expect(fit('0123456789abcdefXYZ')).toBe('0123456789abcdef');
  });

  it('aligns two columns', () => {
    expect(twoCol('WiFi up', '-61dBm')).toBe('WiFi up   -61dBm');
    expect(twoCol('0123456789', 'abcdefgh')).toBe('0123456789 abcde');
  });
});

describe('gasBand', () => {
  it('maps raw counts onto bands', () => {
    expect(gasBand(99)).toBe('clean');
    expect(gasBand(100)).toBe('safe');
    expect(gasBand(299)).toBe('safe');
    expect(gasBand(300)).toBe('warning');
    expect(gasBand(500)).toBe('danger');
    expect(gasBand(1023)).toBe('danger');
  });
});

describe('StatusDisplay', () => {
  it('renders the climate view', () => {
    const display = new StatusDisplay(new FixedSource(reading()), new ConnectivityTracker(), new RecordingSink());

    expect(display.render('climate', NOW)).toEqual(['T:23.0C  H:80.1%', 'DHT ok    3s ago']);
  });

  it('shows invalid climate values as placeholders, never zero', () => {
    const source = new FixedSource(reading({ temperature: null, humidity: null }));
    const display = new StatusDisplay(source, new ConnectivityTracker(), new RecordingSink());

    expect(display.render('climate', NOW)).toEqual(['T:--.-C  H:--.-%', 'DHT fault 3s ago']);
  });

  it('renders the gas view with band and digital state', () => {
    const source = new FixedSource(reading({ gasRaw: 512, gasDigital: true }));
    const display = new StatusDisplay(source, new ConnectivityTracker(), new RecordingSink());

    expect(display.render('gas', NOW)).toEqual(['Gas 512   DANGER', 'Digital ALARM   ']);
  });

  it('shows the remaining warm-up time while the gas sensor heats', () => {
    const source = new FixedSource(reading(), NOW + 41_500);
    const display = new StatusDisplay(source, new ConnectivityTracker(), new RecordingSink());

    expect(display.render('gas', NOW)).toEqual(['Gas 197     SAFE', 'Warm-up 42s     ']);
  });

  it('renders placeholders before the first sample', () => {
    const display = new StatusDisplay(new FixedSource(null), new ConnectivityTracker(), new RecordingSink());

    expect(display.render('climate', NOW)).toEqual(['No reading yet  ', '                ']);
    expect(display.render('gas', NOW)).toEqual(['No reading yet  ', '                ']);
  });

  it('renders network and counter views from the connectivity snapshot', () => {
    const tracker = new ConnectivityTracker();
    tracker.setLink(true, -61);
    tracker.recordAttempt();
    tracker.recordSuccess(201, 7, NOW);
    tracker.recordAttempt();
    tracker.recordFailure(null);
    tracker.recordDrop();
    const display = new StatusDisplay(new FixedSource(reading()), tracker, new RecordingSink());

    expect(display.render('network', NOW)).toEqual(['WiFi up   -61dBm', 'HTTP 201    fail']);
    expect(display.render('counters', NOW)).toEqual(['Sent 1/2        ', 'Dropped 1       ']);
  });

  it('shows a dropped link', () => {
    const tracker = new ConnectivityTracker();
    tracker.setLink(false, null);
    tracker.setUploadState('disconnected');
    const display = new StatusDisplay(new FixedSource(reading()), tracker, new RecordingSink());

    expect(display.render('network', NOW)).toEqual(['WiFi down       ', 'HTTP ---     off']);
  });

  it('rotates views on each tick and writes every frame to the sink', () => {
    const sink = new RecordingSink();
    const display = new StatusDisplay(new FixedSource(reading()), new ConnectivityTracker(), sink);

    for (let i = 0; i < 5; i++) {
      display.tick(NOW);
    }

    expect(sink.frames.map((entry) => entry.view)).toEqual(['climate', 'gas', 'network', 'counters', 'climate']);
    expect(sink.frames.every(({ frame }) => frame[0].length === 16 && frame[1].length === 16)).toBe(true);
  });

  it('rejects an empty view list', () => {
    expect(() => new StatusDisplay(new FixedSource(null), new ConnectivityTracker(), new RecordingSink(), [])).toThrow(
      'StatusDisplay needs at least one view'
    );
  });
});
