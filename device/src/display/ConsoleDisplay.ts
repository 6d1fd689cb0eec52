import { log } from '../utils/logger';

export type DisplayFrame = readonly [string, string];

export type DisplayView = 'climate' | 'gas' | 'network' | 'counters';

export interface DisplaySink {
  write(frame: DisplayFrame, view: DisplayView): void;
}

/**
 * Stand-in for the 16x2 character LCD. Repeated identical frames are not
 * printed again.
 */
export class ConsoleDisplay implements DisplaySink {
  private lastFrame: string | null = null;

  public write(frame: DisplayFrame, view: DisplayView): void {
    const key = frame.join('\n');
    if (key === this.lastFrame) {
      return;
    }
    this.lastFrame = key;
    log.info(`[${view}] |${frame[0]}| |${frame[1]}|`, 'LCD');
  }
}
