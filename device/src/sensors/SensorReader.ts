import { ADC_MAX, ClimateSensor, GasSensor } from './drivers';
import { Reading } from '../types/reading';
import { SensorFault, errorMessage } from '../utils/errors';
import { log } from '../utils/logger';

// DHT22 datasheet range; values outside it are treated as faults
export const TEMPERATURE_VALID_RANGE = { min: -40, max: 80 } as const;
export const HUMIDITY_VALID_RANGE = { min: 0, max: 100 } as const;

export interface SensorReaderOptions {
  bootedAt: number; // epoch ms when the device powered on
  gasWarmupMs: number;
}

export interface ReadingSource {
  latest(): Reading | null;
  isGasWarmingUp(now: number): boolean;
  gasWarmupRemainingMs(now: number): number;
}

function validOrNull(value: number, range: { min: number; max: number }): number | null {
  return Number.isFinite(value) && value >= range.min && value <= range.max ? value : null;
}

/**
 * Samples every sensor once per tick and keeps only the latest reading.
 *
 * A climate fault nulls temperature/humidity but still yields a reading.
 * A gas read failure yields no reading at all, since gas_raw is mandatory;
 * the previous reading stays as latest.
 */
export class SensorReader implements ReadingSource {
  private current: Reading | null = null;
  private samples = 0;
  private climateFaults = 0;

  constructor(private climate: ClimateSensor, private gas: GasSensor, private options: SensorReaderOptions) {}

  public async sample(now: number): Promise<Reading> {
    const [gasRaw, gasDigital] = await this.readGas();
    const { temperature, humidity } = await this.readClimate();

    const reading: Reading = Object.freeze({
      sampleNumber: ++this.samples,
      sampledAt: new Date(now),
      uptimeMs: now - this.options.bootedAt,
      temperature,
      humidity,
      gasRaw,
      gasDigital,
      gasWarmingUp: this.isGasWarmingUp(now),
    });
    this.current = reading;

    log.debug(
      `Sample #${reading.sampleNumber}: T=${temperature ?? 'invalid'} H=${humidity ?? 'invalid'} Gas=${gasRaw}` +
        (reading.gasWarmingUp ? ' (warming up)' : ''),
      'SensorReader'
    );
    return reading;
  }

  public latest(): Reading | null {
    return this.current;
  }

  public isGasWarmingUp(now: number): boolean {
    return this.gasWarmupRemainingMs(now) > 0;
  }

  public gasWarmupRemainingMs(now: number): number {
    return Math.max(0, this.options.bootedAt + this.options.gasWarmupMs - now);
  }

  public getClimateFaultCount(): number {
    return this.climateFaults;
  }

  private async readClimate(): Promise<{ temperature: number | null; humidity: number | null }> {
    try {
      const sample = await this.climate.read();
      const temperature = validOrNull(sample.temperature, TEMPERATURE_VALID_RANGE);
      const humidity = validOrNull(sample.humidity, HUMIDITY_VALID_RANGE);
      if (temperature === null || humidity === null) {
        this.climateFaults++;
        log.warn(
          `${this.climate.name} returned invalid values (T=${sample.temperature}, H=${sample.humidity})`,
          'SensorReader'
        );
      }
      return { temperature, humidity };
    } catch (error) {
      this.climateFaults++;
      log.warn(`Failed to read from ${this.climate.name}: ${errorMessage(error)}`, 'SensorReader');
      return { temperature: null, humidity: null };
    }
  }

  private async readGas(): Promise<[number, boolean]> {
    try {
      const raw = await this.gas.readAnalog();
      const digital = await this.gas.readDigital();
      if (!Number.isFinite(raw)) {
        throw new Error(`non-numeric ADC value ${raw}`);
      }
      return [Math.round(Math.min(ADC_MAX, Math.max(0, raw))), digital];
    } catch (error) {
      throw new SensorFault(this.gas.name, errorMessage(error));
    }
  }
}
