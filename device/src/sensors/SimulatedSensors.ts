import { ADC_MAX, ClimateSample, ClimateSensor, GasSensor } from './drivers';
import { SensorFault } from '../utils/errors';

export type RandomSource = () => number;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * DHT-style climate sensor drifting around indoor conditions. `faultRate` is
 * the chance a read fails its checksum.
 */
export class SimulatedClimateSensor implements ClimateSensor {
  public readonly name = 'DHT11';
  private temperature = 22.0;
  private humidity = 55.0;

  constructor(private faultRate: number = 0.05, private random: RandomSource = Math.random) {}

  public async read(): Promise<ClimateSample> {
    if (this.random() < this.faultRate) {
      throw new SensorFault(this.name, 'checksum mismatch');
    }
    this.temperature = clamp(this.temperature + (this.random() - 0.5) * 0.4, 10, 40);
    this.humidity = clamp(this.humidity + (this.random() - 0.5) * 1.0, 20, 95);
    return {
      temperature: Math.round(this.temperature * 10) / 10,
      humidity: Math.round(this.humidity * 10) / 10,
    };
  }
}

/**
 * MQ-series gas sensor: analog counts with occasional spikes and a digital
 * comparator output tripping at `threshold`.
 */
export class SimulatedGasSensor implements GasSensor {
  public readonly name = 'MQ-135';
  private level = 180;

  constructor(private threshold: number = 400, private random: RandomSource = Math.random) {}

  public async readAnalog(): Promise<number> {
    const spike = this.random() < 0.02 ? 250 : 0;
    this.level = clamp(this.level + (this.random() - 0.5) * 20, 60, 700);
    return Math.round(clamp(this.level + spike, 0, ADC_MAX));
  }

  public async readDigital(): Promise<boolean> {
    return this.level >= this.threshold;
  }
}
