/**
 * Hardware driver contracts. A climate read may throw SensorFault (checksum,
 * timeout) or yield NaN; the gas channel only ever returns raw counts.
 */

export interface ClimateSample {
  temperature: number; // °C, NaN when the sensor could not be read
  humidity: number; // % RH, NaN when the sensor could not be read
}

export interface ClimateSensor {
  readonly name: string;
  read(): Promise<ClimateSample>;
}

export interface GasSensor {
  readonly name: string;
  readAnalog(): Promise<number>;
  readDigital(): Promise<boolean>;
}

export const ADC_MAX = 1023;
