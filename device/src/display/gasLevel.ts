// Gas level bands for raw MQ-series ADC counts (0-1023)

export type GasBand = 'clean' | 'safe' | 'warning' | 'danger';

export const GAS_THRESHOLDS = {
  safe: 100,
  warning: 300,
  danger: 500,
} as const;

export function gasBand(raw: number): GasBand {
  if (raw >= GAS_THRESHOLDS.danger) return 'danger';
  if (raw >= GAS_THRESHOLDS.warning) return 'warning';
  if (raw >= GAS_THRESHOLDS.safe) return 'safe';
  return 'clean';
}
