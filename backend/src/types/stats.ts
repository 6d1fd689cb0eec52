// Windowed statistics returned by the AggregationEngine

export type StatsWindow =
  | { kind: 'all' }
  | { kind: 'count'; count: number }
  | { kind: 'duration'; ms: number }
  | { kind: 'range'; start: Date; end: Date };

export type NumericMetric = 'temperature' | 'humidity' | 'gas_raw';

export interface MetricStats {
  min: number;
  max: number;
  mean: number;
  count: number; // valid samples that contributed
}

export interface Correlation {
  value: number | null; // null means undefined, never 0
  samples: number; // rows where both metrics were valid
  reason?: 'insufficient_samples' | 'zero_variance';
}

export interface CorrelationMatrix {
  temperature_humidity: Correlation;
  temperature_gas_raw: Correlation;
  humidity_gas_raw: Correlation;
}

export interface NoDataStats {
  status: 'no_data';
  window: StatsWindow;
  epoch: number;
}

export interface WindowStatsData {
  status: 'ok';
  window: StatsWindow;
  epoch: number;
  row_count: number;
  first_row_id: number;
  last_row_id: number;
  from: string;
  to: string;
  metrics: Record<NumericMetric, MetricStats | null>;
  gas_digital: {
    triggered: number;
    ratio: number;
  };
  correlation: CorrelationMatrix;
}

export type WindowStats = NoDataStats | WindowStatsData;
