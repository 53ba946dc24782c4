import { metrics, type Counter, type Histogram, type Meter, type MetricOptions } from "@opentelemetry/api";

export interface MetaguardInstrumentationOptions {
  readonly name?: string;
  readonly version?: string;
  readonly schemaUrl?: string;
}

const DEFAULT_INSTRUMENTATION_NAME = "metaguard";

export const getMetaguardMeter = (options: MetaguardInstrumentationOptions = {}): Meter =>
  metrics.getMeter(options.name ?? DEFAULT_INSTRUMENTATION_NAME, options.version, {
    schemaUrl: options.schemaUrl,
  });

export interface MetaguardCounterOptions extends MetricOptions {
  readonly instrumentation?: MetaguardInstrumentationOptions;
}

export const createMetaguardCounter = (name: string, options: MetaguardCounterOptions = {}): Counter => {
  const { instrumentation, ...counterOptions } = options;
  return getMetaguardMeter(instrumentation).createCounter(name, counterOptions);
};

export interface MetaguardHistogramOptions extends MetricOptions {
  readonly instrumentation?: MetaguardInstrumentationOptions;
}

export const createMetaguardHistogram = (
  name: string,
  options: MetaguardHistogramOptions = {},
): Histogram => {
  const { instrumentation, ...histogramOptions } = options;
  return getMetaguardMeter(instrumentation).createHistogram(name, histogramOptions);
};
