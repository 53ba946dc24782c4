export type {
  MetaguardInstrumentationOptions,
  MetaguardCounterOptions,
  MetaguardHistogramOptions,
} from "./metrics.js";
export { getMetaguardMeter, createMetaguardCounter, createMetaguardHistogram } from "./metrics.js";

export type { MetaguardLogger, MetaguardLoggerOptions, MetaguardLogLevel } from "./logging.js";
export { createMetaguardLogger, isLogLevel, LOG_LEVELS } from "./logging.js";

export type { MetaguardTracer, RunWithSpanOptions } from "./tracing.js";
export { getMetaguardTracer, runWithSpan, SpanStatusCode } from "./tracing.js";
