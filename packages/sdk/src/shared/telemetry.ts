import {
  createMetaguardCounter,
  createMetaguardHistogram,
  createMetaguardLogger,
  getMetaguardTracer,
  SpanStatusCode,
  type MetaguardInstrumentationOptions,
  type MetaguardLogger,
  type MetaguardTracer,
} from "@metaguard/telemetry";

export interface MetaguardSdkTelemetryMetrics {
  readonly operationCounter: ReturnType<typeof createMetaguardCounter>;
  readonly operationDuration: ReturnType<typeof createMetaguardHistogram>;
}

export interface MetaguardSdkTelemetryOptions {
  readonly instrumentation?: MetaguardInstrumentationOptions;
  readonly tracer?: MetaguardTracer;
  readonly logger?: MetaguardLogger;
  readonly metrics?: Partial<MetaguardSdkTelemetryMetrics>;
}

export interface MetaguardSdkTelemetryContext {
  readonly tracer: MetaguardTracer;
  readonly logger: MetaguardLogger;
  readonly metrics: MetaguardSdkTelemetryMetrics;
  readonly instrumentation: MetaguardInstrumentationOptions;
}

const DEFAULT_INSTRUMENTATION: MetaguardInstrumentationOptions = { name: "metaguard-sdk" };

export const createSdkTelemetryContext = (
  options: MetaguardSdkTelemetryOptions = {},
): MetaguardSdkTelemetryContext => {
  const instrumentation: MetaguardInstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  const tracer = options.tracer ?? getMetaguardTracer(instrumentation);
  const logger = options.logger ?? createMetaguardLogger({ name: instrumentation.name ?? "metaguard-sdk" });
  const metrics: MetaguardSdkTelemetryMetrics = {
    operationCounter:
      options.metrics?.operationCounter ??
      createMetaguardCounter("metaguard_sdk_operations_total", {
        description: "Count of metaguard SDK operations by module and method.",
        instrumentation,
      }),
    operationDuration:
      options.metrics?.operationDuration ??
      createMetaguardHistogram("metaguard_sdk_operation_duration_ms", {
        description: "Duration of metaguard SDK operations.",
        unit: "ms",
        instrumentation,
      }),
  };

  return { tracer, logger, metrics, instrumentation } satisfies MetaguardSdkTelemetryContext;
};

type Outcome = "ok" | "error";

/**
 * Wraps an SDK operation with a span, an operation counter, a duration histogram and debug logs.
 * Operations returning a failed Result count as `error` without failing the span.
 */
export const instrumentOperation = <TArgs extends ReadonlyArray<unknown>, TResult>(
  telemetry: MetaguardSdkTelemetryContext,
  moduleName: string,
  methodName: string,
  implementation: (...args: TArgs) => Promise<TResult>,
): ((...args: TArgs) => Promise<TResult>) => {
  const spanName = `sdk.${moduleName}.${methodName}`;

  const record = (outcome: Outcome, duration: number, errorCode?: string) => {
    const attributes = { module: moduleName, method: methodName, outcome };
    telemetry.metrics.operationCounter.add(1, attributes);
    telemetry.metrics.operationDuration.record(duration, attributes);
    if (errorCode) {
      telemetry.logger.debug("sdk.operation.rejected", { ...attributes, code: errorCode });
    }
  };

  return async (...args: TArgs): Promise<TResult> => {
    const start = performance.now();

    return telemetry.tracer.startActiveSpan(spanName, async (span) => {
      span.setAttribute("metaguard.sdk.module", moduleName);
      span.setAttribute("metaguard.sdk.method", methodName);
      telemetry.logger.debug("sdk.operation.start", { module: moduleName, method: methodName });

      try {
        const result = await implementation(...args);
        const duration = performance.now() - start;
        const errorCode = failedResultCode(result);
        span.setAttribute("metaguard.sdk.duration_ms", duration);
        if (errorCode) {
          span.setAttribute("metaguard.sdk.error_code", errorCode);
        }
        span.setStatus({ code: SpanStatusCode.OK });
        record(errorCode ? "error" : "ok", duration, errorCode);
        return result;
      } catch (error) {
        const duration = performance.now() - start;
        const message = error instanceof Error ? error.message : String(error);
        span.setAttribute("metaguard.sdk.duration_ms", duration);
        span.recordException(error instanceof Error ? error : message);
        span.setStatus({ code: SpanStatusCode.ERROR, message });
        record("error", duration);
        telemetry.logger.error("sdk.operation.failed", {
          module: moduleName,
          method: methodName,
          error: message,
        });
        throw error;
      } finally {
        span.end();
      }
    });
  };
};

const failedResultCode = (result: unknown): string | undefined => {
  if (typeof result !== "object" || result === null || !("ok" in result) || result.ok !== false) {
    return undefined;
  }
  if (!("error" in result) || typeof result.error !== "object" || result.error === null) {
    return undefined;
  }
  return "code" in result.error && typeof result.error.code === "string" ? result.error.code : undefined;
};
