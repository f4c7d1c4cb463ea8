/**
 * Telemetry Port
 *
 * Tracing and metrics hooks for procedure calls.
 */

export interface SpanLike {
  setAttribute(key: string, value: string | number | boolean): void;
  setStatus(status: { code: number; message?: string }): void;
  recordException(exception: Error): void;
  end(): void;
}

export interface TracerPort {
  /**
   * Run fn inside a span; the span ends when fn settles
   */
  withSpan<T>(name: string, fn: (span: SpanLike) => Promise<T>): Promise<T>;
}

export interface MetricRecorder {
  recordCall(procedure: string, expected: string): void;
  recordDuration(durationMs: number, procedure: string): void;
  recordFailure(procedure: string, errorType: string): void;
  recordFieldError(procedure: string, column: string): void;
}
