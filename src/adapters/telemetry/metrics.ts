/**
 * OpenTelemetry Metrics
 *
 * Counters and a duration histogram for procedure calls. No-op until an
 * OpenTelemetry SDK registers a meter provider.
 */

import {
  metrics as otelMetrics,
  type Counter,
  type Histogram,
  type Meter,
} from "@opentelemetry/api";
import type { MetricRecorder } from "../../core/ports/telemetry.port.js";

const METER_NAME = "pg-procedure-mapper";

export class OtelMetricRecorder implements MetricRecorder {
  private readonly calls: Counter;
  private readonly failures: Counter;
  private readonly fieldErrors: Counter;
  private readonly duration: Histogram;

  constructor(meter: Meter = otelMetrics.getMeter(METER_NAME)) {
    this.calls = meter.createCounter("procedure.calls", {
      description: "Stored procedure calls issued",
    });
    this.failures = meter.createCounter("procedure.failures", {
      description: "Stored procedure calls that failed",
    });
    this.fieldErrors = meter.createCounter("procedure.field_errors", {
      description: "Fields left at their default after a mapping failure",
    });
    this.duration = meter.createHistogram("procedure.duration", {
      description: "Stored procedure call duration",
      unit: "ms",
    });
  }

  recordCall(procedure: string, expected: string): void {
    this.calls.add(1, { procedure, expected });
  }

  recordDuration(durationMs: number, procedure: string): void {
    this.duration.record(durationMs, { procedure });
  }

  recordFailure(procedure: string, errorType: string): void {
    this.failures.add(1, { procedure, error_type: errorType });
  }

  recordFieldError(procedure: string, column: string): void {
    this.fieldErrors.add(1, { procedure, column });
  }
}

export const metrics: MetricRecorder = new OtelMetricRecorder();
