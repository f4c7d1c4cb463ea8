/**
 * OpenTelemetry Tracer
 *
 * Wraps procedure calls in CLIENT spans. Without a registered SDK the
 * OpenTelemetry API hands out non-recording spans, so this costs nothing
 * until tracing is configured.
 */

import { SpanKind, SpanStatusCode, trace, type Tracer } from "@opentelemetry/api";
import type { SpanLike, TracerPort } from "../../core/ports/telemetry.port.js";

const TRACER_NAME = "pg-procedure-mapper";

export class OtelTracer implements TracerPort {
  private readonly tracer: Tracer;

  constructor(tracer: Tracer = trace.getTracer(TRACER_NAME)) {
    this.tracer = tracer;
  }

  withSpan<T>(name: string, fn: (span: SpanLike) => Promise<T>): Promise<T> {
    return this.tracer.startActiveSpan(
      name,
      { kind: SpanKind.CLIENT },
      async (span) => {
        try {
          const result = await fn(span);
          span.setStatus({ code: SpanStatusCode.OK });
          return result;
        } catch (error) {
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message: error instanceof Error ? error.message : String(error),
          });
          if (error instanceof Error) {
            span.recordException(error);
          }
          throw error;
        } finally {
          span.end();
        }
      },
    );
  }
}

export const tracer: TracerPort = new OtelTracer();
