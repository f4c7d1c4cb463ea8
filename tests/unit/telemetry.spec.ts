import { describe, it, expect, vi } from "vitest";
import { OtelTracer } from "../../src/adapters/telemetry/tracer.js";
import { OtelMetricRecorder } from "../../src/adapters/telemetry/metrics.js";

describe("OtelTracer", () => {
  it("should return the wrapped result", async () => {
    const tracer = new OtelTracer();

    await expect(tracer.withSpan("procedure.one", async () => 42)).resolves.toBe(42);
  });

  it("should rethrow errors from the wrapped call", async () => {
    const tracer = new OtelTracer();
    const failure = new Error("boom");

    await expect(
      tracer.withSpan("procedure.none", async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);
  });

  it("should hand the span to the wrapped call", async () => {
    const tracer = new OtelTracer();
    const fn = vi.fn(async () => "done");

    await tracer.withSpan("procedure.many", fn);

    expect(fn).toHaveBeenCalledWith(
      expect.objectContaining({ setAttribute: expect.any(Function), end: expect.any(Function) }),
    );
  });
});

describe("OtelMetricRecorder", () => {
  it("should record without a meter provider registered", () => {
    const recorder = new OtelMetricRecorder();

    expect(() => {
      recorder.recordCall("list_users", "MANY");
      recorder.recordDuration(12, "list_users");
      recorder.recordFailure("list_users", "ProcedureError");
      recorder.recordFieldError("list_users", "id");
    }).not.toThrow();
  });
});
