/**
 * Composition Root
 *
 * Wires a ProcedureInvoker over fresh pg connections from configuration.
 *
 * @example
 * ```typescript
 * const invoker = createProcedureInvoker();
 * const user = await invoker.fetchOne("default", "get_user", User, { id: 42 });
 * ```
 */

import { PgConnectionProvider } from "../adapters/persistence/pg-connection-provider.js";
import { metrics } from "../adapters/telemetry/metrics.js";
import { tracer } from "../adapters/telemetry/tracer.js";
import {
  loadDataAccessConfig,
  type DataAccessConfig,
} from "../config/data-access-config.js";
import {
  ProcedureInvoker,
  type ProcedureInvokerConfig,
} from "../core/use-cases/invoke-procedure.use-case.js";

export function createProcedureInvoker(
  config: DataAccessConfig = loadDataAccessConfig(),
  overrides: Partial<ProcedureInvokerConfig> = {},
): ProcedureInvoker {
  const connections = new PgConnectionProvider({
    connectionStrings: config.connectionStrings,
  });

  return new ProcedureInvoker(connections, {
    defaultSchema: config.procedureSchema,
    logFieldErrors: config.logFieldErrors,
    metrics,
    tracer,
    ...overrides,
  });
}
