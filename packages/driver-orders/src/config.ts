/**
 * ## Workflow Configuration
 *
 * | Key | Environment variable | Default |
 * |-----|----------------------|---------|
 * | `logLevel` | `COURIERFLOW_LOG_LEVEL` | `INFO` |
 * | `maxLocationAccuracyMeters` | `COURIERFLOW_MAX_LOCATION_ACCURACY_M` | 100 |
 * | `preferredLocationAccuracyMeters` | `COURIERFLOW_PREFERRED_LOCATION_ACCURACY_M` | 50 |
 * | `optimisticUpdates` | `COURIERFLOW_OPTIMISTIC_UPDATES` | `true` |
 *
 * @example
 * ```typescript
 * const config = loadWorkflowConfig(process.env);
 * const coordinator = createDriverOrderCoordinator({ repository, config });
 * ```
 */

import { z } from "zod";
import { LOG_LEVELS, loadConfigFromEnv, parseConfig, type EnvSource } from "@courierflow/core";

export const WorkflowConfigSchema = z
  .object({
    logLevel: z.string().trim().toUpperCase().pipe(z.enum(LOG_LEVELS)).default("INFO"),
    maxLocationAccuracyMeters: z.coerce.number().positive().default(100),
    preferredLocationAccuracyMeters: z.coerce.number().positive().default(50),
    optimisticUpdates: z.stringbool().default(true),
  })
  .refine(
    (config) => config.preferredLocationAccuracyMeters <= config.maxLocationAccuracyMeters,
    {
      message: "preferredLocationAccuracyMeters must not exceed maxLocationAccuracyMeters",
      path: ["preferredLocationAccuracyMeters"],
    }
  );

export type WorkflowConfig = z.output<typeof WorkflowConfigSchema>;

export const WORKFLOW_ENV = {
  logLevel: "COURIERFLOW_LOG_LEVEL",
  maxLocationAccuracyMeters: "COURIERFLOW_MAX_LOCATION_ACCURACY_M",
  preferredLocationAccuracyMeters: "COURIERFLOW_PREFERRED_LOCATION_ACCURACY_M",
  optimisticUpdates: "COURIERFLOW_OPTIMISTIC_UPDATES",
} as const satisfies Record<keyof WorkflowConfig, string>;

const SCOPE = "driver workflow";

export const DEFAULT_WORKFLOW_CONFIG: WorkflowConfig = parseConfig(SCOPE, WorkflowConfigSchema, {});

/**
 * @throws ConfigError when a variable is set to an invalid value
 */
export function loadWorkflowConfig(env: EnvSource = process.env): WorkflowConfig {
  return loadConfigFromEnv(SCOPE, WorkflowConfigSchema, WORKFLOW_ENV, env);
}
