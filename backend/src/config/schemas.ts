import { z } from "zod";

import { ConfigurationError } from "@pcr-bess/domain";

// Numbers may arrive quoted from YAML; the factory coerces them.
const numeric = z.union([z.number(), z.string()]);

const bessSchema = z
  .object({
    capacity_mwh: numeric,
    prequalified_power_mw: numeric,
    efficiency_charge: numeric,
    efficiency_discharge: numeric,
    self_consumption_mwh_per_s: numeric,
    nominal_frequency_hz: numeric,
    soc_limits_st: z.array(numeric),
    soc_limits_of: z.array(numeric),
    soc_limits_du: z.array(numeric),
    transaction_power_mw: numeric,
    contract_duration_h: numeric,
    lead_time_h: numeric,
    initial_soc_percent: numeric,
    use_overfulfillment: z.boolean(),
    use_deadband_utilization: z.boolean(),
  })
  .partial();

const datasetSchema = z.object({
  path: z.string().min(1),
  format: z.enum(["csv", "json"]).optional(),
  label: z.string().optional(),
});

const syntheticSchema = z
  .object({
    duration_hours: numeric,
    sampling_rate_hz: numeric,
    seed: numeric,
    volatility_hz: numeric,
    reversion_per_s: numeric,
    max_deviation_hz: numeric,
  })
  .partial();

export const configDocumentSchema = z.object({
  logging: z
    .object({
      level: z.string().optional(),
    })
    .optional(),
  bess: bessSchema.optional(),
  dataset: datasetSchema.optional(),
  synthetic: syntheticSchema.optional(),
  seed_on_startup: z.boolean().optional(),
});

export type ConfigDocument = z.infer<typeof configDocumentSchema>;
export type BessSection = NonNullable<ConfigDocument["bess"]>;
export type SyntheticSection = NonNullable<ConfigDocument["synthetic"]>;

export function parseConfigDocument(raw: unknown): ConfigDocument {
  const result = configDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue.path.length ? issue.path.join(".") : "document";
    throw new ConfigurationError(`Invalid configuration at ${location}: ${issue.message}`);
  }
  return result.data;
}
