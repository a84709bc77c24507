import { z } from "zod";

/** Half-width of the regulatory deadband around the nominal frequency. */
export const DEADBAND_HALF_WIDTH_HZ = 0.01;

/** Share of the primary-control response added while overfulfilling. */
export const OVERFULFILLMENT_FACTOR = 0.2;

export const DEFAULT_SIMULATION_HOURS = 6;
export const DEFAULT_SAMPLING_RATE_HZ = 1;

const finite = (label: string) => z.number({invalid_type_error: `${label} must be a number`}).finite();

export const socLimitsSchema = z
  .tuple([finite("SOC limit"), finite("SOC limit")])
  .refine(([low, high]) => low <= high, {message: "SOC limits must be ordered as [low, high]"});

export const pcrParametersSchema = z.object({
  capacity_mwh: finite("capacity_mwh").positive(),
  prequalified_power_mw: finite("prequalified_power_mw").nonnegative(),
  efficiency_charge: finite("efficiency_charge").gt(0).lte(1),
  efficiency_discharge: finite("efficiency_discharge").gt(0).lte(1),
  self_consumption_mwh_per_s: finite("self_consumption_mwh_per_s").nonnegative(),
  nominal_frequency_hz: finite("nominal_frequency_hz").positive(),
  soc_limits_st: socLimitsSchema,
  soc_limits_of: socLimitsSchema,
  soc_limits_du: socLimitsSchema,
  transaction_power_mw: finite("transaction_power_mw").nonnegative(),
  contract_duration_h: finite("contract_duration_h").nonnegative(),
  lead_time_h: finite("lead_time_h").nonnegative(),
  initial_soc_percent: finite("initial_soc_percent").min(0).max(100),
  use_overfulfillment: z.boolean(),
  use_deadband_utilization: z.boolean(),
});

export type SocLimits = z.infer<typeof socLimitsSchema>;
export type PcrParameters = Readonly<z.infer<typeof pcrParametersSchema>>;

/** Fields a parameter set must name explicitly; the feature flags default to off. */
export const REQUIRED_PARAMETER_FIELDS = [
  "capacity_mwh",
  "prequalified_power_mw",
  "efficiency_charge",
  "efficiency_discharge",
  "self_consumption_mwh_per_s",
  "soc_limits_st",
  "soc_limits_of",
  "soc_limits_du",
  "transaction_power_mw",
  "contract_duration_h",
  "lead_time_h",
  "initial_soc_percent",
  "nominal_frequency_hz",
] as const satisfies readonly (keyof PcrParameters)[];

// 2 MWh / 1 MW unit on a 60 Hz grid, transactions of 0.5 MW for 30 min announced 45 min ahead.
export const DEFAULT_PCR_PARAMETERS: PcrParameters = {
  capacity_mwh: 2,
  prequalified_power_mw: 1,
  efficiency_charge: 0.9,
  efficiency_discharge: 0.9,
  self_consumption_mwh_per_s: 3.85e-8,
  nominal_frequency_hz: 60,
  soc_limits_st: [39, 41],
  soc_limits_of: [50, 50],
  soc_limits_du: [50, 50],
  transaction_power_mw: 0.5,
  contract_duration_h: 0.5,
  lead_time_h: 0.75,
  initial_soc_percent: 40,
  use_overfulfillment: false,
  use_deadband_utilization: false,
};
