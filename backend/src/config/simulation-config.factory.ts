import { Injectable } from "@nestjs/common";

import type { PcrParameters } from "@pcr-bess/domain";
import { ConfigurationError, DEFAULT_PCR_PARAMETERS, parsePcrParameters } from "@pcr-bess/domain";
import type { SyntheticFrequencyOptions } from "../frequency/synthetic-frequency";
import { DEFAULT_SYNTHETIC_OPTIONS } from "../frequency/synthetic-frequency";
import type { BessSection, ConfigDocument, SyntheticSection } from "./schemas";

export function coerceNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) {
      return null;
    }
    const parsed = Number(trimmed);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return null;
}

function coerceLimits(value: unknown[] | undefined, field: string): [number, number] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const numbers = value.map(coerceNumber);
  const [low, high] = numbers;
  if (numbers.length !== 2 || low == null || high == null) {
    throw new ConfigurationError(`bess.${field} must be a pair of numbers [low, high]`, field);
  }
  return [low, high];
}

type NumericBessField = Exclude<
  keyof BessSection,
  "soc_limits_st" | "soc_limits_of" | "soc_limits_du" | "use_overfulfillment" | "use_deadband_utilization"
>;

function coerceField(section: BessSection, field: NumericBessField): number | undefined {
  const raw = section[field];
  if (raw === undefined) {
    return undefined;
  }
  const value = coerceNumber(raw);
  if (value == null) {
    throw new ConfigurationError(`bess.${field} must be numeric, got '${String(raw)}'`, field);
  }
  return value;
}

export type ParameterOverrides = Partial<PcrParameters>;

@Injectable()
export class SimulationConfigFactory {
  /** Layers the `bess` section over the default parameter set and validates the outcome. */
  create(config: ConfigDocument): PcrParameters {
    const bess = config.bess ?? {};
    const overrides: ParameterOverrides = {
      capacity_mwh: coerceField(bess, "capacity_mwh"),
      prequalified_power_mw: coerceField(bess, "prequalified_power_mw"),
      efficiency_charge: coerceField(bess, "efficiency_charge"),
      efficiency_discharge: coerceField(bess, "efficiency_discharge"),
      self_consumption_mwh_per_s: coerceField(bess, "self_consumption_mwh_per_s"),
      nominal_frequency_hz: coerceField(bess, "nominal_frequency_hz"),
      soc_limits_st: coerceLimits(bess.soc_limits_st, "soc_limits_st"),
      soc_limits_of: coerceLimits(bess.soc_limits_of, "soc_limits_of"),
      soc_limits_du: coerceLimits(bess.soc_limits_du, "soc_limits_du"),
      transaction_power_mw: coerceField(bess, "transaction_power_mw"),
      contract_duration_h: coerceField(bess, "contract_duration_h"),
      lead_time_h: coerceField(bess, "lead_time_h"),
      initial_soc_percent: coerceField(bess, "initial_soc_percent"),
      use_overfulfillment: bess.use_overfulfillment,
      use_deadband_utilization: bess.use_deadband_utilization,
    };
    return this.merge(DEFAULT_PCR_PARAMETERS, overrides);
  }

  merge(base: PcrParameters, overrides: ParameterOverrides | undefined): PcrParameters {
    const merged: Record<string, unknown> = {...base};
    for (const [key, value] of Object.entries(overrides ?? {})) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
    return parsePcrParameters(merged);
  }

  createSyntheticOptions(config: ConfigDocument, parameters: PcrParameters): SyntheticFrequencyOptions {
    const synthetic: SyntheticSection = config.synthetic ?? {};
    return {
      nominalHz: parameters.nominal_frequency_hz,
      durationHours: coerceNumber(synthetic.duration_hours) ?? DEFAULT_SYNTHETIC_OPTIONS.durationHours,
      samplingRateHz: coerceNumber(synthetic.sampling_rate_hz) ?? DEFAULT_SYNTHETIC_OPTIONS.samplingRateHz,
      seed: coerceNumber(synthetic.seed) ?? DEFAULT_SYNTHETIC_OPTIONS.seed,
      volatilityHz: coerceNumber(synthetic.volatility_hz) ?? DEFAULT_SYNTHETIC_OPTIONS.volatilityHz,
      reversionPerSecond: coerceNumber(synthetic.reversion_per_s) ?? DEFAULT_SYNTHETIC_OPTIONS.reversionPerSecond,
      maxDeviationHz: coerceNumber(synthetic.max_deviation_hz) ?? DEFAULT_SYNTHETIC_OPTIONS.maxDeviationHz,
    };
  }
}
