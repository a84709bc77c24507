import { ConfigurationError } from "./errors";
import { pcrParametersSchema, REQUIRED_PARAMETER_FIELDS } from "./parameters";
import type { PcrParameters } from "./parameters";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates an untyped parameter record. Absent required fields are reported
 * by name, in declaration order; the two feature flags default to `false`.
 */
export function parsePcrParameters(input: unknown): PcrParameters {
  if (!isRecord(input)) {
    throw new ConfigurationError("Parameter set must be an object");
  }
  for (const field of REQUIRED_PARAMETER_FIELDS) {
    if (input[field] === undefined || input[field] === null) {
      throw ConfigurationError.missing(field);
    }
  }

  const result = pcrParametersSchema.safeParse({
    ...input,
    use_overfulfillment: input.use_overfulfillment ?? false,
    use_deadband_utilization: input.use_deadband_utilization ?? false,
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.length ? String(issue.path[0]) : undefined;
    const location = issue.path.length ? issue.path.join(".") : "parameters";
    throw new ConfigurationError(`Invalid parameter ${location}: ${issue.message}`, field);
  }
  return result.data;
}

export function socPercent(energyMwh: number, capacityMwh: number): number {
  return (energyMwh / capacityMwh) * 100;
}
