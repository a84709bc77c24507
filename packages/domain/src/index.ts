export { Power } from "./power";
export { Energy } from "./energy";
export { Duration } from "./duration";
export { Frequency } from "./frequency";
export { TimeWindow } from "./time-window";
export { Percentage } from "./percentage";
export { ConfigurationError, InputShapeError, describeError } from "./errors";
export {
  DEADBAND_HALF_WIDTH_HZ,
  DEFAULT_PCR_PARAMETERS,
  DEFAULT_SAMPLING_RATE_HZ,
  DEFAULT_SIMULATION_HOURS,
  OVERFULFILLMENT_FACTOR,
  REQUIRED_PARAMETER_FIELDS,
  pcrParametersSchema,
  socLimitsSchema,
} from "./parameters";
export type { PcrParameters, SocLimits } from "./parameters";
export { parsePcrParameters, socPercent } from "./parsing";
export * from "./simulation";
