import type { PcrParameters, StepFlows, Transaction } from "@pcr-bess/domain";
import {
  DEADBAND_HALF_WIDTH_HZ,
  Duration,
  Energy,
  Frequency,
  OVERFULFILLMENT_FACTOR,
  Percentage,
  Power,
  TimeWindow,
  socPercent,
} from "@pcr-bess/domain";

export interface PowerFlowSample {
  frequencyHz: number;
  timeSeconds: number;
}

export interface PowerFlowOutput {
  flows: StepFlows;
  current_power_mw: number;
}

/** True while an active transaction's delivery window covers `timeSeconds`. */
export function isDelivering(transaction: Transaction, timeSeconds: number): boolean {
  if (transaction.state !== "active") {
    return false;
  }
  return TimeWindow.fromBounds(transaction.start_time_s, transaction.end_time_s).contains(timeSeconds);
}

/**
 * Primary control power seen from the battery. Over-frequency (negative grid
 * demand) charges with `eta_ch` applied; under-frequency discharges and draws
 * `1 / eta_dis` more than the grid receives.
 */
export function primaryControlPower(params: PcrParameters, frequency: Frequency): Power {
  const nominal = Frequency.fromHertz(params.nominal_frequency_hz);
  const gridDemand = Power.fromMegawatts(params.prequalified_power_mw * frequency.shortfallFrom(nominal));
  if (gridDemand.isNegative) {
    return gridDemand.multiply(-params.efficiency_charge);
  }
  return gridDemand.divide(params.efficiency_discharge);
}

function scheduleTransactionEnergy(
  params: PcrParameters,
  transaction: Transaction,
  timeSeconds: number,
  step: Duration,
): Energy {
  if (transaction.state !== "active" || !isDelivering(transaction, timeSeconds)) {
    return Energy.zero();
  }
  const contracted = Power.fromMegawatts(params.transaction_power_mw).forDuration(step);
  if (transaction.type === 1) {
    return contracted.multiply(params.efficiency_charge);
  }
  return contracted.negate().divide(params.efficiency_discharge);
}

function overfulfillmentEnergy(
  params: PcrParameters,
  soc: Percentage,
  frequency: Frequency,
  primaryControl: Energy,
): Energy {
  if (!params.use_overfulfillment) {
    return Energy.zero();
  }
  const nominal = Frequency.fromHertz(params.nominal_frequency_hz);
  const [low, high] = params.soc_limits_of;
  const roomToCharge = soc.isAtMost(low) && frequency.isAbove(nominal);
  const roomToDischarge = soc.isAtLeast(high) && frequency.isBelow(nominal);
  if (roomToCharge || roomToDischarge) {
    return primaryControl.multiply(OVERFULFILLMENT_FACTOR);
  }
  return Energy.zero();
}

function deadbandUtilizationEnergy(
  params: PcrParameters,
  soc: Percentage,
  frequency: Frequency,
  primaryControl: Energy,
): Energy {
  if (!params.use_deadband_utilization) {
    return Energy.zero();
  }
  const nominal = Frequency.fromHertz(params.nominal_frequency_hz);
  if (!frequency.isWithinBand(nominal, DEADBAND_HALF_WIDTH_HZ)) {
    return Energy.zero();
  }
  const [low, high] = params.soc_limits_du;
  // Skip the response that would push SOC further towards the limit it already sits past.
  const skipDischarge = soc.isAtMost(low) && frequency.isBelow(nominal);
  const skipCharge = soc.isAtLeast(high) && frequency.isAbove(nominal);
  if (skipDischarge || skipCharge) {
    return primaryControl.negate();
  }
  return Energy.zero();
}

/**
 * Energy flows of one step. `energyMwh` is the stored energy before this
 * step is committed and `transaction` the state carried over from the
 * previous step; neither is modified.
 */
export function calculatePowerFlows(
  params: PcrParameters,
  sample: PowerFlowSample,
  energyMwh: number,
  transaction: Transaction,
  deltaSeconds: number,
): PowerFlowOutput {
  const frequency = Frequency.fromHertz(sample.frequencyHz);
  const step = Duration.fromSeconds(deltaSeconds);
  const soc = Percentage.fromPercent(socPercent(energyMwh, params.capacity_mwh));

  const primaryPower = primaryControlPower(params, frequency);
  const primaryControl = primaryPower.forDuration(step);
  const scheduleTx = scheduleTransactionEnergy(params, transaction, sample.timeSeconds, step);
  const overfulfillment = overfulfillmentEnergy(params, soc, frequency, primaryControl);
  const deadbandUtil = deadbandUtilizationEnergy(params, soc, frequency, primaryControl);
  const selfConsumption = Energy.fromMegawattHours(-params.self_consumption_mwh_per_s * step.seconds);

  let currentPower = primaryPower;
  if (transaction.state === "active" && isDelivering(transaction, sample.timeSeconds)) {
    currentPower = currentPower.add(Power.fromMegawatts(transaction.type * params.transaction_power_mw));
  }

  return {
    flows: {
      primary_control: primaryControl.megawattHours,
      overfulfillment: overfulfillment.megawattHours,
      deadband_util: deadbandUtil.megawattHours,
      schedule_tx: scheduleTx.megawattHours,
      self_consumption: selfConsumption.megawattHours,
    },
    current_power_mw: currentPower.megawatts,
  };
}
