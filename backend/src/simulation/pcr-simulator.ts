import type { PcrParameters, SimulationResult, Transaction, TransactionRecord } from "@pcr-bess/domain";
import { InputShapeError, parsePcrParameters, socPercent } from "@pcr-bess/domain";

import { applyEnergyBalance, FlowHistory } from "./energy-balance";
import { calculatePerformanceMetrics } from "./metrics";
import { calculatePowerFlows } from "./power-flow";
import type { TransactionEvent, TransactionObserver } from "./transaction-scheduler";
import { advanceTransaction, IDLE_TRANSACTION } from "./transaction-scheduler";

export interface SimulationOptions {
  observer?: TransactionObserver;
}

/** Keeps one record per scheduled transaction and forwards every event. */
class TransactionLedger implements TransactionObserver {
  readonly records: TransactionRecord[] = [];

  constructor(private readonly downstream?: TransactionObserver) {
  }

  onTransactionEvent(event: TransactionEvent): void {
    if (event.kind === "transaction_scheduled") {
      const {type, power_mw, scheduled_at_s, start_time_s, end_time_s} = event.transaction;
      this.records.push({
        type,
        power_mw,
        scheduled_at_s,
        start_time_s,
        end_time_s,
        activated_at_s: null,
        completed_at_s: null,
      });
    } else {
      const current = this.records.at(-1);
      if (current) {
        if (event.kind === "transaction_activated") {
          current.activated_at_s = event.time_s;
        } else {
          current.completed_at_s = event.time_s;
        }
      }
    }
    this.downstream?.onTransactionEvent(event);
  }
}

export function validateSeries(frequencyHz: readonly number[], timeSeconds: readonly number[]): void {
  if (frequencyHz.length !== timeSeconds.length) {
    throw new InputShapeError(
      `Frequency data and time vector must have same length (frequency=${frequencyHz.length}, time=${timeSeconds.length})`,
    );
  }
  if (frequencyHz.length < 2) {
    throw new InputShapeError(`At least two samples are required, got ${frequencyHz.length}`);
  }
  for (let index = 0; index < timeSeconds.length; index += 1) {
    if (!Number.isFinite(frequencyHz[index]) || !Number.isFinite(timeSeconds[index])) {
      throw new InputShapeError(`Sample ${index} is not a finite number`);
    }
    if (index > 0 && timeSeconds[index] <= timeSeconds[index - 1]) {
      throw new InputShapeError(
        `Time must be strictly increasing (t[${index - 1}]=${timeSeconds[index - 1]}, t[${index}]=${timeSeconds[index]})`,
      );
    }
  }
}

/**
 * Runs the PCR operation over the whole series. Each step computes flows with
 * the transaction carried over from the previous step, then advances the
 * transaction, then commits the energy balance.
 */
export function runSimulation(
  parameters: PcrParameters,
  frequencyHz: readonly number[],
  timeSeconds: readonly number[],
  options: SimulationOptions = {},
): SimulationResult {
  const params = parsePcrParameters(parameters);
  validateSeries(frequencyHz, timeSeconds);

  const steps = frequencyHz.length;
  const capacity = params.capacity_mwh;
  const soc = new Float64Array(steps);
  const eRate = new Float64Array(steps);
  const history = new FlowHistory(steps);
  const ledger = new TransactionLedger(options.observer);

  let energy = capacity * (params.initial_soc_percent / 100);
  let transaction: Transaction = IDLE_TRANSACTION;
  soc[0] = params.initial_soc_percent;

  for (let k = 1; k < steps; k += 1) {
    const time = timeSeconds[k];
    const deltaSeconds = time - timeSeconds[k - 1];

    const {flows, current_power_mw} = calculatePowerFlows(
      params,
      {frequencyHz: frequencyHz[k], timeSeconds: time},
      energy,
      transaction,
      deltaSeconds,
    );
    // The next step sees the transition; this one already has its flows.
    transaction = advanceTransaction(params, transaction, socPercent(energy, capacity), time, ledger);
    energy = applyEnergyBalance(energy, flows, capacity);
    history.record(k, flows);

    soc[k] = socPercent(energy, capacity);
    eRate[k] = Math.abs(current_power_mw) / capacity;
  }

  return {
    ...calculatePerformanceMetrics(history, capacity),
    steps,
    soc_percent: Array.from(soc),
    e_rate: Array.from(eRate),
    energy_flows: history.toJSON(),
    transactions: ledger.records,
  };
}
