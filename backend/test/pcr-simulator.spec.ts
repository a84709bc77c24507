import { describe, expect, it } from "vitest";

import type { PcrParameters } from "@pcr-bess/domain";
import { ConfigurationError, DEFAULT_PCR_PARAMETERS, InputShapeError } from "@pcr-bess/domain";
import { runSimulation } from "../src/simulation/pcr-simulator";
import type { TransactionEvent } from "../src/simulation/transaction-scheduler";

const params: PcrParameters = {...DEFAULT_PCR_PARAMETERS};

function uniformTime(count: number, stepSeconds: number): number[] {
  return Array.from({length: count}, (_, index) => index * stepSeconds);
}

describe("runSimulation", () => {
  it("only drains self-consumption at nominal frequency", () => {
    const result = runSimulation(params, [60, 60], [0, 1]);
    expect(result.steps).toBe(2);
    expect(result.soc_percent[0]).toBe(40);
    expect(result.soc_percent[1]).toBe(((0.8 - 3.85e-8) / 2) * 100);
    expect(result.e_rate).toEqual([0, 0]);
    expect(result.energy_flows.self_consumption).toEqual([0, -3.85e-8]);
    expect(result.energy_flows.primary_control).toEqual([0, 0]);
    expect(result.transactions).toEqual([]);
    expect(result.fce).toBe(0);
  });

  it("decreases SOC monotonically and never schedules while frequency stays nominal", () => {
    const count = 50;
    const result = runSimulation(params, new Array<number>(count).fill(60), uniformTime(count, 60));
    for (let k = 1; k < count; k += 1) {
      expect(result.soc_percent[k]).toBeLessThan(result.soc_percent[k - 1]);
    }
    expect(result.transactions).toHaveLength(0);
    expect(result.energy_flows.schedule_tx.every((value) => value === 0)).toBe(true);
  });

  it("keeps overfulfillment and deadband series at zero while disabled", () => {
    const frequency = [60, 59.995, 60.005, 59.8, 60.2, 60.01, 59.99];
    const result = runSimulation(params, frequency, uniformTime(frequency.length, 1));
    expect(result.energy_flows.overfulfillment).toEqual(new Array<number>(frequency.length).fill(0));
    expect(result.energy_flows.deadband_util).toEqual(new Array<number>(frequency.length).fill(0));
  });

  it("applies a scheduled transaction one step after the threshold crossing and only inside its window", () => {
    const scenario: PcrParameters = {
      ...params,
      prequalified_power_mw: 0,
      self_consumption_mwh_per_s: 0,
      initial_soc_percent: 30,
      lead_time_h: 0.25,
      contract_duration_h: 0.5,
    };
    const time = uniformTime(10, 450);
    const events: TransactionEvent["kind"][] = [];
    const result = runSimulation(scenario, new Array<number>(10).fill(60), time, {
      observer: {onTransactionEvent: (event) => events.push(event.kind)},
    });

    const perStep = (0.5 * 450 / 3600) * 0.9;
    expect(result.energy_flows.schedule_tx).toEqual([0, 0, 0, 0, perStep, perStep, perStep, perStep, 0, 0]);
    expect(result.e_rate).toEqual([0, 0, 0, 0, 0.25, 0.25, 0.25, 0.25, 0, 0]);
    expect(result.transactions).toEqual([
      {
        type: 1,
        power_mw: 0.5,
        scheduled_at_s: 450,
        start_time_s: 1350,
        end_time_s: 3150,
        activated_at_s: 1350,
        completed_at_s: 3600,
      },
      {
        type: -1,
        power_mw: 0.5,
        scheduled_at_s: 4050,
        start_time_s: 4950,
        end_time_s: 6750,
        activated_at_s: null,
        completed_at_s: null,
      },
    ]);
    expect(events).toEqual([
      "transaction_scheduled",
      "transaction_activated",
      "transaction_completed",
      "transaction_scheduled",
    ]);

    result.energy_flows.schedule_tx.forEach((value, k) => {
      if (time[k] < 1350 || time[k] > 3150) {
        expect(value).toBe(0);
      }
    });
    expect(result.schedule_tx_energy.charged).toBe(perStep + perStep + perStep + perStep);
    expect(result.schedule_tx_energy.discharged).toBe(0);
    expect(result.energy_shares).toEqual({pct_charged_via_st: 100, pct_discharged_via_st: 0});
    expect(result.fce).toBeGreaterThan(0);
  });

  it("decides overfulfillment on the SOC held before the step", () => {
    const overfulfilling: PcrParameters = {
      ...params,
      use_overfulfillment: true,
      self_consumption_mwh_per_s: 0,
      soc_limits_st: [0, 100],
      initial_soc_percent: 49,
    };
    const result = runSimulation(overfulfilling, [60.5, 60.5, 60.5], [0, 3600, 7200]);
    const primary = (-0.5 * -0.9) * 3600 / 3600;

    // Step 1 starts at 49 % and ends above the 50 % limit; step 2 sees that.
    expect(result.soc_percent[1]).toBeGreaterThan(50);
    expect(result.energy_flows.primary_control).toEqual([0, primary, primary]);
    expect(result.energy_flows.overfulfillment).toEqual([0, primary * 0.2, 0]);
    expect(result.energy_flows.schedule_tx).toEqual([0, 0, 0]);
  });

  it("pins SOC at 100 when driven above capacity", () => {
    const strong: PcrParameters = {...params, prequalified_power_mw: 100};
    const result = runSimulation(strong, [60, 59], [0, 3600]);
    expect(result.soc_percent[1]).toBe(100);
    expect(result.e_rate[1]).toBe((100 / 0.9) / 2);
  });

  it("pins SOC at 0 when drained below empty", () => {
    const leaky: PcrParameters = {...params, self_consumption_mwh_per_s: 0.001, initial_soc_percent: 1};
    const result = runSimulation(leaky, [60, 60, 60], [0, 3600, 7200]);
    expect(result.soc_percent).toEqual([1, 0, 0]);
  });

  it("keeps SOC within bounds and FCE non-negative on a volatile series", () => {
    const frequency = Array.from({length: 200}, (_, index) => 60 + 0.3 * Math.sin(index / 7));
    const strong: PcrParameters = {
      ...params,
      prequalified_power_mw: 20,
      use_overfulfillment: true,
      use_deadband_utilization: true,
    };
    const result = runSimulation(strong, frequency, uniformTime(200, 30));
    for (const soc of result.soc_percent) {
      expect(soc).toBeGreaterThanOrEqual(0);
      expect(soc).toBeLessThanOrEqual(100);
    }
    expect(result.fce).toBeGreaterThanOrEqual(0);
  });

  it("rejects series of different lengths", () => {
    expect(() => runSimulation(params, [60, 60, 60], [0, 1])).toThrow(
      "Frequency data and time vector must have same length (frequency=3, time=2)",
    );
    expect(() => runSimulation(params, [60, 60, 60], [0, 1])).toThrow(InputShapeError);
  });

  it("rejects series that cannot be stepped", () => {
    expect(() => runSimulation(params, [60], [0])).toThrow("At least two samples are required, got 1");
    expect(() => runSimulation(params, [60, 60, 60], [0, 2, 2])).toThrow(
      "Time must be strictly increasing (t[1]=2, t[2]=2)",
    );
    expect(() => runSimulation(params, [60, Number.NaN], [0, 1])).toThrow("Sample 1 is not a finite number");
  });

  it("rejects invalid parameters before stepping", () => {
    expect(() => runSimulation({...params, capacity_mwh: -1}, [60, 60], [0, 1])).toThrow(ConfigurationError);
    expect(() => runSimulation({...params, efficiency_discharge: 0}, [60], [0])).toThrow(
      /^Invalid parameter efficiency_discharge: /,
    );
  });
});
