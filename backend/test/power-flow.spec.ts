import { describe, expect, it } from "vitest";

import type { ActiveTransaction, PcrParameters, ScheduledTransaction } from "@pcr-bess/domain";
import { DEFAULT_PCR_PARAMETERS } from "@pcr-bess/domain";
import { calculatePowerFlows, isDelivering } from "../src/simulation/power-flow";
import { IDLE_TRANSACTION } from "../src/simulation/transaction-scheduler";

const params: PcrParameters = {...DEFAULT_PCR_PARAMETERS};

const charging: ActiveTransaction = {
  state: "active",
  type: 1,
  power_mw: 0.5,
  scheduled_at_s: 0,
  start_time_s: 10,
  end_time_s: 100,
  activated_at_s: 10,
};

describe("calculatePowerFlows", () => {
  it("charges with eta_ch applied on over-frequency", () => {
    const {flows, current_power_mw} = calculatePowerFlows(params, {frequencyHz: 60.5, timeSeconds: 1}, 0.8, IDLE_TRANSACTION, 1);
    expect(current_power_mw).toBe(-0.5 * -0.9);
    expect(flows.primary_control).toBe((-0.5 * -0.9) * 1 / 3600);
  });

  it("scales by 1 / eta_dis on under-frequency", () => {
    const {flows, current_power_mw} = calculatePowerFlows(params, {frequencyHz: 59.5, timeSeconds: 2}, 0.8, IDLE_TRANSACTION, 2);
    expect(current_power_mw).toBe(0.5 / 0.9);
    expect(flows.primary_control).toBe((0.5 / 0.9) * 2 / 3600);
  });

  it("drains self-consumption per second without hour conversion", () => {
    const {flows} = calculatePowerFlows(params, {frequencyHz: 60, timeSeconds: 2}, 0.8, IDLE_TRANSACTION, 2);
    expect(flows.self_consumption).toBe(-3.85e-8 * 2);
    expect(flows.primary_control).toBe(0);
    expect(flows.schedule_tx).toBe(0);
    expect(flows.overfulfillment).toBe(0);
    expect(flows.deadband_util).toBe(0);
  });

  it("adds the contracted transaction inside its window", () => {
    const {flows, current_power_mw} = calculatePowerFlows(params, {frequencyHz: 60, timeSeconds: 50}, 0.8, charging, 1);
    expect(flows.schedule_tx).toBe((0.5 * 1 / 3600) * 0.9);
    expect(current_power_mw).toBe(0.5);
  });

  it("draws extra energy for a discharging transaction", () => {
    const discharging: ActiveTransaction = {...charging, type: -1};
    const {flows, current_power_mw} = calculatePowerFlows(params, {frequencyHz: 60, timeSeconds: 50}, 0.8, discharging, 1);
    expect(flows.schedule_tx).toBe(-(0.5 * 1 / 3600) / 0.9);
    expect(current_power_mw).toBe(-0.5);
  });

  it("ignores transactions outside their window or not yet active", () => {
    const scheduled: ScheduledTransaction = {
      state: "scheduled",
      type: 1,
      power_mw: 0.5,
      scheduled_at_s: 0,
      start_time_s: 10,
      end_time_s: 100,
    };
    expect(calculatePowerFlows(params, {frequencyHz: 60, timeSeconds: 50}, 0.8, scheduled, 1).flows.schedule_tx).toBe(0);
    const after = calculatePowerFlows(params, {frequencyHz: 60, timeSeconds: 101}, 0.8, charging, 1);
    expect(after.flows.schedule_tx).toBe(0);
    expect(after.current_power_mw).toBe(0);
  });

  it("boosts primary control by a fifth while overfulfilling", () => {
    const enabled: PcrParameters = {...params, use_overfulfillment: true};
    // SOC 40 % sits below the 50 % limit, so over-frequency may be overfulfilled.
    const boosted = calculatePowerFlows(enabled, {frequencyHz: 60.5, timeSeconds: 1}, 0.8, IDLE_TRANSACTION, 1);
    expect(boosted.flows.overfulfillment).toBe(boosted.flows.primary_control * 0.2);

    const blocked = calculatePowerFlows(enabled, {frequencyHz: 59.5, timeSeconds: 1}, 0.8, IDLE_TRANSACTION, 1);
    expect(blocked.flows.overfulfillment).toBe(0);
  });

  it("cancels primary control inside the deadband when SOC is past the limit", () => {
    const enabled: PcrParameters = {...params, use_deadband_utilization: true};
    const inBand = calculatePowerFlows(enabled, {frequencyHz: 59.995, timeSeconds: 1}, 0.8, IDLE_TRANSACTION, 1);
    expect(inBand.flows.primary_control).toBeGreaterThan(0);
    expect(inBand.flows.deadband_util).toBe(-inBand.flows.primary_control);

    const outOfBand = calculatePowerFlows(enabled, {frequencyHz: 59.5, timeSeconds: 1}, 0.8, IDLE_TRANSACTION, 1);
    expect(outOfBand.flows.deadband_util).toBe(0);

    // Above nominal with SOC below the upper limit: nothing to cancel.
    const above = calculatePowerFlows(enabled, {frequencyHz: 60.005, timeSeconds: 1}, 0.8, IDLE_TRANSACTION, 1);
    expect(above.flows.deadband_util).toBe(0);
  });

  it("overfulfills under-frequency once SOC reaches the upper limit", () => {
    const enabled: PcrParameters = {...params, use_overfulfillment: true};
    // 1.0 MWh of 2 MWh is exactly the 50 % limit.
    const boosted = calculatePowerFlows(enabled, {frequencyHz: 59.5, timeSeconds: 1}, 1.0, IDLE_TRANSACTION, 1);
    expect(boosted.flows.primary_control).toBe((0.5 / 0.9) * 1 / 3600);
    expect(boosted.flows.overfulfillment).toBe(boosted.flows.primary_control * 0.2);
  });

  it("cancels charging inside the deadband once SOC reaches the upper limit", () => {
    const enabled: PcrParameters = {...params, use_deadband_utilization: true};
    const cancelled = calculatePowerFlows(enabled, {frequencyHz: 60.005, timeSeconds: 1}, 1.0, IDLE_TRANSACTION, 1);
    expect(cancelled.flows.primary_control).toBeGreaterThan(0);
    expect(cancelled.flows.deadband_util).toBe(-cancelled.flows.primary_control);
  });

  it("leaves both optional flows at zero while disabled", () => {
    const {flows} = calculatePowerFlows(params, {frequencyHz: 59.995, timeSeconds: 1}, 0.8, IDLE_TRANSACTION, 1);
    expect(flows.overfulfillment).toBe(0);
    expect(flows.deadband_util).toBe(0);
  });
});

describe("isDelivering", () => {
  it("covers the closed window of an active transaction only", () => {
    expect(isDelivering(charging, 10)).toBe(true);
    expect(isDelivering(charging, 100)).toBe(true);
    expect(isDelivering(charging, 9)).toBe(false);
    expect(isDelivering(IDLE_TRANSACTION, 50)).toBe(false);
  });
});
