import { describe, expect, it, vi } from "vitest";

import type { ActiveTransaction, PcrParameters, ScheduledTransaction } from "@pcr-bess/domain";
import { DEFAULT_PCR_PARAMETERS } from "@pcr-bess/domain";
import type { TransactionEvent, TransactionObserver } from "../src/simulation/transaction-scheduler";
import { advanceTransaction, IDLE_TRANSACTION } from "../src/simulation/transaction-scheduler";

const params: PcrParameters = {...DEFAULT_PCR_PARAMETERS};

function recorder(): TransactionObserver & { events: TransactionEvent[] } {
  const events: TransactionEvent[] = [];
  return {
    events,
    onTransactionEvent: (event) => {
      events.push(event);
    },
  };
}

const scheduled: ScheduledTransaction = {
  state: "scheduled",
  type: 1,
  power_mw: 0.5,
  scheduled_at_s: 100,
  start_time_s: 2800,
  end_time_s: 4600,
};

describe("advanceTransaction", () => {
  it("schedules a charge at or below the lower threshold", () => {
    const observer = recorder();
    const next = advanceTransaction(params, IDLE_TRANSACTION, 39, 100, observer);
    expect(next).toEqual(scheduled);
    expect(observer.events).toEqual([{kind: "transaction_scheduled", time_s: 100, transaction: scheduled}]);
  });

  it("schedules a discharge at or above the upper threshold", () => {
    const next = advanceTransaction(params, IDLE_TRANSACTION, 41, 0);
    expect(next).toEqual({
      state: "scheduled",
      type: -1,
      power_mw: 0.5,
      scheduled_at_s: 0,
      start_time_s: 2700,
      end_time_s: 4500,
    });
  });

  it("stays idle between the thresholds", () => {
    const observer = recorder();
    expect(advanceTransaction(params, IDLE_TRANSACTION, 40, 100, observer)).toBe(IDLE_TRANSACTION);
    expect(observer.events).toHaveLength(0);
  });

  it("activates once the start time is reached", () => {
    expect(advanceTransaction(params, scheduled, 39, 2799)).toBe(scheduled);
    const observer = recorder();
    const active = advanceTransaction(params, scheduled, 39, 2800, observer);
    expect(active).toEqual({...scheduled, state: "active", activated_at_s: 2800});
    expect(observer.events.map((event) => event.kind)).toEqual(["transaction_activated"]);
  });

  it("completes strictly after the end time and does not reschedule in the same call", () => {
    const active: ActiveTransaction = {...scheduled, state: "active", activated_at_s: 2800};
    expect(advanceTransaction(params, active, 10, 4600)).toBe(active);

    const observer = recorder();
    const next = advanceTransaction(params, active, 10, 4601, observer);
    expect(next).toBe(IDLE_TRANSACTION);
    expect(observer.events).toEqual([{kind: "transaction_completed", time_s: 4601, transaction: active}]);
  });

  it("ignores SOC while a transaction is pending or active", () => {
    const observer = {onTransactionEvent: vi.fn()};
    advanceTransaction(params, scheduled, 0, 1000, observer);
    advanceTransaction(params, {...scheduled, state: "active", activated_at_s: 2800}, 100, 3000, observer);
    expect(observer.onTransactionEvent).not.toHaveBeenCalled();
  });

  it("activates on the next call when the lead time is zero", () => {
    const immediate: PcrParameters = {...params, lead_time_h: 0};
    const first = advanceTransaction(immediate, IDLE_TRANSACTION, 30, 5);
    expect(first.state).toBe("scheduled");
    const second = advanceTransaction(immediate, first, 30, 6);
    expect(second.state).toBe("active");
  });
});
