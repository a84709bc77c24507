import type {
  ActiveTransaction,
  IdleTransaction,
  PcrParameters,
  ScheduledTransaction,
  Transaction,
  TransactionType,
} from "@pcr-bess/domain";
import { Duration, TimeWindow, TRANSACTION_CHARGE, TRANSACTION_DISCHARGE } from "@pcr-bess/domain";

export type TransactionEvent =
  | { kind: "transaction_scheduled"; time_s: number; transaction: ScheduledTransaction }
  | { kind: "transaction_activated"; time_s: number; transaction: ActiveTransaction }
  | { kind: "transaction_completed"; time_s: number; transaction: ActiveTransaction };

export interface TransactionObserver {
  onTransactionEvent(event: TransactionEvent): void;
}

export const IDLE_TRANSACTION: IdleTransaction = {state: "idle"};

function resolveTransactionType(params: PcrParameters, socPercent: number): TransactionType | null {
  const [low, high] = params.soc_limits_st;
  if (socPercent <= low) {
    return TRANSACTION_CHARGE;
  }
  if (socPercent >= high) {
    return TRANSACTION_DISCHARGE;
  }
  return null;
}

function schedule(params: PcrParameters, type: TransactionType, timeSeconds: number): ScheduledTransaction {
  const startSeconds = timeSeconds + Duration.fromHours(params.lead_time_h).seconds;
  const window = TimeWindow.fromStartAndDuration(startSeconds, Duration.fromHours(params.contract_duration_h));
  return {
    state: "scheduled",
    type,
    power_mw: params.transaction_power_mw,
    scheduled_at_s: timeSeconds,
    start_time_s: window.startSeconds,
    end_time_s: window.endSeconds,
  };
}

/**
 * Applies at most one life-cycle transition for the step at `timeSeconds`:
 * Active -> Idle once the window has elapsed, Idle -> Scheduled when SOC sits
 * on or past a schedule-transaction threshold, Scheduled -> Active once the
 * start time is reached. A transaction completed in this call is not
 * replaced before the next call.
 */
export function advanceTransaction(
  params: PcrParameters,
  transaction: Transaction,
  socPercent: number,
  timeSeconds: number,
  observer?: TransactionObserver,
): Transaction {
  switch (transaction.state) {
    case "active": {
      const window = TimeWindow.fromBounds(transaction.start_time_s, transaction.end_time_s);
      if (!window.hasElapsed(timeSeconds)) {
        return transaction;
      }
      observer?.onTransactionEvent({kind: "transaction_completed", time_s: timeSeconds, transaction});
      return IDLE_TRANSACTION;
    }
    case "idle": {
      const type = resolveTransactionType(params, socPercent);
      if (type === null) {
        return transaction;
      }
      const scheduled = schedule(params, type, timeSeconds);
      observer?.onTransactionEvent({kind: "transaction_scheduled", time_s: timeSeconds, transaction: scheduled});
      return scheduled;
    }
    case "scheduled": {
      const window = TimeWindow.fromBounds(transaction.start_time_s, transaction.end_time_s);
      if (!window.hasStarted(timeSeconds)) {
        return transaction;
      }
      const active: ActiveTransaction = {...transaction, state: "active", activated_at_s: timeSeconds};
      observer?.onTransactionEvent({kind: "transaction_activated", time_s: timeSeconds, transaction: active});
      return active;
    }
    default: {
      const unexpected: never = transaction;
      throw new Error(`Unknown transaction state: ${JSON.stringify(unexpected)}`);
    }
  }
}
