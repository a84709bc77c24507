import { z } from "zod";

import { pcrParametersSchema } from "./parameters";

export type TransactionType = 1 | -1;

export const TRANSACTION_CHARGE: TransactionType = 1;
export const TRANSACTION_DISCHARGE: TransactionType = -1;

interface PendingTransactionFields {
  type: TransactionType;
  power_mw: number;
  start_time_s: number;
  end_time_s: number;
}

export interface IdleTransaction {
  state: "idle";
}

export interface ScheduledTransaction extends PendingTransactionFields {
  state: "scheduled";
  scheduled_at_s: number;
}

export interface ActiveTransaction extends PendingTransactionFields {
  state: "active";
  scheduled_at_s: number;
  activated_at_s: number;
}

export type Transaction = IdleTransaction | ScheduledTransaction | ActiveTransaction;
export type TransactionState = Transaction["state"];

export interface StepFlows {
  primary_control: number;
  overfulfillment: number;
  deadband_util: number;
  schedule_tx: number;
  self_consumption: number;
}

export type EnergyFlowKey = keyof StepFlows;

export const ENERGY_FLOW_KEYS: readonly EnergyFlowKey[] = [
  "primary_control",
  "overfulfillment",
  "deadband_util",
  "schedule_tx",
  "self_consumption",
];

const series = z.array(z.number());

export const energyFlowSeriesSchema = z.object({
  primary_control: series,
  overfulfillment: series,
  deadband_util: series,
  schedule_tx: series,
  self_consumption: series,
});

export const chargeSplitSchema = z.object({
  charged: z.number(),
  discharged: z.number(),
});

export const energySharesSchema = z.object({
  pct_charged_via_st: z.number(),
  pct_discharged_via_st: z.number(),
});

export const performanceMetricsSchema = z.object({
  fce: z.number(),
  schedule_tx_energy: chargeSplitSchema,
  total_energy: chargeSplitSchema,
  energy_shares: energySharesSchema,
});

export const transactionRecordSchema = z.object({
  type: z.union([z.literal(1), z.literal(-1)]),
  power_mw: z.number(),
  scheduled_at_s: z.number(),
  start_time_s: z.number(),
  end_time_s: z.number(),
  activated_at_s: z.number().nullable(),
  completed_at_s: z.number().nullable(),
});

export const simulationResultSchema = performanceMetricsSchema.extend({
  steps: z.number().int(),
  soc_percent: series,
  e_rate: series,
  energy_flows: energyFlowSeriesSchema,
  transactions: z.array(transactionRecordSchema),
});

export const runSummarySchema = z.object({
  steps: z.number().int(),
  duration_hours: z.number(),
  initial_soc_percent: z.number(),
  final_soc_percent: z.number(),
  min_soc_percent: z.number(),
  max_soc_percent: z.number(),
  mean_soc_percent: z.number(),
  max_e_rate: z.number(),
  fce: z.number(),
  schedule_tx_energy_mwh: chargeSplitSchema,
  total_energy_mwh: chargeSplitSchema,
  energy_shares: energySharesSchema,
  transactions: z.object({
    charge: z.number().int(),
    discharge: z.number().int(),
    completed: z.number().int(),
  }),
});

export const distributionSchema = z.object({
  bin_edges: series,
  counts: z.array(z.number().int()),
  probabilities: series,
});

export const runDistributionsSchema = z.object({
  soc_percent: distributionSchema,
  e_rate: distributionSchema,
  frequency_hz: distributionSchema,
});

export const frequencySeriesSchema = z.object({
  time_s: series,
  frequency_hz: series,
});

export const storedRunSchema = z.object({
  label: z.string(),
  created_at: z.string(),
  parameters: pcrParametersSchema,
  time_s: series,
  frequency_hz: series,
  summary: runSummarySchema,
  result: simulationResultSchema,
});

export type EnergyFlowSeries = z.infer<typeof energyFlowSeriesSchema>;
export type ChargeSplit = z.infer<typeof chargeSplitSchema>;
export type EnergyShares = z.infer<typeof energySharesSchema>;
export type PerformanceMetrics = z.infer<typeof performanceMetricsSchema>;
export type TransactionRecord = z.infer<typeof transactionRecordSchema>;
export type SimulationResult = z.infer<typeof simulationResultSchema>;
export type RunSummary = z.infer<typeof runSummarySchema>;
export type Distribution = z.infer<typeof distributionSchema>;
export type RunDistributions = z.infer<typeof runDistributionsSchema>;
export type FrequencySeries = z.infer<typeof frequencySeriesSchema>;
export type StoredRunPayload = z.infer<typeof storedRunSchema>;

export interface RunHistoryEntry {
  id: number;
  label: string;
  created_at: string;
  summary: RunSummary;
}

export interface RunHistoryResponse {
  generated_at: string;
  entries: RunHistoryEntry[];
}
