import { Inject, Injectable, Logger } from "@nestjs/common";
import type {
  FrequencySeries,
  PcrParameters,
  RunDistributions,
  RunSummary,
  StoredRunPayload,
} from "@pcr-bess/domain";
import { StorageService } from "../storage/storage.service";
import { DistributionService } from "./distribution.service";
import { runSimulation } from "./pcr-simulator";
import { SummaryService } from "./summary.service";
import type { TransactionEvent, TransactionObserver } from "./transaction-scheduler";

export interface SimulationRunInput {
  label: string;
  parameters: PcrParameters;
  series: FrequencySeries;
}

export interface StoredRun extends StoredRunPayload {
  id: number;
}

export interface RunSummaryResponse {
  id: number;
  label: string;
  created_at: string;
  summary: RunSummary;
}

class LoggingTransactionObserver implements TransactionObserver {
  constructor(private readonly logger: Logger) {
  }

  onTransactionEvent(event: TransactionEvent): void {
    const {type, power_mw, start_time_s, end_time_s} = event.transaction;
    const direction = type === 1 ? "charge" : "discharge";
    switch (event.kind) {
      case "transaction_scheduled":
        this.logger.verbose(
          `t=${event.time_s}s: scheduled ${direction} of ${power_mw} MW for [${start_time_s}s, ${end_time_s}s]`,
        );
        break;
      case "transaction_activated":
        this.logger.verbose(`t=${event.time_s}s: ${direction} transaction active`);
        break;
      case "transaction_completed":
        this.logger.verbose(`t=${event.time_s}s: ${direction} transaction completed`);
        break;
    }
  }
}

@Injectable()
export class SimulationService {
  private readonly logger = new Logger(SimulationService.name);
  private readonly observer = new LoggingTransactionObserver(this.logger);

  constructor(
    @Inject(StorageService) private readonly storageRef: StorageService,
    @Inject(SummaryService) private readonly summaryService: SummaryService,
    @Inject(DistributionService) private readonly distributionService: DistributionService,
  ) {
  }

  run(input: SimulationRunInput): StoredRun {
    const {label, parameters, series} = input;
    this.logger.log(
      `Running '${label}' over ${series.time_s.length} samples (C=${parameters.capacity_mwh} MWh, P_PQ=${parameters.prequalified_power_mw} MW)`,
    );
    const result = runSimulation(parameters, series.frequency_hz, series.time_s, {observer: this.observer});
    const summary = this.summaryService.toSummary(result, series.time_s);
    this.logger.log(
      `Run '${label}' finished: FCE=${summary.fce.toFixed(3)}, SOC ${summary.min_soc_percent.toFixed(1)}..${summary.max_soc_percent.toFixed(1)} %, ${result.transactions.length} transactions`,
    );

    const payload: StoredRunPayload = {
      label,
      created_at: new Date().toISOString(),
      parameters,
      time_s: [...series.time_s],
      frequency_hz: [...series.frequency_hz],
      summary,
      result,
    };
    const id = this.storageRef.saveRun(payload);
    return {id, ...payload};
  }

  getLatestRun(): StoredRun | null {
    const record = this.storageRef.getLatestRun();
    return record ? {id: record.id, ...record.payload} : null;
  }

  getRun(id: number): StoredRun | null {
    const record = this.storageRef.getRun(id);
    return record ? {id: record.id, ...record.payload} : null;
  }

  getSummary(id?: number): RunSummaryResponse | null {
    const run = id === undefined ? this.getLatestRun() : this.getRun(id);
    if (!run) {
      return null;
    }
    return {id: run.id, label: run.label, created_at: run.created_at, summary: run.summary};
  }

  getDistributions(id?: number): RunDistributions | null {
    const run = id === undefined ? this.getLatestRun() : this.getRun(id);
    return run ? this.distributionService.build(run.result, run.frequency_hz) : null;
  }
}
