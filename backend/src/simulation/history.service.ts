import { Inject, Injectable, Logger } from "@nestjs/common";
import type { RunHistoryResponse } from "@pcr-bess/domain";
import { StorageService } from "../storage/storage.service";

@Injectable()
export class HistoryService {
  private readonly logger = new Logger(HistoryService.name);

  constructor(@Inject(StorageService) private readonly storage: StorageService) {
  }

  getHistory(limit = 20): RunHistoryResponse {
    this.logger.log(`Reading run history (limit=${limit})`);
    const entries = this.storage.listRuns(limit);
    this.logger.verbose(`Fetched ${entries.length} runs from storage`);
    return {generated_at: entries[0]?.created_at ?? new Date().toISOString(), entries};
  }
}
