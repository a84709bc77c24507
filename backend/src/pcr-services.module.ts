import { Module } from "@nestjs/common";

import { SimulationService } from "./simulation/simulation.service";
import { HistoryService } from "./simulation/history.service";
import { SummaryService } from "./simulation/summary.service";
import { DistributionService } from "./simulation/distribution.service";
import { FrequencyDataService } from "./frequency/frequency-data.service";
import { ConfigFileService } from "./config/config-file.service";
import { SimulationSeedService } from "./config/simulation-seed.service";
import { SimulationConfigFactory } from "./config/simulation-config.factory";
import { StorageModule } from "./storage/storage.module";
import { RuntimeConfigService } from "./config/runtime-config.service";

const SERVICES = [
  SimulationService,
  HistoryService,
  SummaryService,
  DistributionService,
  FrequencyDataService,
  SimulationSeedService,
  ConfigFileService,
  SimulationConfigFactory,
  RuntimeConfigService,
];

@Module({
  imports: [StorageModule],
  providers: SERVICES,
  exports: SERVICES,
})
export class PcrServicesModule {}
