import { resolve } from "node:path";
import { Inject, Injectable, Logger } from "@nestjs/common";

import type { FrequencySeries, PcrParameters } from "@pcr-bess/domain";
import { describeError } from "@pcr-bess/domain";
import { FrequencyDataService } from "../frequency/frequency-data.service";
import { SimulationService } from "../simulation/simulation.service";
import type { StoredRun } from "../simulation/simulation.service";
import type { ConfigDocument } from "./schemas";
import { RuntimeConfigService } from "./runtime-config.service";
import { SimulationConfigFactory } from "./simulation-config.factory";

interface PreparedRun {
  label: string;
  series: FrequencySeries;
}

@Injectable()
export class SimulationSeedService {
  private readonly logger = new Logger(SimulationSeedService.name);
  private runInProgress = false;

  constructor(
    @Inject(RuntimeConfigService) private readonly configState: RuntimeConfigService,
    @Inject(SimulationConfigFactory) private readonly configFactory: SimulationConfigFactory,
    @Inject(FrequencyDataService) private readonly frequencyData: FrequencyDataService,
    @Inject(SimulationService) private readonly simulationService: SimulationService,
  ) {
  }

  /** Runs the configured dataset, or a synthetic series when none is configured, and stores the result. */
  async seedFromConfig(): Promise<StoredRun | null> {
    if (this.runInProgress) {
      this.logger.warn("Simulation already running; skipping new request.");
      return null;
    }
    this.runInProgress = true;
    try {
      const rawConfig = this.configState.getDocument();
      this.logger.verbose("Loaded configuration from runtime state.");

      const parameters = this.configFactory.create(rawConfig);
      const prepared = await this.prepare(rawConfig, parameters);
      const run = this.simulationService.run({label: prepared.label, parameters, series: prepared.series});
      this.logger.log(`Seeded run #${run.id} using config data.`);
      return run;
    } catch (error) {
      this.logger.error(`Simulation seed failed: ${describeError(error)}`);
      throw error;
    } finally {
      this.runInProgress = false;
    }
  }

  private async prepare(config: ConfigDocument, parameters: PcrParameters): Promise<PreparedRun> {
    if (config.dataset) {
      const path = resolve(process.cwd(), config.dataset.path);
      const series = await this.frequencyData.load(path, config.dataset.format);
      return {label: config.dataset.label ?? config.dataset.path, series};
    }
    const options = this.configFactory.createSyntheticOptions(config, parameters);
    return {
      label: `synthetic (seed ${options.seed})`,
      series: this.frequencyData.synthesize(options),
    };
  }
}
