import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { Logger } from "@nestjs/common";

import type { FrequencySeries } from "@pcr-bess/domain";
import { DEFAULT_PCR_PARAMETERS, describeError } from "@pcr-bess/domain";
import { FrequencyDataService } from "../src/frequency/frequency-data.service";
import { DEFAULT_SYNTHETIC_OPTIONS } from "../src/frequency/synthetic-frequency";
import { runSimulation } from "../src/simulation/pcr-simulator";
import { SummaryService } from "../src/simulation/summary.service";

// Usage: tsx scripts/run-pcr-demo.ts [frequency.csv|frequency.json]
async function loadSeries(frequencyData: FrequencyDataService): Promise<FrequencySeries> {
  const argument = process.argv[2];
  if (!argument) {
    return frequencyData.synthesize({...DEFAULT_SYNTHETIC_OPTIONS, nominalHz: DEFAULT_PCR_PARAMETERS.nominal_frequency_hz});
  }
  const path = resolve(process.cwd(), argument);
  if (!existsSync(path)) {
    throw new Error(`Frequency file not found: ${path}`);
  }
  return frequencyData.load(path);
}

async function main(): Promise<void> {
  Logger.overrideLogger(["fatal", "error", "warn"]);
  const series = await loadSeries(new FrequencyDataService());
  const result = runSimulation(DEFAULT_PCR_PARAMETERS, series.frequency_hz, series.time_s);
  const summary = new SummaryService().toSummary(result, series.time_s);

  // eslint-disable-next-line no-console
  console.log(JSON.stringify({parameters: DEFAULT_PCR_PARAMETERS, summary, transactions: result.transactions}, null, 2));
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(`Demo failed: ${describeError(error)}`);
  process.exitCode = 1;
});
