import { constants as fsConstants } from "node:fs";
import { access, readFile } from "node:fs/promises";
import { extname } from "node:path";
import { Injectable, Logger } from "@nestjs/common";
import Papa from "papaparse";
import { z } from "zod";

import type { FrequencySeries } from "@pcr-bess/domain";
import { describeError, frequencySeriesSchema, InputShapeError } from "@pcr-bess/domain";
import { synthesizeFrequencySeries } from "./synthetic-frequency";
import type { SyntheticFrequencyOptions } from "./synthetic-frequency";

export type FrequencyFileFormat = "csv" | "json";

const TIME_COLUMNS = ["time_s", "time", "t"];
const FREQUENCY_COLUMNS = ["frequency_hz", "frequency", "freq", "f"];

const frequencyRowsSchema = z.array(
  z.object({
    time_s: z.number(),
    frequency_hz: z.number(),
  }),
);

function ensureAligned(series: FrequencySeries): FrequencySeries {
  if (series.time_s.length !== series.frequency_hz.length) {
    throw new InputShapeError(
      `Frequency data and time vector must have same length (frequency=${series.frequency_hz.length}, time=${series.time_s.length})`,
    );
  }
  return series;
}

function findColumn(headers: string[], candidates: string[]): string | null {
  const lookup = new Map(headers.map((header) => [header.trim().toLowerCase(), header]));
  for (const candidate of candidates) {
    const match = lookup.get(candidate);
    if (match !== undefined) {
      return match;
    }
  }
  return null;
}

// Number("") is 0, so blank cells are rejected before conversion.
function numericCell(cell: unknown): number {
  if (typeof cell !== "string" || cell.trim().length === 0) {
    return Number.NaN;
  }
  return Number(cell);
}

/** Two numeric columns with a header row; column names are matched case-insensitively. */
export function parseFrequencyCsv(content: string): FrequencySeries {
  const parsed = Papa.parse<Record<string, unknown>>(content, {
    header: true,
    skipEmptyLines: true,
  });
  if (parsed.errors.length > 0) {
    throw new InputShapeError(`CSV parsing failed: ${parsed.errors[0].message}`);
  }

  const headers = parsed.meta.fields ?? [];
  const timeColumn = findColumn(headers, TIME_COLUMNS);
  const frequencyColumn = findColumn(headers, FREQUENCY_COLUMNS);
  if (!timeColumn || !frequencyColumn) {
    throw new InputShapeError(
      `CSV must provide a time column (${TIME_COLUMNS.join("/")}) and a frequency column (${FREQUENCY_COLUMNS.join("/")})`,
    );
  }

  const time_s: number[] = [];
  const frequency_hz: number[] = [];
  parsed.data.forEach((row, index) => {
    const time = numericCell(row[timeColumn]);
    const frequency = numericCell(row[frequencyColumn]);
    if (!Number.isFinite(time) || !Number.isFinite(frequency)) {
      // Header is line 1.
      throw new InputShapeError(`CSV line ${index + 2} does not hold numeric time and frequency values`);
    }
    time_s.push(time);
    frequency_hz.push(frequency);
  });
  return {time_s, frequency_hz};
}

/** Either `{ time_s: [...], frequency_hz: [...] }` or an array of `{ time_s, frequency_hz }` rows. */
export function parseFrequencyJson(raw: unknown): FrequencySeries {
  const columns = frequencySeriesSchema.safeParse(raw);
  if (columns.success) {
    return ensureAligned(columns.data);
  }
  const rows = frequencyRowsSchema.safeParse(raw);
  if (rows.success) {
    return {
      time_s: rows.data.map((row) => row.time_s),
      frequency_hz: rows.data.map((row) => row.frequency_hz),
    };
  }
  throw new InputShapeError(
    "JSON frequency data must be { time_s: number[], frequency_hz: number[] } or an array of { time_s, frequency_hz }",
  );
}

export function resolveFormat(path: string, format?: FrequencyFileFormat): FrequencyFileFormat {
  if (format) {
    return format;
  }
  const extension = extname(path).toLowerCase();
  if (extension === ".csv") {
    return "csv";
  }
  if (extension === ".json") {
    return "json";
  }
  throw new InputShapeError(`Cannot infer frequency data format from '${path}'; set dataset.format`);
}

@Injectable()
export class FrequencyDataService {
  private readonly logger = new Logger(FrequencyDataService.name);

  async load(path: string, format?: FrequencyFileFormat): Promise<FrequencySeries> {
    try {
      await access(path, fsConstants.R_OK);
    } catch (error) {
      throw new Error(`Frequency data not accessible at ${path}: ${describeError(error)}`);
    }
    const resolvedFormat = resolveFormat(path, format);
    const content = await readFile(path, "utf-8");
    let series: FrequencySeries;
    if (resolvedFormat === "csv") {
      series = parseFrequencyCsv(content);
    } else {
      const raw: unknown = JSON.parse(content);
      series = parseFrequencyJson(raw);
    }
    this.logger.log(`Loaded ${series.time_s.length} frequency samples from ${path}`);
    return ensureAligned(series);
  }

  synthesize(options: SyntheticFrequencyOptions): FrequencySeries {
    const series = synthesizeFrequencySeries(options);
    this.logger.log(
      `Synthesized ${series.time_s.length} frequency samples (${options.durationHours} h at ${options.samplingRateHz} Hz, seed=${options.seed})`,
    );
    return series;
  }
}
