import { mkdirSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import type { Database } from "better-sqlite3";
import DatabaseConstructor from "better-sqlite3";

import type { RunHistoryEntry, StoredRunPayload } from "@pcr-bess/domain";
import { runSummarySchema, storedRunSchema } from "@pcr-bess/domain";

const IN_MEMORY = ":memory:";

export interface RunRecord {
  id: number;
  created_at: string;
  payload: StoredRunPayload;
}

interface RunRow {
  id: number;
  created_at: string;
  payload: string;
}

interface RunSummaryRow {
  id: number;
  created_at: string;
  label: string;
  summary: string;
}

export function resolveStoragePath(): string {
  const override = process.env.PCR_SIM_STORAGE_PATH?.trim();
  if (override === IN_MEMORY) {
    return IN_MEMORY;
  }
  return override && override.length > 0
    ? resolve(process.cwd(), override)
    : join(process.cwd(), "..", "data", "db", "runs.sqlite");
}

@Injectable()
export class StorageService implements OnModuleDestroy {
  private readonly dbPath: string;
  private readonly db: Database;
  private readonly logger = new Logger(StorageService.name);

  constructor() {
    this.dbPath = resolveStoragePath();
    if (this.dbPath !== IN_MEMORY) {
      mkdirSync(dirname(this.dbPath), {recursive: true});
    }
    this.db = new DatabaseConstructor(this.dbPath);
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma("journal_mode = WAL");
    }
    this.migrate();
    this.logger.log(`Storage initialised at ${this.dbPath}`);
  }

  onModuleDestroy(): void {
    this.db.close();
    this.logger.verbose("Storage connection closed");
  }

  saveRun(payload: StoredRunPayload): number {
    this.logger.log(`Storing run '${payload.label}' (${payload.result.steps} steps)`);
    const stmt = this.db.prepare(
      "INSERT INTO runs (created_at, label, summary, payload) VALUES (?, ?, ?, ?)",
    );
    const insert = this.db.transaction((item: StoredRunPayload) =>
      stmt.run(item.created_at, item.label, JSON.stringify(item.summary), JSON.stringify(item)),
    );
    const info = insert(payload);
    return Number(info.lastInsertRowid);
  }

  getLatestRun(): RunRecord | null {
    this.logger.verbose("Fetching latest run from storage");
    const stmt = this.db.prepare("SELECT id, created_at, payload FROM runs ORDER BY id DESC LIMIT 1");
    const row = stmt.get() as RunRow | undefined;
    return row ? this.toRecord(row) : null;
  }

  getRun(id: number): RunRecord | null {
    const stmt = this.db.prepare("SELECT id, created_at, payload FROM runs WHERE id = ?");
    const row = stmt.get(id) as RunRow | undefined;
    return row ? this.toRecord(row) : null;
  }

  listRuns(limit = 20): RunHistoryEntry[] {
    this.logger.verbose(`Listing stored runs (limit=${limit})`);
    const stmt = this.db.prepare("SELECT id, created_at, label, summary FROM runs ORDER BY id DESC LIMIT ?");
    const rows = stmt.all(limit) as RunSummaryRow[];
    return rows.map((row) => ({
      id: row.id,
      created_at: row.created_at,
      label: row.label,
      summary: runSummarySchema.parse(JSON.parse(row.summary)),
    }));
  }

  private toRecord(row: RunRow): RunRecord {
    return {
      id: row.id,
      created_at: row.created_at,
      payload: storedRunSchema.parse(JSON.parse(row.payload)),
    };
  }

  private migrate(): void {
    this.logger.verbose("Ensuring storage schema is up to date");
    this.db.exec(`
        CREATE TABLE IF NOT EXISTS runs
        (
            id         INTEGER PRIMARY KEY AUTOINCREMENT,
            created_at TEXT NOT NULL,
            label      TEXT NOT NULL,
            summary    TEXT NOT NULL,
            payload    TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_runs_created_at ON runs (created_at DESC);
    `);
  }
}
