import { mkdirSync } from "node:fs";
import Database from "better-sqlite3";
import { getConfig } from "../config";
import type { DetectionResult } from "../secrets/modules/types";

export type ScanSource = "cli" | "api";
export type ScanOperation = "check" | "carve" | "hashcat";

export interface ScanLog {
  id?: number;
  timestamp: string;
  source: ScanSource;
  operation: ScanOperation;
  target: string | null;
  modules: string;
  secrets_found: number;
  products_identified: number;
  latency_ms: number;
  status_code: number | null;
  error_message: string | null;
}

/**
 * Statistics summary
 */
export interface Stats {
  total_scans: number;
  secrets_found: number;
  products_identified: number;
  avg_latency_ms: number;
  scans_last_hour: number;
}

export interface ScanLoggerOptions {
  database: string;
  retentionDays: number;
}

/**
 * SQLite-based log of scans
 *
 * Rows hold module names and counts only. Secret values and token contents
 * are never written.
 */
export class ScanLogger {
  private db: Database.Database;
  private retentionDays: number;

  constructor(options: ScanLoggerOptions) {
    this.retentionDays = options.retentionDays;

    // Ensure data directory exists
    const dbPath = options.database;
    const dir = dbPath.substring(0, dbPath.lastIndexOf("/"));
    if (dir) {
      mkdirSync(dir, { recursive: true });
    }

    this.db = new Database(dbPath);
    this.initializeDatabase();
  }

  private initializeDatabase(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS scan_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        source TEXT NOT NULL,
        operation TEXT NOT NULL,
        target TEXT,
        modules TEXT NOT NULL DEFAULT '',
        secrets_found INTEGER NOT NULL DEFAULT 0,
        products_identified INTEGER NOT NULL DEFAULT 0,
        latency_ms INTEGER NOT NULL,
        status_code INTEGER,
        error_message TEXT,
        created_at TEXT DEFAULT CURRENT_TIMESTAMP
      )
    `);

    this.db.exec("CREATE INDEX IF NOT EXISTS idx_scan_timestamp ON scan_logs(timestamp)");
    this.db.exec("CREATE INDEX IF NOT EXISTS idx_scan_operation ON scan_logs(operation)");
  }

  log(entry: Omit<ScanLog, "id">): void {
    this.db
      .prepare(`
        INSERT INTO scan_logs
          (timestamp, source, operation, target, modules, secrets_found, products_identified, latency_ms, status_code, error_message)
        VALUES
          (@timestamp, @source, @operation, @target, @modules, @secrets_found, @products_identified, @latency_ms, @status_code, @error_message)
      `)
      .run(entry);
  }

  /**
   * Gets recent logs
   */
  getLogs(limit: number = 100, offset: number = 0): ScanLog[] {
    return this.db
      .prepare<[number, number], ScanLog>(`
        SELECT id, timestamp, source, operation, target, modules, secrets_found,
               products_identified, latency_ms, status_code, error_message
        FROM scan_logs
        ORDER BY timestamp DESC, id DESC
        LIMIT ? OFFSET ?
      `)
      .all(limit, offset);
  }

  /**
   * Gets statistics
   */
  getStats(): Stats {
    const totals = this.db
      .prepare<[], { count: number; secrets: number; products: number; latency: number | null }>(`
        SELECT COUNT(*) as count,
               COALESCE(SUM(secrets_found), 0) as secrets,
               COALESCE(SUM(products_identified), 0) as products,
               AVG(latency_ms) as latency
        FROM scan_logs
      `)
      .get();

    const oneHourAgo = new Date(Date.now() - 60 * 60 * 1000).toISOString();
    const hour = this.db
      .prepare<[string], { count: number }>(
        "SELECT COUNT(*) as count FROM scan_logs WHERE timestamp >= ?",
      )
      .get(oneHourAgo);

    return {
      total_scans: totals?.count ?? 0,
      secrets_found: totals?.secrets ?? 0,
      products_identified: totals?.products ?? 0,
      avg_latency_ms: Math.round(totals?.latency ?? 0),
      scans_last_hour: hour?.count ?? 0,
    };
  }

  /**
   * Cleans up old logs based on retention policy
   */
  cleanup(): number {
    if (this.retentionDays <= 0) {
      return 0; // Keep forever
    }

    const cutoffDate = new Date();
    cutoffDate.setDate(cutoffDate.getDate() - this.retentionDays);

    const result = this.db
      .prepare("DELETE FROM scan_logs WHERE timestamp < ?")
      .run(cutoffDate.toISOString());

    return result.changes;
  }

  close(): void {
    this.db.close();
  }
}

// Singleton instance
let loggerInstance: ScanLogger | null = null;

export function getLogger(): ScanLogger {
  if (!loggerInstance) {
    const config = getConfig();
    loggerInstance = new ScanLogger({
      database: config.logging.database,
      retentionDays: config.logging.retention_days,
    });
  }
  return loggerInstance;
}

export function closeLogger(): void {
  loggerInstance?.close();
  loggerInstance = null;
}

export interface ScanLogData {
  source: ScanSource;
  operation: ScanOperation;
  target?: string;
  results: DetectionResult[];
  /** Modules named by hashcat suggestions, for hashcat-only lookups */
  hashcatModules?: string[];
  startTime: number;
  statusCode?: number;
  errorMessage?: string;
}

/**
 * Summarises a scan into a log row
 */
export function toScanLog(data: ScanLogData): Omit<ScanLog, "id"> {
  const modules = new Set([
    ...data.results.map((r) => r.detectingModule),
    ...(data.hashcatModules ?? []),
  ]);

  return {
    timestamp: new Date().toISOString(),
    source: data.source,
    operation: data.operation,
    target: data.target ?? null,
    modules: [...modules].join(","),
    secrets_found: data.results.filter((r) => r.type === "SecretFound").length,
    products_identified: data.results.filter((r) => r.type === "ProductIdentified").length,
    latency_ms: Date.now() - data.startTime,
    status_code: data.statusCode ?? null,
    error_message: data.errorMessage ?? null,
  };
}

export function logScan(data: ScanLogData): void {
  try {
    if (!getConfig().logging.enabled) return;
    getLogger().log(toScanLog(data));
  } catch (error) {
    console.error("Failed to log scan:", error);
  }
}
