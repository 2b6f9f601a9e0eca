import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import {
  bigintReplacer,
  type LogEntry,
  type LogSink,
  type MirrorDecisionRecord,
  type PersistenceSink,
  type RiskAssessment,
  type SimulationResult,
  type TradeExecution,
  type TradeProposal,
} from "@tradeguard/core";

interface JsonPayload {
  [key: string]: unknown;
}

export interface StoredLog {
  id: number;
  ts: string;
  level: string;
  component: string;
  code: string;
  message: string;
  data: JsonPayload;
}

export interface AssessmentRow {
  id: string;
  ts: string;
  chain: string;
  token: string;
  score: number;
  level: string;
  simulationId: string;
  payload: JsonPayload;
}

export interface ExecutionRow {
  executionId: string;
  proposalId: string;
  ts: string;
  status: string;
  payload: JsonPayload;
}

export interface MirrorDecisionRow {
  id: number;
  ts: string;
  signalId: string;
  sourceWallet: string;
  action: string;
  reason: string | null;
  proposalId: string | null;
}

interface LogRecord {
  id: number;
  ts: string;
  level: string;
  component: string;
  code: string;
  message: string;
  data_json: string | null;
}

function parseJson(text: string | null): JsonPayload {
  if (!text) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed) ? { ...parsed } : {};
  } catch {
    return {};
  }
}

function toJson(value: unknown): string {
  return JSON.stringify(value, bigintReplacer);
}

function toStoredLog(row: LogRecord): StoredLog {
  return {
    id: row.id,
    ts: row.ts,
    level: row.level,
    component: row.component,
    code: row.code,
    message: row.message,
    data: parseJson(row.data_json),
  };
}

/**
 * Append-only history on SQLite. Proposals and executions are written as a new
 * row per state change, so the latest row per id is the current view.
 */
export class Store implements PersistenceSink, LogSink {
  private readonly dbPath: string;
  private readonly db: Database.Database;

  public constructor(dbPath: string) {
    this.dbPath = dbPath;
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
  }

  public initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS simulations (
        id TEXT PRIMARY KEY,
        ts TEXT NOT NULL,
        chain TEXT NOT NULL,
        token TEXT NOT NULL,
        flags_json TEXT NOT NULL,
        result_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS assessments (
        id TEXT PRIMARY KEY,
        ts TEXT NOT NULL,
        chain TEXT NOT NULL,
        token TEXT NOT NULL,
        score REAL NOT NULL,
        level TEXT NOT NULL,
        simulation_id TEXT NOT NULL,
        assessment_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS proposals (
        row_id INTEGER PRIMARY KEY AUTOINCREMENT,
        proposal_id TEXT NOT NULL,
        ts TEXT NOT NULL,
        status TEXT NOT NULL,
        origin TEXT NOT NULL,
        proposal_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS executions (
        row_id INTEGER PRIMARY KEY AUTOINCREMENT,
        execution_id TEXT NOT NULL,
        proposal_id TEXT NOT NULL,
        ts TEXT NOT NULL,
        status TEXT NOT NULL,
        paper INTEGER NOT NULL,
        execution_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS mirror_decisions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts TEXT NOT NULL,
        signal_id TEXT NOT NULL,
        source_wallet TEXT NOT NULL,
        action TEXT NOT NULL,
        reason TEXT,
        proposal_id TEXT,
        signal_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts TEXT NOT NULL,
        level TEXT NOT NULL,
        component TEXT NOT NULL,
        code TEXT NOT NULL,
        message TEXT NOT NULL,
        data_json TEXT
      );

      CREATE TABLE IF NOT EXISTS runtime_state (
        key TEXT PRIMARY KEY,
        value_json TEXT NOT NULL,
        updated_ts TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_assessments_token ON assessments(chain, token, ts);
      CREATE INDEX IF NOT EXISTS idx_proposals_id ON proposals(proposal_id);
      CREATE INDEX IF NOT EXISTS idx_executions_id ON executions(execution_id);
      CREATE INDEX IF NOT EXISTS idx_mirror_decisions_ts ON mirror_decisions(ts);
      CREATE INDEX IF NOT EXISTS idx_logs_ts ON logs(ts);
    `);
  }

  public appendSimulation(result: SimulationResult): void {
    this.db
      .prepare(
        `INSERT INTO simulations (id, ts, chain, token, flags_json, result_json)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(result.id, result.createdAt, result.token.chain, result.token.address, toJson(result.flags), toJson(result));
  }

  public appendAssessment(assessment: RiskAssessment): void {
    this.db
      .prepare(
        `INSERT INTO assessments (id, ts, chain, token, score, level, simulation_id, assessment_json)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        assessment.id,
        assessment.assessedAt,
        assessment.token.chain,
        assessment.token.address,
        assessment.score,
        assessment.level,
        assessment.simulationId,
        toJson(assessment),
      );
  }

  public appendProposal(proposal: TradeProposal): void {
    this.db
      .prepare(
        `INSERT INTO proposals (proposal_id, ts, status, origin, proposal_json)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(proposal.id, proposal.resolvedAt ?? proposal.createdAt, proposal.status, proposal.origin, toJson(proposal));
  }

  public appendExecution(execution: TradeExecution): void {
    this.db
      .prepare(
        `INSERT INTO executions (execution_id, proposal_id, ts, status, paper, execution_json)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        execution.id,
        execution.proposalId,
        execution.finishedAt ?? new Date().toISOString(),
        execution.status,
        execution.paper ? 1 : 0,
        toJson(execution),
      );
  }

  public appendMirrorDecision(record: MirrorDecisionRecord): void {
    this.db
      .prepare(
        `INSERT INTO mirror_decisions (ts, signal_id, source_wallet, action, reason, proposal_id, signal_json)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        record.decidedAt,
        record.signal.id,
        record.signal.sourceWallet,
        record.action,
        record.reason,
        record.proposalId,
        toJson(record.signal),
      );
  }

  public write(entry: LogEntry): void {
    this.insertLog(entry);
  }

  public insertLog(entry: LogEntry): number {
    const result = this.db
      .prepare(
        `INSERT INTO logs (ts, level, component, code, message, data_json)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(entry.ts, entry.level, entry.component, entry.code, entry.message, entry.data ? toJson(entry.data) : null);
    return Number(result.lastInsertRowid);
  }

  public getLogsAfter(afterId: number, limit = 200): StoredLog[] {
    return this.db
      .prepare<[number, number], LogRecord>(
        `SELECT id, ts, level, component, code, message, data_json
         FROM logs
         WHERE id > ?
         ORDER BY id ASC
         LIMIT ?`,
      )
      .all(afterId, limit)
      .map(toStoredLog);
  }

  public getRecentLogs(limit = 200): StoredLog[] {
    return this.db
      .prepare<[number], LogRecord>(
        `SELECT id, ts, level, component, code, message, data_json
         FROM logs
         ORDER BY id DESC
         LIMIT ?`,
      )
      .all(limit)
      .reverse()
      .map(toStoredLog);
  }

  public listAssessments(chain: string, token: string, limit = 20): AssessmentRow[] {
    const rows = this.db
      .prepare<
        [string, string, number],
        {
          id: string;
          ts: string;
          chain: string;
          token: string;
          score: number;
          level: string;
          simulation_id: string;
          assessment_json: string;
        }
      >(
        `SELECT id, ts, chain, token, score, level, simulation_id, assessment_json
         FROM assessments
         WHERE chain = ? AND token = ?
         ORDER BY ts DESC, rowid DESC
         LIMIT ?`,
      )
      .all(chain, token, limit);

    return rows.map((row) => ({
      id: row.id,
      ts: row.ts,
      chain: row.chain,
      token: row.token,
      score: row.score,
      level: row.level,
      simulationId: row.simulation_id,
      payload: parseJson(row.assessment_json),
    }));
  }

  /** Every recorded state of one execution, oldest first. */
  public getExecutionHistory(executionId: string): ExecutionRow[] {
    const rows = this.db
      .prepare<
        [string],
        { execution_id: string; proposal_id: string; ts: string; status: string; execution_json: string }
      >(
        `SELECT execution_id, proposal_id, ts, status, execution_json
         FROM executions
         WHERE execution_id = ?
         ORDER BY row_id ASC`,
      )
      .all(executionId);

    return rows.map((row) => ({
      executionId: row.execution_id,
      proposalId: row.proposal_id,
      ts: row.ts,
      status: row.status,
      payload: parseJson(row.execution_json),
    }));
  }

  public getProposalStatusHistory(proposalId: string): string[] {
    return this.db
      .prepare<[string], { status: string }>(
        `SELECT status FROM proposals WHERE proposal_id = ? ORDER BY row_id ASC`,
      )
      .all(proposalId)
      .map((row) => row.status);
  }

  public listMirrorDecisions(limit = 100): MirrorDecisionRow[] {
    const rows = this.db
      .prepare<
        [number],
        {
          id: number;
          ts: string;
          signal_id: string;
          source_wallet: string;
          action: string;
          reason: string | null;
          proposal_id: string | null;
        }
      >(
        `SELECT id, ts, signal_id, source_wallet, action, reason, proposal_id
         FROM mirror_decisions
         ORDER BY id DESC
         LIMIT ?`,
      )
      .all(limit);

    return rows.map((row) => ({
      id: row.id,
      ts: row.ts,
      signalId: row.signal_id,
      sourceWallet: row.source_wallet,
      action: row.action,
      reason: row.reason,
      proposalId: row.proposal_id,
    }));
  }

  public setRuntimeState(key: string, value: JsonPayload): void {
    const now = new Date().toISOString();
    this.db
      .prepare(
        `INSERT INTO runtime_state (key, value_json, updated_ts)
         VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value_json=excluded.value_json, updated_ts=excluded.updated_ts`,
      )
      .run(key, toJson(value), now);
  }

  public getRuntimeState(key: string): { key: string; value: JsonPayload; updatedTs: string } | null {
    const row = this.db
      .prepare<[string], { key: string; value_json: string; updated_ts: string }>(
        `SELECT key, value_json, updated_ts
         FROM runtime_state
         WHERE key = ?`,
      )
      .get(key);
    if (!row) {
      return null;
    }
    return {
      key: row.key,
      value: parseJson(row.value_json),
      updatedTs: row.updated_ts,
    };
  }

  public getDbPath(): string {
    return this.dbPath;
  }

  public close(): void {
    this.db.close();
  }
}
