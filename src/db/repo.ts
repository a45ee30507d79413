import {Database, SqlValue} from "sql.js";
import {IPublishStateRepository} from "../interfaces/IPublishStateRepository";
import {
  AttemptStatus,
  ListAttemptsInput,
  PublishAttempt,
  RecordAttemptInput
} from "../types/publish.types";
import {saveDb} from "./db";

const ATTEMPT_COLUMNS = "id, board_id, clock, status, endpoint, tx_hash, gas_price, fee, created_at";

function asNumber(value: SqlValue, column: string): number {
  if (typeof value !== "number") {
    throw new Error(`unexpected-column-type:${column}`);
  }
  return value;
}

function asString(value: SqlValue, column: string): string {
  if (typeof value !== "string") {
    throw new Error(`unexpected-column-type:${column}`);
  }
  return value;
}

function asNullableString(value: SqlValue, column: string): string | null {
  return value === null ? null : asString(value, column);
}

function asAttemptStatus(value: SqlValue): AttemptStatus {
  if (value === "published" || value === "failed") {
    return value;
  }
  throw new Error("unexpected-column-type:status");
}

function mapAttempt(values: SqlValue[]): PublishAttempt {
  return {
    id: asNumber(values[0], "id"),
    boardId: asNumber(values[1], "board_id"),
    clock: asString(values[2], "clock"),
    status: asAttemptStatus(values[3]),
    endpoint: asNullableString(values[4], "endpoint"),
    txHash: asNullableString(values[5], "tx_hash"),
    gasPrice: asNullableString(values[6], "gas_price"),
    fee: asNullableString(values[7], "fee"),
    createdAt: asNumber(values[8], "created_at")
  };
}

export class PublishStateRepo implements IPublishStateRepository {
  /**
   * @param persistPath when set, the database is written to this file after every change
   */
  constructor(private readonly db: Database, private readonly persistPath?: string) { }

  getLastPublishedClock(boardId: number): string | null {
    const stmt = this.db.prepare("SELECT last_published_clock FROM board_state WHERE board_id = ?");
    stmt.bind([boardId]);
    const clock = stmt.step() ? asString(stmt.get()[0], "last_published_clock") : null;
    stmt.free();
    return clock;
  }

  markPublished(boardId: number, clock: string, now: number): void {
    this.db.run(
      `INSERT INTO board_state (board_id, last_published_clock, updated_at) VALUES (?, ?, ?)
       ON CONFLICT(board_id) DO UPDATE SET last_published_clock = excluded.last_published_clock, updated_at = excluded.updated_at`,
      [boardId, clock, now]
    );
    this.persist();
  }

  recordAttempt(input: RecordAttemptInput): PublishAttempt {
    this.db.run(
      `INSERT INTO publish_attempts (board_id, clock, status, endpoint, tx_hash, gas_price, fee, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        input.boardId,
        input.clock,
        input.status,
        input.endpoint ?? null,
        input.txHash ?? null,
        input.gasPrice === undefined ? null : input.gasPrice.toString(),
        input.fee ?? null,
        input.now
      ]
    );

    const idStmt = this.db.prepare("SELECT last_insert_rowid()");
    idStmt.step();
    const id = asNumber(idStmt.get()[0], "last_insert_rowid");
    idStmt.free();

    const attempt = this.getAttempt(id);
    if (!attempt) {
      throw new Error("failed-to-read-recorded-attempt");
    }
    this.persist();
    return attempt;
  }

  getAttempt(id: number): PublishAttempt | null {
    const stmt = this.db.prepare(`SELECT ${ATTEMPT_COLUMNS} FROM publish_attempts WHERE id = ?`);
    stmt.bind([id]);
    if (!stmt.step()) {
      stmt.free();
      return null;
    }
    const attempt = mapAttempt(stmt.get());
    stmt.free();
    return attempt;
  }

  listAttempts(input: ListAttemptsInput): PublishAttempt[] {
    const first = Math.max(1, Math.min(100, input.first));
    const conditions: string[] = [];
    const params: SqlValue[] = [];

    if (input.boardId !== undefined) {
      conditions.push("board_id = ?");
      params.push(input.boardId);
    }

    if (input.after !== undefined && input.after !== null) {
      conditions.push("id > ?");
      params.push(input.after);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const stmt = this.db.prepare(
      `SELECT ${ATTEMPT_COLUMNS} FROM publish_attempts ${where} ORDER BY id ASC LIMIT ?`
    );

    stmt.bind([...params, first]);
    const attempts: PublishAttempt[] = [];
    while (stmt.step()) {
      attempts.push(mapAttempt(stmt.get()));
    }
    stmt.free();
    return attempts;
  }

  private persist(): void {
    if (this.persistPath) {
      saveDb(this.db, this.persistPath);
    }
  }
}
