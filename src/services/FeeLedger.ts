import {mkdir, readFile, rename, writeFile} from "node:fs/promises";
import {dirname} from "node:path";
import {lock, LockOptions} from "proper-lockfile";
import {IFeeLedger} from "../interfaces/IFeeLedger";
import {formatLedgerAmount, parseLedgerAmount} from "../shared/amounts";
import {createLogger, Logger} from "../shared/logger";
import {FeeLedgerSnapshot} from "../types/ledger.types";

const TOTAL_PREFIX = "TOTAL:";

// Lock directory `<ledger>.lock`; contenders back off and retry instead of failing.
const DEFAULT_LOCK_OPTIONS: LockOptions = {
  realpath: false,
  stale: 10_000,
  retries: {retries: 100, minTimeout: 5, maxTimeout: 100, factor: 1.5, randomize: true}
};

interface ParsedLedger {
  totalUnits: bigint;
  entries: string[];
  header: "ok" | "missing" | "unparseable" | "empty";
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readLedgerFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error: unknown) {
    if (isMissingFileError(error)) {
      return "";
    }
    throw error;
  }
}

/**
 * The header is authoritative: an unreadable total restarts from zero and is
 * never rebuilt from the entry lines. Without a header line at all, nothing in
 * the file counts as history.
 */
export function parseFeeLedger(content: string): ParsedLedger {
  const lines = content.split(/\r?\n/).filter((line) => line.trim() !== "");
  if (lines.length === 0) {
    return {totalUnits: 0n, entries: [], header: "empty"};
  }

  const [first, ...rest] = lines;
  if (!first.startsWith(TOTAL_PREFIX)) {
    return {totalUnits: 0n, entries: [], header: "missing"};
  }

  const totalUnits = parseLedgerAmount(first.slice(TOTAL_PREFIX.length));
  if (totalUnits === null) {
    return {totalUnits: 0n, entries: rest, header: "unparseable"};
  }

  return {totalUnits, entries: rest, header: "ok"};
}

export function serializeFeeLedger(snapshot: FeeLedgerSnapshot): string {
  return [`${TOTAL_PREFIX} ${snapshot.total}`, ...snapshot.entries].join("\n") + "\n";
}

/**
 * Fee ledger shared by every worker pointed at the same file, in this process
 * or any other.
 */
export class FileFeeLedger implements IFeeLedger {
  constructor(
    private readonly path: string,
    private readonly logger: Logger = createLogger("feeLedger"),
    private readonly lockOptions: LockOptions = DEFAULT_LOCK_OPTIONS
  ) {}

  async record(fee: string): Promise<FeeLedgerSnapshot> {
    const feeUnits = parseLedgerAmount(fee);
    if (feeUnits === null) {
      throw new Error(`invalid-fee:${fee}`);
    }

    await mkdir(dirname(this.path), {recursive: true});
    const release = await lock(this.path, this.lockOptions);
    try {
      const current = parseFeeLedger(await readLedgerFile(this.path));
      if (current.header === "missing" || current.header === "unparseable") {
        this.logger.warn("fee-ledger-header-reset", {path: this.path, header: current.header});
      }

      const entry = formatLedgerAmount(feeUnits);
      const next: FeeLedgerSnapshot = {
        total: formatLedgerAmount(current.totalUnits + feeUnits),
        entries: [...current.entries, entry]
      };

      const tempPath = `${this.path}.${process.pid}.tmp`;
      await writeFile(tempPath, serializeFeeLedger(next), "utf8");
      await rename(tempPath, this.path);

      this.logger.info("fee-recorded", {fee: entry, total: next.total});
      return next;
    } finally {
      await release();
    }
  }

  async read(): Promise<FeeLedgerSnapshot> {
    const parsed = parseFeeLedger(await readLedgerFile(this.path));
    return {total: formatLedgerAmount(parsed.totalUnits), entries: parsed.entries};
  }
}
