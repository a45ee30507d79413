import {mkdtemp, writeFile} from "node:fs/promises";
import {tmpdir} from "node:os";
import {join} from "node:path";
import {IDocumentSubmitter} from "../../src/interfaces/IDocumentSubmitter";
import {IFeeLedger} from "../../src/interfaces/IFeeLedger";
import {FeeLedgerSnapshot} from "../../src/types/ledger.types";
import {SubmissionResult} from "../../src/types/publish.types";

export const TEST_WRITE_KEY = `0x${"ab".repeat(32)}`;
export const TEMPLATE = "<html><!--BOARD_ID-->|<!--LAST_UPDATE_TIME-->|<!--BOARD_DATA--></html>";

export async function makeWorkspace(): Promise<string> {
  return mkdtemp(join(tmpdir(), "board-publisher-"));
}

export async function writeBoard(path: string, lines: string[]): Promise<void> {
  await writeFile(path, lines.map((line) => `${line}\n`).join(""), "utf8");
}

export class RecordingFeeLedger implements IFeeLedger {
  readonly fees: string[] = [];

  async record(fee: string): Promise<FeeLedgerSnapshot> {
    this.fees.push(fee);
    return {total: fee, entries: [...this.fees]};
  }

  async read(): Promise<FeeLedgerSnapshot> {
    return {total: "0.0000000000", entries: [...this.fees]};
  }
}

export class FailingFeeLedger implements IFeeLedger {
  async record(_fee: string): Promise<FeeLedgerSnapshot> {
    throw new Error("disk-full");
  }

  async read(): Promise<FeeLedgerSnapshot> {
    throw new Error("disk-full");
  }
}

export function acceptedResult(endpoint = "http://rpc-b"): SubmissionResult {
  return {
    ok: true,
    endpoint,
    txHash: "0x01",
    gasPrice: 1_300_000n,
    gasUsed: 100_000n,
    feeWei: 130_000_000_000n,
    fee: "0.0000001300",
    outcomes: []
  };
}

export function failedResult(): SubmissionResult {
  return {ok: false, outcomes: [{url: "http://rpc-a", result: "unreachable"}]};
}

type ScriptedStep = SubmissionResult | Error;

/**
 * Submitter stand-in that replays scripted results (or throws scripted
 * errors) and keeps every document it was handed.
 */
export class ScriptedSubmitter implements IDocumentSubmitter {
  readonly documents: string[] = [];
  private readonly steps: ScriptedStep[];

  constructor(...steps: ScriptedStep[]) {
    this.steps = steps;
  }

  async submit(document: string): Promise<SubmissionResult> {
    this.documents.push(document);
    const step = this.steps.shift() ?? acceptedResult();
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}
