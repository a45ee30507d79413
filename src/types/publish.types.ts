export type EndpointOutcome =
  | { url: string; result: "unreachable" }
  | { url: string; result: "accepted"; txHash: string; gasPrice: bigint; gasUsed: bigint }
  | { url: string; result: "rejected"; txHash: string; gasPrice: bigint }
  | { url: string; result: "timeout"; gasPrice: bigint; escalatedTo: bigint; saturated: boolean }
  | { url: string; result: "error"; gasPrice: bigint; error: string };

export type SubmissionResult =
  | {
      ok: true;
      endpoint: string;
      txHash: string;
      gasPrice: bigint;
      gasUsed: bigint;
      feeWei: bigint;
      /** Fee in ETH as written to the fee ledger. */
      fee: string;
      outcomes: EndpointOutcome[];
    }
  | { ok: false; outcomes: EndpointOutcome[] };

export type TickAction = "waiting" | "malformed" | "unchanged" | "published" | "failed" | "error";

export interface TickResult {
  boardId: number;
  action: TickAction;
  clock: string | null;
}

export type AttemptStatus = "published" | "failed";

export interface PublishAttempt {
  id: number;
  boardId: number;
  clock: string;
  status: AttemptStatus;
  endpoint: string | null;
  txHash: string | null;
  gasPrice: string | null;
  fee: string | null;
  createdAt: number;
}

export interface RecordAttemptInput {
  boardId: number;
  clock: string;
  status: AttemptStatus;
  endpoint?: string;
  txHash?: string;
  gasPrice?: bigint;
  fee?: string;
  now: number;
}

export interface ListAttemptsInput {
  boardId?: number;
  first: number;
  after?: number | null;
}
