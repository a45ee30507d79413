import {createHash} from "node:crypto";
import {makeError} from "ethers";
import {ILedgerEndpoint} from "../interfaces/ILedgerEndpoint";
import {StoreDocumentInput, WriteReceipt} from "../types/chain.types";

export type FakeWriteBehavior = "accept" | "reject" | "timeout" | "error";

export interface FakeLedgerEndpointOptions {
  reachable?: boolean;
  gasUsed?: bigint;
  /** Used once the scripted behaviours run out. */
  defaultBehavior?: FakeWriteBehavior;
}

export const FAKE_SIGNER_ADDRESS = "0x00000000000000000000000000000000000000b0";

export function computeFakeTxHash(url: string, input: StoreDocumentInput): string {
  const digest = createHash("sha256")
    .update(`${url}:${input.nonce}:${input.gasPrice}:${input.document}`)
    .digest("hex");
  return `0x${digest}`;
}

/**
 * Deterministic, in-memory endpoint. Each write consumes the next scripted
 * behaviour; every write and probe is kept for assertions.
 */
export class FakeLedgerEndpoint implements ILedgerEndpoint {
  readonly signerAddress = FAKE_SIGNER_ADDRESS;
  readonly writes: StoreDocumentInput[] = [];
  probes = 0;

  private reachable: boolean;
  private readonly script: FakeWriteBehavior[] = [];
  private readonly gasUsed: bigint;
  private readonly defaultBehavior: FakeWriteBehavior;

  constructor(readonly url: string, options: FakeLedgerEndpointOptions = {}) {
    this.reachable = options.reachable ?? true;
    this.gasUsed = options.gasUsed ?? 100_000n;
    this.defaultBehavior = options.defaultBehavior ?? "accept";
  }

  /**
   * Test helper: queue behaviours for the next writes
   */
  enqueue(...behaviors: FakeWriteBehavior[]): this {
    this.script.push(...behaviors);
    return this;
  }

  /**
   * Test helper: take the endpoint up or down
   */
  setReachable(reachable: boolean): void {
    this.reachable = reachable;
  }

  async isReachable(): Promise<boolean> {
    this.probes += 1;
    return this.reachable;
  }

  async getNonce(_address: string): Promise<number> {
    return this.writes.length;
  }

  async storeDocument(input: StoreDocumentInput, timeoutMs: number): Promise<WriteReceipt> {
    this.writes.push(input);
    const behavior = this.script.shift() ?? this.defaultBehavior;
    const txHash = computeFakeTxHash(this.url, input);

    switch (behavior) {
      case "accept":
        return {txHash, status: "accepted", gasUsed: this.gasUsed};
      case "reject":
        return {txHash, status: "rejected", gasUsed: this.gasUsed};
      case "timeout":
        throw makeError(`timeout waiting ${timeoutMs}ms for ${txHash}`, "TIMEOUT", {
          operation: "waitForTransaction",
          reason: "timeout"
        });
      case "error":
        throw new Error(`fake-transport-error: ${this.url}`);
    }
  }
}
