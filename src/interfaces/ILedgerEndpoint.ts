import {StoreDocumentInput, WriteReceipt} from "../types/chain.types";

/**
 * One JSON-RPC endpoint able to write documents to the storage contract.
 * Implementations: EthersLedgerEndpoint (production), FakeLedgerEndpoint (tests)
 */
export interface ILedgerEndpoint {
  readonly url: string;

  /** Address of the signing account. */
  readonly signerAddress: string;

  /**
   * Probe the endpoint. Called on every attempt, never cached.
   */
  isReachable(): Promise<boolean>;

  getNonce(address: string): Promise<number>;

  /**
   * Sign and broadcast a `storeString` write, then block until it is mined or
   * `timeoutMs` elapses.
   * @throws an error classified by `isTimeoutError` when no receipt arrived in time
   */
  storeDocument(input: StoreDocumentInput, timeoutMs: number): Promise<WriteReceipt>;
}
