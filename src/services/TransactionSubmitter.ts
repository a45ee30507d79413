import {IDocumentSubmitter} from "../interfaces/IDocumentSubmitter";
import {IFeeLedger} from "../interfaces/IFeeLedger";
import {ILedgerEndpoint} from "../interfaces/ILedgerEndpoint";
import {formatGwei, weiToLedgerAmount} from "../shared/amounts";
import {errorMessage, isTimeoutError} from "../shared/errors";
import {createLogger, Logger} from "../shared/logger";
import {EndpointOutcome, SubmissionResult} from "../types/publish.types";
import {GasPriceController} from "./GasPriceController";

export interface SubmitterConfig {
  /** Storage slot on the contract (the board's token id). */
  tokenId: bigint;
  /** bytes32 key passed to every `storeString` call. */
  writeKey: string;
  gasLimit: bigint;
  receiptTimeoutMs: number;
}

export class TransactionSubmitter implements IDocumentSubmitter {
  constructor(
    private readonly endpoints: ReadonlyArray<ILedgerEndpoint>,
    private readonly gasPrice: GasPriceController,
    private readonly feeLedger: IFeeLedger,
    private readonly config: SubmitterConfig,
    private readonly logger: Logger = createLogger("transactionSubmitter")
  ) {}

  /**
   * Write the document through the first endpoint that confirms it. Endpoints
   * are tried in configured order on every call; nothing is remembered about
   * them between calls.
   */
  async submit(document: string): Promise<SubmissionResult> {
    const outcomes: EndpointOutcome[] = [];

    for (const endpoint of this.endpoints) {
      const outcome = await this.tryEndpoint(endpoint, document);
      outcomes.push(outcome);

      if (outcome.result === "accepted") {
        const feeWei = outcome.gasUsed * outcome.gasPrice;
        const fee = weiToLedgerAmount(feeWei);
        await this.recordFee(fee, outcome.txHash);
        this.gasPrice.reset();

        return {
          ok: true,
          endpoint: outcome.url,
          txHash: outcome.txHash,
          gasPrice: outcome.gasPrice,
          gasUsed: outcome.gasUsed,
          feeWei,
          fee,
          outcomes
        };
      }
    }

    this.logger.warn("submission-endpoints-exhausted", {
      attempted: outcomes.map((outcome) => `${outcome.url}:${outcome.result}`),
      nextGasPriceGwei: formatGwei(this.gasPrice.current)
    });
    return {ok: false, outcomes};
  }

  private async tryEndpoint(endpoint: ILedgerEndpoint, document: string): Promise<EndpointOutcome> {
    const url = endpoint.url;

    if (!(await this.probe(endpoint))) {
      this.logger.warn("endpoint-unreachable", {endpoint: url});
      return {url, result: "unreachable"};
    }

    const gasPrice = this.gasPrice.current;
    try {
      const nonce = await endpoint.getNonce(endpoint.signerAddress);
      this.logger.info("write-sending", {endpoint: url, gasPriceGwei: formatGwei(gasPrice), nonce});

      const receipt = await endpoint.storeDocument(
        {
          tokenId: this.config.tokenId,
          writeKey: this.config.writeKey,
          document,
          gasPrice,
          gasLimit: this.config.gasLimit,
          nonce
        },
        this.config.receiptTimeoutMs
      );

      if (receipt.status === "accepted") {
        this.logger.info("write-confirmed", {endpoint: url, txHash: receipt.txHash, gasUsed: receipt.gasUsed});
        return {url, result: "accepted", txHash: receipt.txHash, gasPrice, gasUsed: receipt.gasUsed};
      }

      // Reverts leave the gas price alone.
      this.logger.warn("write-rejected", {endpoint: url, txHash: receipt.txHash});
      return {url, result: "rejected", txHash: receipt.txHash, gasPrice};
    } catch (error: unknown) {
      if (isTimeoutError(error)) {
        const {price, saturated} = this.gasPrice.escalate();
        this.logger.warn(saturated ? "write-timeout-gas-price-saturated" : "write-timeout-gas-price-raised", {
          endpoint: url,
          gasPriceGwei: formatGwei(gasPrice),
          nextGasPriceGwei: formatGwei(price)
        });
        return {url, result: "timeout", gasPrice, escalatedTo: price, saturated};
      }

      this.logger.error("write-failed", {endpoint: url, error});
      return {url, result: "error", gasPrice, error: errorMessage(error)};
    }
  }

  private async probe(endpoint: ILedgerEndpoint): Promise<boolean> {
    try {
      return await endpoint.isReachable();
    } catch (error: unknown) {
      this.logger.debug("endpoint-probe-failed", {endpoint: endpoint.url, error});
      return false;
    }
  }

  /** Ledger failures never fail a confirmed write. */
  private async recordFee(fee: string, txHash: string): Promise<void> {
    try {
      await this.feeLedger.record(fee);
    } catch (error: unknown) {
      this.logger.error("fee-ledger-write-failed", {fee, txHash, error});
    }
  }
}
