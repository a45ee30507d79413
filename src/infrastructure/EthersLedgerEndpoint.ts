import {Contract, FetchRequest, JsonRpcProvider, Network, Wallet} from "ethers";
import {ILedgerEndpoint} from "../interfaces/ILedgerEndpoint";
import {createLogger, Logger} from "../shared/logger";
import {StoreDocumentInput, WriteReceipt} from "../types/chain.types";

export const STORAGE_ABI = ["function storeString(uint256 tokenId, bytes32 key, string data) external"];

export interface EthersLedgerEndpointConfig {
  rpcUrl: string;
  chainId: bigint;
  contractAddress: string;
  signerPrivateKey: string;
  /** Per JSON-RPC request, not the receipt wait. */
  requestTimeoutMs: number;
  /** Replaces the provider built from `rpcUrl`; `requestTimeoutMs` then does not apply. */
  provider?: JsonRpcProvider;
}

function createProvider(config: EthersLedgerEndpointConfig): JsonRpcProvider {
  const request = new FetchRequest(config.rpcUrl);
  request.timeout = config.requestTimeoutMs;

  // A static network keeps the provider from retrying network detection
  // forever against a dead endpoint.
  const network = Network.from(config.chainId);
  return new JsonRpcProvider(request, network, {staticNetwork: network});
}

export class EthersLedgerEndpoint implements ILedgerEndpoint {
  readonly url: string;
  readonly signerAddress: string;

  private readonly provider: JsonRpcProvider;
  private readonly wallet: Wallet;
  private readonly storage: Contract;
  private readonly chainId: bigint;

  constructor(
    config: EthersLedgerEndpointConfig,
    private readonly logger: Logger = createLogger("ethersLedgerEndpoint")
  ) {
    this.provider = config.provider ?? createProvider(config);
    this.wallet = new Wallet(config.signerPrivateKey, this.provider);
    this.storage = new Contract(config.contractAddress, STORAGE_ABI, this.wallet);

    this.url = config.rpcUrl;
    this.signerAddress = this.wallet.address;
    this.chainId = config.chainId;
  }

  async isReachable(): Promise<boolean> {
    try {
      await this.provider.getBlockNumber();
      return true;
    } catch (error: unknown) {
      this.logger.debug("rpc-probe-failed", {endpoint: this.url, error});
      return false;
    }
  }

  async getNonce(address: string): Promise<number> {
    // "latest" rather than "pending": after a timeout the retry reuses the
    // stuck nonce and replaces the pending write at the raised price.
    return this.provider.getTransactionCount(address, "latest");
  }

  async storeDocument(input: StoreDocumentInput, timeoutMs: number): Promise<WriteReceipt> {
    const storeString = this.storage.getFunction("storeString");
    const tx = await storeString(input.tokenId, input.writeKey, input.document, {
      type: 0,
      chainId: this.chainId,
      gasPrice: input.gasPrice,
      gasLimit: input.gasLimit,
      nonce: input.nonce
    });

    const receipt = await this.provider.waitForTransaction(tx.hash, 1, timeoutMs);
    if (!receipt) {
      throw new Error(`receipt-timeout: ${tx.hash}`);
    }

    return {
      txHash: tx.hash,
      status: receipt.status === 1 ? "accepted" : "rejected",
      gasUsed: receipt.gasUsed
    };
  }
}
