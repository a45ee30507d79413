export interface StoreDocumentInput {
  tokenId: bigint;
  writeKey: string;
  document: string;
  gasPrice: bigint;
  gasLimit: bigint;
  nonce: number;
}

export type WriteStatus = "accepted" | "rejected";

export interface WriteReceipt {
  txHash: string;
  status: WriteStatus;
  gasUsed: bigint;
}
