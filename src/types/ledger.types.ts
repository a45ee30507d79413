export interface FeeLedgerSnapshot {
  /** Running total in ETH, 10 fractional digits. */
  total: string;
  /** Fee lines as stored, oldest first. */
  entries: string[];
}
