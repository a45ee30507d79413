import {FeeLedgerSnapshot} from "../types/ledger.types";

export interface IFeeLedger {
  /**
   * Add a fee (decimal ETH) to the shared ledger under an exclusive lock.
   */
  record(fee: string): Promise<FeeLedgerSnapshot>;

  read(): Promise<FeeLedgerSnapshot>;
}
