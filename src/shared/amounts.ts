import {formatUnits, parseUnits} from "ethers";

/** Fractional digits of every amount written to the fee ledger. */
export const LEDGER_DECIMALS = 10;

const WEI_DECIMALS = 18;
const WEI_PER_LEDGER_UNIT = 10n ** BigInt(WEI_DECIMALS - LEDGER_DECIMALS);
const DECIMAL_PATTERN = /^-?\d+(\.\d*)?$/;

/**
 * Parse a decimal ETH string into ledger units (1e-10 ETH). Digits beyond the
 * tenth decimal are dropped. Returns null for anything that is not a plain
 * decimal.
 */
export function parseLedgerAmount(value: string): bigint | null {
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }

  const [whole, fraction = ""] = trimmed.split(".");
  const kept = fraction.slice(0, LEDGER_DECIMALS);
  return parseUnits(kept.length > 0 ? `${whole}.${kept}` : whole, LEDGER_DECIMALS);
}

export function formatLedgerAmount(units: bigint): string {
  const [whole, fraction = ""] = formatUnits(units, LEDGER_DECIMALS).split(".");
  return `${whole}.${fraction.padEnd(LEDGER_DECIMALS, "0")}`;
}

/**
 * Convert a fee in wei to the ledger's decimal ETH form, rounding half up at
 * the tenth decimal.
 */
export function weiToLedgerAmount(wei: bigint): string {
  return formatLedgerAmount((wei + WEI_PER_LEDGER_UNIT / 2n) / WEI_PER_LEDGER_UNIT);
}

/** Render a wei gas price in gwei for log lines. */
export function formatGwei(wei: bigint): string {
  return formatUnits(wei, "gwei");
}
