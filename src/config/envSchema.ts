import {isAddress} from "ethers";
import {z} from "zod";
import defaults from "../../config/publisher.json";

const weiAmount = z.string().regex(/^\d+$/, "must be an integer amount in wei");

const commaList = z.string().transform((value) =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
);

export const rawEnvSchema = z.object({
  CONTRACT_ADDRESS: z.string().refine((value) => isAddress(value), "must be a 20-byte hex address"),
  RPC_URLS: commaList.pipe(z.array(z.string().url()).min(1, "needs at least one URL")),
  CHAIN_ID: z.string().regex(/^\d+$/, "must be a positive integer").transform((value) => BigInt(value)),
  WRITE_KEY: z.string().regex(/^0x[0-9a-fA-F]{64}$/, "must be 0x followed by 64 hex digits"),

  BOARD_IDS: commaList
    .default("0")
    .pipe(z.array(z.coerce.number().int().nonnegative()).min(1, "needs at least one board id")),

  GAS_PRICE_BASE_WEI: weiAmount.default(defaults.gasPrice.baseWei).transform((value) => BigInt(value)),
  GAS_PRICE_MAX_WEI: weiAmount.default(defaults.gasPrice.maxWei).transform((value) => BigInt(value)),
  GAS_PRICE_STEP_WEI: weiAmount.default(defaults.gasPrice.stepWei).transform((value) => BigInt(value)),
  GAS_LIMIT: weiAmount.default(defaults.gasLimit).transform((value) => BigInt(value)),

  RECEIPT_TIMEOUT_MS: z.coerce.number().int().positive().default(defaults.receiptTimeoutMs),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(defaults.pollIntervalMs),
  RPC_TIMEOUT_MS: z.coerce.number().int().positive().default(defaults.rpcTimeoutMs),

  BOARD_DIR: z.string().default(defaults.paths.boardDir),
  TEMPLATE_PATH: z.string().default(defaults.paths.template),
  FEE_LEDGER_PATH: z.string().default(defaults.paths.feeLedger),
  STATE_DB_PATH: z.string().optional(),
  STATUS_API_PORT: z.coerce.number().int().min(1).max(65535).optional()
});

export type RawEnv = z.infer<typeof rawEnvSchema>;

export const privateKeySchema = z.string().regex(/^(0x)?[0-9a-fA-F]{64}$/, "must be a 32-byte hex private key");

/**
 * Turns zod issues into the `missing-env:NAME` / `invalid-env:NAME` codes the
 * rest of the service reports.
 */
export function describeEnvIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const name = issue.path.join(".");
      if (issue.code === "invalid_type" && issue.received === "undefined") {
        return `missing-env:${name}`;
      }
      return `invalid-env:${name} (${issue.message})`;
    })
    .join(", ");
}
