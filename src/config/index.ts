import {join} from "node:path";
import {GasPricePolicy} from "../services/GasPriceController";
import {createLogger, Logger} from "../shared/logger";
import {describeEnvIssues, privateKeySchema, rawEnvSchema} from "./envSchema";

export interface BoardConfig {
  boardId: number;
  /** Contract storage slot; defaults to the board id. */
  tokenId: bigint;
  privateKey: string;
  boardPath: string;
}

export interface PublisherConfig {
  contractAddress: string;
  rpcUrls: string[];
  chainId: bigint;
  writeKey: string;
  gasPrice: GasPricePolicy;
  gasLimit: bigint;
  receiptTimeoutMs: number;
  pollIntervalMs: number;
  rpcTimeoutMs: number;
  templatePath: string;
  feeLedgerPath: string;
  stateDbPath?: string;
  statusApiPort?: number;
  boards: BoardConfig[];
}

type Env = Record<string, string | undefined>;

// dotenv writes `KEY=` as an empty string; treat that as unset.
function withoutBlankValues(env: Env): Env {
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

function resolveTokenId(env: Env, boardId: number, logger: Logger): bigint {
  const name = `TOKEN_ID${boardId}`;
  const raw = env[name];
  if (raw === undefined) {
    logger.warn("token-id-defaulted", {variable: name, tokenId: boardId});
    return BigInt(boardId);
  }
  if (!/^\d+$/.test(raw.trim())) {
    logger.warn("token-id-invalid-defaulted", {variable: name, value: raw, tokenId: boardId});
    return BigInt(boardId);
  }
  return BigInt(raw.trim());
}

function resolveBoard(env: Env, boardId: number, boardDir: string, logger: Logger): BoardConfig {
  const keyName = `PRIVATE_KEY${boardId}`;
  const privateKey = env[keyName];
  if (privateKey === undefined) {
    throw new Error(`missing-env:${keyName}`);
  }
  if (!privateKeySchema.safeParse(privateKey).success) {
    throw new Error(`invalid-env:${keyName}`);
  }

  return {
    boardId,
    tokenId: resolveTokenId(env, boardId, logger),
    privateKey,
    boardPath: join(boardDir, `board${boardId}.txt`)
  };
}

export function loadPublisherConfig(
  env: Env = process.env,
  logger: Logger = createLogger("config")
): PublisherConfig {
  const cleaned = withoutBlankValues(env);
  const parsed = rawEnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new Error(describeEnvIssues(parsed.error));
  }

  const raw = parsed.data;
  if (raw.GAS_PRICE_MAX_WEI < raw.GAS_PRICE_BASE_WEI) {
    throw new Error("invalid-env:GAS_PRICE_MAX_WEI (below GAS_PRICE_BASE_WEI)");
  }

  const boardIds = [...new Set(raw.BOARD_IDS)];

  return {
    contractAddress: raw.CONTRACT_ADDRESS,
    rpcUrls: raw.RPC_URLS,
    chainId: raw.CHAIN_ID,
    writeKey: raw.WRITE_KEY,
    gasPrice: {
      baseWei: raw.GAS_PRICE_BASE_WEI,
      maxWei: raw.GAS_PRICE_MAX_WEI,
      stepWei: raw.GAS_PRICE_STEP_WEI
    },
    gasLimit: raw.GAS_LIMIT,
    receiptTimeoutMs: raw.RECEIPT_TIMEOUT_MS,
    pollIntervalMs: raw.POLL_INTERVAL_MS,
    rpcTimeoutMs: raw.RPC_TIMEOUT_MS,
    templatePath: raw.TEMPLATE_PATH,
    feeLedgerPath: raw.FEE_LEDGER_PATH,
    stateDbPath: raw.STATE_DB_PATH,
    statusApiPort: raw.STATUS_API_PORT,
    boards: boardIds.map((boardId) => resolveBoard(cleaned, boardId, raw.BOARD_DIR, logger))
  };
}
