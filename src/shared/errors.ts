import {isError} from "ethers";

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * A receipt wait that ran out of time. ethers raises `TIMEOUT`; anything else
 * whose message mentions a timeout (fetch aborts, RPC gateways) counts too.
 */
export function isTimeoutError(error: unknown): boolean {
  if (isError(error, "TIMEOUT")) {
    return true;
  }

  return errorMessage(error).toLowerCase().includes("timeout");
}
