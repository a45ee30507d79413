export interface GasPricePolicy {
  baseWei: bigint;
  maxWei: bigint;
  stepWei: bigint;
}

export interface EscalationResult {
  price: bigint;
  saturated: boolean;
}

/**
 * Per-worker gas price. Climbs on timeouts, capped at `maxWei`, and only drops
 * back to `baseWei` after a confirmed write, so a worker stuck in a congested
 * market keeps its raised price from one cycle to the next.
 */
export class GasPriceController {
  private price: bigint;

  constructor(private readonly policy: GasPricePolicy) {
    if (policy.baseWei <= 0n || policy.stepWei <= 0n) {
      throw new Error("invalid-gas-policy: base and step must be positive");
    }
    if (policy.maxWei < policy.baseWei) {
      throw new Error("invalid-gas-policy: max below base");
    }
    this.price = policy.baseWei;
  }

  get current(): bigint {
    return this.price;
  }

  get base(): bigint {
    return this.policy.baseWei;
  }

  escalate(): EscalationResult {
    if (this.price >= this.policy.maxWei) {
      return {price: this.price, saturated: true};
    }

    const next = this.price + this.policy.stepWei;
    this.price = next > this.policy.maxWei ? this.policy.maxWei : next;
    return {price: this.price, saturated: false};
  }

  reset(): void {
    this.price = this.policy.baseWei;
  }
}
