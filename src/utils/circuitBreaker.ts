import { ICircuitBreakerState } from "../types/pipeline.types";
import { logger } from "./logger";

/**
 * Stops calling a failing dependency for a cooldown after `threshold`
 * consecutive failures, then lets a single trial call through.
 */
export class CircuitBreaker {
  private state: ICircuitBreakerState;
  private readonly cooldownMs: number;
  private readonly now: () => number;

  constructor(
    name: string,
    private threshold: number = 5,
    cooldownMs: number = 30 * 1000,
    now: () => number = Date.now
  ) {
    this.cooldownMs = cooldownMs;
    this.now = now;
    this.state = {
      name,
      state: "closed",
      consecutiveFailures: 0,
    };
  }

  isAllowed(): boolean {
    if (this.state.state === "closed") return true;

    if (this.state.state === "open") {
      if (this.state.cooldownUntil && this.now() >= this.state.cooldownUntil.getTime()) {
        this.state.state = "half-open";
        logger.info(`Circuit ${this.state.name}: open -> half-open`);
        return true;
      }
      return false;
    }

    // half-open: one trial call
    return true;
  }

  recordSuccess(): void {
    if (this.state.state === "half-open") {
      logger.info(`Circuit ${this.state.name}: half-open -> closed`);
    }
    this.state.state = "closed";
    this.state.consecutiveFailures = 0;
    this.state.cooldownUntil = undefined;
    this.state.lastSuccessAt = new Date(this.now());
  }

  recordFailure(): void {
    this.state.consecutiveFailures++;
    this.state.lastFailureAt = new Date(this.now());

    if (this.state.state === "half-open") {
      this.trip(`half-open -> open (cooldown ${this.cooldownMs}ms)`);
      return;
    }

    if (this.state.state === "closed" && this.state.consecutiveFailures >= this.threshold) {
      this.trip(`closed -> open after ${this.state.consecutiveFailures} failures`);
    }
  }

  getState(): ICircuitBreakerState {
    return { ...this.state };
  }

  reset(): void {
    this.state = { name: this.state.name, state: "closed", consecutiveFailures: 0 };
  }

  private trip(transition: string): void {
    this.state.state = "open";
    this.state.cooldownUntil = new Date(this.now() + this.cooldownMs);
    logger.warning(`Circuit ${this.state.name}: ${transition}`);
  }
}
