import type {
  CadenceHealth,
  ISizingResult,
  TradeApproval,
  TradeResult,
} from "./risk.types";
import type { SessionTag, TradeDirection } from "./signal.types";

export enum DecisionAction {
  TRADE = "TRADE",
  CAUTIOUS_TRADE = "CAUTIOUS_TRADE",
  NO_TRADE = "NO_TRADE",
}

export interface ICadenceSnapshot {
  session: SessionTag;
  thresholdMet: boolean;
  consecutiveFailures: number;
  health: CadenceHealth;
}

/** Raw sub-outputs kept on the decision for observability. */
export interface IDecisionComponents {
  cadence: ICadenceSnapshot | null;
  sizing: ISizingResult | null;
  compliance: TradeApproval | null;
}

export interface IDecision {
  readonly id: string;
  readonly action: DecisionAction;
  readonly confidenceScore: number; // 0-1
  readonly qualityScore: number; // 0-1, from the reading alone
  readonly positionSizeFraction: number; // share of equity put at risk
  readonly positionUnits: number;
  readonly stopDistance: number;
  readonly targetDistance: number;
  readonly reasoning: readonly string[];
  readonly complianceApproved: boolean;
  readonly kellyFraction: number;
  readonly instrument: string;
  readonly direction: TradeDirection | null;
  readonly session: SessionTag;
  readonly readingTimestamp: Date;
  readonly timestamp: Date;
  readonly components: IDecisionComponents;
}

export interface ITradeOutcomeReport {
  decisionId: string;
  pnl: number;
  closedAt?: Date;
}

export type OutcomeAck =
  | { accepted: true; decisionId: string; result: TradeResult }
  | { accepted: false; decisionId: string; reason: string };
