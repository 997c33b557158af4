import type { IDecision } from "./decision.types";
import type {
  IAccountState,
  ICadenceHealthStatus,
  ICadenceStatus,
  IComplianceAlert,
  IComplianceReport,
  IKellyMetrics,
  IStreakAnalysis,
  IThresholdRecommendation,
} from "./risk.types";

export interface ICircuitBreakerState {
  name: string;
  state: "closed" | "open" | "half-open";
  consecutiveFailures: number;
  lastFailureAt?: Date;
  lastSuccessAt?: Date;
  cooldownUntil?: Date;
}

export enum SubscriberClass {
  DASHBOARD = "dashboard",
  EXECUTION = "execution",
}

export interface IGuardianStatus {
  tradingEnabled: boolean;
  cadence: ICadenceStatus;
  cadenceHealth: ICadenceHealthStatus;
  cadenceAnalysis: { streaks: IStreakAnalysis; recommendation: IThresholdRecommendation };
  sizing: { equity: number; metrics: IKellyMetrics | null; tradesRecorded: number };
  account: IAccountState;
  recentAlerts: IComplianceAlert[];
  pendingTrades: number;
  timestamp: Date;
}

export type BroadcastMessage =
  | { type: "decision"; payload: IDecision }
  | { type: "compliance_alert"; payload: IComplianceAlert & { tradingEnabled: boolean } }
  | { type: "compliance_report"; payload: IComplianceReport }
  | { type: "status"; payload: IGuardianStatus };

/**
 * The decision core's only view of the transport.
 */
export interface DecisionPublisher {
  publish(decision: IDecision): void;
}

export type AuditComponent =
  | "decision_engine"
  | "compliance_monitor"
  | "pipeline";

export type AuditKind =
  | "decision"
  | "rule_evaluation"
  | "trade_outcome"
  | "reading_rejected"
  | "trading_halted"
  | "trading_resumed";

export interface IAuditEvent {
  timestamp: Date;
  component: AuditComponent;
  kind: AuditKind;
  payload: Record<string, unknown>;
}

export interface IAuditQuery {
  from?: Date;
  to?: Date;
  component?: AuditComponent;
  limit?: number;
}
