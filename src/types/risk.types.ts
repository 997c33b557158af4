import type { InvalidInputError } from "../utils/errors";
import type { SessionTag } from "./signal.types";

// ---------------------------------------------------------------------------
// Cadence
// ---------------------------------------------------------------------------

export enum TradeResult {
  WIN = "WIN",
  LOSS = "LOSS",
}

export interface ICadenceState {
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  currentSessionTag: SessionTag | null;
  lastSignalTimestamp: Date | null;
}

export interface ISessionStats {
  signals: number;
  wins: number;
  losses: number;
}

export interface ICadenceStatus extends ICadenceState {
  activeSession: SessionTag;
  thresholds: Record<SessionTag, number>;
  thresholdMet: boolean;
  sessionStats: Record<SessionTag, ISessionStats>;
  sessionWinRates: Record<SessionTag, number>;
  totalOutcomes: number;
}

export interface IStreakAnalysis {
  insufficientData: boolean;
  thresholdSignals: number;
  successRateAfterThreshold: number;
  averageFailuresBeforeWin: number;
  maxConsecutiveFailures: number;
  effective: boolean;
}

export interface IThresholdRecommendation {
  adjust: boolean;
  reason: string;
  current: Record<SessionTag, number>;
  recommended: Record<SessionTag, number>;
}

export enum CadenceHealth {
  NORMAL = "NORMAL",
  WARNING = "WARNING",
  FAILURE = "FAILURE",
  RECOVERY = "RECOVERY",
}

export interface ICadenceFailureEvent {
  startedAt: Date;
  kind: "critical_window" | "sustained_low";
  minPowerScore: number;
  recoveredAt: Date | null;
  durationMinutes: number | null;
}

export interface ICadenceHealthStatus {
  state: CadenceHealth;
  since: Date;
  averagePowerScore: number;
  readingsTracked: number;
  failureEvents: number;
  recoveryEvents: number;
  longestFailureMinutes: number;
}

// ---------------------------------------------------------------------------
// Position sizing
// ---------------------------------------------------------------------------

export interface ITradeOutcome {
  instrument: string;
  pnl: number;
  win: boolean;
  timestamp: Date;
}

export interface IKellyMetrics {
  sampleSize: number;
  winRate: number;
  avgWin: number;
  avgLoss: number;
  payoffRatio: number;
  kellyFraction: number; // clamped to [0, maxKellyFraction]
  halfKellyFraction: number;
  recentWinRate: number;
  confidenceLevel: number;
  updatedAt: Date;
}

export type CalculationSource = "instrument" | "global" | "default";

export interface ISizingResult {
  instrument: string;
  units: number;
  positionValue: number;
  riskPerUnit: number;
  riskAmount: number;
  riskPercentage: number; // percent of equity, 0-100
  kellyFraction: number;
  halfKellyFraction: number;
  appliedFraction: number; // half-Kelly scaled by signal strength
  winRate: number;
  payoffRatio: number;
  confidence: number;
  signalStrength: number;
  maxPositionValue: number;
  calculationSource: CalculationSource;
}

export type SizingOutcome =
  | { ok: true; sizing: ISizingResult }
  | { ok: false; error: InvalidInputError };

export interface ITradeHistorySummary {
  totalTrades: number;
  wins: number;
  losses: number;
  winRate: number;
  totalPnl: number;
  avgPnl: number;
  instruments: string[];
  firstTradeAt: Date | null;
  lastTradeAt: Date | null;
}

export interface ITradeHistorySnapshot {
  exportedAt: string;
  equity: number;
  trades: { instrument: string; pnl: number; win: boolean; timestamp: string }[];
}

// ---------------------------------------------------------------------------
// Compliance
// ---------------------------------------------------------------------------

export enum ComplianceLevel {
  SAFE = "SAFE",
  WARNING = "WARNING",
  CRITICAL = "CRITICAL",
  VIOLATION = "VIOLATION",
}

export const COMPLIANCE_SEVERITY: Record<ComplianceLevel, number> = {
  [ComplianceLevel.SAFE]: 0,
  [ComplianceLevel.WARNING]: 1,
  [ComplianceLevel.CRITICAL]: 2,
  [ComplianceLevel.VIOLATION]: 3,
};

export enum ComplianceMetric {
  TOTAL_PNL = "totalPnl",
  DAILY_PNL = "dailyPnl",
  TRAILING_DRAWDOWN = "trailingDrawdown",
  POSITION_RISK = "positionRisk",
  CONSECUTIVE_LOSSES = "consecutiveLosses",
  DAILY_TRADE_COUNT = "dailyTradeCount",
}

export interface IComplianceRule {
  id: string;
  name: string;
  metric: ComplianceMetric;
  hardLimit: number;
  warningThreshold: number;
  criticalThreshold: number;
  enabled: boolean;
  autoStopOnViolation: boolean;
}

export interface IAccountState {
  startingBalance: number;
  currentBalance: number;
  peakBalance: number;
  dailyPnl: number;
  dailyTradeCount: number;
  consecutiveLosses: number;
  totalTradeCount: number;
  lastTradeAt: Date | null;
}

export interface IRuleEvaluation {
  ruleId: string;
  name: string;
  metric: ComplianceMetric;
  level: ComplianceLevel;
  observedValue: number;
  hardLimit: number;
  warningThreshold: number;
  criticalThreshold: number;
  usagePercentage: number;
  autoStopTriggered: boolean;
}

export interface IComplianceReport {
  overallLevel: ComplianceLevel;
  tradingEnabled: boolean;
  rules: IRuleEvaluation[];
  account: IAccountState;
  tradingDay: string;
  timestamp: Date;
}

export type TradeApproval =
  | { approved: true; riskAmount: number; riskPercentage: number }
  | { approved: false; reason: string; ruleId: string };

export interface IComplianceAlert {
  timestamp: Date;
  ruleId: string;
  level: ComplianceLevel;
  observedValue: number;
  thresholdValue: number;
  message: string;
  action: "none" | "trading_halted";
}

export interface IComplianceStats {
  totalChecks: number;
  warningsIssued: number;
  violationsRecorded: number;
  autoStopsTriggered: number;
  lastCheckAt: Date | null;
}
