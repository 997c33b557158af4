import { ComplianceConfig, DEFAULT_GUARDIAN_CONFIG } from "../config/guardianConfig";
import {
  COMPLIANCE_SEVERITY,
  ComplianceLevel,
  ComplianceMetric,
  IAccountState,
  IComplianceAlert,
  IComplianceReport,
  IComplianceRule,
  IComplianceStats,
  IRuleEvaluation,
  TradeApproval,
} from "../types/risk.types";
import { ConfigValidationError, InvalidInputError } from "../utils/errors";
import { logger } from "../utils/logger";
import { safeRatio } from "../utils/mathUtils";
import { parseClockTime, tradingDayKey } from "../utils/timeUtils";
import {
  buildDefaultRules,
  classifyLevel,
  ruleTableIssues,
  usagePercentage,
} from "./complianceRules";

export type ComplianceAlertListener = (alert: IComplianceAlert, tradingEnabled: boolean) => void;

const MAX_ALERTS = 1000;
const UNHEALTHY_VIOLATION_COUNT = 5;

/**
 * Sole owner of the account state. Evaluates the rule table against it,
 * halts trading on auto-stop violations and gates every proposed trade.
 */
export class ComplianceMonitor {
  private rules: readonly IComplianceRule[];
  private account: IAccountState;
  private tradingEnabled = true;
  private haltReason: string | null = null;
  private tradingDay: string;
  private readonly resetMinutes: number;
  private lastLevels = new Map<string, ComplianceLevel>();
  private alerts: IComplianceAlert[] = [];
  private listeners: ComplianceAlertListener[] = [];
  private stats: IComplianceStats = {
    totalChecks: 0,
    warningsIssued: 0,
    violationsRecorded: 0,
    autoStopsTriggered: 0,
    lastCheckAt: null,
  };

  constructor(
    private readonly config: ComplianceConfig = DEFAULT_GUARDIAN_CONFIG.compliance,
    private readonly now: () => Date = () => new Date()
  ) {
    this.rules = freezeRules(config.rules ?? buildDefaultRules(config));
    this.account = {
      startingBalance: config.accountSize,
      currentBalance: config.accountSize,
      peakBalance: config.accountSize,
      dailyPnl: 0,
      dailyTradeCount: 0,
      consecutiveLosses: 0,
      totalTradeCount: 0,
      lastTradeAt: null,
    };
    this.resetMinutes = parseClockTime(config.dailyResetTime);
    this.tradingDay = this.currentTradingDay();
  }

  applyTradeResult(pnl: number, isWin: boolean): void {
    if (!Number.isFinite(pnl)) {
      throw new InvalidInputError(`Trade pnl must be finite, got ${pnl}`);
    }
    this.rollDailyIfNeeded();

    const account = this.account;
    account.currentBalance += pnl;
    account.peakBalance = Math.max(account.peakBalance, account.currentBalance);
    account.dailyPnl += pnl;
    account.dailyTradeCount++;
    account.totalTradeCount++;
    account.consecutiveLosses = isWin ? 0 : account.consecutiveLosses + 1;
    account.lastTradeAt = this.now();

    logger.info(
      `Account ${pnl >= 0 ? "+" : ""}${pnl.toFixed(2)} -> balance $${account.currentBalance.toFixed(2)}, daily $${account.dailyPnl.toFixed(2)}, losses in a row ${account.consecutiveLosses}`
    );
  }

  evaluate(): IComplianceReport {
    this.rollDailyIfNeeded();
    const timestamp = this.now();
    const rules = this.rules;

    const evaluations: IRuleEvaluation[] = [];
    for (const rule of rules) {
      if (!rule.enabled || rule.metric === ComplianceMetric.POSITION_RISK) continue;

      const observedValue = this.observe(rule.metric);
      const level = classifyLevel(rule, observedValue);
      const haltsNow =
        level === ComplianceLevel.VIOLATION && rule.autoStopOnViolation && this.tradingEnabled;

      const evaluation: IRuleEvaluation = {
        ruleId: rule.id,
        name: rule.name,
        metric: rule.metric,
        level,
        observedValue,
        hardLimit: rule.hardLimit,
        warningThreshold: rule.warningThreshold,
        criticalThreshold: rule.criticalThreshold,
        usagePercentage: usagePercentage(rule, observedValue),
        autoStopTriggered: haltsNow,
      };
      evaluations.push(evaluation);

      if (haltsNow) {
        this.halt(`${rule.name} violated (${observedValue.toFixed(2)} vs ${rule.hardLimit.toFixed(2)})`);
      }
      this.trackLevel(rule, evaluation, timestamp);
    }

    this.stats.totalChecks++;
    this.stats.lastCheckAt = timestamp;

    const overallLevel = evaluations.reduce<ComplianceLevel>(
      (worst, e) => (COMPLIANCE_SEVERITY[e.level] > COMPLIANCE_SEVERITY[worst] ? e.level : worst),
      ComplianceLevel.SAFE
    );

    return {
      overallLevel,
      tradingEnabled: this.tradingEnabled,
      rules: evaluations,
      account: this.getAccountSnapshot(),
      tradingDay: this.tradingDay,
      timestamp,
    };
  }

  canOpenPosition(proposedSize: number, proposedRiskAmount: number, instrument: string): TradeApproval {
    this.rollDailyIfNeeded();

    if (!Number.isFinite(proposedSize) || proposedSize < 0) {
      return this.deny(`Invalid position size ${proposedSize} for ${instrument}`, "input");
    }
    if (!Number.isFinite(proposedRiskAmount) || proposedRiskAmount < 0) {
      return this.deny(`Invalid risk amount ${proposedRiskAmount} for ${instrument}`, "input");
    }
    if (!this.tradingEnabled) {
      return this.deny(`Trading halted: ${this.haltReason ?? "operator stop"}`, "trading_halted");
    }

    for (const rule of this.rules) {
      if (!rule.enabled) continue;
      switch (rule.metric) {
        case ComplianceMetric.POSITION_RISK:
          if (proposedRiskAmount > rule.hardLimit) {
            return this.deny(
              `Risk $${proposedRiskAmount.toFixed(2)} exceeds ${rule.name} $${rule.hardLimit.toFixed(2)}`,
              rule.id
            );
          }
          break;
        case ComplianceMetric.CONSECUTIVE_LOSSES:
          if (this.account.consecutiveLosses >= rule.hardLimit) {
            return this.deny(
              `${this.account.consecutiveLosses} consecutive losses >= ${rule.name} ${rule.hardLimit}`,
              rule.id
            );
          }
          break;
        case ComplianceMetric.DAILY_TRADE_COUNT:
          if (this.account.dailyTradeCount >= rule.hardLimit) {
            return this.deny(
              `${this.account.dailyTradeCount} trades today >= ${rule.name} ${rule.hardLimit}`,
              rule.id
            );
          }
          break;
        default:
          break;
      }
    }

    return {
      approved: true,
      riskAmount: proposedRiskAmount,
      riskPercentage: safeRatio(proposedRiskAmount, this.account.currentBalance) * 100,
    };
  }

  /**
   * Swaps in a new rule table. The whole table is validated before the
   * single assignment, so evaluations never see a partial update.
   */
  reloadRules(rules: IComplianceRule[]): void {
    const issues = ruleTableIssues(rules);
    if (issues.length > 0) throw new ConfigValidationError(issues);

    this.rules = freezeRules(rules);
    this.lastLevels.clear();
    logger.info(`Compliance rules reloaded (${rules.length} rules)`);
  }

  /** Operator override: the only way to clear an auto-stop. */
  resumeTrading(operator: string): boolean {
    if (this.tradingEnabled) return false;

    logger.warning(`Trading resumed by ${operator} (was halted: ${this.haltReason ?? "unknown"})`);
    this.tradingEnabled = true;
    this.haltReason = null;
    this.lastLevels.clear();
    return true;
  }

  /**
   * Zeroes the daily counters the first time it runs on a new trading day.
   * Repeated calls within the same day are no-ops.
   */
  rollDailyIfNeeded(): boolean {
    const day = this.currentTradingDay();
    if (day === this.tradingDay) return false;

    logger.info(
      `Daily compliance reset for ${day}: previous P&L $${this.account.dailyPnl.toFixed(2)}, ${this.account.dailyTradeCount} trades`
    );
    this.account.dailyPnl = 0;
    this.account.dailyTradeCount = 0;
    this.tradingDay = day;
    return true;
  }

  isTradingEnabled(): boolean {
    return this.tradingEnabled;
  }

  getHaltReason(): string | null {
    return this.haltReason;
  }

  isHealthy(): boolean {
    return this.tradingEnabled && this.stats.violationsRecorded < UNHEALTHY_VIOLATION_COUNT;
  }

  getAccountSnapshot(): IAccountState {
    return { ...this.account };
  }

  getRules(): IComplianceRule[] {
    return this.rules.map((r) => ({ ...r }));
  }

  getAlerts(sinceMs?: number): IComplianceAlert[] {
    const cutoff = sinceMs === undefined ? -Infinity : this.now().getTime() - sinceMs;
    return this.alerts.filter((a) => a.timestamp.getTime() >= cutoff).map((a) => ({ ...a }));
  }

  getStatistics(): IComplianceStats {
    return { ...this.stats };
  }

  onAlert(listener: ComplianceAlertListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private observe(metric: ComplianceMetric): number {
    const a = this.account;
    switch (metric) {
      case ComplianceMetric.TOTAL_PNL:
        return a.currentBalance - a.startingBalance;
      case ComplianceMetric.DAILY_PNL:
        return a.dailyPnl;
      case ComplianceMetric.TRAILING_DRAWDOWN:
        return a.peakBalance - a.currentBalance;
      case ComplianceMetric.CONSECUTIVE_LOSSES:
        return a.consecutiveLosses;
      case ComplianceMetric.DAILY_TRADE_COUNT:
        return a.dailyTradeCount;
      case ComplianceMetric.POSITION_RISK:
        return 0;
    }
  }

  private halt(reason: string): void {
    this.tradingEnabled = false;
    this.haltReason = reason;
    this.stats.autoStopsTriggered++;
    logger.critical(`TRADING HALTED: ${reason}`);
  }

  /** Raises an alert when a rule's level climbs above what was last seen. */
  private trackLevel(rule: IComplianceRule, evaluation: IRuleEvaluation, timestamp: Date): void {
    const previous = this.lastLevels.get(rule.id) ?? ComplianceLevel.SAFE;
    this.lastLevels.set(rule.id, evaluation.level);
    if (COMPLIANCE_SEVERITY[evaluation.level] <= COMPLIANCE_SEVERITY[previous]) return;

    const threshold =
      evaluation.level === ComplianceLevel.VIOLATION
        ? rule.hardLimit
        : evaluation.level === ComplianceLevel.CRITICAL
          ? rule.criticalThreshold
          : rule.warningThreshold;
    const alert: IComplianceAlert = {
      timestamp,
      ruleId: rule.id,
      level: evaluation.level,
      observedValue: evaluation.observedValue,
      thresholdValue: threshold,
      message: `${rule.name} at ${evaluation.level}: ${evaluation.observedValue.toFixed(2)} (threshold ${threshold.toFixed(2)}, ${evaluation.usagePercentage.toFixed(0)}% used)`,
      action: evaluation.autoStopTriggered ? "trading_halted" : "none",
    };

    if (evaluation.level === ComplianceLevel.VIOLATION) {
      this.stats.violationsRecorded++;
      logger.critical(alert.message);
    } else {
      this.stats.warningsIssued++;
      logger.warning(alert.message);
    }

    this.alerts.push(alert);
    if (this.alerts.length > MAX_ALERTS) this.alerts.shift();

    for (const listener of this.listeners) {
      try {
        listener({ ...alert }, this.tradingEnabled);
      } catch (err) {
        logger.error(`Compliance alert listener failed`, err);
      }
    }
  }

  private deny(reason: string, ruleId: string): TradeApproval {
    logger.warning(`Compliance DENIED: ${reason}`);
    return { approved: false, reason, ruleId };
  }

  private currentTradingDay(): string {
    return tradingDayKey(this.now(), this.config.timeZone, this.resetMinutes);
  }
}

function freezeRules(rules: IComplianceRule[]): readonly IComplianceRule[] {
  return Object.freeze(rules.map((r) => Object.freeze({ ...r })));
}
