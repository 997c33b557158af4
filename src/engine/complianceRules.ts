import type { ComplianceConfig } from "../config/guardianConfig";
import {
  ComplianceLevel,
  ComplianceMetric,
  IComplianceRule,
} from "../types/risk.types";

/** Metrics whose limits are negative P&L floors. Everything else is a ceiling. */
export function isLossMetric(metric: ComplianceMetric): boolean {
  return metric === ComplianceMetric.TOTAL_PNL || metric === ComplianceMetric.DAILY_PNL;
}

/**
 * Severity of an observed value against a rule. Loss-style rules (negative
 * hard limit) trip as the value falls; limit-style rules trip as it rises.
 * Equality with a threshold counts as reaching it.
 */
export function classifyLevel(rule: IComplianceRule, value: number): ComplianceLevel {
  if (rule.hardLimit < 0) {
    if (value <= rule.hardLimit) return ComplianceLevel.VIOLATION;
    if (value <= rule.criticalThreshold) return ComplianceLevel.CRITICAL;
    if (value <= rule.warningThreshold) return ComplianceLevel.WARNING;
    return ComplianceLevel.SAFE;
  }
  if (value >= rule.hardLimit) return ComplianceLevel.VIOLATION;
  if (value >= rule.criticalThreshold) return ComplianceLevel.CRITICAL;
  if (value >= rule.warningThreshold) return ComplianceLevel.WARNING;
  return ComplianceLevel.SAFE;
}

/** Share of the hard limit consumed, in percent. */
export function usagePercentage(rule: IComplianceRule, value: number): number {
  if (rule.hardLimit === 0) return 0;
  return Math.max(0, (value / rule.hardLimit) * 100);
}

export function buildDefaultRules(cfg: ComplianceConfig): IComplianceRule[] {
  const { accountSize, warningRatio, criticalRatio } = cfg;

  const lossRule = (
    id: string,
    name: string,
    metric: ComplianceMetric,
    pct: number
  ): IComplianceRule => {
    const hardLimit = -accountSize * pct;
    return {
      id,
      name,
      metric,
      hardLimit,
      warningThreshold: hardLimit * warningRatio,
      criticalThreshold: hardLimit * criticalRatio,
      enabled: true,
      autoStopOnViolation: true,
    };
  };

  const ceilingRule = (
    id: string,
    name: string,
    metric: ComplianceMetric,
    hardLimit: number,
    autoStopOnViolation: boolean,
    warn: number = warningRatio,
    crit: number = criticalRatio
  ): IComplianceRule => ({
    id,
    name,
    metric,
    hardLimit,
    warningThreshold: hardLimit * warn,
    criticalThreshold: hardLimit * crit,
    enabled: true,
    autoStopOnViolation,
  });

  return [
    lossRule("max_loss", "Maximum Loss Limit", ComplianceMetric.TOTAL_PNL, cfg.maxLossPercentage),
    lossRule("daily_loss", "Daily Loss Limit", ComplianceMetric.DAILY_PNL, cfg.dailyLossPercentage),
    ceilingRule(
      "trailing_drawdown",
      "Trailing Drawdown",
      ComplianceMetric.TRAILING_DRAWDOWN,
      accountSize * cfg.trailingDrawdownPercentage,
      true
    ),
    ceilingRule(
      "position_risk",
      "Position Risk Limit",
      ComplianceMetric.POSITION_RISK,
      accountSize * cfg.maxPositionRiskPercentage,
      false,
      0.8,
      0.95
    ),
    ceilingRule(
      "revenge_trading",
      "Consecutive Loss Limit",
      ComplianceMetric.CONSECUTIVE_LOSSES,
      cfg.maxConsecutiveLosses,
      true
    ),
    ceilingRule(
      "daily_trade_count",
      "Daily Trade Count",
      ComplianceMetric.DAILY_TRADE_COUNT,
      cfg.maxDailyTrades,
      false
    ),
  ];
}

/**
 * Structural problems in a rule table, empty when the table is usable.
 */
export function ruleTableIssues(rules: readonly IComplianceRule[]): string[] {
  const issues: string[] = [];
  const seen = new Set<string>();

  for (const rule of rules) {
    if (seen.has(rule.id)) issues.push(`duplicate rule id "${rule.id}"`);
    seen.add(rule.id);

    const { hardLimit, criticalThreshold, warningThreshold } = rule;
    if (isLossMetric(rule.metric)) {
      if (hardLimit >= 0) {
        issues.push(`${rule.id}: loss limit must be negative`);
      } else if (!(hardLimit <= criticalThreshold && criticalThreshold <= warningThreshold && warningThreshold <= 0)) {
        issues.push(`${rule.id}: thresholds must satisfy hardLimit <= critical <= warning <= 0`);
      }
    } else if (hardLimit <= 0) {
      issues.push(`${rule.id}: limit must be positive`);
    } else if (!(0 <= warningThreshold && warningThreshold <= criticalThreshold && criticalThreshold <= hardLimit)) {
      issues.push(`${rule.id}: thresholds must satisfy 0 <= warning <= critical <= hardLimit`);
    }
  }
  return issues;
}
