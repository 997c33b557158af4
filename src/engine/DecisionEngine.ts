import { v4 as uuidv4 } from "uuid";
import { DecisionConfig, DEFAULT_GUARDIAN_CONFIG } from "../config/guardianConfig";
import {
  DecisionAction,
  ICadenceSnapshot,
  IDecision,
  ITradeOutcomeReport,
  OutcomeAck,
} from "../types/decision.types";
import { DecisionPublisher, IGuardianStatus } from "../types/pipeline.types";
import { ISizingResult, TradeApproval, TradeResult } from "../types/risk.types";
import {
  ConfluenceTier,
  DirectionalColor,
  FilterState,
  IMarketContext,
  ISignalReading,
  SessionTag,
  TradeDirection,
} from "../types/signal.types";
import { ComponentFailure } from "../utils/errors";
import { logger } from "../utils/logger";
import { clamp, safeRatio } from "../utils/mathUtils";
import { CadenceHealthMonitor } from "./CadenceHealthMonitor";
import { CadenceTracker } from "./CadenceTracker";
import { ComplianceMonitor } from "./ComplianceMonitor";
import { KellyEngine } from "./KellyEngine";

export interface IDecisionEngineDeps {
  cadence: CadenceTracker;
  health: CadenceHealthMonitor;
  sizing: KellyEngine;
  compliance: ComplianceMonitor;
  publisher?: DecisionPublisher;
  config?: DecisionConfig;
  now?: () => Date;
}

const RECENT_ALERT_WINDOW_MS = 24 * 60 * 60 * 1000;

interface IPendingTrade {
  instrument: string;
  session: SessionTag;
  action: DecisionAction;
  openedAt: Date;
}

export function directionFor(color: DirectionalColor): TradeDirection | null {
  switch (color) {
    case DirectionalColor.GREEN:
    case DirectionalColor.BLUE:
      return TradeDirection.LONG;
    case DirectionalColor.RED:
    case DirectionalColor.PINK:
      return TradeDirection.SHORT;
    case DirectionalColor.NEUTRAL:
      return null;
  }
}

/**
 * Turns each reading into one terminal decision by combining signal
 * quality, the cadence gate, Kelly sizing and the compliance check.
 * Never mutates component state while deciding; settled outcomes are
 * forwarded through `reportOutcome`.
 */
export class DecisionEngine {
  private readonly cadence: CadenceTracker;
  private readonly health: CadenceHealthMonitor;
  private readonly sizing: KellyEngine;
  private readonly compliance: ComplianceMonitor;
  private readonly config: DecisionConfig;
  private readonly now: () => Date;
  private readonly publisher: DecisionPublisher | null;
  private pending = new Map<string, IPendingTrade>();

  constructor(deps: IDecisionEngineDeps) {
    this.cadence = deps.cadence;
    this.health = deps.health;
    this.sizing = deps.sizing;
    this.compliance = deps.compliance;
    this.publisher = deps.publisher ?? null;
    this.config = deps.config ?? DEFAULT_GUARDIAN_CONFIG.decision;
    this.now = deps.now ?? (() => new Date());
  }

  evaluate(reading: ISignalReading, market: IMarketContext | null): IDecision {
    const cfg = this.config;
    const reasoning: string[] = [];
    const disqualifiers: string[] = [];
    const disqualify = (reason: string) => {
      disqualifiers.push(reason);
      reasoning.push(`DISQUALIFIED: ${reason}`);
    };

    const stage = <T>(name: string, fn: () => T): T | null => {
      try {
        return fn();
      } catch (err) {
        const failure = new ComponentFailure(name, err);
        logger.error(`Decision stage failed for ${reading.instrument}`, failure);
        disqualify(`Analysis error (${name}): ${failure.message}`);
        return null;
      }
    };

    // 1. Signal quality
    const direction = directionFor(reading.directionalColor);
    const qualityScore =
      stage("quality", () => this.scoreQuality(reading, reasoning, disqualify)) ?? 0;

    // 2. Cadence gate
    let confidenceScore = qualityScore;
    const cadence = stage("cadence", (): ICadenceSnapshot => {
      const session = reading.sessionTag;
      const met = this.cadence.thresholdMet(session);
      const failures = this.cadence.getState().consecutiveFailures;
      const threshold = this.cadence.threshold(session);
      if (met) {
        confidenceScore += cfg.cadenceBonus;
        reasoning.push(
          `Cadence threshold met for ${session} (${failures}/${threshold} failures): +${cfg.cadenceBonus}`
        );
      } else {
        confidenceScore -= cfg.cadenceMissPenalty;
        reasoning.push(
          `Cadence threshold not met for ${session} (${failures}/${threshold} failures)` +
            (cfg.cadenceMissPenalty > 0 ? `: -${cfg.cadenceMissPenalty}` : "")
        );
      }
      const health = this.health.getState();
      reasoning.push(`Cadence health: ${health}`);
      return { session, thresholdMet: met, consecutiveFailures: failures, health };
    });
    confidenceScore = clamp(confidenceScore, 0, 1);
    reasoning.push(`Confidence ${confidenceScore.toFixed(2)} (quality ${qualityScore.toFixed(2)})`);

    // 3. Sizing
    let stopDistance = 0;
    let targetDistance = 0;
    let sizing: ISizingResult | null = null;
    if (!market) {
      disqualify(`No market context for ${reading.instrument}`);
    } else if (direction && disqualifiers.length === 0) {
      const context = market;
      stopDistance = context.atr * cfg.stopAtrMultiplier;
      targetDistance = context.atr * cfg.targetAtrMultiplier;
      sizing = stage("sizing", () => {
        const entry = context.price;
        const stop = direction === TradeDirection.LONG ? entry - stopDistance : entry + stopDistance;
        const outcome = this.sizing.sizePosition(reading.instrument, entry, stop, confidenceScore);
        if (!outcome.ok) {
          disqualify(`Sizing rejected: ${outcome.error.message}`);
          return null;
        }
        const s = outcome.sizing;
        reasoning.push(
          `Kelly ${s.kellyFraction.toFixed(3)} -> half ${s.halfKellyFraction.toFixed(3)} -> applied ${s.appliedFraction.toFixed(4)} [${s.calculationSource}], ${s.units.toFixed(2)} units risking $${s.riskAmount.toFixed(2)}`
        );
        return s;
      });
    }

    // 4. Compliance
    let compliance: TradeApproval | null = null;
    if (sizing && disqualifiers.length === 0) {
      const proposal = sizing;
      compliance = stage("compliance", () =>
        this.compliance.canOpenPosition(proposal.units, proposal.riskAmount, reading.instrument)
      );
      if (compliance) {
        if (compliance.approved) {
          reasoning.push(`Compliance approved (${compliance.riskPercentage.toFixed(2)}% risk)`);
        } else {
          disqualify(`Compliance denied: ${compliance.reason}`);
        }
      }
    }

    // 5. Decision rule
    const kellyFraction = sizing ? sizing.appliedFraction : 0;
    let action = DecisionAction.NO_TRADE;
    if (disqualifiers.length > 0) {
      reasoning.push(`NO_TRADE: ${disqualifiers.length} disqualifying condition(s)`);
    } else if (confidenceScore >= cfg.highConfidence && kellyFraction > cfg.minKellyForTrade) {
      action = DecisionAction.TRADE;
      reasoning.push(
        `TRADE: confidence ${confidenceScore.toFixed(2)} >= ${cfg.highConfidence} and Kelly ${kellyFraction.toFixed(4)} > ${cfg.minKellyForTrade}`
      );
    } else if (confidenceScore >= cfg.mediumConfidence && kellyFraction > cfg.minKellyForCautious) {
      action = DecisionAction.CAUTIOUS_TRADE;
      reasoning.push(
        `CAUTIOUS_TRADE: confidence ${confidenceScore.toFixed(2)} >= ${cfg.mediumConfidence} and Kelly ${kellyFraction.toFixed(4)} > ${cfg.minKellyForCautious}; size halved`
      );
    } else {
      reasoning.push(
        `NO_TRADE: confidence ${confidenceScore.toFixed(2)} or Kelly ${kellyFraction.toFixed(4)} below floors`
      );
    }

    const sizeFactor =
      action === DecisionAction.TRADE ? 1 : action === DecisionAction.CAUTIOUS_TRADE ? 0.5 : 0;
    const positionUnits = sizing ? sizing.units * sizeFactor : 0;
    const positionSizeFraction = sizing
      ? safeRatio(sizing.riskAmount * sizeFactor, this.sizing.getEquity())
      : 0;

    // 6. Assemble
    const decision: IDecision = Object.freeze({
      id: uuidv4(),
      action,
      confidenceScore,
      qualityScore,
      positionSizeFraction,
      positionUnits,
      stopDistance,
      targetDistance,
      reasoning: Object.freeze([...reasoning]),
      complianceApproved: compliance !== null && compliance.approved,
      kellyFraction,
      instrument: reading.instrument,
      direction,
      session: reading.sessionTag,
      readingTimestamp: reading.timestamp,
      timestamp: this.now(),
      components: Object.freeze({ cadence, sizing, compliance }),
    });

    if (action !== DecisionAction.NO_TRADE) {
      this.prunePending();
      this.pending.set(decision.id, {
        instrument: decision.instrument,
        session: decision.session,
        action,
        openedAt: decision.timestamp,
      });
      while (this.pending.size > cfg.maxPendingTrades) this.evictOldestPending();
      logger.success(
        `${action} ${direction ?? ""} ${reading.instrument}: ${positionUnits.toFixed(2)} units, confidence ${confidenceScore.toFixed(2)}`
      );
    } else {
      logger.debug(`NO_TRADE ${reading.instrument}: ${disqualifiers[0] ?? "below thresholds"}`);
    }

    if (this.publisher) {
      try {
        this.publisher.publish(decision);
      } catch (err) {
        logger.error(`Decision publish failed for ${decision.id}`, err);
      }
    }
    return decision;
  }

  /**
   * Settles a previously emitted TRADE/CAUTIOUS_TRADE. Each decision id is
   * accepted once; the outcome reaches all three stateful components.
   */
  reportOutcome(report: ITradeOutcomeReport): OutcomeAck {
    const { decisionId, pnl } = report;
    this.prunePending();
    const trade = this.pending.get(decisionId);
    if (!trade) {
      return { accepted: false, decisionId, reason: "Unknown or already settled decision" };
    }
    if (!Number.isFinite(pnl)) {
      return { accepted: false, decisionId, reason: `Invalid pnl ${pnl}` };
    }
    this.pending.delete(decisionId);

    const closedAt = report.closedAt ?? this.now();
    const result = pnl > 0 ? TradeResult.WIN : TradeResult.LOSS;
    const win = result === TradeResult.WIN;

    this.cadence.recordOutcome(result, trade.session, closedAt);
    this.sizing.recordTrade({ instrument: trade.instrument, pnl, win, timestamp: closedAt });
    this.compliance.applyTradeResult(pnl, win);

    const balance = this.compliance.getAccountSnapshot().currentBalance;
    if (balance > 0) this.sizing.updateEquity(balance);

    logger.info(`Outcome ${result} for ${trade.instrument} (${decisionId}): ${pnl.toFixed(2)}`);
    return { accepted: true, decisionId, result };
  }

  getPendingCount(): number {
    return this.pending.size;
  }

  hasPending(decisionId: string): boolean {
    return this.pending.has(decisionId);
  }

  getStatus(): IGuardianStatus {
    return {
      tradingEnabled: this.compliance.isTradingEnabled(),
      cadence: this.cadence.getStatus(),
      cadenceHealth: this.health.getStatus(),
      cadenceAnalysis: {
        streaks: this.cadence.streakAnalysis(),
        recommendation: this.cadence.thresholdRecommendation(),
      },
      sizing: {
        equity: this.sizing.getEquity(),
        metrics: this.sizing.getMetrics(),
        tradesRecorded: this.sizing.getStatistics().tradesRecorded,
      },
      account: this.compliance.getAccountSnapshot(),
      recentAlerts: this.compliance.getAlerts(RECENT_ALERT_WINDOW_MS),
      pendingTrades: this.pending.size,
      timestamp: this.now(),
    };
  }

  private evictOldestPending(): void {
    for (const [id, trade] of this.pending) {
      this.pending.delete(id);
      logger.warning(
        `Pending ${trade.action} ${trade.instrument} (${id}) evicted: more than ${this.config.maxPendingTrades} unsettled trades`
      );
      return;
    }
  }

  /** Drops unsettled trades older than the pending TTL. */
  private prunePending(): void {
    const cutoff = this.now().getTime() - this.config.pendingTtlMs;
    for (const [id, trade] of this.pending) {
      if (trade.openedAt.getTime() >= cutoff) continue;
      this.pending.delete(id);
      logger.warning(`Pending ${trade.action} ${trade.instrument} (${id}) expired without an outcome`);
    }
  }

  /**
   * Reading-only score: confluence tier, power score and filter alignment.
   * Records a disqualifying reason for each sub-score below its floor.
   */
  private scoreQuality(
    reading: ISignalReading,
    reasoning: string[],
    disqualify: (reason: string) => void
  ): number {
    const cfg = this.config;
    let score = 0;

    const tierWeight = cfg.tierWeights[reading.confluenceTier];
    if (reading.confluenceTier === ConfluenceTier.L1) {
      disqualify("Confluence at lowest tier (L1)");
    } else {
      score += tierWeight;
      reasoning.push(`Confluence ${reading.confluenceTier}: +${tierWeight}`);
    }

    const power = reading.powerScore;
    if (power < cfg.minPowerScore) {
      disqualify(`Power score ${power} below minimum ${cfg.minPowerScore}`);
    } else if (power >= cfg.strongPowerScore) {
      score += cfg.strongPowerWeight;
      reasoning.push(`Strong power score ${power}: +${cfg.strongPowerWeight}`);
    } else if (power >= cfg.moderatePowerScore) {
      score += cfg.moderatePowerWeight;
      reasoning.push(`Moderate power score ${power}: +${cfg.moderatePowerWeight}`);
    } else {
      reasoning.push(`Weak power score ${power}: no contribution`);
    }

    switch (reading.secondaryFilterState) {
      case FilterState.ALIGNED:
        score += cfg.filterAlignedWeight;
        reasoning.push(`Secondary filter aligned: +${cfg.filterAlignedWeight}`);
        break;
      case FilterState.OPPOSED:
        disqualify("Secondary filter opposed");
        break;
      case FilterState.NEUTRAL:
        reasoning.push("Secondary filter neutral");
        break;
    }

    if (reading.directionalColor === DirectionalColor.NEUTRAL) {
      disqualify("Directional color NEUTRAL gives no trade direction");
    } else {
      reasoning.push(`Direction ${reading.directionalColor} -> ${directionFor(reading.directionalColor)}`);
    }

    return clamp(score, 0, 1);
  }
}
