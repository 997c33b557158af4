import { CadenceConfig, DEFAULT_GUARDIAN_CONFIG } from "../config/guardianConfig";
import {
  ICadenceState,
  ICadenceStatus,
  ISessionStats,
  IStreakAnalysis,
  IThresholdRecommendation,
  TradeResult,
} from "../types/risk.types";
import { SessionTag } from "../types/signal.types";
import { logger } from "../utils/logger";
import { safeRatio } from "../utils/mathUtils";
import { parseClockTime, wallClock } from "../utils/timeUtils";

interface IOutcomeRecord {
  result: TradeResult;
  session: SessionTag;
  failuresBefore: number;
  timestamp: Date;
}

const SESSIONS: SessionTag[] = [SessionTag.MORNING, SessionTag.AFTERNOON, SessionTag.OVERNIGHT];
const MIN_OUTCOMES_FOR_ANALYSIS = 10;

function perSession<T>(fn: (session: SessionTag) => T): Record<SessionTag, T> {
  return {
    [SessionTag.MORNING]: fn(SessionTag.MORNING),
    [SessionTag.AFTERNOON]: fn(SessionTag.AFTERNOON),
    [SessionTag.OVERNIGHT]: fn(SessionTag.OVERNIGHT),
  };
}

const emptyStats = (): Record<SessionTag, ISessionStats> =>
  perSession(() => ({ signals: 0, wins: 0, losses: 0 }));

/**
 * Tracks consecutive signal failures and gates entries until the active
 * session's failure threshold has been reached. Only settled outcomes move
 * the counters; reading the gate never does.
 */
export class CadenceTracker {
  private state: ICadenceState = {
    consecutiveFailures: 0,
    consecutiveSuccesses: 0,
    currentSessionTag: null,
    lastSignalTimestamp: null,
  };
  private sessionStats = emptyStats();
  private history: IOutcomeRecord[] = [];
  private longestFailureStreak = 0;

  private readonly morningStart: number;
  private readonly morningEnd: number;
  private readonly afternoonEnd: number;

  constructor(
    private readonly config: CadenceConfig = DEFAULT_GUARDIAN_CONFIG.cadence,
    private readonly now: () => Date = () => new Date()
  ) {
    this.morningStart = parseClockTime(config.morningStart);
    this.morningEnd = parseClockTime(config.morningEnd);
    this.afternoonEnd = parseClockTime(config.afternoonEnd);
  }

  recordOutcome(outcome: TradeResult, sessionTag: SessionTag, at: Date = this.now()): void {
    this.history.push({
      result: outcome,
      session: sessionTag,
      failuresBefore: this.state.consecutiveFailures,
      timestamp: at,
    });
    if (this.history.length > this.config.historySize) {
      this.history.shift();
    }

    const stats = this.sessionStats[sessionTag];
    stats.signals++;

    if (outcome === TradeResult.WIN) {
      stats.wins++;
      this.state.consecutiveFailures = 0;
      this.state.consecutiveSuccesses++;
    } else {
      stats.losses++;
      this.state.consecutiveSuccesses = 0;
      this.state.consecutiveFailures++;
      this.longestFailureStreak = Math.max(this.longestFailureStreak, this.state.consecutiveFailures);
    }

    this.state.currentSessionTag = sessionTag;
    this.state.lastSignalTimestamp = at;

    logger.debug(
      `Cadence ${outcome} (${sessionTag}) failures=${this.state.consecutiveFailures} successes=${this.state.consecutiveSuccesses}`
    );
  }

  threshold(sessionTag: SessionTag): number {
    const { thresholds } = this.config;
    switch (sessionTag) {
      case SessionTag.MORNING:
        return thresholds.MORNING;
      case SessionTag.AFTERNOON:
        return thresholds.AFTERNOON;
      case SessionTag.OVERNIGHT:
        return thresholds.OVERNIGHT ?? thresholds.AFTERNOON;
    }
  }

  thresholdMet(sessionTag: SessionTag): boolean {
    return this.state.consecutiveFailures >= this.threshold(sessionTag);
  }

  currentSession(now: Date = this.now()): SessionTag {
    const { minutesOfDay } = wallClock(now, this.config.timeZone);
    if (minutesOfDay >= this.morningStart && minutesOfDay < this.morningEnd) {
      return SessionTag.MORNING;
    }
    if (minutesOfDay >= this.morningEnd && minutesOfDay < this.afternoonEnd) {
      return SessionTag.AFTERNOON;
    }
    return SessionTag.OVERNIGHT;
  }

  /** Win rate for one session, or across all sessions when omitted. */
  winRate(sessionTag?: SessionTag): number {
    if (sessionTag) {
      const { wins, losses } = this.sessionStats[sessionTag];
      return safeRatio(wins, wins + losses);
    }
    let wins = 0;
    let total = 0;
    for (const s of SESSIONS) {
      wins += this.sessionStats[s].wins;
      total += this.sessionStats[s].wins + this.sessionStats[s].losses;
    }
    return safeRatio(wins, total);
  }

  getState(): ICadenceState {
    return { ...this.state };
  }

  getStatus(now: Date = this.now()): ICadenceStatus {
    const activeSession = this.currentSession(now);
    return {
      ...this.getState(),
      activeSession,
      thresholds: perSession((s) => this.threshold(s)),
      thresholdMet: this.thresholdMet(activeSession),
      sessionStats: perSession((s) => ({ ...this.sessionStats[s] })),
      sessionWinRates: perSession((s) => this.winRate(s)),
      totalOutcomes: this.history.length,
    };
  }

  resetCadence(): void {
    this.state.consecutiveFailures = 0;
    this.state.consecutiveSuccesses = 0;
    logger.info("Cadence counters reset");
  }

  resetSessionStats(): void {
    this.sessionStats = emptyStats();
    logger.info("Cadence session statistics reset");
  }

  /**
   * How outcomes fared once a session's failure streak had reached its
   * threshold, over the retained outcome history.
   */
  streakAnalysis(): IStreakAnalysis {
    const afterThreshold = this.history.filter(
      (r) => r.failuresBefore >= this.threshold(r.session)
    );
    const winsAfterThreshold = afterThreshold.filter((r) => r.result === TradeResult.WIN);
    const successRate = safeRatio(winsAfterThreshold.length, afterThreshold.length);

    return {
      insufficientData: this.history.length < MIN_OUTCOMES_FOR_ANALYSIS,
      thresholdSignals: afterThreshold.length,
      successRateAfterThreshold: successRate,
      averageFailuresBeforeWin: safeRatio(
        winsAfterThreshold.reduce((acc, r) => acc + r.failuresBefore, 0),
        winsAfterThreshold.length
      ),
      maxConsecutiveFailures: this.longestFailureStreak,
      effective: successRate > 0.6,
    };
  }

  /** Advisory only; thresholds are never changed automatically. */
  thresholdRecommendation(): IThresholdRecommendation {
    const current = perSession((s) => this.threshold(s));
    const hold = (reason: string): IThresholdRecommendation => ({
      adjust: false,
      reason,
      current,
      recommended: { ...current },
    });

    const analysis = this.streakAnalysis();
    if (analysis.insufficientData) return hold("Insufficient data");
    if (analysis.thresholdSignals === 0) return hold("No outcomes recorded after a met threshold");

    const rate = analysis.successRateAfterThreshold;
    if (rate < 0.5) {
      return {
        adjust: true,
        reason: "Low success rate after threshold: increase thresholds",
        current,
        recommended: {
          [SessionTag.MORNING]: Math.min(current.MORNING + 1, 5),
          [SessionTag.AFTERNOON]: Math.min(current.AFTERNOON + 1, 6),
          [SessionTag.OVERNIGHT]: Math.min(current.OVERNIGHT + 1, 6),
        },
      };
    }
    if (rate > 0.8) {
      return {
        adjust: true,
        reason: "High success rate after threshold: decrease thresholds",
        current,
        recommended: {
          [SessionTag.MORNING]: Math.max(current.MORNING - 1, 1),
          [SessionTag.AFTERNOON]: Math.max(current.AFTERNOON - 1, 2),
          [SessionTag.OVERNIGHT]: Math.max(current.OVERNIGHT - 1, 2),
        },
      };
    }
    return hold("Success rate after threshold within range");
  }
}
