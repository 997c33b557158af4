import { DEFAULT_GUARDIAN_CONFIG, SizingConfig } from "../config/guardianConfig";
import {
  CalculationSource,
  IKellyMetrics,
  ISizingResult,
  ITradeHistorySnapshot,
  ITradeHistorySummary,
  ITradeOutcome,
  SizingOutcome,
} from "../types/risk.types";
import { InsufficientDataError, InvalidInputError, InvalidStopError } from "../utils/errors";
import { logger } from "../utils/logger";
import { clamp, mean, safeRatio, sum } from "../utils/mathUtils";

export interface ISizingStatistics {
  calculations: number;
  tradesRecorded: number;
  instrumentsTracked: number;
  equity: number;
  kellyReady: boolean;
}

/**
 * Sizes positions from the Kelly criterion over a rolling window of settled
 * trades, kept globally and per instrument. Statistics are recomputed on
 * every recorded trade so sizing requests only read cached values.
 */
export class KellyEngine {
  private globalWindow: ITradeOutcome[] = [];
  private instrumentWindows = new Map<string, ITradeOutcome[]>();
  private globalMetrics: IKellyMetrics | null = null;
  private instrumentMetrics = new Map<string, IKellyMetrics>();
  private equity: number;
  private calculations = 0;

  constructor(
    private readonly config: SizingConfig = DEFAULT_GUARDIAN_CONFIG.sizing,
    private readonly now: () => Date = () => new Date()
  ) {
    this.equity = config.initialEquity;
  }

  recordTrade(record: ITradeOutcome): void {
    if (!record.instrument) {
      throw new InvalidInputError("Trade record is missing its instrument");
    }
    if (!Number.isFinite(record.pnl)) {
      throw new InvalidInputError(`Trade pnl must be finite, got ${record.pnl}`);
    }
    const trade: ITradeOutcome = { ...record };

    this.append(this.globalWindow, trade);
    let window = this.instrumentWindows.get(trade.instrument);
    if (!window) {
      window = [];
      this.instrumentWindows.set(trade.instrument, window);
    }
    this.append(window, trade);

    this.globalMetrics = this.computeMetrics(this.globalWindow);
    this.instrumentMetrics.set(trade.instrument, this.computeMetrics(window));
  }

  sizePosition(
    instrument: string,
    entryPrice: number,
    stopPrice: number,
    signalStrength: number
  ): SizingOutcome {
    if (!Number.isFinite(entryPrice) || entryPrice <= 0) {
      return { ok: false, error: new InvalidInputError(`Entry price must be positive, got ${entryPrice}`) };
    }
    if (!Number.isFinite(stopPrice)) {
      return { ok: false, error: new InvalidInputError(`Stop price must be finite, got ${stopPrice}`) };
    }
    if (!Number.isFinite(signalStrength) || signalStrength < 0 || signalStrength > 1) {
      return { ok: false, error: new InvalidInputError(`Signal strength must lie in [0, 1], got ${signalStrength}`) };
    }

    const riskPerUnit = Math.abs(entryPrice - stopPrice);
    if (riskPerUnit <= 0) {
      return { ok: false, error: new InvalidStopError(entryPrice, stopPrice) };
    }

    this.calculations++;
    const { metrics, source } = this.selectMetrics(instrument);
    const maxPositionValue = this.equity * this.config.maxPositionPercentage;
    const maxUnits = maxPositionValue / entryPrice;

    let appliedFraction = 0;
    let rawUnits: number;
    if (source === "default") {
      rawUnits = (this.equity * this.config.defaultRiskFraction) / riskPerUnit;
    } else {
      appliedFraction = metrics.halfKellyFraction * signalStrength;
      rawUnits = (this.equity * appliedFraction) / riskPerUnit;
    }

    const units = Math.min(rawUnits, maxUnits);
    const riskAmount = units * riskPerUnit;

    const sizing: ISizingResult = {
      instrument,
      units,
      positionValue: units * entryPrice,
      riskPerUnit,
      riskAmount,
      riskPercentage: safeRatio(riskAmount, this.equity) * 100,
      kellyFraction: source === "default" ? 0 : metrics.kellyFraction,
      halfKellyFraction: source === "default" ? 0 : metrics.halfKellyFraction,
      appliedFraction,
      winRate: metrics.winRate,
      payoffRatio: metrics.payoffRatio,
      confidence: source === "default" ? 0 : metrics.confidenceLevel,
      signalStrength,
      maxPositionValue,
      calculationSource: source,
    };

    logger.debug(
      `Sizing ${instrument} [${source}]: ${units.toFixed(2)} units, risk $${riskAmount.toFixed(2)} (${sizing.riskPercentage.toFixed(2)}%)`
    );
    return { ok: true, sizing };
  }

  updateEquity(newEquity: number): void {
    if (!Number.isFinite(newEquity) || newEquity <= 0) {
      throw new InvalidInputError(`Equity must be positive, got ${newEquity}`);
    }
    this.equity = newEquity;
  }

  getEquity(): number {
    return this.equity;
  }

  getMetrics(instrument?: string): IKellyMetrics | null {
    const metrics = instrument ? this.instrumentMetrics.get(instrument) : this.globalMetrics;
    return metrics ? { ...metrics } : null;
  }

  getWindow(instrument?: string): ITradeOutcome[] {
    const window = instrument ? this.instrumentWindows.get(instrument) ?? [] : this.globalWindow;
    return window.map((t) => ({ ...t }));
  }

  getHistorySummary(): ITradeHistorySummary {
    const trades = this.globalWindow;
    const wins = trades.filter((t) => t.win).length;
    const totalPnl = sum(trades.map((t) => t.pnl));
    return {
      totalTrades: trades.length,
      wins,
      losses: trades.length - wins,
      winRate: safeRatio(wins, trades.length),
      totalPnl,
      avgPnl: safeRatio(totalPnl, trades.length),
      instruments: [...this.instrumentWindows.keys()].sort(),
      firstTradeAt: trades.length > 0 ? trades[0].timestamp : null,
      lastTradeAt: trades.length > 0 ? trades[trades.length - 1].timestamp : null,
    };
  }

  getStatistics(): ISizingStatistics {
    return {
      calculations: this.calculations,
      tradesRecorded: this.globalWindow.length,
      instrumentsTracked: this.instrumentWindows.size,
      equity: this.equity,
      kellyReady: this.globalWindow.length >= this.config.minTradesForKelly,
    };
  }

  exportHistory(): ITradeHistorySnapshot {
    return {
      exportedAt: this.now().toISOString(),
      equity: this.equity,
      trades: this.globalWindow.map((t) => ({
        instrument: t.instrument,
        pnl: t.pnl,
        win: t.win,
        timestamp: t.timestamp.toISOString(),
      })),
    };
  }

  /** Replaces the current windows with the snapshot's trades. Returns the count replayed. */
  importHistory(snapshot: ITradeHistorySnapshot): number {
    const trades = snapshot.trades.map((t) => {
      const timestamp = new Date(t.timestamp);
      if (Number.isNaN(timestamp.getTime())) {
        throw new InvalidInputError(`Invalid trade timestamp "${t.timestamp}"`);
      }
      return { instrument: t.instrument, pnl: t.pnl, win: t.win, timestamp };
    });
    this.updateEquity(snapshot.equity);

    this.globalWindow = [];
    this.instrumentWindows.clear();
    this.globalMetrics = null;
    this.instrumentMetrics.clear();
    for (const trade of trades) this.recordTrade(trade);

    logger.info(`Imported ${trades.length} trades (equity $${snapshot.equity.toFixed(2)})`);
    return trades.length;
  }

  /**
   * Most specific statistics with enough samples and a defined payoff
   * ratio: the instrument's own, then global, then the fixed-risk default.
   */
  private selectMetrics(instrument: string): { metrics: IKellyMetrics; source: CalculationSource } {
    for (const [source, metrics] of [
      ["instrument", this.instrumentMetrics.get(instrument)],
      ["global", this.globalMetrics],
    ] as const) {
      if (!metrics) continue;
      if (metrics.avgLoss === 0) {
        logger.debug(`No ${source} Kelly for ${instrument}: payoff ratio undefined without losses`);
        continue;
      }
      const shortfall = this.sampleShortfall(metrics);
      if (!shortfall) return { metrics, source };
      logger.debug(`No ${source} Kelly for ${instrument}: ${shortfall.message}`);
    }
    return { metrics: this.globalMetrics ?? this.computeMetrics([]), source: "default" };
  }

  private sampleShortfall(metrics: IKellyMetrics): InsufficientDataError | null {
    if (metrics.sampleSize >= this.config.minTradesForKelly) return null;
    return new InsufficientDataError(metrics.sampleSize, this.config.minTradesForKelly);
  }

  private append(window: ITradeOutcome[], trade: ITradeOutcome): void {
    window.push(trade);
    while (window.length > this.config.historySize) window.shift();
  }

  private computeMetrics(window: ITradeOutcome[]): IKellyMetrics {
    const wins = window.filter((t) => t.win).map((t) => t.pnl);
    const losses = window.filter((t) => !t.win).map((t) => Math.abs(t.pnl));

    const winRate = safeRatio(wins.length, window.length);
    const avgWin = mean(wins);
    const avgLoss = mean(losses);
    // No recorded losses leaves the payoff undefined; treated as zero edge
    const payoffRatio = safeRatio(avgWin, avgLoss);

    const lossRate = 1 - winRate;
    const rawKelly =
      payoffRatio > 0 && lossRate > 0 ? (payoffRatio * winRate - lossRate) / payoffRatio : 0;
    const kellyFraction = clamp(rawKelly, 0, this.config.maxKellyFraction);

    const recent = window.slice(-this.config.recentWindow);
    const recentWinRate = safeRatio(recent.filter((t) => t.win).length, recent.length);

    return {
      sampleSize: window.length,
      winRate,
      avgWin,
      avgLoss,
      payoffRatio,
      kellyFraction,
      halfKellyFraction: kellyFraction * this.config.kellyMultiplier,
      recentWinRate,
      confidenceLevel: this.confidenceFor(window.length, winRate, recentWinRate),
      updatedAt: this.now(),
    };
  }

  private confidenceFor(sampleSize: number, winRate: number, recentWinRate: number): number {
    if (sampleSize < this.config.minTradesForKelly) return 0;

    let base = 0.9;
    if (sampleSize < 50) base = 0.6;
    else if (sampleSize < 100) base = 0.8;

    const excess = Math.max(0, Math.abs(recentWinRate - winRate) - this.config.divergenceTolerance);
    return clamp(base * (1 - excess * this.config.divergencePenalty), 0, 1);
  }
}
