import { describe, it, expect } from "vitest";
import { InvalidInputError, InvalidStopError } from "../../utils/errors";
import { KellyEngine } from "../KellyEngine";
import { config, MORNING_UTC, seedEdge } from "./fixtures";

function trade(pnl: number, instrument = "NQ") {
  return { instrument, pnl, win: pnl > 0, timestamp: MORNING_UTC };
}

function sized(engine: KellyEngine, ...args: Parameters<KellyEngine["sizePosition"]>) {
  const outcome = engine.sizePosition(...args);
  if (!outcome.ok) throw outcome.error;
  return outcome.sizing;
}

describe("KellyEngine", () => {
  describe("trade window", () => {
    it("evicts the oldest trade once capacity is reached", () => {
      const engine = new KellyEngine(config({ sizing: { historySize: 5 } }).sizing);
      for (let pnl = 1; pnl <= 6; pnl++) engine.recordTrade(trade(pnl));

      const window = engine.getWindow();
      expect(window).toHaveLength(5);
      expect(window[0].pnl).toBe(2);
      expect(window[4].pnl).toBe(6);
      expect(engine.getWindow("NQ").map((t) => t.pnl)).toEqual([2, 3, 4, 5, 6]);
    });

    it("keeps a separate window per instrument", () => {
      const engine = new KellyEngine();
      engine.recordTrade(trade(50, "NQ"));
      engine.recordTrade(trade(-25, "ES"));

      expect(engine.getWindow()).toHaveLength(2);
      expect(engine.getWindow("ES").map((t) => t.pnl)).toEqual([-25]);
      expect(engine.getMetrics("ES")?.winRate).toBe(0);
      expect(engine.getMetrics("NQ")?.winRate).toBe(1);
    });

    it("rejects a non-finite pnl", () => {
      expect(() => new KellyEngine().recordTrade(trade(Number.NaN))).toThrow(InvalidInputError);
    });
  });

  describe("Kelly fraction", () => {
    it("caps a large edge at 0.25 and halves it", () => {
      const engine = new KellyEngine();
      seedEdge(engine);

      const metrics = engine.getMetrics();
      expect(metrics?.winRate).toBe(0.6);
      expect(metrics?.payoffRatio).toBe(2);
      expect(metrics?.kellyFraction).toBe(0.25);
      expect(metrics?.halfKellyFraction).toBe(0.125);
    });

    it("is 0 when no losses have been recorded", () => {
      const engine = new KellyEngine();
      for (let i = 0; i < 20; i++) engine.recordTrade(trade(100));

      const metrics = engine.getMetrics();
      expect(metrics?.winRate).toBe(1);
      expect(metrics?.payoffRatio).toBe(0);
      expect(metrics?.kellyFraction).toBe(0);
    });

    it("sizes a loss-free history on the fixed-risk default", () => {
      const engine = new KellyEngine();
      for (let i = 0; i < 20; i++) engine.recordTrade(trade(100));

      const sizing = sized(engine, "NQ", 100, 50, 1);
      expect(sizing.calculationSource).toBe("default");
      expect(sizing.units).toBe(10);
      expect(sizing.riskAmount).toBe(500);
      expect(sizing.kellyFraction).toBe(0);
      expect(sizing.appliedFraction).toBe(0);
    });

    it("is 0 when every trade lost", () => {
      const engine = new KellyEngine();
      for (let i = 0; i < 20; i++) engine.recordTrade(trade(-100));
      expect(engine.getMetrics()?.kellyFraction).toBe(0);
    });

    it("clamps a negative edge to 0", () => {
      const engine = new KellyEngine();
      // 25% wins at 1:1 payoff
      for (let i = 0; i < 20; i++) engine.recordTrade(trade(i % 4 === 0 ? 100 : -100));
      expect(engine.getMetrics()?.kellyFraction).toBe(0);
    });

    it("uses the uncapped formula below the cap", () => {
      const engine = new KellyEngine();
      // 55% wins at 1:1 payoff -> (0.55 - 0.45) / 1 = 0.1
      for (let i = 0; i < 20; i++) engine.recordTrade(trade(i < 11 ? 100 : -100));
      expect(engine.getMetrics()?.kellyFraction).toBeCloseTo(0.1);
    });
  });

  describe("sizePosition", () => {
    it("fails with InvalidStopError when entry equals stop", () => {
      const outcome = new KellyEngine().sizePosition("NQ", 100, 100, 1);
      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(InvalidStopError);
        expect(outcome.error.code).toBe("INVALID_STOP");
      }
    });

    it("rejects a signal strength outside [0, 1]", () => {
      const outcome = new KellyEngine().sizePosition("NQ", 100, 90, 1.5);
      expect(outcome.ok).toBe(false);
    });

    it("falls back to 1% fixed risk without enough history", () => {
      const engine = new KellyEngine();
      const sizing = sized(engine, "NQ", 100, 50, 1);

      expect(sizing.calculationSource).toBe("default");
      expect(sizing.riskPerUnit).toBe(50);
      expect(sizing.units).toBe(10);
      expect(sizing.riskAmount).toBe(500);
      expect(sizing.riskPercentage).toBe(1);
      expect(sizing.kellyFraction).toBe(0);
      expect(sizing.appliedFraction).toBe(0);
      expect(sizing.confidence).toBe(0);
    });

    it("caps position value at 5% of equity", () => {
      const engine = new KellyEngine();
      // 1% risk would buy 100 units; 5% of 50k only buys 25 at 100
      const sizing = sized(engine, "NQ", 100, 95, 1);

      expect(sizing.units).toBe(25);
      expect(sizing.positionValue).toBe(2500);
      expect(sizing.maxPositionValue).toBe(2500);
      expect(sizing.riskAmount).toBe(125);
    });

    it("falls back to global statistics when the instrument has too few trades", () => {
      const engine = new KellyEngine();
      seedEdge(engine, "ES");

      const sizing = sized(engine, "NQ", 100, 50, 0.8);
      expect(sizing.calculationSource).toBe("global");
      expect(sizing.appliedFraction).toBeCloseTo(0.1);
      expect(sizing.units).toBeCloseTo(25);
      expect(sizing.riskAmount).toBeCloseTo(1250);
      expect(sizing.riskPercentage).toBeCloseTo(2.5);
      expect(sizing.confidence).toBe(0.6);
    });

    it("prefers the instrument's own statistics", () => {
      const engine = new KellyEngine();
      seedEdge(engine, "NQ");
      expect(sized(engine, "NQ", 100, 99, 1).calculationSource).toBe("instrument");
    });

    it("scales the raw Kelly size by signal strength", () => {
      const engine = new KellyEngine(config({ sizing: { maxPositionPercentage: 1 } }).sizing);
      seedEdge(engine);

      // 50k * 0.125 * 0.4 / 100 = 25 units
      const sizing = sized(engine, "NQ", 1000, 900, 0.4);
      expect(sizing.appliedFraction).toBeCloseTo(0.05);
      expect(sizing.units).toBeCloseTo(25);
      expect(sizing.riskAmount).toBeCloseTo(2500);
    });
  });

  describe("confidence", () => {
    it("penalises a recent win rate that diverges from the overall rate", () => {
      const engine = new KellyEngine();
      // 12 wins then 8 losses: overall 0.6, last ten 0.2
      for (let i = 0; i < 20; i++) engine.recordTrade(trade(i < 12 ? 200 : -100));

      const metrics = engine.getMetrics();
      expect(metrics?.recentWinRate).toBeCloseTo(0.2);
      expect(metrics?.confidenceLevel).toBeCloseTo(0.6 * (1 - 0.4));
    });

    it("ignores divergence inside the configured tolerance", () => {
      const engine = new KellyEngine(config({ sizing: { divergenceTolerance: 0.5 } }).sizing);
      for (let i = 0; i < 20; i++) engine.recordTrade(trade(i < 12 ? 200 : -100));
      expect(engine.getMetrics()?.confidenceLevel).toBe(0.6);
    });

    it("rises in bands with sample size", () => {
      const engine = new KellyEngine();
      seedEdge(engine, "NQ", 50);
      expect(engine.getMetrics()?.confidenceLevel).toBe(0.8);

      seedEdge(engine, "NQ", 50);
      expect(engine.getMetrics()?.confidenceLevel).toBe(0.9);
    });
  });

  describe("equity and history", () => {
    it("rejects non-positive equity", () => {
      const engine = new KellyEngine();
      expect(() => engine.updateEquity(0)).toThrow(InvalidInputError);
      expect(engine.getEquity()).toBe(50_000);

      engine.updateEquity(80_000);
      expect(sized(engine, "NQ", 100, 50, 1).riskAmount).toBe(800);
    });

    it("summarises the global window", () => {
      const engine = new KellyEngine();
      engine.recordTrade(trade(300, "NQ"));
      engine.recordTrade(trade(-100, "ES"));

      expect(engine.getHistorySummary()).toEqual({
        totalTrades: 2,
        wins: 1,
        losses: 1,
        winRate: 0.5,
        totalPnl: 200,
        avgPnl: 100,
        instruments: ["ES", "NQ"],
        firstTradeAt: MORNING_UTC,
        lastTradeAt: MORNING_UTC,
      });
    });

    it("replaces its windows from an exported snapshot", () => {
      const source = new KellyEngine();
      seedEdge(source);
      source.updateEquity(60_000);
      const snapshot = source.exportHistory();

      const target = new KellyEngine();
      target.recordTrade(trade(999, "CL"));
      expect(target.importHistory(snapshot)).toBe(20);

      expect(target.getEquity()).toBe(60_000);
      expect(target.getWindow()).toHaveLength(20);
      expect(target.getWindow("CL")).toHaveLength(0);
      expect(target.getMetrics()?.kellyFraction).toBe(0.25);
      expect(target.getStatistics()).toMatchObject({ tradesRecorded: 20, instrumentsTracked: 1, kellyReady: true });
    });
  });
});
