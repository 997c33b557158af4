import { describe, it, expect } from "vitest";
import { CadenceHealth, TradeResult } from "../../types/risk.types";
import { SessionTag } from "../../types/signal.types";
import { CadenceHealthMonitor } from "../CadenceHealthMonitor";
import { CadenceTracker } from "../CadenceTracker";
import { config, DEFAULTS, MORNING_UTC, reading } from "./fixtures";

const { WIN, LOSS } = TradeResult;

function record(tracker: CadenceTracker, outcomes: TradeResult[], session = SessionTag.MORNING) {
  for (const o of outcomes) tracker.recordOutcome(o, session, MORNING_UTC);
}

describe("CadenceTracker", () => {
  describe("recordOutcome", () => {
    it("increments one streak counter and zeroes the other", () => {
      const tracker = new CadenceTracker();

      record(tracker, [LOSS, LOSS]);
      expect(tracker.getState()).toMatchObject({ consecutiveFailures: 2, consecutiveSuccesses: 0 });

      record(tracker, [WIN]);
      expect(tracker.getState()).toMatchObject({ consecutiveFailures: 0, consecutiveSuccesses: 1 });

      record(tracker, [LOSS]);
      expect(tracker.getState()).toMatchObject({ consecutiveFailures: 1, consecutiveSuccesses: 0 });
    });

    it("never leaves both counters non-zero", () => {
      const tracker = new CadenceTracker();
      const sequence = [LOSS, WIN, WIN, LOSS, LOSS, LOSS, WIN, LOSS, WIN, WIN];
      for (const o of sequence) {
        tracker.recordOutcome(o, SessionTag.AFTERNOON);
        const { consecutiveFailures, consecutiveSuccesses } = tracker.getState();
        expect(consecutiveFailures === 0 || consecutiveSuccesses === 0).toBe(true);
      }
    });

    it("stamps the session and time of the last outcome", () => {
      const tracker = new CadenceTracker();
      tracker.recordOutcome(LOSS, SessionTag.AFTERNOON, MORNING_UTC);

      const state = tracker.getState();
      expect(state.currentSessionTag).toBe(SessionTag.AFTERNOON);
      expect(state.lastSignalTimestamp).toEqual(MORNING_UTC);
    });
  });

  describe("thresholdMet", () => {
    it("uses 2 failures for MORNING and 3 for AFTERNOON by default", () => {
      const tracker = new CadenceTracker();
      record(tracker, [LOSS]);
      expect(tracker.thresholdMet(SessionTag.MORNING)).toBe(false);

      record(tracker, [LOSS]);
      expect(tracker.thresholdMet(SessionTag.MORNING)).toBe(true);
      expect(tracker.thresholdMet(SessionTag.AFTERNOON)).toBe(false);

      record(tracker, [LOSS]);
      expect(tracker.thresholdMet(SessionTag.AFTERNOON)).toBe(true);
    });

    it("falls back to the AFTERNOON threshold overnight", () => {
      const tracker = new CadenceTracker(config({ cadence: { thresholds: { AFTERNOON: 4 } } }).cadence);
      expect(tracker.threshold(SessionTag.OVERNIGHT)).toBe(4);

      const explicit = new CadenceTracker(
        config({ cadence: { thresholds: { AFTERNOON: 4, OVERNIGHT: 1 } } }).cadence
      );
      expect(explicit.threshold(SessionTag.OVERNIGHT)).toBe(1);
    });

    it("does not change state when read", () => {
      const tracker = new CadenceTracker();
      record(tracker, [LOSS, LOSS]);
      tracker.thresholdMet(SessionTag.MORNING);
      tracker.thresholdMet(SessionTag.MORNING);
      expect(tracker.getState().consecutiveFailures).toBe(2);
    });
  });

  describe("currentSession", () => {
    const tracker = new CadenceTracker();

    it("maps New York wall-clock time onto sessions", () => {
      expect(tracker.currentSession(new Date("2026-01-15T14:30:00Z"))).toBe(SessionTag.MORNING); // 09:30
      expect(tracker.currentSession(new Date("2026-01-15T16:59:00Z"))).toBe(SessionTag.MORNING); // 11:59
      expect(tracker.currentSession(new Date("2026-01-15T17:00:00Z"))).toBe(SessionTag.AFTERNOON); // 12:00
      expect(tracker.currentSession(new Date("2026-01-15T20:59:00Z"))).toBe(SessionTag.AFTERNOON); // 15:59
      expect(tracker.currentSession(new Date("2026-01-15T21:00:00Z"))).toBe(SessionTag.OVERNIGHT); // 16:00
      expect(tracker.currentSession(new Date("2026-01-15T14:29:00Z"))).toBe(SessionTag.OVERNIGHT); // 09:29
    });

    it("follows daylight saving time", () => {
      // 09:30 EDT in July is 13:30 UTC
      expect(tracker.currentSession(new Date("2026-07-15T13:30:00Z"))).toBe(SessionTag.MORNING);
    });
  });

  describe("winRate", () => {
    it("returns 0 for a session without outcomes", () => {
      expect(new CadenceTracker().winRate(SessionTag.OVERNIGHT)).toBe(0);
      expect(new CadenceTracker().winRate()).toBe(0);
    });

    it("computes per-session and overall rates", () => {
      const tracker = new CadenceTracker();
      record(tracker, [WIN, LOSS, WIN, WIN], SessionTag.MORNING);
      record(tracker, [LOSS, LOSS, LOSS, WIN], SessionTag.AFTERNOON);

      expect(tracker.winRate(SessionTag.MORNING)).toBe(0.75);
      expect(tracker.winRate(SessionTag.AFTERNOON)).toBe(0.25);
      expect(tracker.winRate()).toBe(0.5);

      const status = tracker.getStatus(MORNING_UTC);
      expect(status.sessionStats.MORNING).toEqual({ signals: 4, wins: 3, losses: 1 });
      expect(status.activeSession).toBe(SessionTag.MORNING);
      expect(status.totalOutcomes).toBe(8);
    });

    it("clears session stats without touching the streak", () => {
      const tracker = new CadenceTracker();
      record(tracker, [LOSS, LOSS]);
      tracker.resetSessionStats();

      expect(tracker.winRate()).toBe(0);
      expect(tracker.getState().consecutiveFailures).toBe(2);

      tracker.resetCadence();
      expect(tracker.getState().consecutiveFailures).toBe(0);
    });
  });

  describe("streak analysis", () => {
    it("reports insufficient data below ten outcomes", () => {
      const tracker = new CadenceTracker();
      record(tracker, [LOSS, LOSS, WIN]);
      expect(tracker.streakAnalysis().insufficientData).toBe(true);
      expect(tracker.thresholdRecommendation()).toMatchObject({ adjust: false, reason: "Insufficient data" });
    });

    it("scores outcomes recorded after the threshold was reached", () => {
      const tracker = new CadenceTracker();
      record(tracker, [LOSS, LOSS, WIN, LOSS, LOSS, LOSS, WIN, WIN, WIN, WIN, LOSS, WIN]);

      const analysis = tracker.streakAnalysis();
      expect(analysis.insufficientData).toBe(false);
      expect(analysis.thresholdSignals).toBe(3);
      expect(analysis.successRateAfterThreshold).toBeCloseTo(2 / 3);
      expect(analysis.averageFailuresBeforeWin).toBe(2.5);
      expect(analysis.maxConsecutiveFailures).toBe(3);
      expect(analysis.effective).toBe(true);

      expect(tracker.thresholdRecommendation().adjust).toBe(false);
    });

    it("recommends raising thresholds when post-threshold outcomes keep failing", () => {
      const tracker = new CadenceTracker();
      record(tracker, Array<TradeResult>(10).fill(LOSS));

      const rec = tracker.thresholdRecommendation();
      expect(rec.adjust).toBe(true);
      expect(rec.current).toEqual({ MORNING: 2, AFTERNOON: 3, OVERNIGHT: 3 });
      expect(rec.recommended).toEqual({ MORNING: 3, AFTERNOON: 4, OVERNIGHT: 4 });
      // advisory only
      expect(tracker.threshold(SessionTag.MORNING)).toBe(2);
    });

    it("recommends lowering thresholds when post-threshold outcomes win", () => {
      const tracker = new CadenceTracker();
      record(tracker, [LOSS, LOSS, WIN, LOSS, LOSS, WIN, LOSS, LOSS, WIN, WIN]);

      const rec = tracker.thresholdRecommendation();
      expect(rec.adjust).toBe(true);
      expect(rec.recommended).toEqual({ MORNING: 1, AFTERNOON: 2, OVERNIGHT: 2 });
    });
  });
});

describe("CadenceHealthMonitor", () => {
  const minute = 60_000;
  const at = (i: number) => new Date(MORNING_UTC.getTime() + i * minute);

  function feed(monitor: CadenceHealthMonitor, scores: number[], offset = 0): CadenceHealth[] {
    return scores.map((powerScore, i) => monitor.observe(reading({ powerScore, timestamp: at(offset + i) })));
  }

  it("stays NORMAL until enough readings arrive", () => {
    const monitor = new CadenceHealthMonitor(DEFAULTS.cadence);
    const states = feed(monitor, Array<number>(9).fill(5));
    expect(states.every((s) => s === CadenceHealth.NORMAL)).toBe(true);
  });

  it("walks NORMAL -> WARNING -> FAILURE -> RECOVERY -> NORMAL", () => {
    const monitor = new CadenceHealthMonitor(DEFAULTS.cadence);

    const low = feed(monitor, Array<number>(11).fill(20));
    expect(low[9]).toBe(CadenceHealth.WARNING);
    expect(low[10]).toBe(CadenceHealth.FAILURE);

    // average climbs past 30 on the third strong reading
    const strong = feed(monitor, Array<number>(8).fill(80), 11);
    expect(strong[1]).toBe(CadenceHealth.FAILURE);
    expect(strong[2]).toBe(CadenceHealth.RECOVERY);
    expect(strong[6]).toBe(CadenceHealth.RECOVERY);
    expect(strong[7]).toBe(CadenceHealth.NORMAL);

    const [event] = monitor.getFailureEvents();
    expect(event.kind).toBe("sustained_low");
    expect(event.startedAt).toEqual(at(10));
    expect(event.recoveredAt).toEqual(at(13));
    expect(event.durationMinutes).toBe(3);

    const status = monitor.getStatus();
    expect(status.failureEvents).toBe(1);
    expect(status.recoveryEvents).toBe(1);
    expect(status.longestFailureMinutes).toBe(3);
  });

  it("forces FAILURE on a weak reading inside a critical window", () => {
    const monitor = new CadenceHealthMonitor(DEFAULTS.cadence);
    // 14:45 New York
    const state = monitor.observe(reading({ powerScore: 10, timestamp: new Date("2026-01-15T19:45:00Z") }));

    expect(state).toBe(CadenceHealth.FAILURE);
    expect(monitor.getFailureEvents()[0]).toMatchObject({ kind: "critical_window", minPowerScore: 10 });
  });

  it("keeps only the most recent 500 failure events but counts them all", () => {
    const monitor = new CadenceHealthMonitor(config({ cadence: { healthWindow: 1, healthMinReadings: 1 } }).cadence);
    const inWindow = new Date("2026-01-15T19:45:00Z");

    for (let i = 0; i < 600; i++) {
      expect(monitor.observe(reading({ powerScore: 10, timestamp: inWindow }))).toBe(CadenceHealth.FAILURE);
      expect(monitor.observe(reading({ powerScore: 80, timestamp: inWindow }))).toBe(CadenceHealth.RECOVERY);
    }

    expect(monitor.getFailureEvents()).toHaveLength(500);
    expect(monitor.getStatus()).toMatchObject({ failureEvents: 600, recoveryEvents: 600, longestFailureMinutes: 0 });
  });
});
