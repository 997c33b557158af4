import { DEFAULT_GUARDIAN_CONFIG, GuardianConfigInput, parseGuardianConfig } from "../../config/guardianConfig";
import {
  ConfluenceTier,
  DirectionalColor,
  FilterState,
  IMarketContext,
  ISignalReading,
  SessionTag,
} from "../../types/signal.types";
import { KellyEngine } from "../KellyEngine";

// 10:00 New York time, a Thursday in January (no DST)
export const MORNING_UTC = new Date("2026-01-15T15:00:00Z");

export function config(overrides: GuardianConfigInput = {}) {
  return parseGuardianConfig(overrides);
}

export const DEFAULTS = DEFAULT_GUARDIAN_CONFIG;

export function reading(overrides: Partial<ISignalReading> = {}): ISignalReading {
  return {
    timestamp: MORNING_UTC,
    instrument: "NQ",
    powerScore: 80,
    confluenceTier: ConfluenceTier.L4,
    directionalColor: DirectionalColor.GREEN,
    secondaryFilterState: FilterState.ALIGNED,
    sessionTag: SessionTag.MORNING,
    ...overrides,
  };
}

export function market(overrides: Partial<IMarketContext> = {}): IMarketContext {
  return { instrument: "NQ", price: 100, atr: 10, updatedAt: MORNING_UTC, ...overrides };
}

/**
 * 20 trades repeating W,W,W,L,L: 60% wins, +200 per win, -100 per loss,
 * and the last ten trades match the overall win rate.
 */
export function seedEdge(engine: KellyEngine, instrument = "NQ", count = 20): void {
  for (let i = 0; i < count; i++) {
    const win = i % 5 < 3;
    engine.recordTrade({
      instrument,
      pnl: win ? 200 : -100,
      win,
      timestamp: new Date(MORNING_UTC.getTime() - (count - i) * 60_000),
    });
  }
}
