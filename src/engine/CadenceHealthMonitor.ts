import { CadenceConfig, DEFAULT_GUARDIAN_CONFIG } from "../config/guardianConfig";
import {
  CadenceHealth,
  ICadenceFailureEvent,
  ICadenceHealthStatus,
} from "../types/risk.types";
import { ISignalReading } from "../types/signal.types";
import { logger } from "../utils/logger";
import { mean } from "../utils/mathUtils";
import { parseClockTime, wallClock } from "../utils/timeUtils";

const FAILURE_RATIO = 0.7;
const WARNING_CLEAR_RATIO = 1.2;
const RECOVERY_RATIO = 1.0;
const RECOVERY_RELAPSE_RATIO = 0.8;
const RECOVERY_CLEAR_RATIO = 1.5;
const MAX_FAILURE_EVENTS = 500;

/**
 * Watches the power score of every accepted reading for sustained weakness.
 * Independent of the outcome streak counters and purely informational.
 */
export class CadenceHealthMonitor {
  private state: CadenceHealth = CadenceHealth.NORMAL;
  private since: Date;
  private window: number[] = [];
  private events: ICadenceFailureEvent[] = [];
  private openEvent: ICadenceFailureEvent | null = null;
  private failures = 0;
  private recoveries = 0;
  private longestFailureMinutes = 0;
  private readonly criticalWindows: { start: number; end: number }[];

  constructor(private readonly config: CadenceConfig = DEFAULT_GUARDIAN_CONFIG.cadence) {
    this.since = new Date();
    this.criticalWindows = config.criticalWindows.map((w) => ({
      start: parseClockTime(w.start),
      end: parseClockTime(w.end),
    }));
  }

  observe(reading: ISignalReading): CadenceHealth {
    const { powerScore, timestamp } = reading;
    const low = this.config.lowPowerThreshold;

    this.window.push(powerScore);
    if (this.window.length > this.config.healthWindow) this.window.shift();
    if (this.openEvent) {
      this.openEvent.minPowerScore = Math.min(this.openEvent.minPowerScore, powerScore);
    }

    if (powerScore < low && this.inCriticalWindow(timestamp)) {
      if (this.state !== CadenceHealth.FAILURE) {
        this.enterFailure("critical_window", powerScore, timestamp);
      }
      return this.state;
    }

    if (this.window.length < this.config.healthMinReadings) return this.state;

    const avg = mean(this.window);
    switch (this.state) {
      case CadenceHealth.NORMAL:
        if (avg < low) this.transition(CadenceHealth.WARNING, timestamp, avg);
        break;
      case CadenceHealth.WARNING:
        if (avg < low * FAILURE_RATIO) {
          this.enterFailure("sustained_low", powerScore, timestamp);
        } else if (avg > low * WARNING_CLEAR_RATIO) {
          this.transition(CadenceHealth.NORMAL, timestamp, avg);
        }
        break;
      case CadenceHealth.FAILURE:
        if (avg > low * RECOVERY_RATIO) this.enterRecovery(timestamp, avg);
        break;
      case CadenceHealth.RECOVERY:
        if (avg > low * RECOVERY_CLEAR_RATIO) {
          this.transition(CadenceHealth.NORMAL, timestamp, avg);
        } else if (avg < low * RECOVERY_RELAPSE_RATIO) {
          this.transition(CadenceHealth.WARNING, timestamp, avg);
        }
        break;
    }
    return this.state;
  }

  getState(): CadenceHealth {
    return this.state;
  }

  getFailureEvents(): ICadenceFailureEvent[] {
    return this.events.map((e) => ({ ...e }));
  }

  getStatus(): ICadenceHealthStatus {
    return {
      state: this.state,
      since: this.since,
      averagePowerScore: mean(this.window),
      readingsTracked: this.window.length,
      failureEvents: this.failures,
      recoveryEvents: this.recoveries,
      longestFailureMinutes: this.longestFailureMinutes,
    };
  }

  private inCriticalWindow(at: Date): boolean {
    const { minutesOfDay } = wallClock(at, this.config.timeZone);
    return this.criticalWindows.some((w) => minutesOfDay >= w.start && minutesOfDay < w.end);
  }

  private enterFailure(kind: ICadenceFailureEvent["kind"], powerScore: number, at: Date): void {
    this.openEvent = {
      startedAt: at,
      kind,
      minPowerScore: powerScore,
      recoveredAt: null,
      durationMinutes: null,
    };
    this.events.push(this.openEvent);
    if (this.events.length > MAX_FAILURE_EVENTS) this.events.shift();
    this.failures++;
    this.transition(CadenceHealth.FAILURE, at, mean(this.window));
  }

  private enterRecovery(at: Date, avg: number): void {
    if (this.openEvent) {
      this.openEvent.recoveredAt = at;
      this.openEvent.durationMinutes = (at.getTime() - this.openEvent.startedAt.getTime()) / 60_000;
      this.longestFailureMinutes = Math.max(this.longestFailureMinutes, this.openEvent.durationMinutes);
      this.openEvent = null;
    }
    this.recoveries++;
    this.transition(CadenceHealth.RECOVERY, at, avg);
  }

  private transition(next: CadenceHealth, at: Date, avg: number): void {
    const message = `Cadence health ${this.state} -> ${next} (avg power ${avg.toFixed(1)})`;
    if (next === CadenceHealth.FAILURE) logger.warning(message);
    else logger.info(message);
    this.state = next;
    this.since = at;
  }
}
