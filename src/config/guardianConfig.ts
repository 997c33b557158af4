import fs from "fs";
import cron from "node-cron";
import { z } from "zod";
import { ruleTableIssues } from "../engine/complianceRules";
import { ComplianceMetric } from "../types/risk.types";
import { ConfigValidationError } from "../utils/errors";
import {
  isClockTime,
  isValidTimeZone,
  parseClockTime,
} from "../utils/timeUtils";

const unit = z.number().min(0).max(1);
const fraction = z.number().gt(0).max(1);
const clockTime = z.string().refine(isClockTime, { message: "expected HH:MM" });
const timeZone = z
  .string()
  .refine(isValidTimeZone, { message: "unknown time zone" });
const cronExpression = z
  .string()
  .refine((expr) => cron.validate(expr), { message: "invalid cron expression" });

const ClockWindowSchema = z.object({ start: clockTime, end: clockTime });

const CadenceSchema = z.object({
  thresholds: z
    .object({
      MORNING: z.number().int().min(1).default(2),
      AFTERNOON: z.number().int().min(1).default(3),
      // Falls back to AFTERNOON when omitted
      OVERNIGHT: z.number().int().min(1).optional(),
    })
    .default({}),
  morningStart: clockTime.default("09:30"),
  morningEnd: clockTime.default("12:00"),
  afternoonEnd: clockTime.default("16:00"),
  timeZone: timeZone.default("America/New_York"),
  historySize: z.number().int().min(10).max(100_000).default(1000),
  lowPowerThreshold: z.number().min(0).default(30),
  healthWindow: z.number().int().min(1).default(30),
  healthMinReadings: z.number().int().min(1).default(10),
  criticalWindows: z.array(ClockWindowSchema).default([
    { start: "01:30", end: "02:30" },
    { start: "14:30", end: "15:30" },
  ]),
});

const SizingSchema = z.object({
  historySize: z.number().int().min(1).max(10_000).default(100),
  minTradesForKelly: z.number().int().min(1).default(20),
  kellyMultiplier: fraction.default(0.5),
  maxKellyFraction: z.number().gt(0).max(0.25).default(0.25),
  maxPositionPercentage: fraction.default(0.05),
  defaultRiskFraction: fraction.default(0.01),
  initialEquity: z.number().positive().default(50_000),
  recentWindow: z.number().int().min(1).default(10),
  divergenceTolerance: unit.default(0),
  divergencePenalty: z.number().min(0).max(10).default(1),
});

const RuleSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  metric: z.nativeEnum(ComplianceMetric),
  hardLimit: z.number().finite(),
  warningThreshold: z.number().finite(),
  criticalThreshold: z.number().finite(),
  enabled: z.boolean().default(true),
  autoStopOnViolation: z.boolean().default(false),
});

const ComplianceSchema = z.object({
  accountSize: z.number().positive().default(50_000),
  maxLossPercentage: fraction.default(0.08),
  dailyLossPercentage: fraction.default(0.05),
  trailingDrawdownPercentage: fraction.default(0.05),
  maxPositionRiskPercentage: fraction.default(0.02),
  maxConsecutiveLosses: z.number().int().min(1).default(5),
  maxDailyTrades: z.number().int().min(1).default(50),
  warningRatio: fraction.default(0.7),
  criticalRatio: fraction.default(0.9),
  dailyResetTime: clockTime.default("17:00"),
  timeZone: timeZone.default("America/New_York"),
  // Replaces the derived table entirely when present
  rules: z.array(RuleSchema).optional(),
});

const DecisionSchema = z.object({
  powerScoreMin: z.number().int().default(0),
  powerScoreMax: z.number().int().default(100),
  minPowerScore: z.number().default(10),
  moderatePowerScore: z.number().default(40),
  strongPowerScore: z.number().default(60),
  tierWeights: z
    .object({
      L1: unit.default(0),
      L2: unit.default(0.15),
      L3: unit.default(0.3),
      L4: unit.default(0.3),
    })
    .default({}),
  strongPowerWeight: unit.default(0.3),
  moderatePowerWeight: unit.default(0.2),
  filterAlignedWeight: unit.default(0.2),
  cadenceBonus: unit.default(0.3),
  cadenceMissPenalty: unit.default(0),
  highConfidence: unit.default(0.7),
  mediumConfidence: unit.default(0.5),
  minKellyForTrade: unit.default(0.02),
  minKellyForCautious: unit.default(0.01),
  stopAtrMultiplier: z.number().positive().default(1.5),
  targetAtrMultiplier: z.number().positive().default(2.0),
  // Unsettled TRADE/CAUTIOUS_TRADE decisions kept for outcome reports
  maxPendingTrades: z.number().int().min(1).default(1000),
  pendingTtlMs: z.number().int().min(1000).default(24 * 60 * 60 * 1000),
});

const PipelineSchema = z.object({
  defaultInstrument: z.string().min(1).default("NQ"),
  readIntervalMs: z.number().int().min(50).default(1000),
  readerTimeoutMs: z.number().int().min(10).default(2000),
  readerFailureThreshold: z.number().int().min(1).default(5),
  readerCooldownMs: z.number().int().min(0).default(30_000),
  complianceCron: cronExpression.default("*/30 * * * * *"),
  statusCron: cronExpression.default("*/5 * * * * *"),
});

const MarketSchema = z.object({
  instrument: z.string().min(1),
  price: z.number().positive(),
  atr: z.number().positive(),
});

const BroadcastSchema = z.object({
  maxQueuePerSubscriber: z.number().int().min(1).max(10_000).default(100),
});

export const GuardianConfigSchema = z
  .object({
    cadence: CadenceSchema.default({}),
    sizing: SizingSchema.default({}),
    compliance: ComplianceSchema.default({}),
    decision: DecisionSchema.default({}),
    pipeline: PipelineSchema.default({}),
    markets: z.array(MarketSchema).default([]),
    broadcast: BroadcastSchema.default({}),
  })
  .superRefine((cfg, ctx) => {
    const issue = (path: (string | number)[], message: string) =>
      ctx.addIssue({ code: z.ZodIssueCode.custom, path, message });

    const { cadence, compliance, decision } = cfg;

    if (
      isClockTime(cadence.morningStart) &&
      isClockTime(cadence.morningEnd) &&
      isClockTime(cadence.afternoonEnd)
    ) {
      const start = parseClockTime(cadence.morningStart);
      const mid = parseClockTime(cadence.morningEnd);
      const end = parseClockTime(cadence.afternoonEnd);
      if (!(start < mid && mid < end)) {
        issue(["cadence"], "session windows must satisfy morningStart < morningEnd < afternoonEnd");
      }
    }
    cadence.criticalWindows.forEach((w, i) => {
      if (isClockTime(w.start) && isClockTime(w.end) && parseClockTime(w.start) >= parseClockTime(w.end)) {
        issue(["cadence", "criticalWindows", i], "window start must precede its end");
      }
    });
    if (cadence.healthMinReadings > cadence.healthWindow) {
      issue(["cadence", "healthMinReadings"], "cannot exceed healthWindow");
    }

    if (compliance.warningRatio >= compliance.criticalRatio) {
      issue(["compliance", "warningRatio"], "must be below criticalRatio");
    }
    if (compliance.rules) {
      for (const message of ruleTableIssues(compliance.rules)) {
        issue(["compliance", "rules"], message);
      }
    }

    if (decision.powerScoreMin >= decision.powerScoreMax) {
      issue(["decision", "powerScoreMax"], "must exceed powerScoreMin");
    }
    if (
      decision.minPowerScore < decision.powerScoreMin ||
      decision.strongPowerScore > decision.powerScoreMax
    ) {
      issue(["decision"], "power score thresholds must lie inside the power score domain");
    }
    if (
      !(decision.minPowerScore <= decision.moderatePowerScore &&
        decision.moderatePowerScore <= decision.strongPowerScore)
    ) {
      issue(["decision"], "power score thresholds must satisfy min <= moderate <= strong");
    }
    if (decision.mediumConfidence > decision.highConfidence) {
      issue(["decision", "mediumConfidence"], "cannot exceed highConfidence");
    }
    if (decision.minKellyForCautious > decision.minKellyForTrade) {
      issue(["decision", "minKellyForCautious"], "cannot exceed minKellyForTrade");
    }
  });

export type GuardianConfigInput = z.input<typeof GuardianConfigSchema>;
export type GuardianConfig = z.output<typeof GuardianConfigSchema>;
export type CadenceConfig = GuardianConfig["cadence"];
export type SizingConfig = GuardianConfig["sizing"];
export type ComplianceConfig = GuardianConfig["compliance"];
export type DecisionConfig = GuardianConfig["decision"];
export type PipelineConfig = GuardianConfig["pipeline"];
export type BroadcastConfig = GuardianConfig["broadcast"];

/**
 * Validates a raw configuration document. Out-of-range values are rejected,
 * never clamped.
 */
export function parseGuardianConfig(raw: unknown): GuardianConfig {
  const result = GuardianConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map(
        (i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`
      )
    );
  }
  return result.data;
}

export function loadGuardianConfig(filePath?: string): GuardianConfig {
  if (!filePath) return parseGuardianConfig({});

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ConfigValidationError([
      `${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }
  return parseGuardianConfig(raw);
}

export const DEFAULT_GUARDIAN_CONFIG: GuardianConfig = parseGuardianConfig({});
