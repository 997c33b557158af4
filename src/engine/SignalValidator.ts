import { z } from "zod";
import { DecisionConfig, DEFAULT_GUARDIAN_CONFIG } from "../config/guardianConfig";
import {
  ConfluenceTier,
  DirectionalColor,
  FilterState,
  ISignalReading,
  SessionTag,
} from "../types/signal.types";
import { InvalidInputError } from "../utils/errors";

const timestamp = z.union([z.string(), z.number(), z.date()]).transform((value, ctx) => {
  const date = value instanceof Date ? new Date(value.getTime()) : new Date(value);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "invalid timestamp" });
    return z.NEVER;
  }
  return date;
});

function readingSchema(cfg: DecisionConfig, defaultInstrument: string) {
  return z.object({
    timestamp,
    instrument: z.string().min(1).default(defaultInstrument),
    powerScore: z.number().int().min(cfg.powerScoreMin).max(cfg.powerScoreMax),
    confluenceTier: z.nativeEnum(ConfluenceTier),
    directionalColor: z.nativeEnum(DirectionalColor),
    secondaryFilterState: z.nativeEnum(FilterState),
    sessionTag: z.nativeEnum(SessionTag),
  });
}

/**
 * Builds a frozen reading from untrusted input. Out-of-range or malformed
 * fields raise `InvalidInputError`; nothing is coerced into range.
 */
export function parseSignalReading(
  raw: unknown,
  cfg: DecisionConfig = DEFAULT_GUARDIAN_CONFIG.decision,
  defaultInstrument: string = DEFAULT_GUARDIAN_CONFIG.pipeline.defaultInstrument
): ISignalReading {
  const result = readingSchema(cfg, defaultInstrument).safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.length > 0 ? i.path.join(".") : "reading"}: ${i.message}`)
      .join("; ");
    throw new InvalidInputError(`Rejected signal reading: ${detail}`, "INVALID_READING");
  }
  return Object.freeze(result.data);
}
