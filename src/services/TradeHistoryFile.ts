import fs from "fs";
import path from "path";
import { z } from "zod";
import { ITradeHistorySnapshot } from "../types/risk.types";
import { InvalidInputError } from "../utils/errors";

const SnapshotSchema = z.object({
  exportedAt: z.string(),
  equity: z.number().positive().finite(),
  trades: z.array(
    z.object({
      instrument: z.string().min(1),
      pnl: z.number().finite(),
      win: z.boolean(),
      timestamp: z.string(),
    })
  ),
});

/** Reads a trade-history snapshot. A missing file means no history yet. */
export function loadTradeHistory(filePath: string): ITradeHistorySnapshot | null {
  if (!fs.existsSync(filePath)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new InvalidInputError(
      `Unreadable trade history ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = SnapshotSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidInputError(
      `Invalid trade history ${filePath}: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`
    );
  }
  return result.data;
}

/** Writes through a temporary file so a crash never leaves half a snapshot. */
export async function saveTradeHistory(filePath: string, snapshot: ITradeHistorySnapshot): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp`;
  await fs.promises.writeFile(tmp, JSON.stringify(snapshot, null, 2), "utf8");
  await fs.promises.rename(tmp, filePath);
}
