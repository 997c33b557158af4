import { z } from "zod";
import { IMarketContext } from "../types/signal.types";
import { InvalidInputError } from "../utils/errors";

const MarketUpdateSchema = z.object({
  instrument: z.string().min(1),
  price: z.number().positive().finite(),
  atr: z.number().positive().finite(),
});

/**
 * Latest price and ATR per instrument, supplied from outside the decision
 * core (configuration seed, execution-side updates).
 */
export class MarketContextProvider {
  private contexts = new Map<string, IMarketContext>();

  constructor(
    seed: { instrument: string; price: number; atr: number }[] = [],
    private readonly now: () => Date = () => new Date()
  ) {
    for (const entry of seed) this.update(entry);
  }

  update(raw: unknown): IMarketContext {
    const result = MarketUpdateSchema.safeParse(raw);
    if (!result.success) {
      throw new InvalidInputError(
        `Rejected market update: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`
      );
    }
    const context: IMarketContext = { ...result.data, updatedAt: this.now() };
    this.contexts.set(context.instrument, context);
    return { ...context };
  }

  get(instrument: string): IMarketContext | null {
    const context = this.contexts.get(instrument);
    return context ? { ...context } : null;
  }

  instruments(): string[] {
    return [...this.contexts.keys()];
  }
}
