export enum ConfluenceTier {
  L1 = "L1",
  L2 = "L2",
  L3 = "L3",
  L4 = "L4",
}

export enum DirectionalColor {
  GREEN = "GREEN",
  BLUE = "BLUE",
  RED = "RED",
  PINK = "PINK",
  NEUTRAL = "NEUTRAL",
}

export enum FilterState {
  ALIGNED = "ALIGNED",
  OPPOSED = "OPPOSED",
  NEUTRAL = "NEUTRAL",
}

export enum SessionTag {
  MORNING = "MORNING",
  AFTERNOON = "AFTERNOON",
  OVERNIGHT = "OVERNIGHT",
}

export enum TradeDirection {
  LONG = "LONG",
  SHORT = "SHORT",
}

/**
 * One validated observation from the signal reader. Built by
 * `parseSignalReading` and frozen; never mutated afterwards.
 */
export interface ISignalReading {
  readonly timestamp: Date;
  readonly instrument: string;
  readonly powerScore: number; // integer within the configured domain
  readonly confluenceTier: ConfluenceTier;
  readonly directionalColor: DirectionalColor;
  readonly secondaryFilterState: FilterState;
  readonly sessionTag: SessionTag;
}

/**
 * Volatility and price context supplied from outside the decision core.
 * `atr` is an ATR-style distance in price units.
 */
export interface IMarketContext {
  instrument: string;
  price: number;
  atr: number;
  updatedAt: Date;
}
