import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { SortCriteria, type FilterCriteria, type Token } from '../shared/types.js';

export interface TokenFilter {
  apply(tokens: readonly Token[]): Token[];
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Token age in days, or null when the creation time is unknown.
 */
export function tokenAgeDays(token: Token, now: number = Date.now()): number | null {
  if (token.createdTimestamp <= 0) return null;
  return (now - token.createdTimestamp * 1000) / DAY_MS;
}

function within(value: number, min: number | undefined, max: number | undefined): boolean {
  if (min !== undefined && value < min) return false;
  if (max !== undefined && value > max) return false;
  return true;
}

/**
 * True when the token satisfies every bound present in `criteria`.
 * A token with unknown age fails any age bound.
 */
export function matchesCriteria(token: Token, criteria: FilterCriteria, now: number = Date.now()): boolean {
  if ((criteria.excludeHoneypots ?? true) && token.isHoneypot) return false;
  if (!within(token.volume, criteria.minVolume, criteria.maxVolume)) return false;
  if (!within(token.marketCap, criteria.minMarketCap, criteria.maxMarketCap)) return false;
  if (!within(token.liquidity, criteria.minLiquidity, criteria.maxLiquidity)) return false;
  if (!within(token.holderCount, criteria.minHolderCount, criteria.maxHolderCount)) return false;
  if (!within(token.priceChangePercent, criteria.minPriceChange, criteria.maxPriceChange)) return false;

  if (criteria.minAgeDays !== undefined || criteria.maxAgeDays !== undefined) {
    const age = tokenAgeDays(token, now);
    if (age === null) return false;
    if (!within(age, criteria.minAgeDays, criteria.maxAgeDays)) return false;
  }

  return true;
}

export class PassThroughFilter implements TokenFilter {
  apply(tokens: readonly Token[]): Token[] {
    return [...tokens];
  }
}

export class CriteriaFilter implements TokenFilter {
  constructor(
    readonly criteria: FilterCriteria,
    private readonly now: () => number = Date.now
  ) {}

  apply(tokens: readonly Token[]): Token[] {
    const now = this.now();
    const kept = tokens.filter(token => matchesCriteria(token, this.criteria, now));
    logger.debug(`Criteria filter kept ${kept.length}/${tokens.length} tokens`);
    return kept;
  }
}

/**
 * Field each sort criterion ranks by.
 */
export const CRITERIA_FIELDS: Readonly<Record<SortCriteria, (token: Token) => number>> = {
  [SortCriteria.OPEN_TIMESTAMP]: t => t.createdTimestamp,
  [SortCriteria.LIQUIDITY]: t => t.liquidity,
  [SortCriteria.MARKETCAP]: t => t.marketCap,
  [SortCriteria.BLUECHIP_OWNER_PERCENTAGE]: t => t.bluechipOwnerPercentage,
  [SortCriteria.HOLDER_COUNT]: t => t.holderCount,
  [SortCriteria.SMARTMONEY]: t => t.smartBuy24h,
  [SortCriteria.SWAPS]: t => t.swaps,
  [SortCriteria.VOLUME]: t => t.volume,
  [SortCriteria.PRICE]: t => t.price,
  [SortCriteria.CHANGE_1M]: t => t.priceChangePercent1m,
  [SortCriteria.CHANGE_5M]: t => t.priceChangePercent5m,
  [SortCriteria.CHANGE_1H]: t => t.priceChangePercent1h
};

export type CriteriaMinimums = Partial<Record<SortCriteria, number>>;

/**
 * Minimum value per sort criterion, e.g. `{ volume: 1_000_000, marketcap: 5_000_000 }`.
 */
export class MinimumsFilter implements TokenFilter {
  private readonly entries: Array<[SortCriteria, number]>;

  constructor(minimums: CriteriaMinimums) {
    this.entries = [];
    for (const criteria of Object.values(SortCriteria)) {
      const min = minimums[criteria];
      if (min !== undefined) this.entries.push([criteria, min]);
    }
    if (this.entries.length === 0) {
      throw new ConfigError('At least one minimum threshold must be set');
    }
  }

  apply(tokens: readonly Token[]): Token[] {
    return tokens.filter(token =>
      this.entries.every(([criteria, min]) => CRITERIA_FIELDS[criteria](token) >= min)
    );
  }
}

/**
 * Keeps the first `n` tokens. Ranking order comes from the API; nothing is re-sorted.
 */
export class TopNFilter implements TokenFilter {
  constructor(readonly n: number) {
    if (!Number.isInteger(n) || n < 0) {
      throw new ConfigError(`Top-N limit must be a non-negative integer, got ${n}`);
    }
  }

  apply(tokens: readonly Token[]): Token[] {
    return tokens.slice(0, this.n);
  }
}

export class CompositeFilter implements TokenFilter {
  constructor(readonly filters: readonly TokenFilter[]) {}

  apply(tokens: readonly Token[]): Token[] {
    let result: Token[] = [...tokens];
    for (const filter of this.filters) {
      result = filter.apply(result);
    }
    return result;
  }
}
