export const Chain = {
  ETHEREUM: 'eth',
  BINANCE_SMART_CHAIN: 'bsc',
  BASE: 'base',
  SOLANA: 'sol',
  TRON: 'tron',
} as const;
export type Chain = (typeof Chain)[keyof typeof Chain];

export const TimePeriod = {
  ONE_MINUTE: '1m',
  FIVE_MINUTES: '5m',
  ONE_HOUR: '1h',
  SIX_HOURS: '6h',
  TWENTY_FOUR_HOURS: '24h',
} as const;
export type TimePeriod = (typeof TimePeriod)[keyof typeof TimePeriod];

export const SortCriteria = {
  OPEN_TIMESTAMP: 'open_timestamp',
  LIQUIDITY: 'liquidity',
  MARKETCAP: 'marketcap',
  BLUECHIP_OWNER_PERCENTAGE: 'bluechip_owner_percentage',
  HOLDER_COUNT: 'holder_count',
  SMARTMONEY: 'smartmoney',
  SWAPS: 'swaps',
  VOLUME: 'volume',
  PRICE: 'price',
  CHANGE_1M: 'change1m',
  CHANGE_5M: 'change5m',
  CHANGE_1H: 'change1h',
} as const;
export type SortCriteria = (typeof SortCriteria)[keyof typeof SortCriteria];

export const SortDirection = {
  ASCENDING: 'asc',
  DESCENDING: 'desc',
} as const;
export type SortDirection = (typeof SortDirection)[keyof typeof SortDirection];

export interface Token {
  readonly id: number;
  readonly chain: string;
  readonly address: string;
  readonly symbol: string;
  readonly price: number;
  readonly volume: number;
  readonly liquidity: number;
  readonly marketCap: number;
  readonly holderCount: number;
  readonly swaps: number;
  readonly priceChangePercent: number; // 24h
  readonly priceChangePercent1m: number;
  readonly priceChangePercent5m: number;
  readonly priceChangePercent1h: number;
  readonly smartBuy24h: number;
  readonly smartSell24h: number;
  readonly isHoneypot: boolean;
  readonly isOpenSource: boolean; // verified contract
  readonly renounced: boolean;
  readonly bluechipOwnerPercentage: number;
  readonly createdTimestamp: number; // unix seconds, 0 when unknown
  readonly logo?: string;
  readonly buyTax?: string;
  readonly sellTax?: string;
  readonly totalSupply?: number;
  readonly buys?: number;
  readonly sells?: number;
  readonly sniperCount?: number;
  readonly lockInfo?: Readonly<Record<string, unknown>>;
}

/**
 * Client-side bounds. A bound is active whenever it is defined, including zero.
 */
export interface FilterCriteria {
  minVolume?: number;
  maxVolume?: number;
  minMarketCap?: number;
  maxMarketCap?: number;
  minLiquidity?: number;
  maxLiquidity?: number;
  minHolderCount?: number;
  maxHolderCount?: number;
  minPriceChange?: number;
  maxPriceChange?: number;
  minAgeDays?: number;
  maxAgeDays?: number;
  excludeHoneypots?: boolean; // defaults to true
}

export interface RiskItem {
  name: string;
  level: string;
  description: string;
  score: number;
}

export interface RiskResult {
  address: string;
  riskScore: number; // 0 = safest, 1 = riskiest
  rugcheckScore: number;
  normalizedScore: number | null;
  isRugged: boolean;
  risks: RiskItem[];
  tokenSymbol?: string;
  report: Record<string, unknown>;
}

export interface RiskCheckFailure {
  address: string;
  error: string;
}

export type RiskOutcome = RiskResult | RiskCheckFailure;

export function isRiskFailure(outcome: RiskOutcome): outcome is RiskCheckFailure {
  return 'error' in outcome;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
