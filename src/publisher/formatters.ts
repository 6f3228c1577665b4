import { riskBand } from '../analyzers/risk.js';
import { isRiskFailure, type RiskOutcome, type Token } from '../shared/types.js';

export interface TokenFormatter {
  format(token: Token, index: number): string;
}

const wholeDollars = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

export function formatPrice(price: number): string {
  return `$${price.toFixed(6)}`;
}

export function formatDollars(value: number): string {
  return `$${wholeDollars.format(value)}`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

/**
 * `$1.50M` from one million up, whole dollars with separators below.
 */
export function formatMillions(value: number): string {
  return value >= 1_000_000 ? `$${(value / 1_000_000).toFixed(2)}M` : formatDollars(value);
}

/**
 * `$1.50M`, `$250K` or `$900`.
 */
export function formatCompact(value: number): string {
  if (value >= 1_000_000) return `$${(value / 1_000_000).toFixed(2)}M`;
  if (value >= 1_000) return `$${(value / 1_000).toFixed(0)}K`;
  return `$${value.toFixed(0)}`;
}

export class GeneralFormatter implements TokenFormatter {
  format(token: Token, index: number): string {
    return `  ${index}. ${token.symbol} - Price: ${formatPrice(token.price)} | 24h: ${formatPercent(token.priceChangePercent)} | Volume: ${formatDollars(token.volume)}`;
  }
}

export class VolumeFormatter implements TokenFormatter {
  format(token: Token, index: number): string {
    return `  ${index}. ${token.symbol} - Volume: ${formatMillions(token.volume)} | Price: ${formatPrice(token.price)}`;
  }
}

export class MarketCapFormatter implements TokenFormatter {
  format(token: Token, index: number): string {
    return `  ${index}. ${token.symbol} - MC: ${formatMillions(token.marketCap)} | Price: ${formatPrice(token.price)}`;
  }
}

export class GainersFormatter implements TokenFormatter {
  format(token: Token, index: number): string {
    return `  ${index}. ${token.symbol} - 1h: ${formatPercent(token.priceChangePercent1h)} | 24h: ${formatPercent(token.priceChangePercent)} | Price: ${formatPrice(token.price)}`;
  }
}

export class SmallCapFormatter implements TokenFormatter {
  format(token: Token, index: number): string {
    return `  ${index}. ${token.symbol} - MC: ${formatCompact(token.marketCap)} | Liq: ${formatCompact(token.liquidity)} | Vol: ${formatCompact(token.volume)} | Price: ${formatPrice(token.price)}`;
  }
}

export function formatRiskDisplay(outcome: RiskOutcome): string {
  if (isRiskFailure(outcome)) return '❌ Error';
  const band = riskBand(outcome.riskScore);
  return `${band.icon} ${band.label} (${outcome.riskScore.toFixed(2)})`;
}

export class RugcheckFormatter implements TokenFormatter {
  format(token: Token, index: number): string {
    return `  ${index}. ${token.symbol} - Price: ${formatPrice(token.price)} | Vol: ${formatDollars(token.volume)}`;
  }

  formatWithRugcheck(token: Token, outcome: RiskOutcome, index: number): string {
    return `  ${index}. ${token.symbol} - ${formatRiskDisplay(outcome)} | Price: ${formatPrice(token.price)} | Vol: ${formatDollars(token.volume)}`;
  }
}

export function formatTokens(tokens: readonly Token[], formatter: TokenFormatter): string[] {
  return tokens.map((token, i) => formatter.format(token, i + 1));
}
