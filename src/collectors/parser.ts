import { z } from 'zod';
import { ParsingError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { isRecord, type Token } from '../shared/types.js';

// Each field falls back to its default instead of failing the whole entry
const num = z.coerce.number().finite().catch(0);
const int = z.coerce.number().finite().transform(Math.trunc).catch(0);
const str = z.string().catch('');
const flag = z
  .union([z.boolean(), z.coerce.number().finite()])
  .transform(value => (typeof value === 'boolean' ? value : value !== 0))
  .catch(false);
const optionalStr = z.string().optional().catch(undefined);
const optionalInt = z.coerce.number().finite().transform(Math.trunc).optional().catch(undefined);

const RawTokenSchema = z.object({
  id: int,
  chain: str,
  address: str,
  symbol: str,
  price: num,
  volume: num,
  liquidity: num,
  market_cap: num,
  holder_count: int,
  swaps: int,
  price_change_percent: num,
  price_change_percent1m: num,
  price_change_percent5m: num,
  price_change_percent1h: num,
  smart_buy_24h: int,
  smart_sell_24h: int,
  is_honeypot: flag,
  is_open_source: flag,
  renounced: flag,
  bluechip_owner_percentage: num,
  open_timestamp: int,
  creation_timestamp: int,
  logo: optionalStr,
  buy_tax: optionalStr,
  sell_tax: optionalStr,
  total_supply: optionalInt,
  buys: optionalInt,
  sells: optionalInt,
  sniper_count: optionalInt,
  lockInfo: z.record(z.unknown()).optional().catch(undefined)
});

type RawToken = z.infer<typeof RawTokenSchema>;

// null coerces to 0; a null optional stays absent
function present(entry: Record<string, unknown>, key: string): boolean {
  return entry[key] !== undefined && entry[key] !== null;
}

function toToken(raw: RawToken, entry: Record<string, unknown>): Token {
  const token: Token = {
    id: raw.id,
    chain: raw.chain,
    address: raw.address,
    symbol: raw.symbol,
    price: raw.price,
    volume: raw.volume,
    liquidity: raw.liquidity,
    marketCap: raw.market_cap,
    holderCount: raw.holder_count,
    swaps: raw.swaps,
    priceChangePercent: raw.price_change_percent,
    priceChangePercent1m: raw.price_change_percent1m,
    priceChangePercent5m: raw.price_change_percent5m,
    priceChangePercent1h: raw.price_change_percent1h,
    smartBuy24h: raw.smart_buy_24h,
    smartSell24h: raw.smart_sell_24h,
    isHoneypot: raw.is_honeypot,
    isOpenSource: raw.is_open_source,
    renounced: raw.renounced,
    bluechipOwnerPercentage: raw.bluechip_owner_percentage,
    createdTimestamp: raw.open_timestamp || raw.creation_timestamp,
    ...(raw.logo !== undefined ? { logo: raw.logo } : {}),
    ...(raw.buy_tax !== undefined ? { buyTax: raw.buy_tax } : {}),
    ...(raw.sell_tax !== undefined ? { sellTax: raw.sell_tax } : {}),
    ...(present(entry, 'total_supply') && raw.total_supply !== undefined ? { totalSupply: raw.total_supply } : {}),
    ...(present(entry, 'buys') && raw.buys !== undefined ? { buys: raw.buys } : {}),
    ...(present(entry, 'sells') && raw.sells !== undefined ? { sells: raw.sells } : {}),
    ...(present(entry, 'sniper_count') && raw.sniper_count !== undefined ? { sniperCount: raw.sniper_count } : {}),
    ...(raw.lockInfo !== undefined ? { lockInfo: raw.lockInfo } : {})
  };
  return Object.freeze(token);
}

/**
 * Map one raw ranking entry to a Token. Never throws.
 */
export function parseToken(entry: Record<string, unknown>): Token {
  return toToken(RawTokenSchema.parse(entry), entry);
}

/**
 * Locate the token list. `data.rank` is what the ranking endpoint returns;
 * the other shapes are older or sibling endpoints.
 */
function findTokenList(response: Record<string, unknown>): unknown {
  const data = response.data;
  if (isRecord(data)) {
    if ('rank' in data) return data.rank;
    if ('tokens' in data) return data.tokens;
  }
  if (Array.isArray(data)) return data;
  if ('rank' in response) return response.rank;
  return undefined;
}

export function parseRankingResponse(response: unknown): Token[] {
  if (!isRecord(response)) {
    const kind = Array.isArray(response) ? 'array' : response === null ? 'null' : typeof response;
    throw new ParsingError(`Expected a JSON object, got ${kind}`);
  }

  if ('code' in response || 'msg' in response) {
    logger.debug('Ranking response status', { code: response.code, msg: response.msg });
  }

  const list = findTokenList(response);
  if (!Array.isArray(list)) {
    logger.debug(`No token list in response (keys: ${Object.keys(response).join(', ')})`);
    return [];
  }

  const tokens: Token[] = [];
  for (const entry of list) {
    if (!isRecord(entry)) {
      logger.debug('Skipping non-object ranking entry');
      continue;
    }
    tokens.push(parseToken(entry));
  }

  logger.info(`Successfully parsed ${tokens.length} tokens`);
  return tokens;
}
