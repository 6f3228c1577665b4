import { describe, it, expect } from 'vitest';
import { parseRankingResponse, parseToken } from './parser.js';
import { ParsingError } from '../shared/errors.js';

const entry = {
  id: 7,
  chain: 'sol',
  address: 'So11111111111111111111111111111111111111112',
  symbol: 'TEST',
  price: 0.0042,
  volume: 1250000,
  liquidity: 98000,
  market_cap: 4200000,
  holder_count: 1532,
  swaps: 9001,
  price_change_percent: 12.5,
  price_change_percent1m: 0.1,
  price_change_percent5m: -0.4,
  price_change_percent1h: 3.25,
  smart_buy_24h: 4,
  smart_sell_24h: 2,
  is_honeypot: 0,
  is_open_source: 1,
  renounced: 1,
  bluechip_owner_percentage: 0.05,
  open_timestamp: 1700000000,
  logo: 'https://example.com/test.png',
  buy_tax: '0',
  sell_tax: '0.01'
};

describe('parseRankingResponse', () => {
  it('should read tokens from data.rank', () => {
    const tokens = parseRankingResponse({ code: 0, msg: 'success', data: { rank: [entry] } });

    expect(tokens).toHaveLength(1);
    expect(tokens[0]?.symbol).toBe('TEST');
    expect(tokens[0]?.marketCap).toBe(4200000);
    expect(tokens[0]?.holderCount).toBe(1532);
    expect(tokens[0]?.isOpenSource).toBe(true);
    expect(tokens[0]?.isHoneypot).toBe(false);
  });

  it('should read tokens from a data array', () => {
    const tokens = parseRankingResponse({ data: [entry, { ...entry, symbol: 'TWO' }] });
    expect(tokens.map(t => t.symbol)).toEqual(['TEST', 'TWO']);
  });

  it('should read tokens from data.tokens', () => {
    const tokens = parseRankingResponse({ data: { tokens: [entry] } });
    expect(tokens.map(t => t.symbol)).toEqual(['TEST']);
  });

  it('should read tokens from a top-level rank', () => {
    const tokens = parseRankingResponse({ rank: [entry] });
    expect(tokens.map(t => t.symbol)).toEqual(['TEST']);
  });

  it('should prefer data.rank over data.tokens', () => {
    const tokens = parseRankingResponse({
      data: { rank: [entry], tokens: [{ ...entry, symbol: 'OTHER' }] }
    });
    expect(tokens.map(t => t.symbol)).toEqual(['TEST']);
  });

  it('should return an empty list when no token list is present', () => {
    expect(parseRankingResponse({})).toEqual([]);
    expect(parseRankingResponse({ code: 0, data: {} })).toEqual([]);
    expect(parseRankingResponse({ data: { rank: null } })).toEqual([]);
  });

  it('should skip entries that are not objects', () => {
    const tokens = parseRankingResponse({ data: { rank: [1, null, 'x', entry, [entry]] } });
    expect(tokens).toHaveLength(1);
  });

  it('should throw ParsingError for non-object responses', () => {
    expect(() => parseRankingResponse([entry])).toThrow(ParsingError);
    expect(() => parseRankingResponse([entry])).toThrow('Expected a JSON object, got array');
    expect(() => parseRankingResponse(null)).toThrow('Expected a JSON object, got null');
    expect(() => parseRankingResponse('oops')).toThrow('Expected a JSON object, got string');
  });
});

describe('parseToken', () => {
  it('should fill defaults for missing fields', () => {
    const token = parseToken({});

    expect(token.id).toBe(0);
    expect(token.symbol).toBe('');
    expect(token.address).toBe('');
    expect(token.price).toBe(0);
    expect(token.volume).toBe(0);
    expect(token.isHoneypot).toBe(false);
    expect(token.renounced).toBe(false);
    expect(token.createdTimestamp).toBe(0);
    expect('logo' in token).toBe(false);
    expect('totalSupply' in token).toBe(false);
  });

  it('should coerce numeric strings and truncate integer fields', () => {
    const token = parseToken({ price: '0.5', volume: '1000', holder_count: '12.7', swaps: 3.9 });

    expect(token.price).toBe(0.5);
    expect(token.volume).toBe(1000);
    expect(token.holderCount).toBe(12);
    expect(token.swaps).toBe(3);
  });

  it('should default unparseable or null numbers to zero', () => {
    const token = parseToken({ price: 'abc', volume: null, liquidity: { nested: true } });

    expect(token.price).toBe(0);
    expect(token.volume).toBe(0);
    expect(token.liquidity).toBe(0);
  });

  it('should read flags from booleans, numbers and numeric strings', () => {
    expect(parseToken({ is_honeypot: true }).isHoneypot).toBe(true);
    expect(parseToken({ is_honeypot: 1 }).isHoneypot).toBe(true);
    expect(parseToken({ is_honeypot: '1' }).isHoneypot).toBe(true);
    expect(parseToken({ is_honeypot: '0' }).isHoneypot).toBe(false);
    expect(parseToken({ is_honeypot: null }).isHoneypot).toBe(false);
    expect(parseToken({ is_honeypot: 'maybe' }).isHoneypot).toBe(false);
  });

  it('should fall back to creation_timestamp when open_timestamp is missing', () => {
    expect(parseToken({ creation_timestamp: 1690000000 }).createdTimestamp).toBe(1690000000);
    expect(parseToken({ open_timestamp: 0, creation_timestamp: 1690000000 }).createdTimestamp).toBe(1690000000);
    expect(
      parseToken({ open_timestamp: 1700000000, creation_timestamp: 1690000000 }).createdTimestamp
    ).toBe(1700000000);
  });

  it('should keep optional fields only when present', () => {
    const token = parseToken({ ...entry, total_supply: '1000000', buys: 10, sells: null });

    expect(token.logo).toBe('https://example.com/test.png');
    expect(token.sellTax).toBe('0.01');
    expect(token.totalSupply).toBe(1000000);
    expect(token.buys).toBe(10);
    expect('sells' in token).toBe(false);
    expect('sniperCount' in token).toBe(false);
  });

  it('should return a frozen token', () => {
    const token = parseToken(entry);
    expect(Object.isFrozen(token)).toBe(true);
  });
});
