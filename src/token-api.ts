import { fetchTokenRankings } from './collectors/gmgn.js';
import { RugcheckClient } from './collectors/rugcheck.js';
import {
  BypassClient,
  RUGCHECK_HEADERS,
  type JsonTransport,
  type SessionFactory
} from './collectors/transport.js';
import {
  CompositeFilter,
  CriteriaFilter,
  MinimumsFilter,
  TopNFilter,
  type CriteriaMinimums,
  type TokenFilter
} from './analyzers/filters.js';
import type { RiskScorer } from './analyzers/risk.js';
import { formatTokens, type TokenFormatter } from './publisher/formatters.js';
import { Config } from './shared/config.js';
import { ConfigError, UnsupportedChainError } from './shared/errors.js';
import { logger, setLogLevel } from './shared/logger.js';
import {
  QueryParameters,
  createGainersQuery,
  createLosersQuery,
  createSafeQuery,
  createVolumeQuery
} from './shared/query.js';
import { RequestPacer } from './shared/rate-limiter.js';
import {
  Chain,
  SortCriteria,
  SortDirection,
  TimePeriod,
  isRiskFailure,
  type FilterCriteria,
  type RiskOutcome,
  type RiskResult,
  type Token
} from './shared/types.js';

export interface TokenApiOptions {
  transport?: JsonTransport; // ranking endpoint
  rugcheckTransport?: JsonTransport;
  sessionFactory?: SessionFactory;
  riskScorer?: RiskScorer;
  now?: () => number;
}

export interface HighValueOptions {
  minVolume?: number;
  minMarketCap?: number;
  minLiquidity?: number;
  limit?: number;
}

export interface RugcheckFilterOptions {
  chain?: Chain;
  maxRiskScore?: number;
  limit?: number; // stop checking once this many tokens qualify
}

export interface RugcheckVerifiedOptions {
  criteria?: SortCriteria;
  limit?: number;
  maxRiskScore?: number;
  filter?: TokenFilter; // applied to the ranking before any rugcheck call
}

// Small caps: MC < 200K, liquidity < 150K, volume < 300K, at least a day old
export const SMALL_CAP_CRITERIA: Readonly<FilterCriteria> = Object.freeze({
  maxMarketCap: 200_000,
  maxLiquidity: 150_000,
  maxVolume: 300_000,
  minAgeDays: 1,
  excludeHoneypots: true
});

function tokenKey(token: Token): string {
  return token.address || `#${token.id}`;
}

function assertRugcheckChain(chain: Chain) {
  if (chain !== Chain.SOLANA) {
    throw new UnsupportedChainError(chain);
  }
}

/**
 * GMGN ranking queries with client-side filtering, formatting and rugcheck verification.
 */
export class TokenApi {
  readonly config: Config;
  private readonly transport: JsonTransport;
  private readonly rugcheck: RugcheckClient;
  private readonly pacer: RequestPacer;
  private readonly now: () => number;
  private readonly ownedClients: BypassClient[] = [];

  constructor(config: Config = Config.createDefault(), options: TokenApiOptions = {}) {
    this.config = config;
    const settings = config.getAll();
    if (settings.verbose) setLogLevel('debug');

    this.transport =
      options.transport ?? this.own(new BypassClient(settings, { sessionFactory: options.sessionFactory }));
    const rugcheckTransport =
      options.rugcheckTransport ??
      this.own(
        new BypassClient(settings, {
          name: 'rugcheck',
          headers: RUGCHECK_HEADERS,
          sessionFactory: options.sessionFactory
        })
      );
    this.rugcheck = new RugcheckClient(rugcheckTransport, settings.rugcheckUrl, options.riskScorer);
    this.now = options.now ?? Date.now;
    this.pacer = new RequestPacer(settings.requestDelay * 1000, this.now);
  }

  async getTokenRankings(params: QueryParameters): Promise<Token[]> {
    return fetchTokenRankings(this.transport, params, this.config.get('baseUrl'));
  }

  getTokens(params: QueryParameters): Promise<Token[]> {
    return this.getTokenRankings(params);
  }

  async getTokensWithFilter(params: QueryParameters, filter: TokenFilter): Promise<Token[]> {
    const tokens = await this.getTokenRankings(params);
    return filter.apply(tokens);
  }

  async getFormattedTokens(
    params: QueryParameters,
    formatter: TokenFormatter,
    filter?: TokenFilter
  ): Promise<string[]> {
    const tokens = filter
      ? await this.getTokensWithFilter(params, filter)
      : await this.getTokenRankings(params);
    return formatTokens(tokens, formatter);
  }

  async getFilteredTokens(
    params: QueryParameters,
    criteria: FilterCriteria,
    limit: number = 10
  ): Promise<Token[]> {
    return this.getTokensWithFilter(params, this.criteriaThenTop(criteria, limit));
  }

  /**
   * Ranking sorted by `primaryCriteria`, keeping only tokens that meet every minimum.
   */
  async getFilteredRankings(
    chain: Chain,
    primaryCriteria: SortCriteria,
    minimums: CriteriaMinimums,
    timePeriod: TimePeriod = TimePeriod.TWENTY_FOUR_HOURS,
    direction: SortDirection = SortDirection.DESCENDING
  ): Promise<Token[]> {
    const filter = new MinimumsFilter(minimums);
    logger.info(`Filtering ${primaryCriteria} ranking by minimums: ${JSON.stringify(minimums)}`);
    const params = new QueryParameters({ chain, timePeriod, criteria: primaryCriteria, direction });
    return this.getTokensWithFilter(params, filter);
  }

  // ---- convenience queries ----

  async getTopVolumeTokens(
    chain: Chain,
    timePeriod: TimePeriod = TimePeriod.TWENTY_FOUR_HOURS,
    limit: number = 10
  ): Promise<Token[]> {
    return this.getTokensWithFilter(createVolumeQuery(chain, timePeriod), new TopNFilter(limit));
  }

  async getTopGainers(
    chain: Chain,
    timePeriod: TimePeriod = TimePeriod.ONE_HOUR,
    limit: number = 10
  ): Promise<Token[]> {
    return this.getTokensWithFilter(createGainersQuery(chain, timePeriod), new TopNFilter(limit));
  }

  async getTopLosers(
    chain: Chain,
    timePeriod: TimePeriod = TimePeriod.TWENTY_FOUR_HOURS,
    limit: number = 10
  ): Promise<Token[]> {
    return this.getTokensWithFilter(createLosersQuery(chain, timePeriod), new TopNFilter(limit));
  }

  async getHighValueTokens(chain: Chain, options: HighValueOptions = {}): Promise<Token[]> {
    const { minVolume = 500_000, minMarketCap = 1_000_000, minLiquidity, limit = 10 } = options;
    const criteria: FilterCriteria = { minVolume, minMarketCap };
    if (minLiquidity !== undefined) criteria.minLiquidity = minLiquidity;

    return this.getTokensWithFilter(createVolumeQuery(chain), this.criteriaThenTop(criteria, limit));
  }

  /**
   * Honeypot, verified and renounced filters applied by the API itself.
   */
  async getSafeTokens(
    chain: Chain,
    criteria: SortCriteria = SortCriteria.VOLUME,
    limit: number = 10
  ): Promise<Token[]> {
    return this.getTokensWithFilter(createSafeQuery(chain, criteria), new TopNFilter(limit));
  }

  async getSmallCapTokens(
    chain: Chain,
    criteria: SortCriteria = SortCriteria.VOLUME,
    limit: number = 10
  ): Promise<Token[]> {
    const params = new QueryParameters({ chain, criteria });
    return this.getTokensWithFilter(params, this.criteriaThenTop(SMALL_CAP_CRITERIA, limit));
  }

  /**
   * Top `tokensPerStep` by the first criterion, then narrowed to the tokens that
   * also appear in each following criterion's ranking, reordered by that ranking.
   */
  async getSequentialRankings(
    chain: Chain,
    criteriaSequence: readonly SortCriteria[],
    timePeriod: TimePeriod = TimePeriod.TWENTY_FOUR_HOURS,
    tokensPerStep: number = 50
  ): Promise<Token[]> {
    const [first, ...rest] = criteriaSequence;
    if (first === undefined) {
      throw new ConfigError('criteriaSequence cannot be empty');
    }
    const top = new TopNFilter(tokensPerStep);
    const query = (criteria: SortCriteria) =>
      new QueryParameters({ chain, timePeriod, criteria, direction: SortDirection.DESCENDING });

    logger.info(`Sequential ranking with criteria: ${criteriaSequence.join(' -> ')}`);
    await this.pacer.waitForSlot();
    let current = top.apply(await this.getTokenRankings(query(first)));

    for (const criteria of rest) {
      await this.pacer.waitForSlot();
      const ranking = await this.getTokenRankings(query(criteria));
      if (ranking.length === 0) {
        logger.warn(`Empty ranking for ${criteria}, step skipped`);
        continue;
      }

      const ranks = new Map<string, number>();
      ranking.forEach((token, rank) => {
        const key = tokenKey(token);
        if (!ranks.has(key)) ranks.set(key, rank);
      });

      const survivors: Array<{ token: Token; rank: number }> = [];
      for (const token of current) {
        const rank = ranks.get(tokenKey(token));
        if (rank !== undefined) survivors.push({ token, rank });
      }
      survivors.sort((a, b) => a.rank - b.rank);
      current = top.apply(survivors.map(s => s.token));
      logger.debug(`Step ${criteria}: ${current.length} tokens remain`);
    }

    return current;
  }

  // ---- rugcheck ----

  async checkTokenRugRisk(address: string, chain: Chain = Chain.SOLANA): Promise<RiskResult> {
    assertRugcheckChain(chain);
    return this.rugcheck.checkToken(address, chain);
  }

  /**
   * One rugcheck per token, in order. Failures are recorded, not thrown.
   * Keyed by address, or `#id` for tokens without one.
   */
  async checkTokensRugRisk(
    tokens: readonly Token[],
    chain: Chain = Chain.SOLANA
  ): Promise<Map<string, RiskOutcome>> {
    assertRugcheckChain(chain);
    const results = new Map<string, RiskOutcome>();
    for (const token of tokens) {
      logger.debug(`Checking rugcheck for ${token.symbol} (${token.address})`);
      results.set(tokenKey(token), await this.tryRugcheck(token, chain));
    }
    return results;
  }

  async getTokensWithRugcheck(
    params: QueryParameters,
    checkRug: boolean = true
  ): Promise<Array<[Token, RiskOutcome | null]>> {
    if (checkRug) assertRugcheckChain(params.chain);
    const tokens = await this.getTokenRankings(params);
    if (!checkRug) {
      return tokens.map((token): [Token, RiskOutcome | null] => [token, null]);
    }

    const results: Array<[Token, RiskOutcome | null]> = [];
    for (const token of tokens) {
      results.push([token, await this.tryRugcheck(token, params.chain)]);
    }
    return results;
  }

  async filterSafeTokensByRugcheck(
    tokens: readonly Token[],
    options: RugcheckFilterOptions = {}
  ): Promise<Token[]> {
    const { chain = Chain.SOLANA, maxRiskScore = 0.3, limit } = options;
    assertRugcheckChain(chain);

    const safe: Token[] = [];
    for (const token of tokens) {
      if (limit !== undefined && safe.length >= limit) break;

      const outcome = await this.tryRugcheck(token, chain);
      if (isRiskFailure(outcome)) continue;

      if (outcome.riskScore <= maxRiskScore) {
        safe.push(token);
        logger.debug(`Token ${token.symbol} passed rugcheck (risk: ${outcome.riskScore})`);
      } else {
        logger.debug(`Token ${token.symbol} failed rugcheck (risk: ${outcome.riskScore})`);
      }
    }
    return safe;
  }

  /**
   * Ranking candidates (honeypots excluded upstream), rugchecked one at a time
   * until `limit` pass. At most `limit * 3` candidates are checked.
   */
  async getRugcheckVerifiedTokens(
    chain: Chain,
    options: RugcheckVerifiedOptions = {}
  ): Promise<Token[]> {
    const { criteria = SortCriteria.VOLUME, limit = 10, maxRiskScore = 0.3, filter } = options;
    assertRugcheckChain(chain);

    const params = new QueryParameters({ chain, criteria, includeNotHoneypot: true });
    let candidates = await this.getTokenRankings(params);
    if (filter) candidates = filter.apply(candidates);
    candidates = new TopNFilter(limit * 3).apply(candidates);

    return this.filterSafeTokensByRugcheck(candidates, { chain, maxRiskScore, limit });
  }

  private async tryRugcheck(token: Token, chain: Chain): Promise<RiskOutcome> {
    await this.pacer.waitForSlot();
    try {
      return await this.rugcheck.checkToken(token.address, chain);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Could not check ${token.symbol}: ${message}`);
      return { address: token.address, error: message };
    }
  }

  /**
   * Closes the sessions this instance opened. Injected transports are left alone.
   */
  close(): void {
    for (const client of this.ownedClients) client.close();
  }

  private own(client: BypassClient): BypassClient {
    this.ownedClients.push(client);
    return client;
  }

  private criteriaThenTop(criteria: FilterCriteria, limit: number): TokenFilter {
    return new CompositeFilter([new CriteriaFilter(criteria, this.now), new TopNFilter(limit)]);
  }
}

// ---- factories ----

export function createApi(verbose: boolean = false): TokenApi {
  return new TokenApi(verbose ? Config.createVerbose() : Config.createDefault());
}

export function createRugcheckApi(verbose: boolean = false): TokenApi {
  return createApi(verbose);
}

export async function getSafeTokensWithRugcheck(
  chain: Chain,
  limit: number = 10,
  maxRiskScore: number = 0.3,
  verbose: boolean = false
): Promise<Token[]> {
  const api = createRugcheckApi(verbose);
  try {
    return await api.getRugcheckVerifiedTokens(chain, { limit, maxRiskScore });
  } finally {
    api.close();
  }
}
