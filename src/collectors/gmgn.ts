import type { QueryParameters } from '../shared/query.js';
import type { Token } from '../shared/types.js';
import { logger } from '../shared/logger.js';
import { parseRankingResponse } from './parser.js';
import type { JsonTransport } from './transport.js';

export const GMGN_RANK_API = 'https://gmgn.ai/defi/quotation/v1/rank';

export async function fetchTokenRankings(
  transport: JsonTransport,
  params: QueryParameters,
  baseUrl: string = GMGN_RANK_API
): Promise<Token[]> {
  const url = params.rankingUrl(baseUrl);
  logger.info(`Fetching tokens for ${params.chain} with criteria ${params.criteria}`);

  const response = await transport.getJson(url, params.toSearchParams());
  const tokens = parseRankingResponse(response);

  logger.debug(`Fetched ${tokens.length} ${params.chain} tokens from GMGN`, {
    period: params.timePeriod,
    direction: params.direction
  });
  return tokens;
}
