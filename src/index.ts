export {
  TokenApi,
  SMALL_CAP_CRITERIA,
  createApi,
  createRugcheckApi,
  getSafeTokensWithRugcheck
} from './token-api.js';
export type {
  TokenApiOptions,
  HighValueOptions,
  RugcheckFilterOptions,
  RugcheckVerifiedOptions
} from './token-api.js';

export {
  Chain,
  TimePeriod,
  SortCriteria,
  SortDirection,
  isRiskFailure
} from './shared/types.js';
export type {
  Token,
  FilterCriteria,
  RiskItem,
  RiskResult,
  RiskCheckFailure,
  RiskOutcome
} from './shared/types.js';

export {
  QueryParameters,
  changeCriteriaFor,
  createVolumeQuery,
  createGainersQuery,
  createLosersQuery,
  createSafeQuery,
  parseChain,
  parseTimePeriod,
  parseSortCriteria,
  parseSortDirection
} from './shared/query.js';
export type { QueryParametersInit } from './shared/query.js';

export { Config } from './shared/config.js';
export type { ClientSettings } from './shared/config.js';

export {
  GmgnError,
  ApiError,
  ParsingError,
  ConfigError,
  UnsupportedChainError
} from './shared/errors.js';

export { logger, setLogLevel } from './shared/logger.js';

export {
  PassThroughFilter,
  CriteriaFilter,
  MinimumsFilter,
  TopNFilter,
  CompositeFilter,
  matchesCriteria,
  tokenAgeDays
} from './analyzers/filters.js';
export type { TokenFilter, CriteriaMinimums } from './analyzers/filters.js';

export { createRiskScorer, defaultRiskScorer, riskBand } from './analyzers/risk.js';
export type { RiskScorer, RiskScorerOptions, RiskBand, RiskLevel } from './analyzers/risk.js';

export {
  GeneralFormatter,
  VolumeFormatter,
  MarketCapFormatter,
  GainersFormatter,
  SmallCapFormatter,
  RugcheckFormatter,
  formatRiskDisplay,
  formatTokens
} from './publisher/formatters.js';
export type { TokenFormatter } from './publisher/formatters.js';

export { parseRankingResponse, parseToken } from './collectors/parser.js';
export { fetchTokenRankings, GMGN_RANK_API } from './collectors/gmgn.js';
export { RugcheckClient, buildRiskResult } from './collectors/rugcheck.js';
export { BypassClient, createBypassSession, randomUserAgent } from './collectors/transport.js';
export type {
  HttpResponse,
  HttpSession,
  SessionFactory,
  SessionOptions,
  JsonTransport
} from './collectors/transport.js';
