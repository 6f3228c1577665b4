import { Chain, SortCriteria, SortDirection, TimePeriod } from './types.js';
import { ConfigError } from './errors.js';

export interface QueryParametersInit {
  chain: Chain;
  timePeriod?: TimePeriod;
  criteria: SortCriteria;
  direction?: SortDirection;
  includeNotHoneypot?: boolean;
  includeVerified?: boolean;
  includeRenounced?: boolean;
}

/**
 * One ranking request. Safety toggles are applied server-side via `filters[]`.
 */
export class QueryParameters {
  readonly chain: Chain;
  readonly timePeriod: TimePeriod;
  readonly criteria: SortCriteria;
  readonly direction: SortDirection;
  readonly includeNotHoneypot: boolean;
  readonly includeVerified: boolean;
  readonly includeRenounced: boolean;

  constructor(init: QueryParametersInit) {
    this.chain = init.chain;
    this.timePeriod = init.timePeriod ?? TimePeriod.TWENTY_FOUR_HOURS;
    this.criteria = init.criteria;
    this.direction = init.direction ?? SortDirection.DESCENDING;
    this.includeNotHoneypot = init.includeNotHoneypot ?? true;
    this.includeVerified = init.includeVerified ?? false;
    this.includeRenounced = init.includeRenounced ?? false;
    Object.freeze(this);
  }

  with(changes: Partial<QueryParametersInit>): QueryParameters {
    return new QueryParameters({ ...this.toInit(), ...changes });
  }

  toUrlParams(): Array<[string, string]> {
    const params: Array<[string, string]> = [
      ['orderby', this.criteria],
      ['direction', this.direction]
    ];

    if (this.includeNotHoneypot) params.push(['filters[]', 'not_honeypot']);
    if (this.includeVerified) params.push(['filters[]', 'verified']);
    if (this.includeRenounced) params.push(['filters[]', 'renounced']);

    return params;
  }

  toSearchParams(): URLSearchParams {
    return new URLSearchParams(this.toUrlParams());
  }

  rankingUrl(baseUrl: string): string {
    return `${baseUrl.replace(/\/+$/, '')}/${this.chain}/swaps/${this.timePeriod}`;
  }

  private toInit(): QueryParametersInit {
    return {
      chain: this.chain,
      timePeriod: this.timePeriod,
      criteria: this.criteria,
      direction: this.direction,
      includeNotHoneypot: this.includeNotHoneypot,
      includeVerified: this.includeVerified,
      includeRenounced: this.includeRenounced
    };
  }
}

/**
 * Price-change criterion matching a time period; longer periods fall back to 1h.
 */
export function changeCriteriaFor(timePeriod: TimePeriod): SortCriteria {
  switch (timePeriod) {
    case TimePeriod.ONE_MINUTE:
      return SortCriteria.CHANGE_1M;
    case TimePeriod.FIVE_MINUTES:
      return SortCriteria.CHANGE_5M;
    default:
      return SortCriteria.CHANGE_1H;
  }
}

export function createVolumeQuery(
  chain: Chain,
  timePeriod: TimePeriod = TimePeriod.TWENTY_FOUR_HOURS
): QueryParameters {
  return new QueryParameters({ chain, timePeriod, criteria: SortCriteria.VOLUME });
}

export function createGainersQuery(
  chain: Chain,
  timePeriod: TimePeriod = TimePeriod.ONE_HOUR
): QueryParameters {
  return new QueryParameters({ chain, timePeriod, criteria: changeCriteriaFor(timePeriod) });
}

export function createLosersQuery(
  chain: Chain,
  timePeriod: TimePeriod = TimePeriod.TWENTY_FOUR_HOURS
): QueryParameters {
  return new QueryParameters({
    chain,
    timePeriod,
    criteria: changeCriteriaFor(timePeriod),
    direction: SortDirection.ASCENDING
  });
}

export function createSafeQuery(
  chain: Chain,
  criteria: SortCriteria = SortCriteria.VOLUME,
  timePeriod: TimePeriod = TimePeriod.TWENTY_FOUR_HOURS
): QueryParameters {
  return new QueryParameters({
    chain,
    timePeriod,
    criteria,
    includeNotHoneypot: true,
    includeVerified: true,
    includeRenounced: true
  });
}

function parseTag<T extends string>(kind: string, values: Record<string, T>, raw: string): T {
  const match = Object.values(values).find(value => value === raw);
  if (match === undefined) {
    throw new ConfigError(`Invalid ${kind} "${raw}". Must be one of: ${Object.values(values).join(', ')}`);
  }
  return match;
}

export const parseChain = (raw: string): Chain => parseTag('chain', Chain, raw);
export const parseTimePeriod = (raw: string): TimePeriod => parseTag('time period', TimePeriod, raw);
export const parseSortCriteria = (raw: string): SortCriteria => parseTag('sort criteria', SortCriteria, raw);
export const parseSortDirection = (raw: string): SortDirection => parseTag('sort direction', SortDirection, raw);
