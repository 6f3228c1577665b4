import { z } from 'zod';
import { defaultRiskScorer, type RiskScorer } from '../analyzers/risk.js';
import { ConfigError, ParsingError, UnsupportedChainError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { Chain, isRecord, type RiskItem, type RiskResult } from '../shared/types.js';
import type { JsonTransport } from './transport.js';

const RiskItemSchema = z.object({
  name: z.string().catch(''),
  level: z.string().catch(''),
  description: z.string().catch(''),
  score: z.coerce.number().finite().catch(0)
});

const TokenMetaSchema = z.object({ symbol: z.string() });

function parseRisks(value: unknown): RiskItem[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map(item => RiskItemSchema.parse(item));
}

/**
 * Client for the rugcheck.xyz token report endpoint (Solana mints only).
 */
export class RugcheckClient {
  constructor(
    private readonly transport: JsonTransport,
    private readonly baseUrl: string,
    private readonly scorer: RiskScorer = defaultRiskScorer
  ) {}

  reportUrl(address: string): string {
    return `${this.baseUrl.replace(/\/+$/, '')}/tokens/${encodeURIComponent(address)}/report`;
  }

  async checkToken(address: string, chain: Chain = Chain.SOLANA): Promise<RiskResult> {
    if (chain !== Chain.SOLANA) {
      throw new UnsupportedChainError(chain);
    }
    if (address.trim() === '') {
      throw new ConfigError('Token address is required for a rugcheck');
    }

    const report = await this.transport.getJson(this.reportUrl(address));
    if (!isRecord(report)) {
      throw new ParsingError(`Rugcheck report for ${address} is not a JSON object`);
    }

    const result = buildRiskResult(address, report, this.scorer);
    logger.info(`Rugcheck completed for ${address}`, { riskScore: result.riskScore });
    return result;
  }
}

export function buildRiskResult(
  address: string,
  report: Record<string, unknown>,
  scorer: RiskScorer = defaultRiskScorer
): RiskResult {
  const score = report.score;
  const scoreNormalised = report.score_normalised;
  const rawScore = typeof score === 'number' && Number.isFinite(score) ? score : 0;
  const normalised =
    typeof scoreNormalised === 'number' && Number.isFinite(scoreNormalised) ? scoreNormalised : null;
  const meta = TokenMetaSchema.safeParse(report.tokenMeta);

  return {
    address,
    riskScore: scorer(report),
    rugcheckScore: rawScore,
    normalizedScore: normalised,
    isRugged: report.rugged === true,
    risks: parseRisks(report.risks),
    ...(meta.success ? { tokenSymbol: meta.data.symbol } : {}),
    report
  };
}
