#!/usr/bin/env node

import 'dotenv/config';
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { logger } from './shared/logger.js';
import { Config } from './shared/config.js';
import { ConfigError } from './shared/errors.js';
import { parseChain, parseTimePeriod } from './shared/query.js';
import { Chain, type TimePeriod } from './shared/types.js';
import {
  GainersFormatter,
  GeneralFormatter,
  MarketCapFormatter,
  RugcheckFormatter,
  SmallCapFormatter,
  VolumeFormatter,
  formatRiskDisplay,
  formatTokens
} from './publisher/formatters.js';
import { TokenApi } from './token-api.js';

export interface CliArgs {
  command: string;
  positional: string[];
  chain: Chain;
  period?: TimePeriod;
  limit: number;
  maxRisk: number;
  verbose: boolean;
}

function optionValue(argv: readonly string[], index: number, name: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`Missing value for --${name}`);
  }
  return value;
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(`--${name} must be a number, got "${raw}"`);
  }
  return value;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    command: 'help',
    positional: [],
    chain: Chain.SOLANA,
    limit: 10,
    maxRisk: 0.3,
    verbose: false
  };
  const rest: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    switch (arg) {
      case '--chain':
        args.chain = parseChain(optionValue(argv, i++, 'chain'));
        break;
      case '--period':
        args.period = parseTimePeriod(optionValue(argv, i++, 'period'));
        break;
      case '--limit':
        args.limit = parseNumber('limit', optionValue(argv, i++, 'limit'));
        break;
      case '--max-risk':
        args.maxRisk = parseNumber('max-risk', optionValue(argv, i++, 'max-risk'));
        break;
      case '--verbose':
        args.verbose = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new ConfigError(`Unknown option: ${arg}`);
        }
        rest.push(arg);
    }
  }

  const [command, ...positional] = rest;
  if (command !== undefined) args.command = command;
  args.positional = positional;
  return args;
}

export async function runCommand(
  api: TokenApi,
  args: CliArgs,
  print: (line: string) => void = console.log
): Promise<void> {
  const { chain, period, limit } = args;

  switch (args.command) {
    case 'volume': {
      print(`\nTop ${limit} ${chain} tokens by volume:`);
      const tokens = await api.getTopVolumeTokens(chain, period, limit);
      formatTokens(tokens, new VolumeFormatter()).forEach(line => print(line));
      break;
    }
    case 'gainers': {
      print(`\nTop ${limit} ${chain} gainers:`);
      const tokens = await api.getTopGainers(chain, period, limit);
      formatTokens(tokens, new GainersFormatter()).forEach(line => print(line));
      break;
    }
    case 'losers': {
      print(`\nTop ${limit} ${chain} losers:`);
      const tokens = await api.getTopLosers(chain, period, limit);
      formatTokens(tokens, new GainersFormatter()).forEach(line => print(line));
      break;
    }
    case 'safe': {
      print(`\nSafe ${chain} tokens (not honeypot, verified, renounced):`);
      const tokens = await api.getSafeTokens(chain, undefined, limit);
      formatTokens(tokens, new GeneralFormatter()).forEach(line => print(line));
      break;
    }
    case 'small-cap': {
      print(`\nSmall cap ${chain} tokens (MC < $200K, Liq < $150K, Vol < $300K):`);
      const tokens = await api.getSmallCapTokens(chain, undefined, limit);
      formatTokens(tokens, new SmallCapFormatter()).forEach(line => print(line));
      break;
    }
    case 'high-value': {
      print(`\nHigh-value ${chain} tokens (Vol > $500K, MC > $1M):`);
      const tokens = await api.getHighValueTokens(chain, { limit });
      formatTokens(tokens, new MarketCapFormatter()).forEach(line => print(line));
      break;
    }
    case 'rugcheck': {
      print(`\nRugcheck verified ${chain} tokens (risk <= ${args.maxRisk}):`);
      const tokens = await api.getRugcheckVerifiedTokens(chain, { limit, maxRiskScore: args.maxRisk });
      formatTokens(tokens, new RugcheckFormatter()).forEach(line => print(line));
      break;
    }
    case 'check': {
      const address = args.positional[0];
      if (!address) {
        throw new ConfigError('Usage: check <token address>');
      }
      const result = await api.checkTokenRugRisk(address, chain);
      print(`\n${result.tokenSymbol ?? 'Unknown'} (${address})`);
      print(`  ${formatRiskDisplay(result)}`);
      print(`  Rugcheck score: ${result.rugcheckScore} | Rugged: ${result.isRugged ? 'yes' : 'no'}`);
      for (const risk of result.risks) {
        print(`  - [${risk.level}] ${risk.name}: ${risk.description}`);
      }
      break;
    }
    case 'config':
      showConfig(api.config, print);
      break;
    case 'help':
      showHelp(print);
      break;
    default:
      print(`Unknown command: ${args.command}`);
      showHelp(print);
  }
}

function showConfig(config: Config, print: (line: string) => void) {
  const cfg = config.getAll();
  print('\n=== CONFIGURATION ===');
  print(`Ranking API: ${cfg.baseUrl}`);
  print(`Rugcheck API: ${cfg.rugcheckUrl}`);
  print(`Timeout: ${cfg.timeout}s`);
  print(`Max Retries: ${cfg.maxRetries}`);
  print(`Retry Delay: ${cfg.retryDelay}s`);
  print(`Request Delay: ${cfg.requestDelay}s`);
  print(`Verbose: ${cfg.verbose ? 'enabled' : 'disabled'}`);
}

function showHelp(print: (line: string) => void) {
  print(`
gmgn-tokens

Commands:
  volume               Top tokens by volume
  gainers              Top gainers for the period
  losers               Top losers for the period
  safe                 Tokens passing honeypot, verified and renounced filters
  small-cap            Small cap tokens
  high-value           Tokens with volume > $500K and market cap > $1M
  rugcheck             Tokens verified by rugcheck (Solana only)
  check <address>      Rugcheck report for one token (Solana only)
  config               Show current configuration
  help                 Show this help

Options:
  --chain <eth|bsc|base|sol|tron>   default: sol
  --period <1m|5m|1h|6h|24h>
  --limit <n>                       default: 10
  --max-risk <0..1>                 default: 0.3
  --verbose

Examples:
  npm run cli volume -- --chain eth --limit 5
  npm run cli rugcheck -- --limit 3 --max-risk 0.2
  `);
}

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  const config = new Config(args.verbose ? { verbose: true } : {});
  logger.debug(`CLI command: ${args.command}`);
  const api = new TokenApi(config);
  try {
    await runCommand(api, args);
  } finally {
    api.close();
  }
}

/**
 * True when `entry` (usually `process.argv[1]`) resolves to the module at `moduleUrl`.
 * npm links `bin` entries, so the path is resolved before comparing.
 */
export function isEntryPoint(moduleUrl: string, entry: string | undefined): boolean {
  if (entry === undefined) return false;
  let resolved: string;
  try {
    resolved = realpathSync(entry);
  } catch {
    // not a file on disk (REPL, -e)
    return false;
  }
  return moduleUrl === pathToFileURL(resolved).href;
}

if (isEntryPoint(import.meta.url, process.argv[1])) {
  main().catch(error => {
    logger.error('CLI error', { message: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}
