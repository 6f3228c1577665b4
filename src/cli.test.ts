import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, realpathSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { pathToFileURL } from 'url';
import { isEntryPoint, parseCliArgs, runCommand } from './cli.js';
import { TokenApi } from './token-api.js';
import type { JsonTransport } from './collectors/transport.js';
import { Config } from './shared/config.js';
import { ConfigError } from './shared/errors.js';

function jsonTransport(respond: (url: string) => unknown): JsonTransport {
  return {
    getJson: vi.fn(async (url: string) => respond(url)),
    postJson: async () => ({})
  };
}

function createTestApi(rankings: unknown[], reports: Record<string, unknown> = {}) {
  const config = new Config({ retryDelay: 0, requestDelay: 0, maxRetries: 3 });
  return new TokenApi(config, {
    transport: jsonTransport(() => ({ code: 0, data: { rank: rankings } })),
    rugcheckTransport: jsonTransport(url => reports[url.split('/tokens/')[1]?.split('/')[0] ?? ''] ?? {})
  });
}

describe('parseCliArgs', () => {
  it('should default to help on Solana', () => {
    expect(parseCliArgs([])).toEqual({
      command: 'help',
      positional: [],
      chain: 'sol',
      limit: 10,
      maxRisk: 0.3,
      verbose: false
    });
  });

  it('should read the command and options', () => {
    const args = parseCliArgs(['volume', '--chain', 'eth', '--limit', '5', '--period', '1h', '--verbose']);

    expect(args.command).toBe('volume');
    expect(args.chain).toBe('eth');
    expect(args.limit).toBe(5);
    expect(args.period).toBe('1h');
    expect(args.verbose).toBe(true);
  });

  it('should collect positional arguments after the command', () => {
    const args = parseCliArgs(['check', 'Mint111', '--max-risk', '0.2']);
    expect(args.command).toBe('check');
    expect(args.positional).toEqual(['Mint111']);
    expect(args.maxRisk).toBe(0.2);
  });

  it('should reject unknown options and bad values', () => {
    expect(() => parseCliArgs(['--foo'])).toThrow('Unknown option: --foo');
    expect(() => parseCliArgs(['volume', '--chain', 'doge'])).toThrow(ConfigError);
    expect(() => parseCliArgs(['volume', '--limit'])).toThrow('Missing value for --limit');
    expect(() => parseCliArgs(['volume', '--limit', 'ten'])).toThrow('--limit must be a number, got "ten"');
  });
});

describe('runCommand', () => {
  it('should print the top volume tokens', async () => {
    const api = createTestApi([
      { symbol: 'AAA', volume: 2_000_000, price: 0 },
      { symbol: 'BBB', volume: 950_000, price: 1.5 },
      { symbol: 'CCC', volume: 10, price: 1 }
    ]);
    const print = vi.fn();

    await runCommand(api, parseCliArgs(['volume', '--limit', '2']), print);

    expect(print.mock.calls.map(call => call[0])).toEqual([
      '\nTop 2 sol tokens by volume:',
      '  1. AAA - Volume: $2.00M | Price: $0.000000',
      '  2. BBB - Volume: $950,000 | Price: $1.500000'
    ]);
  });

  it('should print a rugcheck report for one token', async () => {
    const api = createTestApi([], {
      Mint111: {
        score: 1200,
        score_normalised: 0.9,
        tokenMeta: { symbol: 'MINT' },
        risks: [{ name: 'Mutable metadata', level: 'warn', description: 'Token metadata can be changed', score: 100 }]
      }
    });
    const print = vi.fn();

    await runCommand(api, parseCliArgs(['check', 'Mint111']), print);

    expect(print.mock.calls.map(call => call[0])).toEqual([
      '\nMINT (Mint111)',
      '  ✅ Low Risk (0.10)',
      '  Rugcheck score: 1200 | Rugged: no',
      '  - [warn] Mutable metadata: Token metadata can be changed'
    ]);
  });

  it('should require an address for check', async () => {
    const api = createTestApi([]);
    await expect(runCommand(api, parseCliArgs(['check']), vi.fn())).rejects.toThrow(
      'Usage: check <token address>'
    );
  });

  it('should show the configuration', async () => {
    const api = createTestApi([]);
    const print = vi.fn();

    await runCommand(api, parseCliArgs(['config']), print);

    const lines = print.mock.calls.map(call => call[0]);
    expect(lines[0]).toBe('\n=== CONFIGURATION ===');
    expect(lines).toContain('Max Retries: 3');
    expect(lines).toContain('Request Delay: 0s');
  });

  it('should report unknown commands and show help', async () => {
    const api = createTestApi([]);
    const print = vi.fn();

    await runCommand(api, parseCliArgs(['moon']), print);

    expect(print).toHaveBeenCalledTimes(2);
    expect(print.mock.calls[0]?.[0]).toBe('Unknown command: moon');
  });
});

describe('isEntryPoint', () => {
  let dir: string;

  beforeEach(() => {
    dir = realpathSync(mkdtempSync(join(tmpdir(), 'gmgn-cli-')));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should match the module run directly', () => {
    const target = join(dir, 'cli.js');
    writeFileSync(target, '');
    expect(isEntryPoint(pathToFileURL(target).href, target)).toBe(true);
  });

  it('should match the module run through a bin symlink', () => {
    const target = join(dir, 'cli.js');
    const link = join(dir, 'gmgn-tokens');
    writeFileSync(target, '');
    symlinkSync(target, link);

    expect(isEntryPoint(pathToFileURL(target).href, link)).toBe(true);
  });

  it('should not match another script', () => {
    const target = join(dir, 'cli.js');
    const other = join(dir, 'other.js');
    writeFileSync(target, '');
    writeFileSync(other, '');

    expect(isEntryPoint(pathToFileURL(target).href, other)).toBe(false);
  });

  it('should not match when there is no script path', () => {
    expect(isEntryPoint(pathToFileURL(join(dir, 'cli.js')).href, undefined)).toBe(false);
    expect(isEntryPoint(pathToFileURL(join(dir, 'cli.js')).href, join(dir, 'missing.js'))).toBe(false);
  });
});
