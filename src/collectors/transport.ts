import https from 'https';
import tls from 'tls';
import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import UserAgent from 'user-agents';
import type { ClientSettings } from '../shared/config.js';
import { ApiError, ParsingError, TransientTransportError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { RetryHandler } from '../shared/resilience.js';

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * One browser-like identity: user agent, TLS fingerprint and cookie jar.
 */
export interface HttpSession {
  readonly userAgent: string;
  get(url: string, params?: URLSearchParams): Promise<HttpResponse>;
  post(url: string, body: unknown): Promise<HttpResponse>;
  close(): void;
}

export interface SessionOptions {
  timeoutMs: number;
  userAgents: readonly string[]; // used when no user agent can be generated
  headers: Readonly<Record<string, string>>;
}

export type SessionFactory = (options: SessionOptions) => HttpSession;

export interface JsonTransport {
  getJson(url: string, params?: URLSearchParams): Promise<unknown>;
  postJson(url: string, body: unknown): Promise<unknown>;
}

// Status codes served by challenge pages and rate limiters
const BLOCK_STATUSES = new Set([403, 429, 503]);
const TRANSIENT_NETWORK_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ECONNRESET']);

const ACCEPT_LANGUAGES = [
  'en-US,en;q=0.9',
  'en-GB,en;q=0.9,en-US;q=0.8',
  'fr-FR,fr;q=0.9,en-US;q=0.8,en;q=0.7',
  'de-DE,de;q=0.9,en-US;q=0.8,en;q=0.7'
];

const ECDH_CURVES = ['X25519', 'P-256', 'P-384'];

export const GMGN_HEADERS: Readonly<Record<string, string>> = {
  accept: 'application/json, text/plain, */*',
  dnt: '1',
  priority: 'u=1, i',
  referer: 'https://gmgn.ai/?chain=sol'
};

export const RUGCHECK_HEADERS: Readonly<Record<string, string>> = {
  accept: 'application/json'
};

function pick<T>(items: readonly T[]): T {
  const item = items[Math.floor(Math.random() * items.length)];
  if (item === undefined) {
    throw new RangeError('Cannot pick from an empty list');
  }
  return item;
}

function shuffle<T>(items: readonly T[]): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(Math.random() * (i + 1));
    const a = copy[i];
    const b = copy[j];
    if (a !== undefined && b !== undefined) {
      copy[i] = b;
      copy[j] = a;
    }
  }
  return copy;
}

/**
 * Node's default cipher list with the named suites reordered. TLS 1.3 suites
 * stay ahead of the 1.2 ones; keyword and exclusion entries keep their place at the end.
 */
export function randomizedCipherList(defaults: string = tls.DEFAULT_CIPHERS): string {
  const entries = defaults.split(':').filter(Boolean);
  const tls13 = entries.filter(e => e.startsWith('TLS_'));
  const tls12 = entries.filter(e => !e.startsWith('TLS_') && e.includes('-') && !e.startsWith('!'));
  const rest = entries.filter(e => !tls13.includes(e) && !tls12.includes(e));
  return [...shuffle(tls13), ...shuffle(tls12), ...rest].join(':');
}

const generateDesktopUserAgent = () => new UserAgent({ deviceCategory: 'desktop' }).toString();

/**
 * A current desktop browser user agent, or one of `fallback` when generation fails.
 */
export function randomUserAgent(
  fallback: readonly string[],
  generate: () => string = generateDesktopUserAgent
): string {
  try {
    const userAgent = generate();
    if (userAgent) return userAgent;
  } catch (error) {
    logger.debug(`User agent generation failed: ${error instanceof Error ? error.message : String(error)}`);
  }
  return pick(fallback);
}

function parseSetCookie(header: string): [string, string] | null {
  const pair = header.split(';', 1)[0] ?? '';
  const eq = pair.indexOf('=');
  if (eq <= 0) return null;
  return [pair.slice(0, eq).trim(), pair.slice(eq + 1).trim()];
}

class AxiosBypassSession implements HttpSession {
  readonly userAgent: string;
  private readonly agent: https.Agent;
  private readonly http: AxiosInstance;
  private readonly cookies = new Map<string, string>();

  constructor(options: SessionOptions) {
    this.userAgent = randomUserAgent(options.userAgents);
    this.agent = new https.Agent({
      keepAlive: true,
      ciphers: randomizedCipherList(),
      ecdhCurve: shuffle(ECDH_CURVES).join(':'),
      honorCipherOrder: false
    });
    this.http = axios.create({
      timeout: options.timeoutMs,
      httpsAgent: this.agent,
      headers: {
        ...options.headers,
        'accept-language': pick(ACCEPT_LANGUAGES),
        'user-agent': this.userAgent
      },
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true
    });
    logger.debug(`Session initialized with User-Agent: ${this.userAgent}`);
  }

  get(url: string, params?: URLSearchParams): Promise<HttpResponse> {
    return this.send(() => this.http.get<string>(url, { params, headers: this.cookieHeader() }));
  }

  post(url: string, body: unknown): Promise<HttpResponse> {
    return this.send(() =>
      this.http.post<string>(url, JSON.stringify(body), {
        headers: { 'content-type': 'application/json', ...this.cookieHeader() }
      })
    );
  }

  close(): void {
    this.agent.destroy();
    this.cookies.clear();
  }

  private cookieHeader(): Record<string, string> {
    if (this.cookies.size === 0) return {};
    const cookie = [...this.cookies].map(([name, value]) => `${name}=${value}`).join('; ');
    return { cookie };
  }

  private async send(
    call: () => Promise<AxiosResponse<string>>
  ): Promise<HttpResponse> {
    try {
      const response = await call();
      this.storeCookies(response.headers['set-cookie']);
      return { status: response.status, body: typeof response.data === 'string' ? response.data : '' };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const code = error.code ?? 'UNKNOWN';
        if (TRANSIENT_NETWORK_CODES.has(code)) {
          throw new TransientTransportError(0, `${code}: ${error.message}`);
        }
        throw new ApiError(0, `${code}: ${error.message}`);
      }
      throw error;
    }
  }

  private storeCookies(setCookie: unknown) {
    const headers = Array.isArray(setCookie) ? setCookie : [setCookie];
    for (const header of headers) {
      if (typeof header !== 'string') continue;
      const parsed = parseSetCookie(header);
      if (parsed) this.cookies.set(parsed[0], parsed[1]);
    }
  }
}

export const createBypassSession: SessionFactory = options => new AxiosBypassSession(options);

export interface BypassClientOptions {
  name?: string;
  headers?: Readonly<Record<string, string>>;
  sessionFactory?: SessionFactory;
}

/**
 * JSON transport that answers blocks by throwing the session away and retrying
 * with a new identity.
 */
export class BypassClient implements JsonTransport {
  private session: HttpSession;
  private readonly retry: RetryHandler;
  private readonly name: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly sessionFactory: SessionFactory;

  constructor(
    private readonly settings: ClientSettings,
    options: BypassClientOptions = {}
  ) {
    this.name = options.name ?? 'gmgn';
    this.headers = options.headers ?? GMGN_HEADERS;
    this.sessionFactory = options.sessionFactory ?? createBypassSession;
    this.retry = new RetryHandler({
      maxRetries: settings.maxRetries,
      delayMs: settings.retryDelay * 1000
    });
    this.session = this.createSession();
  }

  get userAgent(): string {
    return this.session.userAgent;
  }

  refreshSession(): void {
    logger.info(`[${this.name}] Refreshing session...`);
    this.session.close();
    this.session = this.createSession();
  }

  getJson(url: string, params?: URLSearchParams): Promise<unknown> {
    const query = params?.toString();
    logger.debug(`[${this.name}] GET ${url}${query ? `?${query}` : ''}`);
    return this.send(() => this.session.get(url, params), `GET ${url}`);
  }

  postJson(url: string, body: unknown): Promise<unknown> {
    logger.debug(`[${this.name}] POST ${url}`);
    return this.send(() => this.session.post(url, body), `POST ${url}`);
  }

  close(): void {
    this.session.close();
  }

  private createSession(): HttpSession {
    return this.sessionFactory({
      timeoutMs: this.settings.timeout * 1000,
      userAgents: this.settings.userAgents,
      headers: this.headers
    });
  }

  private async send(call: () => Promise<HttpResponse>, name: string): Promise<unknown> {
    try {
      return await this.retry.executeWithRetry(
        async () => decodeResponse(await call()),
        `${this.name} ${name}`,
        {
          isRetryable: error => error instanceof TransientTransportError,
          onRetry: () => this.refreshSession()
        }
      );
    } catch (error) {
      if (error instanceof TransientTransportError) {
        throw new ApiError(error.statusCode, error.detail);
      }
      throw error;
    }
  }
}

function decodeResponse(response: HttpResponse): unknown {
  if (response.status >= 200 && response.status < 300) {
    try {
      return JSON.parse(response.body);
    } catch {
      throw new ParsingError(`Response body is not valid JSON (status ${response.status})`);
    }
  }

  if (BLOCK_STATUSES.has(response.status)) {
    throw new TransientTransportError(response.status, 'Cloudflare block detected');
  }

  throw new ApiError(response.status, response.body.slice(0, 200) || 'Request failed');
}
