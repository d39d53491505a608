import type { JsonValue, Maybe, TraceSink, Transport } from '../../types';
import { logger } from '../../lib/logger';
import {
  DEFAULT_API_BASE,
  REDACTED_TOKEN,
  TRACE_REQUEST_RULE,
  TRACE_RESPONSE_RULE,
  USER_AGENT,
  USER_ORGS_PATH,
} from '../../config/constants';
import { Cached } from './cached';
import { Organization } from './organization';
import { objectElements } from './relations';

type Method = 'GET' | 'POST';

export interface ClientOptions {
  /** Trace every request and response to the trace sink */
  debug?: boolean;
  /** Transport used for every request; defaults to the global fetch */
  fetch?: Transport;
  /** Where traces go; defaults to stderr */
  trace?: TraceSink;
  userAgent?: string;
}

const ABSOLUTE_URL = /^https?:/;
const TEMPLATE_FRAGMENT = /\{.*?\}/g;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Client for the GitHub v3 REST API
 *
 * Holds the API base address, the token and the last logical error, and is
 * the entry point for walking organizations → repositories → issues. Every
 * object it hands out keeps a reference back to it for its own lazy fetches.
 *
 * Two kinds of failure are distinguished. A request that cannot be sent, or a
 * response body that is not JSON, throws. A response with a non-2xx status
 * resolves to `null` and its decoded body becomes {@link lastError}.
 *
 * @example
 * ```typescript
 * const github = new GitHubClient().authenticate('token', process.env.GITHUB_TOKEN ?? '');
 * for (const org of await github.orgs()) {
 *   for (const repo of await org.repos()) {
 *     console.log(`${org.login} / ${repo.name}`);
 *   }
 * }
 * ```
 */
export class GitHubClient {
  readonly base: string;

  private readonly transport: Transport;
  private readonly trace: TraceSink;
  private readonly userAgent: string;
  private tracing: boolean;
  private token: Maybe<string> = null;
  private error: Maybe<JsonValue> = null;
  private readonly organizations = new Cached<Organization[]>();

  constructor(baseAddress: string = DEFAULT_API_BASE, options: ClientOptions = {}) {
    this.base = (baseAddress || DEFAULT_API_BASE).replace(/\/$/, '');
    this.transport = options.fetch ?? ((input, init) => fetch(input, init));
    this.trace = options.trace ?? ((chunk) => {
      process.stderr.write(chunk);
    });
    this.userAgent = options.userAgent ?? USER_AGENT;
    this.tracing = options.debug ?? false;
  }

  /**
   * Sets the credentials used by every subsequent request
   *
   * Only personal access tokens (`'token'`) are supported; any other method
   * is a programming error and throws.
   *
   * @returns The client itself, for chaining off the constructor
   */
  authenticate(method: string, credential: string): this {
    if (method === 'token') {
      this.token = credential;
      return this;
    }
    throw new Error(`unrecognized authentication method '${method}'!`);
  }

  debug(on: boolean): this {
    this.tracing = on;
    return this;
  }

  /**
   * Resolves a path against the API base
   *
   * Absolute http(s) URLs, usually copied from an earlier response, are
   * returned as they are minus any `{...}` template fragments; no template
   * expansion takes place. Anything else is joined to the base with exactly
   * one slash.
   */
  url(rel?: string): string {
    if (rel && ABSOLUTE_URL.test(rel)) {
      return rel.replace(TEMPLATE_FRAGMENT, '');
    }
    const path = (rel || '/').replace(/^\//, '');
    return `${this.base}/${path}`;
  }

  get(path?: string): Promise<Maybe<JsonValue>> {
    return this.request('GET', path);
  }

  post(path?: string, payload?: JsonValue): Promise<Maybe<JsonValue>> {
    return this.request('POST', path, payload);
  }

  /**
   * Most recent logical (non-2xx) failure, as decoded from the response body
   *
   * Later successes do not clear it; only consult it right after a call
   * resolved to `null`.
   */
  lastError(): Maybe<JsonValue> {
    return this.error;
  }

  /**
   * Organizations visible to the current credentials
   *
   * Memoized until {@link clear}; a failed fetch resolves to `[]` and is
   * retried on the next call.
   */
  orgs(): Promise<Organization[]> {
    return this.organizations.resolve(async () => {
      const body = await this.get(USER_ORGS_PATH);
      return {
        ok: Array.isArray(body),
        value: objectElements(body).map((object) => new Organization(this, object)),
      };
    });
  }

  /**
   * Forgets the memoized organization list; token, debug flag and last
   * error are untouched
   */
  clear(): this {
    this.organizations.reset();
    return this;
  }

  private async request(method: Method, path: string | undefined, payload?: JsonValue): Promise<Maybe<JsonValue>> {
    const target = this.url(path);
    const label = `${method} ${path ?? ''}`;

    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'User-Agent': this.userAgent,
    };
    let body: string | undefined;
    if (method === 'POST') {
      headers['Content-Type'] = 'application/json';
      if (payload !== undefined) body = JSON.stringify(payload);
    }

    if (this.tracing) {
      const traced = !this.token
        ? headers
        : { ...headers, Authorization: `token ${REDACTED_TOKEN}` };
      this.traceRequest(label, method, target, traced, body);
    }
    if (this.token) {
      headers['Authorization'] = `token ${this.token}`;
    }

    logger.debug('Sending GitHub API request', { method, url: target });

    let res: Response;
    let text: string;
    try {
      res = await this.transport(target, { method, headers, body });
      text = await res.text();
    } catch (error) {
      logger.error('GitHub API transport failure', { method, url: target, error });
      throw new Error(`unable to send ${label} request: ${describeError(error)}`, { cause: error });
    }

    if (this.tracing) {
      this.traceResponse(res, text);
    }

    const decoded = this.decode(label, text);
    if (!res.ok) {
      logger.warn('GitHub API request failed', { method, url: target, status: res.status });
      // never null after a failure, even for an empty body
      this.error = decoded ?? { message: res.statusText, status: res.status };
      return null;
    }
    return decoded;
  }

  private decode(label: string, text: string): Maybe<JsonValue> {
    if (text.trim() === '') return null;
    try {
      const decoded: JsonValue = JSON.parse(text);
      return decoded;
    } catch (error) {
      throw new Error(`unable to decode ${label} response: ${describeError(error)}`, { cause: error });
    }
  }

  private traceRequest(
    label: string,
    method: Method,
    target: string,
    headers: Record<string, string>,
    body: string | undefined
  ): void {
    const lines = [
      `=====[ ${label} ]${TRACE_REQUEST_RULE}`,
      `${method} ${target}`,
      ...Object.entries(headers).map(([name, value]) => `${name}: ${value}`),
      '',
      body ?? '',
    ];
    this.trace(`${lines.join('\n')}\n\n`);
  }

  private traceResponse(res: Response, text: string): void {
    const headerLines: string[] = [];
    res.headers.forEach((value, name) => {
      headerLines.push(`${name}: ${value}`);
    });
    const lines = [
      TRACE_RESPONSE_RULE,
      `${res.status} ${res.statusText}`,
      ...headerLines,
      '',
      text,
    ];
    this.trace(`${lines.join('\n')}\n\n`);
  }
}
