/**
 * REST API Connector
 *
 * HTTP-dialect connector. Query text is "[METHOD] /path/{param}"; path
 * placeholders are filled (URL-encoded) from params and every other param
 * becomes a query-string value. The response's Date header is the data
 * timestamp; Last-Modified is reported as the modification time.
 */

import { ConnectorUnavailableError, type Connector, type ConnectorQueryOptions, type ConnectorQueryResult, type HealthState, type QueryParams } from "./types.js";

export interface RestApiConnectorOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  /** Probed by health() (default: "/health") */
  healthPath?: string;
  /** Injected for tests */
  fetch?: typeof fetch;
}

/** Upstream statuses that mean the source itself is down, not the request. */
const UNAVAILABLE_STATUSES = new Set([502, 503, 504]);

function countItems(data: unknown): number {
  if (Array.isArray(data)) return data.length;
  return data === null || data === undefined ? 0 : 1;
}

function headerTime(response: Response, name: string): string | undefined {
  const value = response.headers.get(name);
  const ms = value ? Date.parse(value) : NaN;
  return Number.isNaN(ms) ? undefined : new Date(ms).toISOString();
}

export class RestApiConnector implements Connector {
  readonly kind = "rest_api";
  readonly dialect = "http";
  private base: URL | null = null;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: RestApiConnectorOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async connect(): Promise<void> {
    try {
      this.base = new URL(this.options.baseUrl.replace(/\/+$/, "") + "/");
    } catch (err) {
      throw new ConnectorUnavailableError(`invalid base URL "${this.options.baseUrl}"`, { cause: err });
    }
  }

  buildUrl(pathTemplate: string, params: QueryParams): URL {
    if (!this.base) throw new ConnectorUnavailableError("not connected");

    const used = new Set<string>();
    const path = pathTemplate.replace(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => {
      used.add(name);
      return encodeURIComponent(String(params[name] ?? ""));
    });

    const url = new URL(path.replace(/^\/+/, ""), this.base);
    for (const [key, value] of Object.entries(params)) {
      if (!used.has(key) && value !== null) url.searchParams.set(key, String(value));
    }
    return url;
  }

  async query(text: string, params: QueryParams, options: ConnectorQueryOptions): Promise<ConnectorQueryResult> {
    const parts = text.trim().split(/\s+/);
    const method = parts.length === 2 ? parts[0].toUpperCase() : "GET";
    const url = this.buildUrl(parts.length === 2 ? parts[1] : parts[0], params);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: { Accept: "application/json", ...this.options.headers },
        signal: options.signal,
      });
    } catch (err) {
      options.signal.throwIfAborted();
      throw new ConnectorUnavailableError(`request to ${url.origin} failed`, { cause: err });
    }

    if (!response.ok) {
      const body = (await response.text()).slice(0, 200);
      const message = `HTTP ${response.status}${body ? `: ${body}` : ""}`;
      if (UNAVAILABLE_STATUSES.has(response.status)) throw new ConnectorUnavailableError(message);
      throw new Error(message);
    }

    const data: unknown = method === "HEAD" ? null : await response.json();

    return {
      data,
      rowCount: countItems(data),
      dataTimestamp: headerTime(response, "date"),
      modifiedAt: headerTime(response, "last-modified"),
    };
  }

  async health(): Promise<HealthState> {
    if (!this.base) return "unreachable";
    try {
      const response = await this.fetchImpl(new URL((this.options.healthPath ?? "/health").replace(/^\/+/, ""), this.base));
      if (response.ok) return "healthy";
      return response.status >= 500 ? "unreachable" : "degraded";
    } catch {
      return "unreachable";
    }
  }

  async close(): Promise<void> {
    this.base = null;
  }
}
