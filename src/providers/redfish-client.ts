import axios, { AxiosHeaders } from "axios";
import type { AxiosAdapter, AxiosInstance, AxiosRequestConfig, AxiosResponse } from "axios";
import https from "https";
import { ErrorHandler } from "../logging/error-handler";
import { RedfishAuthError, RedfishError, RedfishTransportError, errorMessage } from "../logging/errors";
import type { AuthMode, CollectorConfig } from "../types/schemas";
import { childResource, isRedfishResource, linkTarget } from "../types/redfish";
import type { RedfishResource } from "../types/redfish";

export interface RedfishClientOptions {
  baseUrl: string;
  prefix: string;
  username: string;
  password: string;
  authMode: AuthMode;
  timeoutMs: number;
  retries: number;
  verifySsl: boolean;
  /** Replaces the HTTP transport, used by the in-process test BMC. */
  adapter?: AxiosAdapter;
}

export interface RedfishResponse {
  status: number;
  data: unknown;
}

const TOKEN_HEADER = "X-Auth-Token";

function headerValue(headers: AxiosResponse["headers"], name: string): string | undefined {
  const value = headers instanceof AxiosHeaders ? headers.get(name) : headers[name.toLowerCase()];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/** IPv6 literals need brackets in a URL authority. */
export function urlHost(host: string): string {
  return host.includes(":") && !host.startsWith("[") ? `[${host}]` : host;
}

export function clientOptionsFromConfig(cfg: CollectorConfig): RedfishClientOptions {
  const { connection, credentials } = cfg;
  return {
    baseUrl: `${connection.proto}://${urlHost(connection.host)}:${connection.port}`,
    prefix: connection.prefix.replace(/\/$/, ''),
    username: credentials.user,
    password: credentials.password,
    authMode: credentials.auth,
    timeoutMs: connection.timeout * 1000,
    retries: connection.retries,
    verifySsl: connection.verify_ssl,
  };
}

/**
 * Thin Redfish client: one authenticated session per run.
 * HTTP statuses are returned to the caller; only missing responses throw.
 */
export class RedfishClient {
  private client: AxiosInstance;
  private options: RedfishClientOptions;
  private errors: ErrorHandler;
  private sessionLocation?: string;
  private authenticated = false;

  root: RedfishResource = {};

  constructor(options: RedfishClientOptions, errors: ErrorHandler) {
    this.options = options;
    this.errors = errors;
    this.client = axios.create({
      baseURL: options.baseUrl.replace(/\/$/, ''),
      headers: {
        'Accept': 'application/json',
        'Content-Type': 'application/json',
        'OData-Version': '4.0'
      },
      timeout: options.timeoutMs,
      httpsAgent: new https.Agent({ rejectUnauthorized: options.verifySsl }),
      validateStatus: () => true,
      adapter: options.adapter
    });
  }

  get loggedIn(): boolean {
    return this.authenticated;
  }

  async login(): Promise<RedfishResource> {
    this.root = await this.fetchServiceRoot();

    if (this.options.authMode === "basic") {
      this.client.defaults.auth = { username: this.options.username, password: this.options.password };
      // the service root is readable without credentials on most BMCs
      const probe = linkTarget(this.root.Systems) ?? `${this.options.prefix}/Systems`;
      const check = await this.get(probe);
      if (check.status === 401 || check.status === 403) {
        delete this.client.defaults.auth;
        throw new RedfishAuthError(`Basic authentication rejected: HTTP ${check.status}`, check.status);
      }
      this.authenticated = true;
      this.errors.debug("Using basic authentication", { user: this.options.username });
      return this.root;
    }

    const sessionsPath = linkTarget(childResource(this.root, "Links")?.Sessions)
      ?? `${this.options.prefix}/SessionService/Sessions`;
    // a lost answer may still have opened a session, so no second POST
    const response = await this.request({
      method: "POST",
      url: sessionsPath,
      data: { UserName: this.options.username, Password: this.options.password }
    }, 1);

    if (response.status !== 200 && response.status !== 201) {
      throw new RedfishAuthError(`Session login failed: HTTP ${response.status}`, response.status);
    }
    const token = headerValue(response.headers, TOKEN_HEADER);
    if (!token) {
      throw new RedfishAuthError("Session login returned no X-Auth-Token header", response.status);
    }

    this.client.defaults.headers.common[TOKEN_HEADER] = token;
    this.sessionLocation = headerValue(response.headers, "Location");
    this.authenticated = true;
    this.errors.debug("Session established", { session: this.sessionLocation });
    return this.root;
  }

  async logout(): Promise<void> {
    if (!this.authenticated) {
      return;
    }
    this.authenticated = false;

    if (this.options.authMode === "basic") {
      delete this.client.defaults.auth;
      return;
    }

    const location = this.sessionLocation;
    this.sessionLocation = undefined;
    try {
      if (location) {
        const response = await this.request({ method: "DELETE", url: location });
        if (response.status >= 300) {
          this.errors.warn(`Session logout failed: HTTP ${response.status}`, { session: location });
        }
      } else {
        this.errors.warn("No session location known, session left to expire");
      }
    } catch (error) {
      this.errors.warn(`Session logout failed: ${errorMessage(error)}`, { session: location });
    } finally {
      delete this.client.defaults.headers.common[TOKEN_HEADER];
    }
  }

  async get(path: string): Promise<RedfishResponse> {
    const response = await this.request({ method: "GET", url: path });
    return { status: response.status, data: response.data };
  }

  private async fetchServiceRoot(): Promise<RedfishResource> {
    const response = await this.get(this.options.prefix);
    if (response.status !== 200 || !isRedfishResource(response.data)) {
      throw new RedfishError(`Service root ${this.options.prefix} not available: HTTP ${response.status}`);
    }
    return response.data;
  }

  private async request(
    config: AxiosRequestConfig,
    attempts: number = this.options.retries + 1
  ): Promise<AxiosResponse<unknown>> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.client.request<unknown>(config);
      } catch (error) {
        if (attempt >= attempts) {
          throw new RedfishTransportError(
            `${config.method} ${config.url} failed after ${attempts} attempt(s): ${errorMessage(error)}`,
            attempts,
            error
          );
        }
        this.errors.warn(`${config.method} ${config.url} failed, retrying (${attempt}/${this.options.retries})`, {
          error: errorMessage(error)
        });
      }
    }
  }
}
