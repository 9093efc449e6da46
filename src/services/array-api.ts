import axios, { type AxiosAdapter, type AxiosInstance, type Method } from 'axios';
import https from 'https';

const REST_PREFIX = '/api/rest';
const SESSION_TOKEN_HEADER = 'dell-emc-token';

const HOST_DETAIL_SELECT = [
  'id',
  'name',
  'os_type',
  'host_connectivity',
  'host_initiators',
].join(',');

export type ArrayApiOptions = {
  baseUrl: string;
  username: string;
  password: string;
  allowInsecureTls?: boolean;
  timeoutMs?: number;
  /** Transport override; defaults to axios' http adapter. */
  adapter?: AxiosAdapter;
};

export type WireInitiator = {
  port_name: string;
  port_type: string;
  chap_single_username?: string;
  chap_single_password?: string;
  chap_mutual_username?: string;
  chap_mutual_password?: string;
};

export type CreateHostPayload = {
  name: string;
  os_type: string;
  initiators: WireInitiator[];
  host_connectivity?: string;
};

export type ModifyHostPayload = {
  add_initiators?: WireInitiator[];
  remove_initiators?: string[];
  name?: string;
  host_connectivity?: string;
};

export type ArrayApiErrorDetails = {
  status?: number;
  code?: string;
  method?: string;
  url?: string;
  cause?: Error;
};

/**
 * Error raised for any failed call, carrying the HTTP status when there was one.
 * Only the request line is kept: bodies and headers hold credentials.
 */
export class ArrayApiError extends Error {
  readonly status?: number;
  readonly code?: string;
  readonly method?: string;
  readonly url?: string;

  constructor(message: string, details: ArrayApiErrorDetails = {}) {
    super(message, details.cause ? { cause: details.cause } : undefined);
    this.name = 'ArrayApiError';
    this.status = details.status;
    this.code = details.code;
    this.method = details.method;
    this.url = details.url;
  }
}

function readMessages(data: unknown): string | undefined {
  if (!data || typeof data !== 'object' || !('messages' in data)) return undefined;
  const { messages } = data;
  if (!Array.isArray(messages)) return undefined;
  const texts = messages
    .map((m: unknown) =>
      m && typeof m === 'object' && 'message_l10n' in m ? String(m.message_l10n) : undefined
    )
    .filter((t): t is string => Boolean(t));
  return texts.length > 0 ? texts.join('; ') : undefined;
}

function toArrayApiError(err: unknown): ArrayApiError {
  if (err instanceof ArrayApiError) return err;
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const detail = readMessages(err.response?.data) ?? err.message;
    return new ArrayApiError(status ? `HTTP ${status}: ${detail}` : detail, {
      status,
      code: err.code,
      method: err.config?.method?.toUpperCase(),
      url: err.config?.url,
      // the AxiosError itself carries the request config, auth included
      cause: new Error(err.message),
    });
  }
  if (err instanceof Error) {
    return new ArrayApiError(err.message, { cause: err });
  }
  return new ArrayApiError(String(err));
}

/**
 * Thin wrapper around the storage controller's REST host endpoints.
 * Logs in lazily once and reuses the session token for every call.
 */
export class ArrayApi {
  private readonly client: AxiosInstance;
  private loginPromise?: Promise<void>;

  constructor(options: ArrayApiOptions) {
    const httpsAgent = options.allowInsecureTls
      ? new https.Agent({ rejectUnauthorized: false })
      : undefined;

    this.client = axios.create({
      baseURL: `${options.baseUrl.replace(/\/$/, '')}${REST_PREFIX}`,
      auth: {
        username: options.username,
        password: options.password,
      },
      timeout: options.timeoutMs ?? 15_000,
      httpsAgent,
      adapter: options.adapter,
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
      },
    });
  }

  private async login(): Promise<void> {
    const res = await this.client.get('/login_session');

    const token = res.headers[SESSION_TOKEN_HEADER];
    if (typeof token === 'string' && token) {
      this.client.defaults.headers.common[SESSION_TOKEN_HEADER] = token;
    }

    const setCookie = res.headers['set-cookie'];
    if (setCookie && setCookie.length > 0) {
      this.client.defaults.headers.common.Cookie = setCookie.join('; ');
    }
  }

  private async ensureLogin(): Promise<void> {
    if (!this.loginPromise) {
      this.loginPromise = this.login().catch((err: unknown) => {
        this.loginPromise = undefined;
        throw toArrayApiError(err);
      });
    }
    return this.loginPromise;
  }

  private async request(method: Method, url: string, data?: unknown): Promise<unknown> {
    await this.ensureLogin();
    try {
      const res = await this.client.request<unknown>({ method, url, data });
      return res.data;
    } catch (err) {
      throw toArrayApiError(err);
    }
  }

  // ---- Hosts ----

  async getHostsByName(name: string): Promise<unknown> {
    const search = new URLSearchParams();
    search.set('name', `eq.${name}`);
    search.set('select', 'id,name');
    return this.request('GET', `/host?${search.toString()}`);
  }

  async getHost(id: string): Promise<unknown> {
    const search = new URLSearchParams();
    search.set('select', HOST_DETAIL_SELECT);
    return this.request('GET', `/host/${encodeURIComponent(id)}?${search.toString()}`);
  }

  async createHost(payload: CreateHostPayload): Promise<unknown> {
    return this.request('POST', '/host', payload);
  }

  async modifyHost(id: string, payload: ModifyHostPayload): Promise<unknown> {
    return this.request('PATCH', `/host/${encodeURIComponent(id)}`, payload);
  }

  async deleteHost(id: string): Promise<unknown> {
    return this.request('DELETE', `/host/${encodeURIComponent(id)}`);
  }
}
