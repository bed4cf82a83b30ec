import { z } from 'zod';

type FetchImpl = typeof fetch;

export interface VaultClientOptions {
  address: string;
  token?: string;
  namespace?: string;
  fetch?: FetchImpl;
}

export interface KubernetesLogin {
  role: string;
  jwt: string;
  mountPath?: string;
}

const loginResponseSchema = z.object({
  auth: z
    .object({
      client_token: z.string().min(1),
      lease_duration: z.number().optional(),
      renewable: z.boolean().optional(),
    })
    .nullable()
    .optional(),
});

const kvV2ResponseSchema = z.object({
  data: z
    .object({
      data: z.record(z.unknown()).nullable().optional(),
      metadata: z.record(z.unknown()).nullable().optional(),
    })
    .nullable()
    .optional(),
});

export interface VaultAuthInfo {
  clientToken: string;
  leaseDuration?: number;
  renewable?: boolean;
}

/**
 * Minimal HTTP client for the secret store: Kubernetes login and
 * KV version 2 reads, nothing more.
 */
export class VaultClient {
  private readonly address: string;
  private readonly namespace?: string;
  private readonly fetchImpl: FetchImpl;
  private token?: string;

  constructor(options: VaultClientOptions) {
    this.address = options.address.replace(/\/+$/, '');
    this.namespace = options.namespace;
    this.token = options.token;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  get hasToken(): boolean {
    return Boolean(this.token);
  }

  async loginKubernetes(login: KubernetesLogin): Promise<VaultAuthInfo> {
    const mount = trimSlashes(login.mountPath ?? 'kubernetes');
    const res = await this.request('POST', `auth/${mount}/login`, {
      role: login.role,
      jwt: login.jwt,
    });

    if (!res.ok) {
      const detail = await safeErrorBody(res);
      throw new Error(`unable to log in with Kubernetes auth: ${res.status} ${res.statusText}${detail}`);
    }

    const parsed = loginResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error('unable to log in with Kubernetes auth: malformed login response');
    }
    const auth = parsed.data.auth;
    if (!auth) {
      throw new Error('no auth info was returned after login');
    }

    this.token = auth.client_token;
    return {
      clientToken: auth.client_token,
      leaseDuration: auth.lease_duration,
      renewable: auth.renewable,
    };
  }

  /** Reads the latest version of a KV v2 secret and returns its key/value data. */
  async readKvV2(mount: string, path: string): Promise<Record<string, unknown>> {
    const secretPath = `${trimSlashes(mount)}/data/${trimSlashes(path)}`;
    const res = await this.request('GET', secretPath);

    if (res.status === 404) {
      throw new Error(`secret not found: at ${secretPath}`);
    }
    if (!res.ok) {
      const detail = await safeErrorBody(res);
      throw new Error(`error encountered while reading secret at ${secretPath}: ${res.status} ${res.statusText}${detail}`);
    }

    const parsed = kvV2ResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error(`malformed secret response at ${secretPath}`);
    }
    const data = parsed.data.data?.data;
    if (!data) {
      throw new Error(`no secret data at ${secretPath}`);
    }
    return data;
  }

  private request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<Response> {
    const headers: Record<string, string> = {};
    if (body !== undefined) headers['Content-Type'] = 'application/json';
    if (this.token) headers['X-Vault-Token'] = this.token;
    if (this.namespace) headers['X-Vault-Namespace'] = this.namespace;

    return this.fetchImpl(`${this.address}/v1/${path}`, {
      method,
      headers,
      ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
    });
  }
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

async function safeErrorBody(res: Response): Promise<string> {
  try {
    const text = await res.text();
    return text ? ` - ${text}` : '';
  } catch {
    return '';
  }
}
