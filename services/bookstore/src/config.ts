import { z } from 'zod';
import { SecretFetchError } from './errors';

export const PORT = 'PORT';
export const HOST = 'HOST';
export const LOG_LEVEL = 'LOG_LEVEL';

export const VAULT_ADDR = 'VAULT_ADDR';
export const VAULT_TOKEN = 'VAULT_TOKEN';
export const VAULT_NAMESPACE = 'VAULT_NAMESPACE';
export const VAULT_ROLE = 'VAULT_ROLE';
export const VAULT_KV_MOUNT = 'VAULT_KV_MOUNT';
export const VAULT_BOOKSTORE_ENV = 'VAULT_BOOKSTORE_ENV';
export const VAULT_K8S_AUTH_MOUNT = 'VAULT_K8S_AUTH_MOUNT';

export const KUBE_SVC_ACCT_TOKEN = 'KUBE_SVC_ACCT_TOKEN';

export const DB_HOST = 'DB_HOST';
export const DB_PORT = 'DB_PORT';
export const DB_NAME = 'DB_NAME';
export const DB_USER = 'DB_USER';
export const DB_PASS = 'DB_PASS';
export const DB_SSL = 'DB_SSL';

const DEFAULT_PORT = 8080;
const DEFAULT_HOST = '0.0.0.0';
const DEFAULT_VAULT_ADDR = 'https://127.0.0.1:8200';
const DEFAULT_K8S_AUTH_MOUNT = 'kubernetes';
const DEFAULT_SVC_ACCT_TOKEN_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/token';

const secretBundleSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

/**
 * Flat, case-insensitive key/value view over the process environment and the
 * secret bundle fetched at startup. Instances are immutable: merging secrets
 * yields a new store.
 */
export class ConfigStore {
  private readonly values: ReadonlyMap<string, string>;

  private constructor(values: Map<string, string>) {
    this.values = values;
  }

  static fromEnv(env: NodeJS.ProcessEnv): ConfigStore {
    const values = new Map<string, string>();
    for (const [key, value] of Object.entries(env)) {
      if (typeof value === 'string') values.set(normalizeKey(key), value);
    }
    return new ConfigStore(values);
  }

  /** Returns the value for `key`, or an empty string when it was never set. */
  get(key: string): string {
    return this.values.get(normalizeKey(key)) ?? '';
  }

  has(key: string): boolean {
    return this.values.has(normalizeKey(key));
  }

  /** Secret entries win over environment entries with the same key. */
  withSecrets(bundle: unknown): ConfigStore {
    const parsed = secretBundleSchema.safeParse(bundle);
    if (!parsed.success) {
      throw new SecretFetchError(
        `unable to merge secret: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
        { cause: parsed.error },
      );
    }
    const merged = new Map(this.values);
    for (const [key, value] of Object.entries(parsed.data)) {
      merged.set(normalizeKey(key), String(value));
    }
    return new ConfigStore(merged);
  }
}

function normalizeKey(key: string): string {
  return key.toUpperCase();
}

// ---------- Typed settings ----------

const portSchema = z.coerce.number().int().min(0).max(65535);

export interface VaultSettings {
  address: string;
  token?: string;
  namespace?: string;
  role: string;
  kvMount: string;
  bookstoreEnv: string;
  authMount: string;
  serviceAccountTokenPath: string;
}

export interface DatabaseSettings {
  host: string;
  port: string;
  name: string;
  user: string;
  password: string;
  sslMode: string;
}

export interface AppSettings {
  port: number;
  host: string;
  logLevel: string;
  vault: VaultSettings;
  db: DatabaseSettings;
}

export function resolveVaultSettings(store: ConfigStore): VaultSettings {
  return {
    address: store.get(VAULT_ADDR) || DEFAULT_VAULT_ADDR,
    token: store.get(VAULT_TOKEN) || undefined,
    namespace: store.get(VAULT_NAMESPACE) || undefined,
    role: store.get(VAULT_ROLE),
    kvMount: store.get(VAULT_KV_MOUNT),
    bookstoreEnv: store.get(VAULT_BOOKSTORE_ENV),
    authMount: store.get(VAULT_K8S_AUTH_MOUNT) || DEFAULT_K8S_AUTH_MOUNT,
    serviceAccountTokenPath: store.get(KUBE_SVC_ACCT_TOKEN) || DEFAULT_SVC_ACCT_TOKEN_PATH,
  };
}

export function resolveSettings(store: ConfigStore): AppSettings {
  const rawPort = store.get(PORT);
  const port = rawPort ? portSchema.parse(rawPort) : DEFAULT_PORT;

  return {
    port,
    host: store.get(HOST) || DEFAULT_HOST,
    logLevel: store.get(LOG_LEVEL) || 'info',
    vault: resolveVaultSettings(store),
    db: {
      host: store.get(DB_HOST),
      port: store.get(DB_PORT),
      name: store.get(DB_NAME),
      user: store.get(DB_USER),
      password: store.get(DB_PASS),
      sslMode: store.get(DB_SSL),
    },
  };
}

export function buildDatabaseUrl(db: DatabaseSettings): string {
  const auth = `${encodeURIComponent(db.user)}:${encodeURIComponent(db.password)}`;
  const base = `postgres://${auth}@${db.host}:${db.port}/${db.name}`;
  return db.sslMode ? `${base}?sslmode=${encodeURIComponent(db.sslMode)}` : base;
}
