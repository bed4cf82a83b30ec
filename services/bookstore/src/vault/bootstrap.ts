import { readFile } from 'fs/promises';
import type { Logger } from 'pino';
import { ConfigStore, resolveVaultSettings, type VaultSettings } from '../config';
import { AuthBootstrapError, SecretFetchError, errorMessage } from '../errors';
import { VaultClient } from './client';

export interface BootstrapDeps {
  logger: Pick<Logger, 'info' | 'warn'>;
  createClient?: (settings: VaultSettings) => VaultClient;
  readToken?: (path: string) => Promise<string>;
}

/**
 * One-shot startup sequence: Kubernetes login, KV v2 read, merge into config.
 *
 * A failed login is only logged; the client may still carry a token from
 * VAULT_TOKEN. Failing to read or merge the secret throws SecretFetchError.
 */
export async function bootstrapSecrets(store: ConfigStore, deps: BootstrapDeps): Promise<ConfigStore> {
  const { logger } = deps;
  const settings = resolveVaultSettings(store);
  const client = (deps.createClient ?? defaultClient)(settings);
  const readToken = deps.readToken ?? readServiceAccountToken;

  try {
    await loginKubernetes(client, settings, readToken);
    logger.info({ role: settings.role, mount: settings.authMount }, 'vault login succeeded');
  } catch (err) {
    const authErr = err instanceof AuthBootstrapError ? err : new AuthBootstrapError(errorMessage(err), { cause: err });
    logger.warn({ err: authErr, hasToken: client.hasToken }, 'vault login failed, continuing');
  }

  let bundle: Record<string, unknown>;
  try {
    bundle = await client.readKvV2(settings.kvMount, settings.bookstoreEnv);
  } catch (err) {
    throw new SecretFetchError(`unable to read secret: ${errorMessage(err)}`, { cause: err });
  }

  const merged = store.withSecrets(bundle);
  logger.info(
    { mount: settings.kvMount, env: settings.bookstoreEnv, keys: Object.keys(bundle).length },
    'secrets merged into configuration',
  );
  return merged;
}

async function loginKubernetes(
  client: VaultClient,
  settings: VaultSettings,
  readToken: (path: string) => Promise<string>,
): Promise<void> {
  let jwt: string;
  try {
    jwt = await readToken(settings.serviceAccountTokenPath);
  } catch (err) {
    throw new AuthBootstrapError(`unable to initialize Kubernetes auth method: ${errorMessage(err)}`, { cause: err });
  }
  if (!jwt) {
    throw new AuthBootstrapError(`unable to initialize Kubernetes auth method: empty token at ${settings.serviceAccountTokenPath}`);
  }

  await client.loginKubernetes({ role: settings.role, jwt, mountPath: settings.authMount });
}

function defaultClient(settings: VaultSettings): VaultClient {
  return new VaultClient({
    address: settings.address,
    token: settings.token,
    namespace: settings.namespace,
  });
}

async function readServiceAccountToken(path: string): Promise<string> {
  const raw = await readFile(path, 'utf8');
  return raw.trim();
}
