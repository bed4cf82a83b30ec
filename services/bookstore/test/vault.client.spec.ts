import { describe, expect, it, vi } from 'vitest';
import { VaultClient } from '../src/vault/client';

function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

const LOGIN_OK = {
  auth: { client_token: 'test-client-token', lease_duration: 3600, renewable: true },
};

const SECRET_OK = {
  data: {
    data: { DB_USER: 'reader', DB_PASS: 'test-secret' },
    metadata: { version: 3 },
  },
};

describe('VaultClient.loginKubernetes', () => {
  it('posts role and jwt to the kubernetes auth mount and keeps the token', async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse(LOGIN_OK))
      .mockResolvedValueOnce(jsonResponse(SECRET_OK));
    const client = new VaultClient({ address: 'http://vault.test:8200/', fetch: fetchMock });

    const auth = await client.loginKubernetes({ role: 'bookstore', jwt: 'test-jwt' });

    expect(auth).toEqual({ clientToken: 'test-client-token', leaseDuration: 3600, renewable: true });
    expect(client.hasToken).toBe(true);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://vault.test:8200/v1/auth/kubernetes/login');
    expect(init).toMatchObject({ method: 'POST', headers: { 'Content-Type': 'application/json' } });
    expect(JSON.parse(String(init?.body))).toEqual({ role: 'bookstore', jwt: 'test-jwt' });

    await client.readKvV2('secret', 'dev');
    const [, readInit] = fetchMock.mock.calls[1];
    expect(readInit).toMatchObject({ method: 'GET', headers: { 'X-Vault-Token': 'test-client-token' } });
  });

  it('honours a custom auth mount path', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonResponse(LOGIN_OK));
    const client = new VaultClient({ address: 'http://vault.test:8200', fetch: fetchMock });

    await client.loginKubernetes({ role: 'bookstore', jwt: 'test-jwt', mountPath: '/k8s-prod/' });

    expect(fetchMock.mock.calls[0][0]).toBe('http://vault.test:8200/v1/auth/k8s-prod/login');
  });

  it('fails when the store returns no auth info', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonResponse({ auth: null }));
    const client = new VaultClient({ address: 'http://vault.test:8200', fetch: fetchMock });

    await expect(client.loginKubernetes({ role: 'bookstore', jwt: 'test-jwt' })).rejects.toThrow(
      'no auth info was returned after login',
    );
    expect(client.hasToken).toBe(false);
  });

  it('propagates a rejected login with the response details', async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('permission denied', { status: 403, statusText: 'Forbidden' }));
    const client = new VaultClient({ address: 'http://vault.test:8200', fetch: fetchMock });

    await expect(client.loginKubernetes({ role: 'bookstore', jwt: 'test-jwt' })).rejects.toThrow(
      'unable to log in with Kubernetes auth: 403 Forbidden - permission denied',
    );
  });
});

describe('VaultClient.readKvV2', () => {
  it('reads the data of a KV v2 secret', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonResponse(SECRET_OK));
    const client = new VaultClient({
      address: 'http://vault.test:8200',
      token: 'test-root-token',
      namespace: 'team-books',
      fetch: fetchMock,
    });

    const data = await client.readKvV2('secret', 'dev');

    expect(data).toEqual({ DB_USER: 'reader', DB_PASS: 'test-secret' });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://vault.test:8200/v1/secret/data/dev');
    expect(init).toMatchObject({
      method: 'GET',
      headers: { 'X-Vault-Token': 'test-root-token', 'X-Vault-Namespace': 'team-books' },
    });
    expect(init?.body).toBeUndefined();
  });

  it('reports a missing secret', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonResponse({ errors: [] }, 404));
    const client = new VaultClient({ address: 'http://vault.test:8200', fetch: fetchMock });

    await expect(client.readKvV2('secret', 'dev')).rejects.toThrow('secret not found: at secret/data/dev');
  });

  it('reports a deleted version that carries no data', async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse({ data: { data: null, metadata: { deletion_time: 'x' } } }));
    const client = new VaultClient({ address: 'http://vault.test:8200', fetch: fetchMock });

    await expect(client.readKvV2('secret', 'dev')).rejects.toThrow('no secret data at secret/data/dev');
  });

  it('surfaces server errors with status and body', async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('sealed', { status: 503, statusText: 'Service Unavailable' }));
    const client = new VaultClient({ address: 'http://vault.test:8200', fetch: fetchMock });

    await expect(client.readKvV2('secret', 'dev')).rejects.toThrow(/503 Service Unavailable - sealed/);
  });
});
