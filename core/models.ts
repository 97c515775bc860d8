/**
 * Resource models shared by the pools and the request client.
 * Values are frozen; a status change produces a new value.
 */

export enum CredentialStatus {
  ACTIVE = 'ACTIVE',
  INVALID = 'INVALID',
}

export interface Credential {
  readonly id: number;
  readonly name: string;
  /** Cookie header value for the platform session. */
  readonly cookie: string;
  readonly userAgent?: string;
  readonly status: CredentialStatus;
  /** Epoch ms; 0 while active. */
  readonly invalidatedAt: number;
}

export type ProxyProtocol = 'http' | 'https';

export interface ProxyEndpoint {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
  readonly protocol: ProxyProtocol;
  /** Epoch ms after which the endpoint must not be used. */
  readonly expiresAt: number;
}

export interface CredentialBinding {
  readonly credential: Credential;
  readonly proxy: ProxyEndpoint | null;
}

export function createCredential(
  input: Pick<Credential, 'id' | 'name' | 'cookie'> & Partial<Pick<Credential, 'userAgent'>>,
): Credential {
  return Object.freeze({
    id: input.id,
    name: input.name,
    cookie: input.cookie,
    userAgent: input.userAgent,
    status: CredentialStatus.ACTIVE,
    invalidatedAt: 0,
  });
}

export function invalidatedCredential(credential: Credential, at: number): Credential {
  return Object.freeze({ ...credential, status: CredentialStatus.INVALID, invalidatedAt: at });
}

export function createProxyEndpoint(
  input: Omit<ProxyEndpoint, 'protocol' | 'user' | 'password'> &
    Partial<Pick<ProxyEndpoint, 'protocol' | 'user' | 'password'>>,
): ProxyEndpoint {
  return Object.freeze({
    host: input.host,
    port: input.port,
    user: input.user ?? '',
    password: input.password ?? '',
    protocol: input.protocol ?? 'http',
    expiresAt: input.expiresAt,
  });
}

export function createBinding(credential: Credential, proxy: ProxyEndpoint | null): CredentialBinding {
  return Object.freeze({ credential, proxy });
}

export function isProxyExpired(proxy: ProxyEndpoint, now: number = Date.now()): boolean {
  return now >= proxy.expiresAt;
}

export function sameProxyEndpoint(a: ProxyEndpoint, b: ProxyEndpoint): boolean {
  return (
    a.host === b.host &&
    a.port === b.port &&
    a.protocol === b.protocol &&
    a.user === b.user &&
    a.password === b.password
  );
}

export function proxyUrl(proxy: ProxyEndpoint): string {
  const auth =
    proxy.user || proxy.password
      ? `${encodeURIComponent(proxy.user)}:${encodeURIComponent(proxy.password)}@`
      : '';
  return `${proxy.protocol}://${auth}${proxy.host}:${proxy.port}`;
}

/** Log-safe label, credentials omitted. */
export function describeProxy(proxy: ProxyEndpoint | null): string {
  return proxy ? `${proxy.host}:${proxy.port}` : 'direct';
}
