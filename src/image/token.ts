// src/image/token.ts

import axios, { AxiosInstance } from 'axios';
import { AuthChallenge, CredentialProvider, ImageReference, RegistryCredentials } from './types';

const BEARER_SCHEME = /^bearer\s+/i;
const CHALLENGE_PARAM = /(\w+)="([^"]*)"/g;

/**
 * Parse a `WWW-Authenticate` header. Only the Bearer scheme with a realm
 * yields a challenge.
 */
export function parseAuthChallenge(header: string | undefined): AuthChallenge | undefined {
  if (!header || !BEARER_SCHEME.test(header)) {
    return undefined;
  }

  const params = new Map<string, string>();
  for (const match of header.replace(BEARER_SCHEME, '').matchAll(CHALLENGE_PARAM)) {
    params.set(match[1].toLowerCase(), match[2]);
  }

  const realm = params.get('realm');
  if (!realm) {
    return undefined;
  }
  const service = params.get('service');
  const scope = params.get('scope');
  return {
    realm,
    ...(service ? { service } : {}),
    ...(scope ? { scope } : {}),
  };
}

function readToken(data: unknown): string | undefined {
  if (!data || typeof data !== 'object') {
    return undefined;
  }
  if ('token' in data && typeof data.token === 'string' && data.token !== '') {
    return data.token;
  }
  if ('access_token' in data && typeof data.access_token === 'string' && data.access_token !== '') {
    return data.access_token;
  }
  return undefined;
}

/**
 * Answers Bearer challenges by fetching a repository-scoped pull token from
 * the challenge realm, the way Docker Hub and GHCR require even for public
 * images. Basic credentials from the wrapped provider authenticate the token
 * request; without a challenge the wrapped provider answers alone.
 */
export class TokenExchangeCredentialProvider implements CredentialProvider {
  private http: AxiosInstance;

  constructor(private base: CredentialProvider, private timeout: number, http?: AxiosInstance) {
    this.http = http ?? axios.create({ timeout });
  }

  async getCredentials(
    reference: ImageReference,
    challenge?: AuthChallenge
  ): Promise<RegistryCredentials | undefined> {
    const base = await this.base.getCredentials(reference, challenge);
    if (!challenge || base?.type === 'bearer') {
      return base;
    }

    const params: Record<string, string> = {
      scope: challenge.scope ?? `repository:${reference.repository}:pull`,
    };
    if (challenge.service) {
      params.service = challenge.service;
    }

    const response = await this.http.get<unknown>(challenge.realm, {
      params,
      timeout: this.timeout,
      ...(base ? { auth: { username: base.username, password: base.password } } : {}),
    });

    const token = readToken(response.data);
    if (!token) {
      throw new Error(`No token in response from ${challenge.realm}`);
    }
    return { type: 'bearer', token };
  }
}
