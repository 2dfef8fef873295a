// src/image/client.ts

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { UpdaterConfig } from '../config';
import { DIGEST_PATTERN, MANIFEST_MEDIA_TYPES } from '../constants';
import { RegistryError, RegistryErrorReason } from '../errors';
import { anonymousCredentials, DockerConfigCredentialProvider } from './credentials';
import { formatReference } from './parser';
import { parseAuthChallenge, TokenExchangeCredentialProvider } from './token';
import { AuthChallenge, ImageReference, RegistryClientOptions, RegistryCredentials } from './types';

const DIGEST_HEADER = 'docker-content-digest';

export class RegistryClient {
  private http: AxiosInstance;

  constructor(private options: RegistryClientOptions, http?: AxiosInstance) {
    this.http = http ?? axios.create({ timeout: options.timeout });
  }

  /**
   * Fetch the current content digest for a tag. The value of the
   * Docker-Content-Digest header is returned verbatim once it is a
   * well-formed digest. A 401 carrying a Bearer challenge is retried once
   * with the credentials the provider returns for that challenge.
   */
  async getDigest(reference: ImageReference): Promise<string> {
    const url = this.buildManifestUrl(reference);

    let response: AxiosResponse;
    try {
      response = await this.fetchManifest(url, await this.getHeaders(reference));
    } catch (error) {
      if (error instanceof RegistryError) {
        throw error;
      }
      const challenge = readChallenge(error);
      if (!challenge) {
        throw this.classify(error, reference);
      }
      response = await this.retryWithChallenge(url, reference, challenge, error);
    }

    const target = formatReference(reference);
    const digest = readHeader(response.headers, DIGEST_HEADER);
    if (!digest) {
      throw new RegistryError(`No digest header returned for ${target}`, 'malformed', reference, response.status);
    }
    // Must decode back from the last-digest annotation; repeated headers arrive joined with ", "
    if (!DIGEST_PATTERN.test(digest)) {
      throw new RegistryError(
        `Malformed digest header "${digest}" returned for ${target}`,
        'malformed',
        reference,
        response.status
      );
    }
    return digest;
  }

  private fetchManifest(url: string, headers: Record<string, string>): Promise<AxiosResponse> {
    return this.http.get(url, {
      headers,
      timeout: this.options.timeout,
      responseType: 'text',
    });
  }

  private async retryWithChallenge(
    url: string,
    reference: ImageReference,
    challenge: AuthChallenge,
    original: unknown
  ): Promise<AxiosResponse> {
    const headers = await this.getHeaders(reference, challenge);
    if (!headers.Authorization) {
      throw this.classify(original, reference);
    }
    try {
      return await this.fetchManifest(url, headers);
    } catch (error) {
      throw this.classify(error, reference);
    }
  }

  private buildManifestUrl(reference: ImageReference): string {
    const scheme = this.options.insecureRegistries.includes(reference.registry) ? 'http' : 'https';
    return `${scheme}://${reference.registry}/v2/${reference.repository}/manifests/${reference.tag}`;
  }

  private async getHeaders(reference: ImageReference, challenge?: AuthChallenge): Promise<Record<string, string>> {
    const headers: Record<string, string> = {
      Accept: MANIFEST_MEDIA_TYPES.join(', '),
    };

    let credentials: RegistryCredentials | undefined;
    try {
      credentials = await this.options.credentials.getCredentials(reference, challenge);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RegistryError(`Credential lookup failed for ${reference.registry}: ${message}`, 'unauthorized', reference);
    }

    if (credentials?.type === 'basic') {
      const token = Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64');
      headers.Authorization = `Basic ${token}`;
    } else if (credentials?.type === 'bearer') {
      headers.Authorization = `Bearer ${credentials.token}`;
    }
    return headers;
  }

  private classify(error: unknown, reference: ImageReference): RegistryError {
    const target = formatReference(reference);

    if (!axios.isAxiosError(error)) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return new RegistryError(`Failed to fetch manifest for ${target}: ${message}`, 'network', reference);
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new RegistryError(
        `Timed out after ${this.options.timeout}ms fetching manifest for ${target}`,
        'timeout',
        reference
      );
    }

    const status = error.response?.status;
    if (status === undefined) {
      return new RegistryError(`Failed to fetch manifest for ${target}: ${error.message}`, 'network', reference);
    }

    let reason: RegistryErrorReason = 'http';
    if (status === 401 || status === 403) {
      reason = 'unauthorized';
    } else if (status === 404) {
      reason = 'not_found';
    } else if (status >= 500) {
      reason = 'server';
    }
    return new RegistryError(`Failed to fetch manifest for ${target}: HTTP ${status}`, reason, reference, status);
  }
}

function readChallenge(error: unknown): AuthChallenge | undefined {
  if (!axios.isAxiosError(error) || error.response?.status !== 401) {
    return undefined;
  }
  return parseAuthChallenge(readHeader(error.response?.headers, 'www-authenticate'));
}

function readHeader(headers: AxiosResponse['headers'] | undefined, name: string): string | undefined {
  for (const [key, value] of Object.entries(headers ?? {})) {
    if (key.toLowerCase() === name && typeof value === 'string' && value.trim() !== '') {
      return value.trim();
    }
  }
  return undefined;
}

/**
 * Registry client wired from the updater settings
 */
export function createRegistryClient(
  config: Pick<UpdaterConfig, 'registryTimeout' | 'insecureRegistries' | 'registryAuthFile'>
): RegistryClient {
  const timeout = config.registryTimeout * 1000;
  const stored = config.registryAuthFile
    ? new DockerConfigCredentialProvider(config.registryAuthFile)
    : anonymousCredentials;
  return new RegistryClient({
    timeout,
    credentials: new TokenExchangeCredentialProvider(stored, timeout),
    insecureRegistries: config.insecureRegistries,
  });
}
