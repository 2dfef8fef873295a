import * as fs from 'fs';
import { DEFAULT_REGISTRY, DOCKER_HUB_ALIASES } from '../constants';
import { createLogger, Logger } from '../logger';
import { CredentialProvider, ImageReference, RegistryCredentials } from './types';

const DOCKER_HUB_CONFIG_KEY = 'https://index.docker.io/v1/';

interface DockerAuthEntry {
  auth?: string;
  username?: string;
  password?: string;
  registrytoken?: string;
}

interface DockerConfig {
  auths: Record<string, DockerAuthEntry>;
}

function isDockerConfig(obj: unknown): obj is DockerConfig {
  if (obj && typeof obj === 'object' && 'auths' in obj) {
    return !!obj.auths && typeof obj.auths === 'object';
  }
  return false;
}

/**
 * Anonymous access for every registry
 */
export const anonymousCredentials: CredentialProvider = {
  async getCredentials(): Promise<RegistryCredentials | undefined> {
    return undefined;
  },
};

/**
 * Credentials from a mounted `.dockerconfigjson` (the format of
 * `kubernetes.io/dockerconfigjson` secrets). The file is read once.
 */
export class DockerConfigCredentialProvider implements CredentialProvider {
  private auths: Record<string, DockerAuthEntry> | null = null;
  private logger: Logger;

  constructor(private configPath: string, logger?: Logger) {
    this.logger = logger ?? createLogger('credentials');
  }

  async getCredentials(reference: ImageReference): Promise<RegistryCredentials | undefined> {
    const auths = await this.load();
    for (const key of this.candidateKeys(reference.registry)) {
      const entry = auths[key];
      if (entry) {
        return toCredentials(entry);
      }
    }
    return undefined;
  }

  private candidateKeys(registry: string): string[] {
    const keys = [registry, `https://${registry}`, `http://${registry}`];
    if (registry === DEFAULT_REGISTRY) {
      keys.push(DOCKER_HUB_CONFIG_KEY, ...DOCKER_HUB_ALIASES);
    }
    return keys;
  }

  private async load(): Promise<Record<string, DockerAuthEntry>> {
    if (this.auths) {
      return this.auths;
    }

    try {
      const content = await fs.promises.readFile(this.configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      if (isDockerConfig(parsed)) {
        this.auths = parsed.auths;
      } else {
        this.logger.warn({ path: this.configPath }, 'Registry auth file has no "auths" object, using anonymous access');
        this.auths = {};
      }
    } catch (error) {
      this.logger.warn(
        { path: this.configPath, err: error },
        'Failed to read registry auth file, using anonymous access'
      );
      this.auths = {};
    }
    return this.auths;
  }
}

function toCredentials(entry: DockerAuthEntry): RegistryCredentials | undefined {
  if (entry.registrytoken) {
    return { type: 'bearer', token: entry.registrytoken };
  }
  if (entry.username && entry.password) {
    return { type: 'basic', username: entry.username, password: entry.password };
  }
  if (entry.auth) {
    const decoded = Buffer.from(entry.auth, 'base64').toString('utf-8');
    const separator = decoded.indexOf(':');
    if (separator > 0) {
      return {
        type: 'basic',
        username: decoded.substring(0, separator),
        password: decoded.substring(separator + 1),
      };
    }
  }
  return undefined;
}
