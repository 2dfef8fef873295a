// src/image/types.ts

export interface ImageReference {
  registry: string;
  repository: string;
  tag: string;
  /** Set when the image is pinned by digest (`repo@sha256:...`) */
  digest?: string;
}

export type RegistryCredentials =
  | { type: 'basic'; username: string; password: string }
  | { type: 'bearer'; token: string };

/**
 * Parameters of a `WWW-Authenticate: Bearer` challenge
 */
export interface AuthChallenge {
  realm: string;
  service?: string;
  scope?: string;
}

/**
 * Supplies credentials for one image. Returning undefined means anonymous
 * access. Called again with the challenge when the registry answers 401.
 */
export interface CredentialProvider {
  getCredentials(reference: ImageReference, challenge?: AuthChallenge): Promise<RegistryCredentials | undefined>;
}

export interface RegistryClientOptions {
  /** Request timeout in milliseconds */
  timeout: number;
  credentials: CredentialProvider;
  /** Hosts reached over plain http */
  insecureRegistries: string[];
}
