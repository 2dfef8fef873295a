/**
 * Annotation keys and registry constants shared by the controller
 */

const ANNOTATION_PREFIX = 'image-updater.eznix86.github.io';

export const ENABLE_ANNOTATION = `${ANNOTATION_PREFIX}/enabled`;
export const TRACK_CONTAINERS_ANNOTATION = `${ANNOTATION_PREFIX}/track-containers`;
export const IGNORE_CONTAINERS_ANNOTATION = `${ANNOTATION_PREFIX}/ignore-containers`;
export const TRACK_INIT_CONTAINERS_ANNOTATION = `${ANNOTATION_PREFIX}/track-init-containers`;
export const LAST_DIGEST_ANNOTATION = `${ANNOTATION_PREFIX}/last-digest`;

// Written to spec.template.metadata.annotations, same key `kubectl rollout restart` uses
export const RESTART_ANNOTATION = 'kubectl.kubernetes.io/restartedAt';

export const ENABLED_VALUE = 'true';

export const DEFAULT_REGISTRY = 'registry-1.docker.io';
export const DEFAULT_NAMESPACE = 'library';
export const DEFAULT_TAG = 'latest';

// Hosts that all mean Docker Hub
export const DOCKER_HUB_ALIASES = ['docker.io', 'index.docker.io', DEFAULT_REGISTRY];

export const MANIFEST_MEDIA_TYPES = [
  'application/vnd.oci.image.manifest.v1+json',
  'application/vnd.docker.distribution.manifest.v2+json',
  'application/vnd.oci.image.index.v1+json',
  'application/vnd.docker.distribution.manifest.list.v2+json',
];

export const ALWAYS_PULL_POLICY = 'Always';

// algorithm:encoded, as in the OCI image spec
export const DIGEST_PATTERN = /^[a-z0-9]+(?:[+._-][a-z0-9]+)*:[a-zA-Z0-9=_-]+$/;
