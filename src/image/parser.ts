import {
  DEFAULT_NAMESPACE,
  DEFAULT_REGISTRY,
  DEFAULT_TAG,
  DIGEST_PATTERN,
  DOCKER_HUB_ALIASES,
} from '../constants';
import { ImageParseError } from '../errors';
import { ImageReference } from './types';

export class ImageParser {
  parse(image: string): ImageReference {
    // Handle image name format: [registry/][namespace/]repository[:tag][@digest]
    if (typeof image !== 'string' || image.trim() === '') {
      throw new ImageParseError(String(image), 'image name cannot be empty');
    }

    let rest = image.trim();
    let digest: string | undefined;

    const atIndex = rest.indexOf('@');
    if (atIndex !== -1) {
      digest = rest.substring(atIndex + 1);
      rest = rest.substring(0, atIndex);
      if (!DIGEST_PATTERN.test(digest)) {
        throw new ImageParseError(image, `malformed digest "${digest}"`);
      }
    }

    let registry = DEFAULT_REGISTRY;
    const slashIndex = rest.indexOf('/');
    if (slashIndex !== -1) {
      const potentialRegistry = rest.substring(0, slashIndex);
      if (potentialRegistry.includes('.') || potentialRegistry.includes(':') || potentialRegistry === 'localhost') {
        registry = potentialRegistry;
        rest = rest.substring(slashIndex + 1);
      }
    }

    if (DOCKER_HUB_ALIASES.includes(registry)) {
      registry = DEFAULT_REGISTRY;
    }

    // Tag lives on the last path component, after a registry port has been stripped
    const lastSlash = rest.lastIndexOf('/');
    const lastComponent = rest.substring(lastSlash + 1);
    const colonCount = lastComponent.split(':').length - 1;
    if (colonCount > 1) {
      throw new ImageParseError(image, 'ambiguous tag separator');
    }

    let repository = rest;
    let tag = DEFAULT_TAG;
    if (colonCount === 1) {
      const tagIndex = rest.lastIndexOf(':');
      tag = rest.substring(tagIndex + 1);
      repository = rest.substring(0, tagIndex);
      if (tag === '') {
        throw new ImageParseError(image, 'empty tag');
      }
    }

    if (repository === '' || repository.split('/').some((segment) => segment === '')) {
      throw new ImageParseError(image, 'empty repository path segment');
    }

    // Docker Hub official images live under library/
    if (registry === DEFAULT_REGISTRY && !repository.includes('/')) {
      repository = `${DEFAULT_NAMESPACE}/${repository}`;
    }

    return digest ? { registry, repository, tag, digest } : { registry, repository, tag };
  }
}

export function isPinned(reference: ImageReference): reference is ImageReference & { digest: string } {
  return typeof reference.digest === 'string';
}

export function formatReference(reference: ImageReference): string {
  const base = `${reference.registry}/${reference.repository}:${reference.tag}`;
  return reference.digest ? `${base}@${reference.digest}` : base;
}

export const imageParser = new ImageParser();
