/**
 * Error classes
 *
 * Every error is scoped to one container or one workload; none of them is
 * fatal to the controller process.
 */

import { ImageReference } from './image/types';

/**
 * Base error for the image updater
 */
export class ImageUpdaterError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = 'ImageUpdaterError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised when a container image string cannot be parsed
 */
export class ImageParseError extends ImageUpdaterError {
  constructor(public image: string, reason: string) {
    super(`Invalid image reference "${image}": ${reason}`, 'IMAGE_PARSE_ERROR');
    this.name = 'ImageParseError';
  }
}

export type RegistryErrorReason =
  | 'timeout'
  | 'unauthorized'
  | 'not_found'
  | 'server'
  | 'malformed'
  | 'network'
  | 'http';

/**
 * Raised when the registry does not yield a digest for a reference
 */
export class RegistryError extends ImageUpdaterError {
  constructor(
    message: string,
    public reason: RegistryErrorReason,
    public reference: ImageReference,
    public status?: number
  ) {
    super(message, 'REGISTRY_ERROR');
    this.name = 'RegistryError';
  }
}

/**
 * Raised when the last-digest annotation matches neither the canonical
 * nor the legacy format
 */
export class AnnotationFormatError extends ImageUpdaterError {
  constructor(public value: string, reason: string) {
    super(`Unrecognized digest annotation "${value}": ${reason}`, 'ANNOTATION_FORMAT_ERROR');
    this.name = 'AnnotationFormatError';
  }
}

/**
 * Raised when the API server rejects a patch because the workload changed
 * after it was read
 */
export class PatchConflictError extends ImageUpdaterError {
  constructor(public workload: string) {
    super(`Workload ${workload} was modified concurrently`, 'PATCH_CONFLICT');
    this.name = 'PatchConflictError';
  }
}

export class ConfigurationError extends ImageUpdaterError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}
