/**
 * Media types spoken by Docker Registry v2.
 * @module types/mime
 */

export const MANIFEST_SCHEMA1_MIME = 'application/vnd.docker.distribution.manifest.v1+json';
export const MANIFEST_SCHEMA1_SIGNED_MIME = 'application/vnd.docker.distribution.manifest.v1+prettyjws';
export const MANIFEST_SCHEMA2_MIME = 'application/vnd.docker.distribution.manifest.v2+json';
export const MANIFEST_LIST_MIME = 'application/vnd.docker.distribution.manifest.list.v2+json';
export const LAYER_MIME = 'application/vnd.docker.image.rootfs.diff.tar.gzip';
export const CONFIG_JSON_MIME = 'application/vnd.docker.container.image.v1+json';

export const MANIFEST_SCHEMA1_MIMES = [MANIFEST_SCHEMA1_MIME, MANIFEST_SCHEMA1_SIGNED_MIME] as const;
export const MANIFEST_SCHEMA2_MIMES = [MANIFEST_SCHEMA2_MIME] as const;

/**
 * Manifest types a client can ask for with `Accept`.
 */
export const SUPPORTED_MANIFEST_MIMES = [
  ...MANIFEST_SCHEMA1_MIMES,
  ...MANIFEST_SCHEMA2_MIMES,
  MANIFEST_LIST_MIME,
] as const;

/**
 * Content type used for request bodies when none is given.
 */
export const DEFAULT_CONTENT_TYPE = 'application/json';
