/**
 * Structured names of registry resources.
 * @module types/name
 */

import { RegistryTransportError } from '../errors.js';
import type { Action } from './action.js';

/**
 * Registry used when a reference names no host.
 */
export const DEFAULT_REGISTRY = 'index.docker.io';

const REGISTRY_PATTERN = /^[a-zA-Z0-9.-]+(?::\d+)?$/;
const REPOSITORY_COMPONENT_PATTERN = /^[a-z0-9]+(?:[._-][a-z0-9]+)*$/;
const TAG_PATTERN = /^\w[\w.-]{0,127}$/;
const DIGEST_PATTERN = /^sha256:[a-f0-9]{64}$/;

/**
 * What the registry transport needs to know about the resource it serves.
 */
export interface ResourceName {
  /** Registry host, with port when present */
  readonly registry: string;
  /** Authorization scope for the given action */
  scope(action: Action): string;
  /** Stable display name */
  toString(): string;
}

/**
 * A registry as a whole. Its only scope is the catalog.
 */
export class Registry implements ResourceName {
  readonly registry: string;

  constructor(registry: string) {
    if (!REGISTRY_PATTERN.test(registry)) {
      throw RegistryTransportError.invalidName(`Invalid registry: ${registry}`);
    }
    this.registry = registry;
  }

  scope(_action: Action): string {
    return 'registry:catalog:*';
  }

  toString(): string {
    return this.registry;
  }
}

/**
 * A repository within a registry.
 */
export class Repository implements ResourceName {
  readonly registry: string;
  readonly repository: string;

  constructor(registry: string | Registry, repository: string) {
    const host = typeof registry === 'string' ? new Registry(registry) : registry;
    const invalid = repository
      .split('/')
      .some((component) => !REPOSITORY_COMPONENT_PATTERN.test(component));
    if (invalid) {
      throw RegistryTransportError.invalidName(`Invalid repository: ${repository}`);
    }
    this.registry = host.registry;
    this.repository = repository;
  }

  scope(action: Action): string {
    return `repository:${this.repository}:${action}`;
  }

  toString(): string {
    return `${this.registry}/${this.repository}`;
  }
}

/**
 * A tagged image in a repository.
 */
export class Tag implements ResourceName {
  readonly repository: Repository;
  readonly tag: string;

  constructor(repository: Repository, tag: string) {
    if (!TAG_PATTERN.test(tag)) {
      throw RegistryTransportError.invalidName(`Invalid tag: ${tag}`);
    }
    this.repository = repository;
    this.tag = tag;
  }

  get registry(): string {
    return this.repository.registry;
  }

  scope(action: Action): string {
    return this.repository.scope(action);
  }

  toString(): string {
    return `${this.repository.toString()}:${this.tag}`;
  }
}

/**
 * An image in a repository addressed by content digest.
 */
export class Digest implements ResourceName {
  readonly repository: Repository;
  readonly digest: string;

  constructor(repository: Repository, digest: string) {
    if (!DIGEST_PATTERN.test(digest)) {
      throw RegistryTransportError.invalidName(`Invalid digest: ${digest}`);
    }
    this.repository = repository;
    this.digest = digest;
  }

  get registry(): string {
    return this.repository.registry;
  }

  scope(action: Action): string {
    return this.repository.scope(action);
  }

  toString(): string {
    return `${this.repository.toString()}@${this.digest}`;
  }
}

/**
 * Parses `[host[:port]/]path[:tag|@digest]`. The first path component is
 * taken as the host when it contains a `.` or `:` or is `localhost`.
 */
export function parseResourceName(reference: string): Repository | Tag | Digest {
  const [namePart, digest, ...rest] = reference.split('@');
  if (namePart === undefined || namePart === '' || rest.length > 0) {
    throw RegistryTransportError.invalidName(`Invalid reference: ${reference}`);
  }

  let path = namePart;
  let tag: string | undefined;
  const tagSeparator = namePart.lastIndexOf(':');
  if (tagSeparator > namePart.lastIndexOf('/')) {
    path = namePart.slice(0, tagSeparator);
    tag = namePart.slice(tagSeparator + 1);
  }

  const slash = path.indexOf('/');
  const first = slash === -1 ? path : path.slice(0, slash);
  const hasHost =
    slash !== -1 && (first.includes('.') || first.includes(':') || first === 'localhost');
  const repository = hasHost
    ? new Repository(first, path.slice(slash + 1))
    : new Repository(DEFAULT_REGISTRY, path);

  if (digest !== undefined) {
    if (tag !== undefined) {
      throw RegistryTransportError.invalidName(`Invalid reference: ${reference}`);
    }
    return new Digest(repository, digest);
  }

  return tag === undefined ? repository : new Tag(repository, tag);
}
