/**
 * Core data model types for vql-manager.
 *
 * Design principle: Immutable, readonly types. No methods that mutate.
 */

import { createHash } from 'crypto';
import { DuplicateIdentityError } from './errors';

// === Object Kinds ===

/**
 * Chapters of a Denodo export script, in the order the script executes them.
 */
export const OBJECT_KINDS = [
  'I18N MAPS',
  'DATABASE',
  'FOLDERS',
  'LISTENERS JMS',
  'DATASOURCES',
  'WRAPPERS',
  'STORED PROCEDURES',
  'TYPES',
  'MAPS',
  'BASE VIEWS',
  'VIEWS',
  'ASSOCIATIONS',
  'WEBSERVICES',
  'WIDGETS',
  'WEBCONTAINER WEB SERVICE DEPLOYMENTS',
  'WEBCONTAINER WIDGET DEPLOYMENTS',
] as const;

export type ObjectKind = typeof OBJECT_KINDS[number];

export function isObjectKind(value: string): value is ObjectKind {
  return OBJECT_KINDS.some((kind) => kind === value);
}

// === Identity ===

export interface ObjectIdentity {
  readonly kind: ObjectKind;
  /** Lower-cased object name, unique within its kind */
  readonly name: string;
}

export function createIdentity(kind: ObjectKind, name: string): ObjectIdentity {
  return { kind, name: name.toLowerCase() };
}

/**
 * Stable string key for an identity, usable in maps and sets.
 * Names compare case-insensitively, also for identities not built by createIdentity.
 */
export function identityKey(identity: ObjectIdentity): string {
  return JSON.stringify([identity.kind, identity.name.toLowerCase()]);
}

export function compareIdentities(a: ObjectIdentity, b: ObjectIdentity): number {
  if (a.kind !== b.kind) {
    return a.kind < b.kind ? -1 : 1;
  }
  if (a.name !== b.name) {
    return a.name < b.name ? -1 : 1;
  }
  return 0;
}

export function formatIdentity(identity: ObjectIdentity): string {
  return `${identity.kind}:${identity.name}`;
}

/**
 * Parse `KIND:name`, e.g. `BASE VIEWS:bv_customer`.
 * Returns undefined if the kind is unknown or the name is empty.
 */
export function parseIdentity(text: string): ObjectIdentity | undefined {
  const separator = text.indexOf(':');
  if (separator === -1) return undefined;

  const kind = text.slice(0, separator).trim().toUpperCase();
  const name = text.slice(separator + 1).trim();
  if (!isObjectKind(kind) || name === '') return undefined;

  return createIdentity(kind, name);
}

// === Code Objects ===

export type Normalization = 'none' | 'whitespace';

export interface CodeObject {
  readonly identity: ObjectIdentity;
  /** Object name as written in the script */
  readonly displayName: string;
  /** The exact script fragment defining the object */
  readonly text: string;
  readonly dependencies: readonly ObjectIdentity[];
  /** Denodo folder path (lower case, no leading slash), if the object has one */
  readonly folder: string | undefined;
  readonly hash: string;
}

export interface CodeObjectInput {
  readonly kind: ObjectKind;
  readonly name: string;
  readonly text: string;
  readonly dependencies?: readonly ObjectIdentity[];
  readonly folder?: string;
}

export interface CodeObjectOptions {
  readonly normalize?: Normalization;
}

export function contentHash(text: string, normalize: Normalization = 'none'): string {
  const normalized = normalize === 'whitespace' ? text.replace(/\s+/g, ' ').trim() : text;
  return createHash('sha256').update(normalized, 'utf8').digest('hex');
}

export function createCodeObject(input: CodeObjectInput, options: CodeObjectOptions = {}): CodeObject {
  const identity = createIdentity(input.kind, input.name);
  const ownKey = identityKey(identity);

  // Deduplicate and drop self references
  const dependencies = new Map<string, ObjectIdentity>();
  for (const dep of input.dependencies ?? []) {
    const key = identityKey(dep);
    if (key !== ownKey && !dependencies.has(key)) {
      dependencies.set(key, createIdentity(dep.kind, dep.name));
    }
  }

  return Object.freeze({
    identity,
    displayName: input.name,
    text: input.text,
    dependencies: Object.freeze([...dependencies.values()].sort(compareIdentities)),
    folder: input.folder,
    hash: contentHash(input.text, options.normalize),
  });
}

// === Codebase ===

/**
 * An immutable snapshot of all objects of one code base.
 */
export interface Codebase {
  readonly name: string;
  readonly size: number;
  /** Returns undefined if no object has this identity */
  get(identity: ObjectIdentity): CodeObject | undefined;
  has(identity: ObjectIdentity): boolean;
  /** All objects, sorted by kind then name */
  objects(): readonly CodeObject[];
  identities(): readonly ObjectIdentity[];
}

/**
 * Build a codebase from code objects.
 * @throws DuplicateIdentityError if two objects share an identity
 */
export function createCodebase(name: string, objects: Iterable<CodeObject>): Codebase {
  const byKey = new Map<string, CodeObject>();

  for (const object of objects) {
    const key = identityKey(object.identity);
    if (byKey.has(key)) {
      throw new DuplicateIdentityError(object.identity);
    }
    byKey.set(key, object);
  }

  const sorted = Object.freeze(
    [...byKey.values()].sort((a, b) => compareIdentities(a.identity, b.identity))
  );
  const identities = Object.freeze(sorted.map(o => o.identity));

  return {
    name,
    size: sorted.length,
    get(identity: ObjectIdentity): CodeObject | undefined {
      return byKey.get(identityKey(identity));
    },
    has(identity: ObjectIdentity): boolean {
      return byKey.has(identityKey(identity));
    },
    objects(): readonly CodeObject[] {
      return sorted;
    },
    identities(): readonly ObjectIdentity[] {
      return identities;
    },
  };
}

// === Change Report ===

export interface ChangedObject {
  readonly identity: ObjectIdentity;
  readonly oldText: string;
  readonly newText: string;
}

export interface ChangeReport {
  readonly oldName: string;
  readonly newName: string;
  readonly added: readonly ObjectIdentity[];
  readonly removed: readonly ObjectIdentity[];
  readonly changed: readonly ChangedObject[];
  /** Objects of the old codebase that depend on a removed object, excluding the removed ones */
  readonly cascade: readonly ObjectIdentity[];
  readonly unchangedCount: number;
}
