import type { Codebase, CodeObject, ObjectIdentity } from './model';
import { compareIdentities, createCodebase, identityKey } from './model';

/**
 * Reverse dependency index: identity key -> identities that declare it as a dependency.
 * Dependencies on identities absent from the codebase contribute no edge.
 */
export function buildReverseIndex(codebase: Codebase): ReadonlyMap<string, readonly ObjectIdentity[]> {
  const dependents = new Map<string, ObjectIdentity[]>();

  for (const object of codebase.objects()) {
    for (const dep of object.dependencies) {
      if (!codebase.has(dep)) continue;

      const key = identityKey(dep);
      const existing = dependents.get(key) ?? [];
      existing.push(object.identity);
      dependents.set(key, existing);
    }
  }

  return dependents;
}

/**
 * Objects of `old` that transitively depend on one of `removed`.
 * The removed identities themselves are never part of the result.
 */
export function cascade(old: Codebase, removed: Iterable<ObjectIdentity>): ObjectIdentity[] {
  const seeds = [...removed];
  const removedKeys = new Set(seeds.map(identityKey));
  const reached = reachable(seeds, buildReverseIndex(old));

  return reached.filter(identity => !removedKeys.has(identityKey(identity)));
}

/**
 * All objects that transitively depend on `identity`.
 */
export function dependentsOf(codebase: Codebase, identity: ObjectIdentity): ObjectIdentity[] {
  const key = identityKey(identity);
  return reachable([identity], buildReverseIndex(codebase))
    .filter(i => identityKey(i) !== key);
}

/**
 * All objects `identity` transitively depends on, restricted to the codebase.
 */
export function dependenciesOf(codebase: Codebase, identity: ObjectIdentity): ObjectIdentity[] {
  const key = identityKey(identity);
  return reachable([identity], forwardIndex(codebase))
    .filter(i => identityKey(i) !== key);
}

/**
 * A new codebase with the requested objects and everything they depend on.
 * Identities not present in the codebase are ignored.
 */
export function selectWithDependencies(codebase: Codebase, identities: Iterable<ObjectIdentity>): Codebase {
  const seeds = [...identities].filter(i => codebase.has(i));
  const selected: CodeObject[] = [];

  for (const identity of reachable(seeds, forwardIndex(codebase))) {
    const object = codebase.get(identity);
    if (object) {
      selected.push(object);
    }
  }

  return createCodebase(codebase.name, selected);
}

/**
 * Order objects so that dependencies come before their dependents.
 * Ties are broken by (kind, name). Cycles are not an error: each object is emitted once.
 */
export function orderByDependency(objects: readonly CodeObject[]): CodeObject[] {
  const byKey = new Map<string, CodeObject>();
  for (const object of objects) {
    byKey.set(identityKey(object.identity), object);
  }

  const result: CodeObject[] = [];
  const visited = new Set<string>();
  const visiting = new Set<string>(); // For cycle detection

  function visit(object: CodeObject) {
    const key = identityKey(object.identity);
    if (visited.has(key)) return;
    if (visiting.has(key)) {
      // Cycle detected - not an error for our purposes, just skip
      return;
    }

    visiting.add(key);

    for (const dep of object.dependencies) {
      const target = byKey.get(identityKey(dep));
      if (target) {
        visit(target);
      }
    }

    visiting.delete(key);
    visited.add(key);
    result.push(object);
  }

  const sorted = [...objects].sort((a, b) => compareIdentities(a.identity, b.identity));
  for (const object of sorted) {
    visit(object);
  }

  return result;
}

function forwardIndex(codebase: Codebase): ReadonlyMap<string, readonly ObjectIdentity[]> {
  const index = new Map<string, readonly ObjectIdentity[]>();
  for (const object of codebase.objects()) {
    index.set(identityKey(object.identity), object.dependencies.filter(dep => codebase.has(dep)));
  }
  return index;
}

/**
 * Breadth-first traversal from `seeds` along `edges`, including the seeds.
 * Result is sorted by (kind, name).
 */
function reachable(
  seeds: readonly ObjectIdentity[],
  edges: ReadonlyMap<string, readonly ObjectIdentity[]>
): ObjectIdentity[] {
  const visited = new Map<string, ObjectIdentity>();
  const queue: ObjectIdentity[] = [];

  for (const seed of seeds) {
    const key = identityKey(seed);
    if (!visited.has(key)) {
      visited.set(key, seed);
      queue.push(seed);
    }
  }

  for (let i = 0; i < queue.length; i++) {
    for (const next of edges.get(identityKey(queue[i])) ?? []) {
      const key = identityKey(next);
      if (!visited.has(key)) {
        visited.set(key, next);
        queue.push(next);
      }
    }
  }

  return [...visited.values()].sort(compareIdentities);
}
