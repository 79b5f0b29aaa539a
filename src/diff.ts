import type { Codebase, ChangeReport, ChangedObject, ObjectIdentity } from './model';
import { compareIdentities } from './model';
import { cascade } from './dependencies';

/**
 * Compare an old and a new codebase.
 * Returns the added, removed and changed objects, plus the objects of the old
 * codebase that are implicated by the removals (cascade).
 */
export function compare(old: Codebase, next: Codebase): ChangeReport {
  const added: ObjectIdentity[] = [];
  const removed: ObjectIdentity[] = [];
  const changed: ChangedObject[] = [];
  let unchangedCount = 0;

  // Find changes and removals
  for (const oldObject of old.objects()) {
    const newObject = next.get(oldObject.identity);

    if (newObject === undefined) {
      removed.push(oldObject.identity);
    } else if (newObject.hash !== oldObject.hash) {
      changed.push({
        identity: oldObject.identity,
        oldText: oldObject.text,
        newText: newObject.text,
      });
    } else {
      unchangedCount++;
    }
  }

  // Find additions
  for (const newObject of next.objects()) {
    if (!old.has(newObject.identity)) {
      added.push(newObject.identity);
    }
  }

  return {
    oldName: old.name,
    newName: next.name,
    added: added.sort(compareIdentities),
    removed: removed.sort(compareIdentities),
    changed: changed.sort((a, b) => compareIdentities(a.identity, b.identity)),
    cascade: cascade(old, removed),
    unchangedCount,
  };
}

export function hasChanges(report: ChangeReport): boolean {
  return report.added.length > 0
    || report.removed.length > 0
    || report.changed.length > 0
    || report.cascade.length > 0;
}
