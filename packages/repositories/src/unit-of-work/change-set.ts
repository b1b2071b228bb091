// Change set built by a unit of work for one commit attempt

import type { ChangeEntry, ChangeKind, ChangeSet, ProtectedField } from '@ledgerkit/protocol';

/**
 * A pending write as held by the unit of work.
 */
export class TrackedChangeEntry<T extends object> implements ChangeEntry<T> {
  readonly entity: T;
  readonly requestedKind: ChangeKind;
  readonly original: T | null;
  private currentKind: ChangeKind;
  private readonly suppressed = new Set<ProtectedField>();

  constructor(entity: T, kind: ChangeKind, original: T | null) {
    this.entity = entity;
    this.requestedKind = kind;
    this.currentKind = kind;
    this.original = original;
  }

  get kind(): ChangeKind {
    return this.currentKind;
  }

  get suppressedFields(): readonly ProtectedField[] {
    return Array.from(this.suppressed);
  }

  /** Whether a hook redirected this delete into an update */
  get deleteCancelled(): boolean {
    return this.requestedKind === 'delete' && this.currentKind === 'update';
  }

  cancelDelete(): void {
    if (this.currentKind === 'delete') {
      this.currentKind = 'update';
    }
  }

  suppressField(field: ProtectedField): void {
    this.suppressed.add(field);
  }
}

/**
 * Input for one entry of a change set.
 */
export type ChangeSetItem<T extends object> = {
  entity: T;
  kind: ChangeKind;
  original: T | null;
};

export type TrackedChangeSet<T extends object> = {
  entries(): readonly TrackedChangeEntry<T>[];
} & ChangeSet<T>;

/**
 * Create a change set over the given items, keeping their order.
 */
export function createChangeSet<T extends object>(
  items: readonly ChangeSetItem<T>[]
): TrackedChangeSet<T> {
  const entries = items.map((item) => new TrackedChangeEntry(item.entity, item.kind, item.original));

  return {
    entries() {
      return entries;
    },
  };
}
