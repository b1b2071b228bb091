// Entity lifecycle states and the events that move between them

/**
 * Lifecycle state of an entity.
 *
 * - `created`: exists but not yet active (only reachable by explicit assignment)
 * - `inactive`: temporarily switched off
 * - `active`: available (the default for new entities)
 * - `effective`: promoted to operational use
 * - `terminated`: soft deleted
 */
export type EntityState = 'created' | 'inactive' | 'active' | 'effective' | 'terminated';

export const ENTITY_STATES: readonly EntityState[] = [
  'created',
  'inactive',
  'active',
  'effective',
  'terminated',
];

/**
 * Integer tags for each state, as stored by systems that persist the
 * state numerically. Ordering is descriptive only; never compare tags.
 */
export const ENTITY_STATE_TAGS: Record<EntityState, number> = {
  created: 0,
  inactive: 1,
  active: 2,
  effective: 3,
  terminated: 4,
};

export const ENTITY_STATE_DESCRIPTIONS: Record<EntityState, string> = {
  created: 'Created but not yet active',
  inactive: 'Temporarily inactive',
  active: 'Active and available',
  effective: 'Effective and operational',
  terminated: 'Soft deleted/terminated',
};

/**
 * Events of the lifecycle state machine.
 */
export type LifecycleEvent =
  | 'activate'
  | 'deactivate'
  | 'reactivate'
  | 'promote'
  | 'demote'
  | 'soft_delete'
  | 'restore';

/**
 * One row of the transition table.
 */
export type LifecycleTransition = {
  from: readonly EntityState[];
  event: LifecycleEvent;
  to: EntityState;
};

/**
 * The legal transitions. `soft_delete` and `restore` also exist as
 * unconditional operations; this table is what guarded transitions follow.
 */
export const LIFECYCLE_TRANSITIONS: readonly LifecycleTransition[] = [
  { from: ['created'], event: 'activate', to: 'active' },
  { from: ['active'], event: 'deactivate', to: 'inactive' },
  { from: ['inactive'], event: 'reactivate', to: 'active' },
  { from: ['active'], event: 'promote', to: 'effective' },
  { from: ['effective'], event: 'demote', to: 'inactive' },
  { from: ['active', 'inactive', 'effective'], event: 'soft_delete', to: 'terminated' },
  { from: ['terminated'], event: 'restore', to: 'active' },
];

export function isEntityState(value: unknown): value is EntityState {
  const states: readonly string[] = ENTITY_STATES;
  return typeof value === 'string' && states.includes(value);
}

/**
 * Look up an entity state by its integer tag.
 * @returns The state, or null for an unknown tag
 */
export function entityStateFromTag(tag: number): EntityState | null {
  for (const state of ENTITY_STATES) {
    if (ENTITY_STATE_TAGS[state] === tag) return state;
  }
  return null;
}
