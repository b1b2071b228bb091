export { createUnitOfWork } from './unit-of-work.js';
export {
  TrackedChangeEntry,
  createChangeSet,
  type ChangeSetItem,
  type TrackedChangeSet,
} from './change-set.js';
