export {
  createActor,
  anonymousActor,
  resolveActorId,
  type ResolveActorOptions,
} from './actor.js';
