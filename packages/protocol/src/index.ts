// @ledgerkit/protocol
// Entity, lifecycle, actor and change-set types shared by every package.

export * from './types/index.js';
export * from './validation/index.js';
export * from './responses/index.js';
