/**
 * Resource APIs - public exports.
 */

export { ApiResource } from './base.js';
export type { MessageContentParams } from './validation.js';
export {
  assertValid,
  checkRange,
  checkLength,
  checkSnowflake,
  checkExclusive,
  toIsoTimestamp,
  validateMessageContent,
  toMessageBody,
} from './validation.js';
export * from './channels.js';
export * from './messages.js';
export * from './reactions.js';
export * from './threads.js';
export * from './guilds.js';
export * from './members.js';
export * from './roles.js';
export * from './emojis.js';
export * from './webhooks.js';
export * from './interactions.js';
export * from './commands.js';
export * from './users.js';
export * from './invites.js';
export * from './applications.js';
export * from './gateway.js';
export * from './stickers.js';
export * from './scheduled-events.js';
export * from './stage-instances.js';
export * from './auto-moderation.js';
export * from './guild-templates.js';
