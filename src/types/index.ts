/**
 * Discord types - public exports.
 */

export * from './snowflake.js';
export * from './user.js';
export * from './guild.js';
export * from './channel.js';
export * from './message.js';
export * from './component.js';
export * from './webhook.js';
export * from './interaction.js';
export * from './gateway.js';
export * from './sticker.js';
export * from './scheduled-event.js';
export * from './stage-instance.js';
export * from './auto-moderation.js';
export * from './template.js';
