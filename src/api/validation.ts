/**
 * Argument validation and payload shaping shared by the resource APIs.
 *
 * Checks collect every problem before throwing so a caller sees all of them
 * in one {@link ValidationError}.
 */

import { ValidationError } from '../errors/index.js';
import {
  ActionRow,
  AllowedMentions,
  Embed,
  FileAttachment,
  PartialAttachment,
  Snowflake,
  isValidSnowflake,
  getEmbedCharacterCount,
  MAX_ACTION_ROWS,
  MAX_EMBEDS_PER_MESSAGE,
  MAX_EMBED_TOTAL_CHARACTERS,
  MAX_MESSAGE_CONTENT_LENGTH,
} from '../types/index.js';

/**
 * Message content accepted by channel messages, webhooks and interactions.
 */
export interface MessageContentParams {
  content?: string;
  tts?: boolean;
  embeds?: Embed[];
  components?: ActionRow[];
  allowedMentions?: AllowedMentions;
  files?: FileAttachment[];
  /** Existing attachments to keep when editing; `files[n]` uploads are appended with id `n` */
  attachments?: PartialAttachment[];
  flags?: number;
}

export function assertValid(errors: string[]): void {
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
}

/**
 * Checks an optional integer against an inclusive range.
 */
export function checkRange(
  errors: string[],
  name: string,
  value: number | undefined,
  min: number,
  max: number
): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < min || value > max) {
    errors.push(`${name} must be an integer between ${min} and ${max}`);
  }
}

export function checkLength(
  errors: string[],
  name: string,
  value: string | undefined,
  min: number,
  max: number
): void {
  if (value === undefined) return;
  if (value.length < min || value.length > max) {
    errors.push(`${name} must be between ${min} and ${max} characters`);
  }
}

export function checkSnowflake(errors: string[], name: string, value: Snowflake | undefined): void {
  if (value !== undefined && !isValidSnowflake(value)) {
    errors.push(`${name} must be a snowflake`);
  }
}

/**
 * Normalizes a `Date` or ISO8601 string. Values that do not parse are
 * recorded as a problem and dropped.
 */
export function toIsoTimestamp(
  errors: string[],
  name: string,
  value: Date | string | undefined
): string | undefined {
  if (value === undefined) return undefined;
  const time = value instanceof Date ? value.getTime() : Date.parse(value);
  if (Number.isNaN(time)) {
    errors.push(`${name} must be an ISO8601 timestamp`);
    return undefined;
  }
  return value instanceof Date ? value.toISOString() : value;
}

/**
 * Only one of the given pagination cursors may be set.
 */
export function checkExclusive(errors: string[], cursors: Record<string, unknown>): void {
  const present = Object.keys(cursors).filter((key) => cursors[key] !== undefined);
  if (present.length > 1) {
    errors.push(`Only one of ${Object.keys(cursors).join(', ')} may be given`);
  }
}

/**
 * Validates message content.
 *
 * @param requireContent - whether at least one content source must be present
 * @param extraSource - a content source outside `params`, such as stickers
 */
export function validateMessageContent(
  errors: string[],
  params: MessageContentParams,
  options: { requireContent: boolean; extraSource?: boolean }
): void {
  const { content, embeds, components, files } = params;

  if (content !== undefined) {
    if (options.requireContent && content.length === 0) {
      errors.push('Content cannot be empty');
    }
    if (content.length > MAX_MESSAGE_CONTENT_LENGTH) {
      errors.push(`Content exceeds ${MAX_MESSAGE_CONTENT_LENGTH} characters`);
    }
  }

  if (embeds) {
    if (embeds.length > MAX_EMBEDS_PER_MESSAGE) {
      errors.push(`Too many embeds (max ${MAX_EMBEDS_PER_MESSAGE})`);
    }
    const totalChars = embeds.reduce((sum, embed) => sum + getEmbedCharacterCount(embed), 0);
    if (totalChars > MAX_EMBED_TOTAL_CHARACTERS) {
      errors.push(`Embed total characters exceed ${MAX_EMBED_TOTAL_CHARACTERS}`);
    }
  }

  if (components && components.length > MAX_ACTION_ROWS) {
    errors.push(`Too many action rows (max ${MAX_ACTION_ROWS})`);
  }

  if (options.requireContent) {
    const hasContent =
      (content !== undefined && content.length > 0) ||
      (embeds !== undefined && embeds.length > 0) ||
      (components !== undefined && components.length > 0) ||
      (files !== undefined && files.length > 0) ||
      options.extraSource === true;
    if (!hasContent) {
      errors.push('Message needs content, embeds, components, files or stickers');
    }
  }
}

/**
 * Converts message content to Discord's JSON shape. Files travel separately.
 */
export function toMessageBody(params: MessageContentParams): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  if (params.content !== undefined) body.content = params.content;
  if (params.tts !== undefined) body.tts = params.tts;
  if (params.embeds !== undefined) body.embeds = params.embeds;
  if (params.components !== undefined) body.components = params.components;
  if (params.allowedMentions !== undefined) body.allowed_mentions = params.allowedMentions;
  if (params.flags !== undefined) body.flags = params.flags;

  if (params.attachments !== undefined) {
    const uploads = (params.files ?? []).map((file, index): PartialAttachment => {
      const attachment: PartialAttachment = { id: index, filename: file.name };
      if (file.description) attachment.description = file.description;
      return attachment;
    });
    body.attachments = [...params.attachments, ...uploads];
  }
  return body;
}
