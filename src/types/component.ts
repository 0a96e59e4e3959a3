/**
 * Message components: action rows, buttons, select menus and text inputs.
 */

import { Snowflake } from './snowflake.js';
import { ChannelType } from './channel.js';

export enum ComponentType {
  ActionRow = 1,
  Button = 2,
  StringSelect = 3,
  /** Modals only */
  TextInput = 4,
  UserSelect = 5,
  RoleSelect = 6,
  MentionableSelect = 7,
  ChannelSelect = 8,
}

export enum ButtonStyle {
  Primary = 1,
  Secondary = 2,
  Success = 3,
  Danger = 4,
  /** Requires `url`, never sends an interaction */
  Link = 5,
}

/**
 * Unicode emoji (name only) or custom emoji (id + name).
 */
export interface PartialEmoji {
  id?: Snowflake | null;
  name?: string | null;
  animated?: boolean;
}

export interface Button {
  type: ComponentType.Button;
  style: ButtonStyle;
  label?: string;
  emoji?: PartialEmoji;
  custom_id?: string;
  url?: string;
  disabled?: boolean;
}

export interface SelectOption {
  label: string;
  value: string;
  description?: string;
  emoji?: PartialEmoji;
  default?: boolean;
}

interface SelectMenuBase {
  custom_id: string;
  placeholder?: string;
  min_values?: number;
  max_values?: number;
  disabled?: boolean;
}

export interface StringSelectMenu extends SelectMenuBase {
  type: ComponentType.StringSelect;
  options: SelectOption[];
}

/**
 * Select menu whose options Discord populates (users, roles, channels).
 */
export interface AutoPopulatedSelectMenu extends SelectMenuBase {
  type:
    | ComponentType.UserSelect
    | ComponentType.RoleSelect
    | ComponentType.MentionableSelect
    | ComponentType.ChannelSelect;
  /** Channel selects only */
  channel_types?: ChannelType[];
}

export enum TextInputStyle {
  Short = 1,
  Paragraph = 2,
}

export interface TextInput {
  type: ComponentType.TextInput;
  custom_id: string;
  style: TextInputStyle;
  label: string;
  min_length?: number;
  max_length?: number;
  required?: boolean;
  value?: string;
  placeholder?: string;
}

export type InteractiveComponent = Button | StringSelectMenu | AutoPopulatedSelectMenu | TextInput;

export interface ActionRow {
  type: ComponentType.ActionRow;
  components: InteractiveComponent[];
}

/** Maximum number of action rows per message */
export const MAX_ACTION_ROWS = 5;

/** Maximum number of buttons per action row */
export const MAX_BUTTONS_PER_ROW = 5;

export const MAX_SELECT_OPTIONS = 25;

/**
 * Creates a button. Link buttons need `url`; every other style needs `customId`.
 */
export function createButton(options: {
  style: ButtonStyle;
  label?: string;
  emoji?: PartialEmoji;
  customId?: string;
  url?: string;
  disabled?: boolean;
}): Button {
  if (options.style === ButtonStyle.Link) {
    if (!options.url || options.customId) {
      throw new TypeError('Link buttons require a url and cannot have a custom id');
    }
  } else if (!options.customId || options.url) {
    throw new TypeError('Non-link buttons require a custom id and cannot have a url');
  }
  if (!options.label && !options.emoji) {
    throw new TypeError('Buttons need a label or an emoji');
  }

  const button: Button = { type: ComponentType.Button, style: options.style };
  if (options.label) button.label = options.label;
  if (options.emoji) button.emoji = options.emoji;
  if (options.customId) button.custom_id = options.customId;
  if (options.url) button.url = options.url;
  if (options.disabled !== undefined) button.disabled = options.disabled;
  return button;
}

export function createStringSelect(
  customId: string,
  options: SelectOption[],
  extra: Omit<SelectMenuBase, 'custom_id'> = {}
): StringSelectMenu {
  if (options.length === 0 || options.length > MAX_SELECT_OPTIONS) {
    throw new RangeError(`Select menus need between 1 and ${MAX_SELECT_OPTIONS} options`);
  }
  return { type: ComponentType.StringSelect, custom_id: customId, options, ...extra };
}

/**
 * Wraps components in an action row. A row holds up to five buttons or a
 * single select menu.
 */
export function createActionRow(components: InteractiveComponent[]): ActionRow {
  if (components.length === 0) {
    throw new RangeError('Action rows cannot be empty');
  }
  const hasNonButton = components.some((c) => c.type !== ComponentType.Button);
  if (hasNonButton && components.length > 1) {
    throw new RangeError('A select menu or text input must be alone in its action row');
  }
  if (components.length > MAX_BUTTONS_PER_ROW) {
    throw new RangeError(`Action rows hold at most ${MAX_BUTTONS_PER_ROW} buttons`);
  }
  return { type: ComponentType.ActionRow, components };
}
