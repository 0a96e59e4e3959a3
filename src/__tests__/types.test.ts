/**
 * Tests for Discord types and builders.
 */

import {
  isValidSnowflake,
  parseSnowflake,
  getSnowflakeTimestamp,
  getSnowflakeDate,
  snowflakeFromTimestamp,
  compareSnowflakes,
  DISCORD_EPOCH,
  EmbedBuilder,
  getEmbedCharacterCount,
  createButton,
  createStringSelect,
  createActionRow,
  ButtonStyle,
  ComponentType,
  ChannelType,
  isTextChannel,
  isThread,
  isDMChannel,
  getDisplayName,
} from '../index.js';

describe('Snowflake', () => {
  it('should validate snowflake strings', () => {
    expect(isValidSnowflake('175928847299117063')).toBe(true);
    expect(isValidSnowflake('1')).toBe(true);
    expect(isValidSnowflake('18446744073709551615')).toBe(true);
    expect(isValidSnowflake('18446744073709551616')).toBe(false);
    expect(isValidSnowflake('')).toBe(false);
    expect(isValidSnowflake('12a')).toBe(false);
    expect(isValidSnowflake(42)).toBe(false);
    expect(isValidSnowflake(undefined)).toBe(false);
  });

  it('should parse strings, numbers and bigints', () => {
    expect(parseSnowflake('42')).toBe('42');
    expect(parseSnowflake(42)).toBe('42');
    expect(parseSnowflake(175928847299117063n)).toBe('175928847299117063');
    expect(() => parseSnowflake('invalid')).toThrow('Invalid Snowflake ID: invalid');
  });

  it('should extract the creation time', () => {
    expect(getSnowflakeTimestamp('175928847299117063')).toBe(1462015105796);
    expect(getSnowflakeDate('175928847299117063').toISOString()).toBe('2016-04-30T11:18:25.796Z');
    expect(getSnowflakeTimestamp('0')).toBe(Number(DISCORD_EPOCH));
  });

  it('should build pagination cursors from a time', () => {
    const cursor = snowflakeFromTimestamp(1462015105796);
    expect(cursor).toBe('175928847298985984');
    expect(getSnowflakeTimestamp(cursor)).toBe(1462015105796);
    expect(snowflakeFromTimestamp(new Date(Number(DISCORD_EPOCH)))).toBe('0');
    expect(() => snowflakeFromTimestamp(0)).toThrow('Timestamp predates the Discord epoch');
  });

  it('should refuse times that are not numbers', () => {
    expect(() => snowflakeFromTimestamp(new Date('not a date'))).toThrow('Timestamp is not a valid time');
    expect(() => snowflakeFromTimestamp(Number.NaN)).toThrow('Timestamp is not a valid time');
    expect(() => snowflakeFromTimestamp(Number.POSITIVE_INFINITY)).toThrow('Timestamp is not a valid time');
  });

  it('should compare chronologically beyond float precision', () => {
    expect(compareSnowflakes('175928847299117063', '175928847299117064')).toBe(-1);
    expect(compareSnowflakes('9', '10')).toBe(-1);
    expect(compareSnowflakes('10', '9')).toBe(1);
    expect(compareSnowflakes('7', '7')).toBe(0);
  });
});

describe('EmbedBuilder', () => {
  it('should build a rich embed', () => {
    const embed = new EmbedBuilder()
      .title('Deploy finished')
      .description('All services are healthy')
      .url('https://example.test/deploys/1')
      .color(0x57f287)
      .timestamp(new Date('2024-01-02T03:04:05.000Z'))
      .footer('ci')
      .author('builder', undefined, 'https://example.test/a.png')
      .thumbnail('https://example.test/t.png')
      .image('https://example.test/i.png')
      .addField('Duration', '42s', true)
      .addField('Commit', 'abc123')
      .build();

    expect(embed).toEqual({
      type: 'rich',
      title: 'Deploy finished',
      description: 'All services are healthy',
      url: 'https://example.test/deploys/1',
      color: 0x57f287,
      timestamp: '2024-01-02T03:04:05.000Z',
      footer: { text: 'ci' },
      author: { name: 'builder', icon_url: 'https://example.test/a.png' },
      thumbnail: { url: 'https://example.test/t.png' },
      image: { url: 'https://example.test/i.png' },
      fields: [
        { name: 'Duration', value: '42s', inline: true },
        { name: 'Commit', value: 'abc123' },
      ],
    });
  });

  it('should not share fields between builds', () => {
    const builder = new EmbedBuilder().addField('a', '1');
    const first = builder.build();
    builder.addField('b', '2');

    expect(first.fields).toHaveLength(1);
    expect(builder.build().fields).toHaveLength(2);
  });

  it('should enforce length limits', () => {
    expect(() => new EmbedBuilder().title('x'.repeat(257))).toThrow(
      'Embed title cannot exceed 256 characters'
    );
    expect(() => new EmbedBuilder().description('x'.repeat(4097))).toThrow(
      'Embed description cannot exceed 4096 characters'
    );

    const builder = new EmbedBuilder();
    for (let i = 0; i < 25; i++) builder.addField(`f${i}`, 'v');
    expect(() => builder.addField('extra', 'v')).toThrow('Embeds cannot have more than 25 fields');
  });

  it('should count characters charged against the message limit', () => {
    const embed = new EmbedBuilder()
      .title('abc')
      .description('defg')
      .footer('hi', 'https://example.test/f.png')
      .author('me')
      .addField('k', 'value')
      .build();

    expect(getEmbedCharacterCount(embed)).toBe(3 + 4 + 2 + 2 + 1 + 5);
    expect(getEmbedCharacterCount({})).toBe(0);
  });
});

describe('components', () => {
  it('should create action and link buttons', () => {
    expect(createButton({ style: ButtonStyle.Primary, label: 'Approve', customId: 'approve' })).toEqual({
      type: ComponentType.Button,
      style: ButtonStyle.Primary,
      label: 'Approve',
      custom_id: 'approve',
    });
    expect(
      createButton({ style: ButtonStyle.Link, emoji: { name: '🔗' }, url: 'https://example.test', disabled: true })
    ).toEqual({
      type: ComponentType.Button,
      style: ButtonStyle.Link,
      emoji: { name: '🔗' },
      url: 'https://example.test',
      disabled: true,
    });
  });

  it('should reject inconsistent buttons', () => {
    expect(() => createButton({ style: ButtonStyle.Link, label: 'x', customId: 'id' })).toThrow(
      'Link buttons require a url and cannot have a custom id'
    );
    expect(() => createButton({ style: ButtonStyle.Danger, label: 'x', url: 'https://example.test' })).toThrow(
      'Non-link buttons require a custom id and cannot have a url'
    );
    expect(() => createButton({ style: ButtonStyle.Secondary, customId: 'id' })).toThrow(
      'Buttons need a label or an emoji'
    );
  });

  it('should create string selects within the option limit', () => {
    const select = createStringSelect('color', [{ label: 'Red', value: 'red' }], { placeholder: 'Pick one' });
    expect(select).toEqual({
      type: ComponentType.StringSelect,
      custom_id: 'color',
      options: [{ label: 'Red', value: 'red' }],
      placeholder: 'Pick one',
    });
    expect(() => createStringSelect('empty', [])).toThrow('Select menus need between 1 and 25 options');
  });

  it('should build action rows', () => {
    const buttons = [1, 2, 3].map((n) =>
      createButton({ style: ButtonStyle.Secondary, label: String(n), customId: `b${n}` })
    );
    const row = createActionRow(buttons);

    expect(row.type).toBe(ComponentType.ActionRow);
    expect(row.components).toHaveLength(3);
  });

  it('should reject invalid action rows', () => {
    const button = createButton({ style: ButtonStyle.Primary, label: 'b', customId: 'b' });
    const select = createStringSelect('s', [{ label: 'a', value: 'a' }]);

    expect(() => createActionRow([])).toThrow('Action rows cannot be empty');
    expect(() => createActionRow([select, button])).toThrow(
      'A select menu or text input must be alone in its action row'
    );
    expect(() => createActionRow(Array.from({ length: 6 }, () => button))).toThrow(
      'Action rows hold at most 5 buttons'
    );
  });
});

describe('channel and user helpers', () => {
  it('should classify channel types', () => {
    expect(isTextChannel({ type: ChannelType.GuildText })).toBe(true);
    expect(isTextChannel({ type: ChannelType.GuildCategory })).toBe(false);
    expect(isTextChannel({ type: ChannelType.GuildForum })).toBe(false);
    expect(isThread({ type: ChannelType.PublicThread })).toBe(true);
    expect(isThread({ type: ChannelType.GuildText })).toBe(false);
    expect(isDMChannel({ type: ChannelType.GroupDM })).toBe(true);
    expect(isDMChannel({ type: ChannelType.GuildVoice })).toBe(false);
  });

  it('should prefer the global name', () => {
    expect(getDisplayName({ id: '1', username: 'builder', discriminator: '0', global_name: 'Build Bot' })).toBe(
      'Build Bot'
    );
    expect(getDisplayName({ id: '1', username: 'builder', discriminator: '0', global_name: null })).toBe('builder');
  });
});
