/**
 * Tests for guild endpoints.
 */

import { ChannelType, InMemoryLogger } from '../index.js';
import { createTestClient } from './fixtures/fake-fetch.js';

const GUILD = '110000000000000001';
const USER = '130000000000000001';

describe('GuildsApi', () => {
  describe('guild settings', () => {
    it('should request approximate counts only when asked', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { id: GUILD } }, { body: { id: GUILD } });

      await client.guilds.get(GUILD);
      await client.guilds.get(GUILD, true);

      expect(fake.requests.map((r) => r.path)).toEqual([`/guilds/${GUILD}`, `/guilds/${GUILD}?with_counts=true`]);
    });

    it('should validate guild names', async () => {
      const { client, fake } = createTestClient();

      await expect(client.guilds.create({ name: 'x' })).rejects.toThrow(
        'Validation failed: name must be between 2 and 100 characters'
      );
      await expect(client.guilds.modify(GUILD, { name: 'ok', owner_id: 'me' })).rejects.toThrow(
        'Validation failed: owner_id must be a snowflake'
      );
      expect(fake.requests).toHaveLength(0);
    });

    it('should create and delete a guild', async () => {
      const logger = new InMemoryLogger();
      const { client, fake } = createTestClient({ logger });
      fake.reply({ body: { id: GUILD, name: 'Test Guild' } });

      await client.guilds.create({ name: 'Test Guild' });
      await client.guilds.delete(GUILD);

      expect(fake.requests.map((r) => `${r.method} ${r.path}`)).toEqual(['POST /guilds', `DELETE /guilds/${GUILD}`]);
      expect(logger.getLogs().filter((e) => e.message.startsWith('Guild')).map((e) => e.context)).toEqual([
        { guildId: GUILD },
        { guildId: GUILD },
      ]);
    });
  });

  describe('channels', () => {
    it('should create a channel with a reason', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { id: '100000000000000009', type: ChannelType.GuildText } });

      await client.guilds.createChannel(GUILD, { name: 'alerts', type: ChannelType.GuildText, topic: 'Paging' }, 'setup');

      expect(fake.last.path).toBe(`/guilds/${GUILD}/channels`);
      expect(fake.last.json).toEqual({ name: 'alerts', type: 0, topic: 'Paging' });
      expect(fake.last.headers.get('X-Audit-Log-Reason')).toBe('setup');
    });

    it('should list guild channels', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: [{ id: '100000000000000001', type: ChannelType.GuildText }] });

      const channels = await client.guilds.getChannels(GUILD);

      expect(channels).toHaveLength(1);
      expect(`${fake.last.method} ${fake.last.path}`).toBe(`GET /guilds/${GUILD}/channels`);
    });

    it('should reorder channels', async () => {
      const { client, fake } = createTestClient();

      await client.guilds.modifyChannelPositions(GUILD, [{ id: '100000000000000001', position: 2 }]);

      expect(fake.last.method).toBe('PATCH');
      expect(fake.last.json).toEqual([{ id: '100000000000000001', position: 2 }]);
      await expect(client.guilds.modifyChannelPositions(GUILD, [])).rejects.toThrow(
        'Validation failed: At least one channel position is required'
      );
    });
  });

  describe('bans', () => {
    it('should convert deleted message days to seconds', async () => {
      const { client, fake } = createTestClient();

      await client.guilds.createBan(GUILD, USER, { deleteMessageDays: 2, reason: 'raid' });

      expect(fake.last.method).toBe('PUT');
      expect(fake.last.path).toBe(`/guilds/${GUILD}/bans/${USER}`);
      expect(fake.last.json).toEqual({ delete_message_seconds: 172800 });
      expect(fake.last.headers.get('X-Audit-Log-Reason')).toBe('raid');
    });

    it('should cap deleted message days at seven', async () => {
      const { client } = createTestClient();

      await expect(client.guilds.createBan(GUILD, USER, { deleteMessageDays: 8 })).rejects.toThrow(
        'Validation failed: deleteMessageDays must be an integer between 0 and 7'
      );
    });

    it('should page through bans', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: [] });

      await client.guilds.getBans(GUILD, { limit: 1000, after: USER });

      expect(fake.last.path).toBe(`/guilds/${GUILD}/bans?limit=1000&after=${USER}`);
      await expect(client.guilds.getBans(GUILD, { limit: 0 })).rejects.toThrow(
        'Validation failed: limit must be an integer between 1 and 1000'
      );
    });

    it('should get and remove a ban', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { reason: null, user: { id: USER, username: 'u', discriminator: '0' } } });

      const ban = await client.guilds.getBan(GUILD, USER);
      await client.guilds.removeBan(GUILD, USER);

      expect(ban.user.id).toBe(USER);
      expect(fake.last.method).toBe('DELETE');
    });
  });

  describe('pruning', () => {
    it('should send prune options as query parameters', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { pruned: 3 } }, { body: { pruned: null } });

      const count = await client.guilds.getPruneCount(GUILD, { days: 14, includeRoles: ['120000000000000001'] });
      const result = await client.guilds.beginPrune(GUILD, {
        days: 30,
        computePruneCount: false,
        includeRoles: ['120000000000000001', '120000000000000002'],
        reason: 'cleanup',
      });

      expect(count.pruned).toBe(3);
      expect(result.pruned).toBeNull();
      expect(fake.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
        `GET /guilds/${GUILD}/prune?days=14&include_roles=120000000000000001`,
        `POST /guilds/${GUILD}/prune?days=30&compute_prune_count=false&include_roles=120000000000000001&include_roles=120000000000000002`,
      ]);
      expect(fake.last.json).toBeUndefined();
    });

    it('should keep days within 1 to 30', async () => {
      const { client } = createTestClient();

      await expect(client.guilds.beginPrune(GUILD, { days: 0, includeRoles: ['role'] })).rejects.toThrow(
        'Validation failed: days must be an integer between 1 and 30, includeRoles must be a snowflake'
      );
    });
  });

  describe('audit log', () => {
    it('should filter by user, action and cursor', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { audit_log_entries: [], users: [], webhooks: [], integrations: [] } });

      await client.guilds.getAuditLog(GUILD, { userId: USER, actionType: 22, limit: 50 });

      expect(fake.last.path).toBe(`/guilds/${GUILD}/audit-logs?user_id=${USER}&action_type=22&limit=50`);
    });

    it('should reject conflicting cursors', async () => {
      const { client } = createTestClient();

      await expect(client.guilds.getAuditLog(GUILD, { before: '1', after: '2' })).rejects.toThrow(
        'Validation failed: Only one of before, after may be given'
      );
    });
  });

  describe('integrations, widget, vanity URL and welcome screen', () => {
    it('should hit the expected routes', async () => {
      const { client, fake } = createTestClient();
      fake.reply(
        { body: [] },
        { body: [] },
        { body: [] },
        { body: { id: GUILD } },
        { status: 204 },
        { body: { enabled: true, channel_id: null } },
        { body: { enabled: false, channel_id: '100000000000000001' } },
        { body: { code: 'test', uses: 0 } },
        { body: { description: null, welcome_channels: [] } }
      );

      await client.guilds.getVoiceRegions(GUILD);
      await client.guilds.getInvites(GUILD);
      await client.guilds.getIntegrations(GUILD);
      await client.guilds.getPreview(GUILD);
      await client.guilds.deleteIntegration(GUILD, '140000000000000001');
      await client.guilds.getWidgetSettings(GUILD);
      await client.guilds.modifyWidget(GUILD, { enabled: false, channel_id: '100000000000000001' });
      const vanity = await client.guilds.getVanityUrl(GUILD);
      await client.guilds.getWelcomeScreen(GUILD);

      expect(vanity.code).toBe('test');
      expect(fake.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
        `GET /guilds/${GUILD}/regions`,
        `GET /guilds/${GUILD}/invites`,
        `GET /guilds/${GUILD}/integrations`,
        `GET /guilds/${GUILD}/preview`,
        `DELETE /guilds/${GUILD}/integrations/140000000000000001`,
        `GET /guilds/${GUILD}/widget`,
        `PATCH /guilds/${GUILD}/widget`,
        `GET /guilds/${GUILD}/vanity-url`,
        `GET /guilds/${GUILD}/welcome-screen`,
      ]);
    });

    it('should limit welcome screen channels', async () => {
      const { client } = createTestClient();
      const channel = { channel_id: '100000000000000001', description: 'Read me', emoji_id: null, emoji_name: null };

      await expect(
        client.guilds.modifyWelcomeScreen(GUILD, { welcome_channels: Array.from({ length: 6 }, () => channel) })
      ).rejects.toThrow('Validation failed: A welcome screen shows at most 5 channels');
    });
  });

  describe('public widget, membership screening and voice states', () => {
    it('should read the public widget without the bot token', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { id: GUILD, name: 'Ops', presence_count: 3 } });

      const widget = await client.guilds.getWidget(GUILD);

      expect(widget.presence_count).toBe(3);
      expect(fake.last.path).toBe(`/guilds/${GUILD}/widget.json`);
      expect(fake.last.headers.get('Authorization')).toBeNull();
    });

    it('should read and modify the membership screening form', async () => {
      const { client, fake } = createTestClient();
      const fields = [{ field_type: 'TERMS' as const, label: 'Read the rules', values: ['Be kind'], required: true }];
      fake.reply({ body: { version: '1', form_fields: [], description: null } }, { body: { version: '2', form_fields: fields, description: null } });

      await client.guilds.getMembershipScreening(GUILD);
      const screening = await client.guilds.modifyMembershipScreening(GUILD, { enabled: true, form_fields: fields });

      expect(screening.version).toBe('2');
      expect(fake.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
        `GET /guilds/${GUILD}/member-verification`,
        `PATCH /guilds/${GUILD}/member-verification`,
      ]);
      expect(fake.last.json).toEqual({ enabled: true, form_fields: fields });
      await expect(
        client.guilds.modifyMembershipScreening(GUILD, { form_fields: [{ ...fields[0], label: '' }] })
      ).rejects.toThrow('Validation failed: form_fields.label must be between 1 and 300 characters');
    });

    it('should raise and lower the bot hand in a stage', async () => {
      const { client, fake } = createTestClient();
      const stage = '100000000000000009';

      await client.guilds.modifyCurrentVoiceState(GUILD, {
        channel_id: stage,
        request_to_speak_timestamp: new Date('2030-01-01T00:00:00.000Z'),
      });
      await client.guilds.modifyCurrentVoiceState(GUILD, { request_to_speak_timestamp: null });

      expect(fake.requests[0].path).toBe(`/guilds/${GUILD}/voice-states/@me`);
      expect(fake.requests[0].json).toEqual({ channel_id: stage, request_to_speak_timestamp: '2030-01-01T00:00:00.000Z' });
      expect(fake.requests[1].json).toEqual({ request_to_speak_timestamp: null });
    });

    it('should suppress another speaker', async () => {
      const { client, fake } = createTestClient();
      const stage = '100000000000000009';

      await client.guilds.modifyVoiceState(GUILD, USER, { channel_id: stage, suppress: true });

      expect(fake.last.method).toBe('PATCH');
      expect(fake.last.path).toBe(`/guilds/${GUILD}/voice-states/${USER}`);
      expect(fake.last.json).toEqual({ channel_id: stage, suppress: true });
      await expect(client.guilds.modifyVoiceState(GUILD, USER, { channel_id: 'stage' })).rejects.toThrow(
        'Validation failed: channel_id must be a snowflake'
      );
    });
  });
});
