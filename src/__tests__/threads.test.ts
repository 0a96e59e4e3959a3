/**
 * Tests for thread endpoints.
 */

import { ChannelType, InMemoryLogger, ThreadAutoArchiveDuration } from '../index.js';
import { createTestClient } from './fixtures/fake-fetch.js';

const CHANNEL = '100000000000000001';
const MESSAGE = '200000000000000001';
const THREAD = '800000000000000001';
const USER = '130000000000000001';
const TAG = '900000000000000001';

describe('ThreadsApi', () => {
  describe('creating threads', () => {
    it('should start a thread from a message', async () => {
      const logger = new InMemoryLogger();
      const { client, fake } = createTestClient({ logger });
      fake.reply({ body: { id: THREAD, type: ChannelType.PublicThread } });

      await client.threads.startFromMessage(
        CHANNEL,
        MESSAGE,
        { name: 'Incident 42', autoArchiveDuration: ThreadAutoArchiveDuration.OneDay, rateLimitPerUser: 5 },
        'triage'
      );

      expect(fake.last.path).toBe(`/channels/${CHANNEL}/messages/${MESSAGE}/threads`);
      expect(fake.last.json).toEqual({ name: 'Incident 42', auto_archive_duration: 1440, rate_limit_per_user: 5 });
      expect(fake.last.headers.get('X-Audit-Log-Reason')).toBe('triage');
      expect(logger.getLogs().find((e) => e.message === 'Thread created')?.context).toEqual({
        channelId: CHANNEL,
        threadId: THREAD,
      });
    });

    it('should default to a private thread', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { id: THREAD } });

      await client.threads.start(CHANNEL, { name: 'secret', invitable: false });

      expect(fake.last.path).toBe(`/channels/${CHANNEL}/threads`);
      expect(fake.last.json).toEqual({ name: 'secret', type: ChannelType.PrivateThread, invitable: false });
    });

    it('should validate thread options', async () => {
      const { client, fake } = createTestClient();

      await expect(
        client.threads.start(CHANNEL, {
          name: '',
          rateLimitPerUser: 21601,
          type: ChannelType.PublicThread,
          invitable: true,
        })
      ).rejects.toThrow(
        'Validation failed: name must be between 1 and 100 characters, rateLimitPerUser must be an integer between 0 and 21600, invitable only applies to private threads'
      );
      expect(fake.requests).toHaveLength(0);
    });

    it('should create a forum post with its first message', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { id: THREAD, message: { id: MESSAGE } } });

      const post = await client.threads.startInForum(CHANNEL, {
        name: 'Feature request',
        message: { content: 'Dark mode please' },
        appliedTags: [TAG],
      });

      expect(post.message?.id).toBe(MESSAGE);
      expect(fake.last.json).toEqual({
        name: 'Feature request',
        message: { content: 'Dark mode please' },
        applied_tags: [TAG],
      });
    });

    it('should accept stickers as the only forum post content', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { id: THREAD } });

      await client.threads.startInForum(CHANNEL, { name: 'Sticker', message: { stickerIds: ['910000000000000001'] } });

      expect(fake.last.json).toEqual({ name: 'Sticker', message: { sticker_ids: ['910000000000000001'] } });
    });

    it('should upload forum post files as multipart', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { id: THREAD } });

      await client.threads.startInForum(CHANNEL, {
        name: 'Logs',
        message: { content: 'nightly', files: [{ name: 'log.txt', data: 'line 1' }] },
      });

      expect(fake.last.form?.has('files[0]')).toBe(true);
      expect(fake.last.json).toEqual({
        name: 'Logs',
        message: { content: 'nightly', attachments: [{ id: 0, filename: 'log.txt' }] },
      });
    });

    it('should reject empty forum posts and too many tags', async () => {
      const { client } = createTestClient();

      await expect(
        client.threads.startInForum(CHANNEL, {
          name: 'Empty',
          message: {},
          appliedTags: [TAG, TAG, TAG, TAG, TAG, 'tag'],
        })
      ).rejects.toThrow(
        'Validation failed: Message needs content, embeds, components, files or stickers, A forum post can have at most 5 tags, appliedTags must be a snowflake'
      );
    });
  });

  describe('membership', () => {
    it('should join, leave, add and remove members', async () => {
      const { client, fake } = createTestClient();

      await client.threads.join(THREAD);
      await client.threads.leave(THREAD);
      await client.threads.addMember(THREAD, USER);
      await client.threads.removeMember(THREAD, USER);

      expect(fake.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
        `PUT /channels/${THREAD}/thread-members/@me`,
        `DELETE /channels/${THREAD}/thread-members/@me`,
        `PUT /channels/${THREAD}/thread-members/${USER}`,
        `DELETE /channels/${THREAD}/thread-members/${USER}`,
      ]);
    });

    it('should get a member with guild member data on request', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { user_id: USER } }, { body: { user_id: USER } });

      await client.threads.getMember(THREAD, USER);
      await client.threads.getMember(THREAD, USER, true);

      expect(fake.requests.map((r) => r.path)).toEqual([
        `/channels/${THREAD}/thread-members/${USER}`,
        `/channels/${THREAD}/thread-members/${USER}?with_member=true`,
      ]);
    });

    it('should page members only together with member data', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: [] });

      await client.threads.listMembers(THREAD, { withMember: true, after: USER, limit: 50 });

      expect(fake.last.path).toBe(`/channels/${THREAD}/thread-members?with_member=true&after=${USER}&limit=50`);
      await expect(client.threads.listMembers(THREAD, { limit: 101 })).rejects.toThrow(
        'Validation failed: limit must be an integer between 1 and 100, after and limit require withMember'
      );
    });
  });

  describe('listing', () => {
    it('should list active guild threads', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { threads: [], members: [] } });

      await client.threads.listActive('110000000000000001');

      expect(fake.last.path).toBe('/guilds/110000000000000001/threads/active');
    });

    it('should page archived threads by timestamp', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { threads: [], members: [], has_more: false } }, { body: { threads: [], members: [], has_more: false } });

      await client.threads.listPublicArchived(CHANNEL, { before: new Date('2024-03-01T00:00:00Z'), limit: 2 });
      await client.threads.listPrivateArchived(CHANNEL, { before: '2024-03-01T00:00:00.000Z' });

      expect(fake.requests.map((r) => r.path)).toEqual([
        `/channels/${CHANNEL}/threads/archived/public?before=2024-03-01T00%3A00%3A00.000Z&limit=2`,
        `/channels/${CHANNEL}/threads/archived/private?before=2024-03-01T00%3A00%3A00.000Z`,
      ]);
    });

    it('should reject malformed archive cursors', async () => {
      const { client } = createTestClient();

      await expect(client.threads.listPublicArchived(CHANNEL, { before: 'last week', limit: 1 })).rejects.toThrow(
        'Validation failed: limit must be an integer between 2 and 100, before must be an ISO8601 timestamp'
      );
    });

    it('should reject an invalid Date cursor before sending', async () => {
      const { client, fake } = createTestClient();

      await expect(
        client.threads.listPrivateArchived(CHANNEL, { before: new Date('yesterday-ish') })
      ).rejects.toThrow('Validation failed: before must be an ISO8601 timestamp');
      expect(fake.requests).toHaveLength(0);
    });

    it('should page joined private archived threads by ID', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { threads: [], members: [], has_more: true } });

      const list = await client.threads.listJoinedPrivateArchived(CHANNEL, { before: THREAD });

      expect(list.has_more).toBe(true);
      expect(fake.last.path).toBe(`/channels/${CHANNEL}/users/@me/threads/archived/private?before=${THREAD}`);
    });
  });
});
