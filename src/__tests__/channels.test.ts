/**
 * Tests for channel endpoints.
 */

import { InviteTargetType, OverwriteType } from '../index.js';
import { createTestClient } from './fixtures/fake-fetch.js';

const CHANNEL = '100000000000000001';
const ROLE = '120000000000000001';

describe('ChannelsApi', () => {
  it('should get and modify a channel', async () => {
    const { client, fake } = createTestClient();
    fake.reply({ body: { id: CHANNEL, type: 0 } }, { body: { id: CHANNEL, type: 0, name: 'ops' } });

    await client.channels.get(CHANNEL);
    const channel = await client.channels.modify(CHANNEL, { name: 'ops', rate_limit_per_user: 30 }, 'rename');

    expect(channel.name).toBe('ops');
    expect(fake.last.method).toBe('PATCH');
    expect(fake.last.json).toEqual({ name: 'ops', rate_limit_per_user: 30 });
    expect(fake.last.headers.get('X-Audit-Log-Reason')).toBe('rename');
  });

  it('should validate channel fields', async () => {
    const { client, fake } = createTestClient();

    await expect(
      client.channels.modify(CHANNEL, { name: '', topic: 't'.repeat(1025), rate_limit_per_user: 21601 })
    ).rejects.toThrow(
      'Validation failed: name must be between 1 and 100 characters, topic must be between 0 and 1024 characters, rate_limit_per_user must be an integer between 0 and 21600'
    );
    expect(fake.requests).toHaveLength(0);
  });

  it('should return the deleted channel', async () => {
    const { client, fake } = createTestClient();
    fake.reply({ body: { id: CHANNEL, type: 0 } });

    const channel = await client.channels.delete(CHANNEL);

    expect(channel.id).toBe(CHANNEL);
    expect(fake.last.method).toBe('DELETE');
  });

  describe('permission overwrites', () => {
    it('should put an overwrite', async () => {
      const { client, fake } = createTestClient();

      await client.channels.editPermission(CHANNEL, ROLE, { type: OverwriteType.Role, allow: '1024', deny: '2048' });

      expect(fake.last.method).toBe('PUT');
      expect(fake.last.path).toBe(`/channels/${CHANNEL}/permissions/${ROLE}`);
      expect(fake.last.json).toEqual({ type: 0, allow: '1024', deny: '2048' });
    });

    it('should reject malformed permission sets', async () => {
      const { client } = createTestClient();

      await expect(
        client.channels.editPermission(CHANNEL, ROLE, { type: OverwriteType.Member, allow: 'all' })
      ).rejects.toThrow('Validation failed: allow must be a permission bit set');
    });

    it('should delete an overwrite', async () => {
      const { client, fake } = createTestClient();

      await client.channels.deletePermission(CHANNEL, ROLE);

      expect(`${fake.last.method} ${fake.last.path}`).toBe(`DELETE /channels/${CHANNEL}/permissions/${ROLE}`);
    });
  });

  describe('invites', () => {
    it('should create an invite with snake_case fields', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { code: 'abc', type: 0 } });

      const invite = await client.channels.createInvite(CHANNEL, { maxAge: 3600, maxUses: 5, unique: true });

      expect(invite.code).toBe('abc');
      expect(fake.last.json).toEqual({ max_age: 3600, max_uses: 5, unique: true });
    });

    it('should require the target of stream and activity invites', async () => {
      const { client } = createTestClient();

      await expect(
        client.channels.createInvite(CHANNEL, { targetType: InviteTargetType.Stream, maxAge: 604801 })
      ).rejects.toThrow(
        'Validation failed: maxAge must be an integer between 0 and 604800, Stream invites need targetUserId'
      );
      await expect(
        client.channels.createInvite(CHANNEL, { targetType: InviteTargetType.EmbeddedApplication })
      ).rejects.toThrow('Validation failed: Embedded application invites need targetApplicationId');
    });

    it('should list channel invites', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: [] });

      await expect(client.channels.getInvites(CHANNEL)).resolves.toEqual([]);
      expect(fake.last.path).toBe(`/channels/${CHANNEL}/invites`);
    });
  });

  describe('typing, pins and following', () => {
    it('should hit the expected routes', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ status: 204 }, { body: [] }, { status: 204 }, { status: 204 });

      await client.channels.triggerTyping(CHANNEL);
      await client.channels.getPinnedMessages(CHANNEL);
      await client.channels.pinMessage(CHANNEL, '200000000000000001');
      await client.channels.unpinMessage(CHANNEL, '200000000000000001', 'resolved');

      expect(fake.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
        `POST /channels/${CHANNEL}/typing`,
        `GET /channels/${CHANNEL}/pins`,
        `PUT /channels/${CHANNEL}/pins/200000000000000001`,
        `DELETE /channels/${CHANNEL}/pins/200000000000000001`,
      ]);
    });

    it('should follow an announcement channel', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: { channel_id: CHANNEL, webhook_id: '600000000000000001' } });

      const followed = await client.channels.follow(CHANNEL, '100000000000000002');

      expect(followed.webhook_id).toBe('600000000000000001');
      expect(fake.last.path).toBe(`/channels/${CHANNEL}/followers`);
      expect(fake.last.json).toEqual({ webhook_channel_id: '100000000000000002' });
    });
  });

  describe('group DM recipients', () => {
    const DM = '100000000000000005';
    const USER = '130000000000000001';

    it('should add and remove a recipient', async () => {
      const { client, fake } = createTestClient();

      await client.channels.addGroupRecipient(DM, USER, 'test-access-token', 'Sam');
      await client.channels.removeGroupRecipient(DM, USER);

      expect(fake.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
        `PUT /channels/${DM}/recipients/${USER}`,
        `DELETE /channels/${DM}/recipients/${USER}`,
      ]);
      expect(fake.requests[0].json).toEqual({ access_token: 'test-access-token', nick: 'Sam' });
    });

    it('should need an access token', async () => {
      const { client, fake } = createTestClient();

      await expect(client.channels.addGroupRecipient(DM, USER, '  ')).rejects.toThrow(
        'Validation failed: Access tokens cannot be empty'
      );
      expect(fake.requests).toHaveLength(0);
    });
  });
});
