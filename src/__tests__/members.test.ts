/**
 * Tests for guild member endpoints.
 */

import { InMemoryLogger } from '../index.js';
import { createTestClient } from './fixtures/fake-fetch.js';

const GUILD = '110000000000000001';
const USER = '130000000000000001';
const ROLE = '120000000000000001';
const MEMBER = { user: { id: USER, username: 'member', discriminator: '0' }, roles: [], joined_at: '2024-01-01T00:00:00.000Z' };

describe('MembersApi', () => {
  it('should get and list members', async () => {
    const { client, fake } = createTestClient();
    fake.reply({ body: MEMBER }, { body: [MEMBER] });

    await client.members.get(GUILD, USER);
    const members = await client.members.list(GUILD, { limit: 1000, after: '0' });

    expect(members).toHaveLength(1);
    expect(fake.requests.map((r) => r.path)).toEqual([
      `/guilds/${GUILD}/members/${USER}`,
      `/guilds/${GUILD}/members?limit=1000&after=0`,
    ]);
  });

  it('should search with a default limit of one', async () => {
    const { client, fake } = createTestClient();
    fake.reply({ body: [MEMBER] });

    await client.members.search(GUILD, 'mem ber');

    expect(fake.last.path).toBe(`/guilds/${GUILD}/members/search?query=mem+ber&limit=1`);
  });

  it('should reject blank searches', async () => {
    const { client } = createTestClient();

    await expect(client.members.search(GUILD, '  ', 1001)).rejects.toThrow(
      'Validation failed: query cannot be empty, limit must be an integer between 1 and 1000'
    );
  });

  describe('add', () => {
    it('should add a member through an OAuth2 grant', async () => {
      const logger = new InMemoryLogger();
      const { client, fake } = createTestClient({ logger });
      fake.reply({ status: 201, body: MEMBER });

      const member = await client.members.add(GUILD, USER, { accessToken: 'test-access-token', roles: [ROLE] });

      expect(member?.user?.id).toBe(USER);
      expect(fake.last.method).toBe('PUT');
      expect(fake.last.json).toEqual({ access_token: 'test-access-token', roles: [ROLE] });
      expect(logger.getLogs().find((e) => e.message === 'Member added')?.context).toEqual({
        guildId: GUILD,
        userId: USER,
        alreadyMember: false,
      });
    });

    it('should resolve to undefined for existing members', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ status: 204 });

      await expect(client.members.add(GUILD, USER, { accessToken: 'test-access-token' })).resolves.toBeUndefined();
    });

    it('should validate the grant and nickname', async () => {
      const { client } = createTestClient();

      await expect(
        client.members.add(GUILD, USER, { accessToken: ' ', nick: 'n'.repeat(33), roles: ['admin'] })
      ).rejects.toThrow(
        'Validation failed: accessToken cannot be empty, nick must be between 1 and 32 characters, roles must be a snowflake'
      );
    });
  });

  describe('modify', () => {
    it('should time out a member', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: MEMBER });
      const until = new Date(Date.now() + 60 * 60 * 1000).toISOString();

      await client.members.modify(GUILD, USER, { communication_disabled_until: until }, 'cool down');

      expect(fake.last.method).toBe('PATCH');
      expect(fake.last.json).toEqual({ communication_disabled_until: until });
      expect(fake.last.headers.get('X-Audit-Log-Reason')).toBe('cool%20down');
    });

    it('should refuse timeouts beyond 28 days', async () => {
      const { client } = createTestClient();
      const until = new Date(Date.now() + 29 * 24 * 60 * 60 * 1000).toISOString();

      await expect(client.members.modify(GUILD, USER, { communication_disabled_until: until })).rejects.toThrow(
        'Validation failed: Timeouts cannot exceed 28 days'
      );
      await expect(client.members.modify(GUILD, USER, { communication_disabled_until: 'tomorrow' })).rejects.toThrow(
        'Validation failed: communication_disabled_until must be an ISO8601 timestamp'
      );
    });

    it('should lift a timeout with null', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: MEMBER });

      await client.members.modify(GUILD, USER, { communication_disabled_until: null });

      expect(fake.last.json).toEqual({ communication_disabled_until: null });
    });

    it('should change the bot nickname', async () => {
      const { client, fake } = createTestClient();
      fake.reply({ body: MEMBER });

      await client.members.modifyCurrent(GUILD, null);

      expect(fake.last.path).toBe(`/guilds/${GUILD}/members/@me`);
      expect(fake.last.json).toEqual({ nick: null });
    });
  });

  it('should kick and manage roles', async () => {
    const { client, fake } = createTestClient();

    await client.members.addRole(GUILD, USER, ROLE, 'promotion');
    await client.members.removeRole(GUILD, USER, ROLE);
    await client.members.remove(GUILD, USER, 'inactive');

    expect(fake.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
      `PUT /guilds/${GUILD}/members/${USER}/roles/${ROLE}`,
      `DELETE /guilds/${GUILD}/members/${USER}/roles/${ROLE}`,
      `DELETE /guilds/${GUILD}/members/${USER}`,
    ]);
  });
});
