/**
 * Tests for role and emoji endpoints.
 */

import { createTestClient } from './fixtures/fake-fetch.js';

const GUILD = '110000000000000001';
const ROLE = '120000000000000001';
const EMOJI = '150000000000000001';
const PNG = 'data:image/png;base64,iVBORw0KGgo=';

describe('RolesApi', () => {
  it('should create a role', async () => {
    const { client, fake } = createTestClient();
    fake.reply({ body: { id: ROLE, name: 'On call' } });

    const role = await client.roles.create(GUILD, { name: 'On call', color: 0xed4245, mentionable: true }, 'rotation');

    expect(role.id).toBe(ROLE);
    expect(fake.last.path).toBe(`/guilds/${GUILD}/roles`);
    expect(fake.last.json).toEqual({ name: 'On call', color: 0xed4245, mentionable: true });
  });

  it('should validate role fields', async () => {
    const { client, fake } = createTestClient();

    await expect(
      client.roles.modify(GUILD, ROLE, { name: '', color: 0x1000000, permissions: '8n' })
    ).rejects.toThrow(
      'Validation failed: name must be between 1 and 100 characters, color must be an integer between 0 and 16777215, permissions must be a permission bit set'
    );
    expect(fake.requests).toHaveLength(0);
  });

  it('should reorder roles', async () => {
    const { client, fake } = createTestClient();
    fake.reply({ body: [] });

    await client.roles.modifyPositions(GUILD, [{ id: ROLE, position: 3 }]);

    expect(fake.last.method).toBe('PATCH');
    expect(fake.last.json).toEqual([{ id: ROLE, position: 3 }]);
    await expect(client.roles.modifyPositions(GUILD, [])).rejects.toThrow(
      'Validation failed: At least one role position is required'
    );
  });

  it('should list, modify and delete roles', async () => {
    const { client, fake } = createTestClient();
    fake.reply({ body: [] }, { body: { id: ROLE } });

    await client.roles.list(GUILD);
    await client.roles.modify(GUILD, ROLE, { permissions: '1024' });
    await client.roles.delete(GUILD, ROLE);

    expect(fake.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
      `GET /guilds/${GUILD}/roles`,
      `PATCH /guilds/${GUILD}/roles/${ROLE}`,
      `DELETE /guilds/${GUILD}/roles/${ROLE}`,
    ]);
  });
});

describe('EmojisApi', () => {
  it('should create an emoji with an empty role list by default', async () => {
    const { client, fake } = createTestClient();
    fake.reply({ body: { id: EMOJI, name: 'ship_it' } });

    await client.emojis.create(GUILD, { name: 'ship_it', image: PNG });

    expect(fake.last.json).toEqual({ name: 'ship_it', image: PNG, roles: [] });
  });

  it('should validate names and images', async () => {
    const { client } = createTestClient();

    await expect(client.emojis.create(GUILD, { name: 'a', image: 'https://example.test/e.png' })).rejects.toThrow(
      'Validation failed: name must be 2-32 letters, digits or underscores, image must be a base64 image data URI'
    );
    await expect(client.emojis.modify(GUILD, EMOJI, { name: 'has space' })).rejects.toThrow(
      'Validation failed: name must be 2-32 letters, digits or underscores'
    );
  });

  it('should list, get, modify and delete emojis', async () => {
    const { client, fake } = createTestClient();
    fake.reply({ body: [] }, { body: { id: EMOJI } }, { body: { id: EMOJI } });

    await client.emojis.list(GUILD);
    await client.emojis.get(GUILD, EMOJI);
    await client.emojis.modify(GUILD, EMOJI, { roles: null });
    await client.emojis.delete(GUILD, EMOJI);

    expect(fake.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
      `GET /guilds/${GUILD}/emojis`,
      `GET /guilds/${GUILD}/emojis/${EMOJI}`,
      `PATCH /guilds/${GUILD}/emojis/${EMOJI}`,
      `DELETE /guilds/${GUILD}/emojis/${EMOJI}`,
    ]);
    expect(fake.requests[2].json).toEqual({ roles: null });
  });
});
