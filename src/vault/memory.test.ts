import { describe, it, expect } from 'vitest';

import { MemoryVaultClient } from './memory.js';
import { ItemNotFoundError, UpdateError, VaultNotFoundError } from './errors.js';

describe('MemoryVaultClient', () => {
  it('matches titles case-insensitively and records writes', async () => {
    const client = new MemoryVaultClient();
    client.addItem('Work', {
      id: 'cf1',
      title: 'Cloudflare DNS token',
      fields: [{ id: 'credential', type: 'CONCEALED' }],
    });

    const item = await client.findItem('Work', 'cloudflare dns');
    expect(item.id).toBe('cf1');

    await client.updateField('Work', 'cf1', { id: 'credential' }, 'test-secret');
    expect(client.valueOf('cf1', 'credential')).toBe('test-secret');
    expect(client.writes).toEqual([
      { vault: 'Work', itemId: 'cf1', fieldId: 'credential', sectionId: null, value: 'test-secret' },
    ]);
  });

  it('distinguishes a missing vault from a missing item', async () => {
    const client = new MemoryVaultClient({ Work: [] });

    await expect(client.findItem('Personal', 'x')).rejects.toThrow(VaultNotFoundError);
    await expect(client.findItem('Work', 'x')).rejects.toThrow(ItemNotFoundError);
  });

  it('rejects writes to unknown items or fields', async () => {
    const client = new MemoryVaultClient({
      Work: [{ id: 'i1', title: 'npm publish', fields: [{ id: 'token', type: 'CONCEALED' }] }],
    });

    await expect(client.updateField('Work', 'i2', { id: 'token' }, 'v')).rejects.toThrow(UpdateError);
    await expect(client.updateField('Work', 'i1', { id: 'password' }, 'v')).rejects.toThrow(
      'Failed to update field "password" of item i1: field not present on item',
    );
    await expect(
      client.updateField('Work', 'i1', { id: 'token', section: { id: 'login' } }, 'v'),
    ).rejects.toThrow('Failed to update field "token" of item i1: field not present on item');
    expect(client.writes).toEqual([]);
  });

  it('keeps values of same-id fields in different sections apart', async () => {
    const client = new MemoryVaultClient({
      Work: [
        {
          id: 'i1',
          title: 'npm publish',
          fields: [
            { id: 'token', type: 'CONCEALED', section: { id: 'old' } },
            { id: 'token', type: 'CONCEALED' },
          ],
        },
      ],
    });

    await client.updateField('Work', 'i1', { id: 'token', section: { id: 'old' } }, 'a');
    await client.updateField('Work', 'i1', { id: 'token' }, 'b');

    expect(client.valueOf('i1', 'token', 'old')).toBe('a');
    expect(client.valueOf('i1', 'token')).toBe('b');
  });
});
