import { describe, it, expect } from 'vitest';

import { findUpdatableField, selectField } from './field-selector.js';
import { NoUpdatableFieldError } from '../vault/errors.js';
import type { VaultField, VaultItem } from '../vault/vault-client.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const LOGIN = { id: 'login', label: 'Login' };

function item(fields: VaultField[]): VaultItem {
  return { id: 'item-1', title: 'GitLab CLI PAT', fields };
}

describe('findUpdatableField', () => {
  it('prefers the top-level concealed field named credential', () => {
    const fields: VaultField[] = [
      { id: 'password', type: 'CONCEALED' },
      { id: 'credential', type: 'CONCEALED', section: LOGIN },
      { id: 'credential', type: 'CONCEALED', label: 'credential' },
    ];
    expect(findUpdatableField(fields)).toBe(fields[2]);
  });

  it('falls back to the first top-level concealed field', () => {
    const fields: VaultField[] = [
      { id: 'username', type: 'STRING' },
      { id: 'password', type: 'CONCEALED', section: LOGIN },
      { id: 'otp', type: 'CONCEALED' },
      { id: 'recovery', type: 'CONCEALED' },
    ];
    expect(findUpdatableField(fields)?.id).toBe('otp');
  });

  it('falls back to the first concealed field in any section', () => {
    const fields: VaultField[] = [
      { id: 'notes', type: 'STRING' },
      { id: 'secret-a', type: 'CONCEALED', section: LOGIN },
      { id: 'secret-b', type: 'CONCEALED', section: { id: 'other' } },
    ];
    expect(findUpdatableField(fields)?.id).toBe('secret-a');
  });

  it('never selects a non-concealed field, even one named credential', () => {
    const fields: VaultField[] = [
      { id: 'credential', type: 'STRING' },
      { id: 'token', type: 'CONCEALED', section: LOGIN },
    ];
    expect(findUpdatableField(fields)?.id).toBe('token');
  });

  it('returns null when there is no concealed field', () => {
    expect(
      findUpdatableField([
        { id: 'username', type: 'STRING' },
        { id: 'website', type: 'URL' },
      ]),
    ).toBeNull();
    expect(findUpdatableField([])).toBeNull();
  });

  it('is deterministic for the same field list', () => {
    const fields: VaultField[] = [
      { id: 'a', type: 'CONCEALED', section: LOGIN },
      { id: 'b', type: 'CONCEALED' },
    ];
    expect(findUpdatableField(fields)).toBe(findUpdatableField([...fields]));
  });
});

describe('selectField', () => {
  it('returns the selected field', () => {
    const field = selectField(item([{ id: 'credential', type: 'CONCEALED' }]));
    expect(field).toEqual({ id: 'credential', type: 'CONCEALED' });
  });

  it('throws NoUpdatableFieldError when nothing is concealed', () => {
    const target = item([{ id: 'username', type: 'STRING' }]);
    expect(() => selectField(target)).toThrow(NoUpdatableFieldError);
    expect(() => selectField(target)).toThrow(
      'Item GitLab CLI PAT (id: item-1) has no concealed field to update',
    );
  });
});
