import { NoUpdatableFieldError } from '../vault/errors.js';
import type { VaultField, VaultItem } from '../vault/vault-client.js';

type FieldPredicate = (field: VaultField) => boolean;

const isConcealed: FieldPredicate = (field) => field.type === 'CONCEALED';
const isTopLevel: FieldPredicate = (field) => field.section === undefined;

/**
 * Selection tiers, highest priority first.
 *
 * Items are assumed to be API credentials, whose secret lives in the top-level
 * concealed field "credential". Failing that, any top-level concealed field,
 * then any concealed field at all.
 */
export const FIELD_TIERS: readonly FieldPredicate[] = [
  (field) => isConcealed(field) && isTopLevel(field) && field.id === 'credential',
  (field) => isConcealed(field) && isTopLevel(field),
  isConcealed,
];

/**
 * Pick the field to overwrite, or `null` if no field is concealed.
 *
 * Tiers are tried in order; within a tier the first field in item order wins.
 */
export function findUpdatableField(fields: readonly VaultField[]): VaultField | null {
  for (const tier of FIELD_TIERS) {
    const match = fields.find(tier);
    if (match !== undefined) return match;
  }
  return null;
}

/** Like {@link findUpdatableField}, but throws when nothing qualifies. */
export function selectField(item: VaultItem): VaultField {
  const field = findUpdatableField(item.fields);
  if (field === null) {
    throw new NoUpdatableFieldError(item.id, item.title);
  }
  return field;
}
