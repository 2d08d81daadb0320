/**
 * VaultClient abstraction.
 *
 * The only two vault capabilities the updater depends on. Implementations may
 * shell out to the 1Password CLI or serve scripted items from memory.
 */

/**
 * Field types reported by the 1Password CLI.
 * Any other string `op` reports is kept as-is and never treated as concealed.
 */
export type KnownFieldType =
  | 'CONCEALED'
  | 'STRING'
  | 'EMAIL'
  | 'URL'
  | 'DATE'
  | 'MONTH_YEAR'
  | 'PHONE'
  | 'OTP'
  | 'MENU';

export type FieldType = KnownFieldType | (string & {});

export interface FieldSection {
  readonly id: string;
  readonly label?: string;
}

export interface VaultField {
  readonly id: string;
  readonly label?: string;
  readonly type: FieldType;
  /** Absent for top-level fields. */
  readonly section?: FieldSection;
}

/**
 * Identifies one field of an item. Field ids are only unique within a
 * section, so the section (or its absence) is part of the reference.
 */
export type FieldRef = Pick<VaultField, 'id' | 'section'>;

export interface VaultItem {
  readonly id: string;
  readonly title: string;
  readonly vault?: string;
  readonly category?: string;
  readonly fields: readonly VaultField[];
}

export interface VaultClient {
  /**
   * Find the first item in `vault` whose title contains `query`.
   *
   * @throws VaultNotFoundError, ItemNotFoundError, AmbiguousMatchError (strict
   *   clients only) or AuthenticationError.
   */
  findItem(vault: string, query: string): Promise<VaultItem>;

  /**
   * Overwrite the value of one field on an item. The field must match both
   * `field.id` and `field.section`.
   *
   * @throws UpdateError carrying the underlying cause.
   */
  updateField(vault: string, itemId: string, field: FieldRef, value: string): Promise<void>;
}

export function describeItem(item: Pick<VaultItem, 'id' | 'title'>): string {
  return `${item.title} (id: ${item.id})`;
}

/** True when `field` is the one `ref` points at: same id, same section or both top-level. */
export function sameField(field: FieldRef, ref: FieldRef): boolean {
  return field.id === ref.id && field.section?.id === ref.section?.id;
}

/** Case-insensitive substring match used to pick items by title. */
export function titleMatches(title: string, query: string): boolean {
  return title.toLowerCase().includes(query.toLowerCase());
}
