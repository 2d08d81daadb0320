import {
  AmbiguousMatchError,
  ItemNotFoundError,
  UpdateError,
  VaultNotFoundError,
} from './errors.js';
import { sameField, titleMatches, type FieldRef, type VaultClient, type VaultItem } from './vault-client.js';

export interface FieldWrite {
  vault: string;
  itemId: string;
  fieldId: string;
  /** `null` for a top-level field. */
  sectionId: string | null;
  value: string;
}

function valueKey(itemId: string, fieldId: string, sectionId: string | null): string {
  return JSON.stringify([itemId, sectionId, fieldId]);
}

/**
 * In-memory vault client.
 *
 * Holds scripted items per vault name and records every field write, so the
 * updater can be exercised without the 1Password CLI. Items keep insertion
 * order, which stands in for `op`'s own listing order.
 */
export class MemoryVaultClient implements VaultClient {
  private readonly vaults = new Map<string, VaultItem[]>();
  private readonly values = new Map<string, string>();
  private readonly failures = new Map<string, Error>();
  private readonly strict: boolean;

  /** Every successful `updateField` call, in order. */
  readonly writes: FieldWrite[] = [];

  constructor(vaults: Record<string, VaultItem[]> = {}, options: { strict?: boolean } = {}) {
    for (const [name, items] of Object.entries(vaults)) {
      this.vaults.set(name, [...items]);
    }
    this.strict = options.strict ?? false;
  }

  addItem(vault: string, item: VaultItem): void {
    const items = this.vaults.get(vault) ?? [];
    items.push(item);
    this.vaults.set(vault, items);
  }

  /** Make every write to `itemId` fail with `error`. */
  failUpdatesTo(itemId: string, error: Error): void {
    this.failures.set(itemId, error);
  }

  /**
   * Last value written to a field, or `null` if it was never written.
   * Pass `sectionId` for a field inside a section.
   */
  valueOf(itemId: string, fieldId: string, sectionId?: string): string | null {
    return this.values.get(valueKey(itemId, fieldId, sectionId ?? null)) ?? null;
  }

  async findItem(vault: string, query: string): Promise<VaultItem> {
    const items = this.vaults.get(vault);
    if (items === undefined) {
      throw new VaultNotFoundError(vault);
    }

    const matches = items.filter((item) => titleMatches(item.title, query));
    if (matches.length === 0) {
      throw new ItemNotFoundError(vault, query);
    }
    if (matches.length > 1 && this.strict) {
      throw new AmbiguousMatchError(
        vault,
        query,
        matches.map((m) => m.title),
      );
    }
    return matches[0];
  }

  async updateField(vault: string, itemId: string, field: FieldRef, value: string): Promise<void> {
    const fieldId = field.id;
    const failure = this.failures.get(itemId);
    if (failure) {
      throw new UpdateError(itemId, fieldId, failure.message, { cause: failure });
    }

    const item = this.vaults.get(vault)?.find((i) => i.id === itemId);
    if (!item) {
      throw new UpdateError(itemId, fieldId, `item not found in vault ${vault}`);
    }
    if (!item.fields.some((f) => sameField(f, field))) {
      throw new UpdateError(itemId, fieldId, 'field not present on item');
    }

    const sectionId = field.section?.id ?? null;
    this.values.set(valueKey(itemId, fieldId, sectionId), value);
    this.writes.push({ vault, itemId, fieldId, sectionId, value });
  }
}
