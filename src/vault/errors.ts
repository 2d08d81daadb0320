/**
 * Errors raised while locating and updating vault items.
 *
 * Every failure here is terminal for the credential being processed; callers
 * decide whether the run halts or moves on to the next credential.
 */

/** Base class for failures reported by a vault client or the field selector. */
export class VaultError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VaultError';
  }
}

export class VaultNotFoundError extends VaultError {
  public readonly vault: string;

  constructor(vault: string, options?: { cause?: unknown }) {
    super(`Vault ${JSON.stringify(vault)} does not exist or is not accessible`, options);
    this.name = 'VaultNotFoundError';
    this.vault = vault;
  }
}

export class ItemNotFoundError extends VaultError {
  public readonly vault: string;
  public readonly query: string;

  constructor(vault: string, query: string) {
    super(`No item with a title containing ${JSON.stringify(query)} in vault ${JSON.stringify(vault)}`);
    this.name = 'ItemNotFoundError';
    this.vault = vault;
    this.query = query;
  }
}

export class AmbiguousMatchError extends VaultError {
  public readonly vault: string;
  public readonly query: string;
  public readonly titles: readonly string[];

  constructor(vault: string, query: string, titles: readonly string[]) {
    super(
      `${titles.length} items in vault ${JSON.stringify(vault)} match ${JSON.stringify(query)}: ` +
        titles.map((t) => JSON.stringify(t)).join(', '),
    );
    this.name = 'AmbiguousMatchError';
    this.vault = vault;
    this.query = query;
    this.titles = titles;
  }
}

export class AuthenticationError extends VaultError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`1Password CLI is not signed in: ${detail}`, options);
    this.name = 'AuthenticationError';
  }
}

export class NoUpdatableFieldError extends VaultError {
  public readonly itemId: string;
  public readonly itemTitle: string;

  constructor(itemId: string, itemTitle: string) {
    super(`Item ${itemTitle} (id: ${itemId}) has no concealed field to update`);
    this.name = 'NoUpdatableFieldError';
    this.itemId = itemId;
    this.itemTitle = itemTitle;
  }
}

export class UpdateError extends VaultError {
  public readonly itemId: string;
  public readonly fieldId: string;

  constructor(itemId: string, fieldId: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to update field ${JSON.stringify(fieldId)} of item ${itemId}: ${reason}`, options);
    this.name = 'UpdateError';
    this.itemId = itemId;
    this.fieldId = fieldId;
  }
}

/** An `op` invocation failed in a way that maps to no more specific error. */
export class OpCommandError extends VaultError {
  public readonly command: readonly string[];
  public readonly stderr: string;

  constructor(command: readonly string[], stderr: string, options?: { cause?: unknown }) {
    const detail = stderr.trim() === '' ? 'no output' : stderr.trim();
    super(`${command.join(' ')} failed: ${detail}`, options);
    this.name = 'OpCommandError';
    this.command = command;
    this.stderr = stderr;
  }
}
