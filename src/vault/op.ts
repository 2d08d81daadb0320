import { execFile, spawn } from 'node:child_process';
import { promisify } from 'node:util';

import {
  AmbiguousMatchError,
  AuthenticationError,
  ItemNotFoundError,
  OpCommandError,
  UpdateError,
  VaultError,
  VaultNotFoundError,
} from './errors.js';
import {
  titleMatches,
  type FieldRef,
  type FieldSection,
  type VaultClient,
  type VaultField,
  type VaultItem,
} from './vault-client.js';

const execFileAsync = promisify(execFile);

type JsonObject = Record<string, unknown>;

type ListedItem = {
  id: string;
  title: string;
};

export interface OpVaultClientOptions {
  /** `op` executable; resolved through PATH when not absolute. */
  opPath?: string;
  /** Throw AmbiguousMatchError instead of taking the first of several matches. */
  strict?: boolean;
  /** Sink for non-fatal warnings. Defaults to `console.warn`. */
  warn?: (message: string) => void;
}

function isObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseJson(command: readonly string[], stdout: string): unknown {
  try {
    return JSON.parse(stdout);
  } catch (err) {
    throw new OpCommandError(command, `unparseable JSON output: ${String(err)}`, { cause: err });
  }
}

function parseItemList(command: readonly string[], stdout: string): ListedItem[] {
  // `op item list` prints nothing at all for an empty vault.
  if (stdout.trim() === '') return [];

  const raw = parseJson(command, stdout);
  if (!Array.isArray(raw)) {
    throw new OpCommandError(command, 'expected a JSON array of items');
  }

  const items: ListedItem[] = [];
  for (const entry of raw) {
    if (!isObject(entry) || typeof entry.id !== 'string' || typeof entry.title !== 'string') {
      throw new OpCommandError(command, 'item list entry is missing "id" or "title"');
    }
    items.push({ id: entry.id, title: entry.title });
  }
  return items;
}

/**
 * Section id of a raw template field: `undefined` when the field is top-level,
 * `''` when it has a section that carries no string id.
 */
function rawSectionId(raw: unknown): string | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (isObject(raw) && typeof raw.id === 'string') return raw.id;
  return '';
}

function parseSection(raw: unknown): FieldSection | undefined {
  const id = rawSectionId(raw);
  if (id === undefined) return undefined;
  const label = isObject(raw) ? optionalString(raw.label) : undefined;
  return label === undefined ? { id } : { id, label };
}

function parseField(command: readonly string[], raw: unknown): VaultField {
  if (!isObject(raw) || typeof raw.id !== 'string' || typeof raw.type !== 'string') {
    throw new OpCommandError(command, 'item field is missing "id" or "type"');
  }
  const field: { id: string; type: string; label?: string; section?: FieldSection } = {
    id: raw.id,
    type: raw.type,
  };
  const label = optionalString(raw.label);
  if (label !== undefined) field.label = label;
  const section = parseSection(raw.section);
  if (section !== undefined) field.section = section;
  return field;
}

/**
 * Build a {@link VaultItem} view from an `op item get --format json` template.
 * A template without a `fields` key yields an item with no fields.
 */
export function itemFromTemplate(command: readonly string[], template: JsonObject): VaultItem {
  if (typeof template.id !== 'string' || typeof template.title !== 'string') {
    throw new OpCommandError(command, 'item is missing "id" or "title"');
  }

  const rawFields = template.fields;
  let fields: VaultField[] = [];
  if (Array.isArray(rawFields)) {
    fields = rawFields.map((f: unknown) => parseField(command, f));
  } else if (rawFields !== undefined && rawFields !== null) {
    throw new OpCommandError(command, '"fields" must be an array');
  }

  const vault = isObject(template.vault) ? optionalString(template.vault.name) : undefined;
  const category = optionalString(template.category);

  return {
    id: template.id,
    title: template.title,
    ...(vault !== undefined ? { vault } : {}),
    ...(category !== undefined ? { category } : {}),
    fields,
  };
}

/**
 * Return a copy of an item template with `value` set on the field matching
 * `field` by id and section, or `null` when the template has no such field.
 * Every other key is carried over untouched so `op item edit` keeps it.
 */
export function withFieldValue(template: JsonObject, field: FieldRef, value: string): JsonObject | null {
  const rawFields = template.fields;
  if (!Array.isArray(rawFields)) return null;

  const sectionId = field.section?.id;
  let found = false;
  const fields = rawFields.map((f: unknown) => {
    if (!found && isObject(f) && f.id === field.id && rawSectionId(f.section) === sectionId) {
      found = true;
      return { ...f, value };
    }
    return f;
  });

  return found ? { ...template, fields } : null;
}

function errorStderr(err: unknown): string {
  if (isObject(err) && typeof err.stderr === 'string') return err.stderr;
  return '';
}

function isMissingExecutable(err: unknown): boolean {
  return isObject(err) && err.code === 'ENOENT';
}

const AUTH_PATTERNS = [
  /not currently signed in/i,
  /not signed in/i,
  /authorization prompt dismissed/i,
  /session expired/i,
  /no accounts configured/i,
];

const VAULT_PATTERNS = [/isn't a vault in this account/i, /vault .*(not found|doesn't exist)/i];

/**
 * Credential-manager client backed by the 1Password CLI (`op`).
 *
 * - `op item list --vault <vault> --format json` lists candidate titles.
 * - `op item get <id> --vault <vault> --format json` reads the full item.
 * - `op item edit <id> --vault <vault>` receives the edited template on stdin,
 *   so secrets never appear in the process arguments.
 *
 * Authentication is whatever session `op` already has.
 */
export class OpVaultClient implements VaultClient {
  private readonly opPath: string;
  private readonly strict: boolean;
  private readonly warn: (message: string) => void;

  constructor(options: OpVaultClientOptions = {}) {
    this.opPath = options.opPath ?? 'op';
    this.strict = options.strict ?? false;
    this.warn = options.warn ?? ((message) => console.warn(message));
  }

  private classify(vault: string, command: readonly string[], err: unknown): VaultError {
    if (isMissingExecutable(err)) {
      const where = /[\\/]/.test(this.opPath) ? 'not found' : 'not found in PATH';
      return new OpCommandError(command, `${this.opPath} ${where}`, { cause: err });
    }
    const stderr = errorStderr(err);
    if (AUTH_PATTERNS.some((p) => p.test(stderr))) {
      return new AuthenticationError(stderr.trim(), { cause: err });
    }
    if (VAULT_PATTERNS.some((p) => p.test(stderr))) {
      return new VaultNotFoundError(vault, { cause: err });
    }
    return new OpCommandError(command, stderr, { cause: err });
  }

  private async output(vault: string, args: string[]): Promise<string> {
    const command = [this.opPath, ...args];
    try {
      const { stdout } = await execFileAsync(this.opPath, args, {
        encoding: 'utf8',
        maxBuffer: 10 * 1024 * 1024,
      });
      return stdout;
    } catch (err) {
      throw this.classify(vault, command, err);
    }
  }

  private async readTemplate(vault: string, itemId: string): Promise<JsonObject> {
    const args = ['item', 'get', itemId, '--vault', vault, '--format', 'json'];
    const raw = parseJson([this.opPath, ...args], await this.output(vault, args));
    if (!isObject(raw)) {
      throw new OpCommandError([this.opPath, ...args], 'expected a JSON object');
    }
    return raw;
  }

  private async writeTemplate(vault: string, itemId: string, template: JsonObject): Promise<void> {
    const args = ['item', 'edit', itemId, '--vault', vault];
    const command = [this.opPath, ...args];
    const content = JSON.stringify(template);

    await new Promise<void>((resolve, reject) => {
      const child = spawn(this.opPath, args, {
        stdio: ['pipe', 'ignore', 'pipe'],
      });

      let stderr = '';
      child.stderr.setEncoding('utf8');
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (err) => reject(this.classify(vault, command, err)));
      child.on('close', (code) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(this.classify(vault, command, { stderr: stderr || `exited with code ${code}` }));
      });

      // An early exit closes the pipe; the exit status reported on 'close' says why.
      child.stdin.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code !== 'EPIPE') reject(this.classify(vault, command, err));
      });
      child.stdin.setDefaultEncoding('utf8');
      child.stdin.write(content);
      child.stdin.end();
    });
  }

  async findItem(vault: string, query: string): Promise<VaultItem> {
    const args = ['item', 'list', '--vault', vault, '--format', 'json'];
    const listed = parseItemList([this.opPath, ...args], await this.output(vault, args));

    const matches = listed.filter((item) => titleMatches(item.title, query));
    if (matches.length === 0) {
      throw new ItemNotFoundError(vault, query);
    }
    if (matches.length > 1) {
      const titles = matches.map((m) => m.title);
      if (this.strict) {
        throw new AmbiguousMatchError(vault, query, titles);
      }
      this.warn(
        `warn: ${matches.length} items match ${JSON.stringify(query)} in vault ${vault}, using ${JSON.stringify(titles[0])}`,
      );
    }

    const [first] = matches;
    const template = await this.readTemplate(vault, first.id);
    return itemFromTemplate([this.opPath, 'item', 'get', first.id], template);
  }

  async updateField(vault: string, itemId: string, field: FieldRef, value: string): Promise<void> {
    const fieldId = field.id;
    let template: JsonObject;
    try {
      template = await this.readTemplate(vault, itemId);
    } catch (err) {
      throw new UpdateError(itemId, fieldId, err instanceof Error ? err.message : String(err), {
        cause: err,
      });
    }

    const edited = withFieldValue(template, field, value);
    if (edited === null) {
      throw new UpdateError(itemId, fieldId, 'field not present on item');
    }

    try {
      await this.writeTemplate(vault, itemId, edited);
    } catch (err) {
      throw new UpdateError(itemId, fieldId, err instanceof Error ? err.message : String(err), {
        cause: err,
      });
    }
  }
}
