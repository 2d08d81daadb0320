/**
 * Credential manifest types and parsing.
 *
 * A manifest lists issuers (service names) and, under each, the credentials
 * whose new values should be written to the vault.
 */
import * as fs from 'node:fs/promises';
import * as toml from 'toml';

export interface Credential {
  readonly name: string;
  /** New secret value; written verbatim, may be empty. */
  readonly value: string;
}

export interface Issuer {
  readonly name: string;
  readonly credentials: readonly Credential[];
}

export interface Manifest {
  readonly issuers: readonly Issuer[];
}

export class ManifestParseError extends Error {
  /** Manifest file the error came from, when it was loaded from disk. */
  public readonly path?: string;

  constructor(message: string, options?: { path?: string; cause?: unknown }) {
    super(options?.path ? `${options.path}: ${message}` : message, { cause: options?.cause });
    this.name = 'ManifestParseError';
    this.path = options?.path;
  }
}

function isTable(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function requireString(table: Record<string, unknown>, key: string, at: string): string {
  const value = table[key];
  if (value === undefined) {
    throw new ManifestParseError(`Missing "${key}" in ${at}`);
  }
  if (typeof value !== 'string') {
    throw new ManifestParseError(`"${at}.${key}" must be a string, got ${typeof value}`);
  }
  return value;
}

function requireArray(table: Record<string, unknown>, key: string, at: string): unknown[] {
  const value = table[key];
  if (value === undefined) {
    throw new ManifestParseError(`Missing "${key}" in ${at}`);
  }
  if (!Array.isArray(value)) {
    throw new ManifestParseError(`"${at}.${key}" must be an array`);
  }
  return value;
}

function parseCredential(raw: unknown, at: string): Credential {
  if (!isTable(raw)) {
    throw new ManifestParseError(`${at} must be a table`);
  }
  const name = requireString(raw, 'name', at);
  if (name === '') {
    throw new ManifestParseError(`"${at}.name" must not be empty`);
  }
  const value = requireString(raw, 'value', at);
  return { name, value };
}

function parseIssuer(raw: unknown, at: string): Issuer {
  if (!isTable(raw)) {
    throw new ManifestParseError(`${at} must be a table`);
  }
  const name = requireString(raw, 'issuer', at);
  if (name === '') {
    throw new ManifestParseError(`"${at}.issuer" must not be empty`);
  }
  const credentials = requireArray(raw, 'credentials', at).map((c, i) =>
    parseCredential(c, `${at}.credentials[${i}]`),
  );
  return { name, credentials };
}

/**
 * Validate an already-parsed TOML value as a {@link Manifest}.
 *
 * Only structure is checked. Duplicate issuers are kept, in document order.
 */
export function parseManifestValue(input: unknown): Manifest {
  if (!isTable(input)) {
    throw new ManifestParseError('Manifest must be a table/object');
  }
  const issuers = requireArray(input, 'issuers', 'manifest').map((iss, i) =>
    parseIssuer(iss, `issuers[${i}]`),
  );
  return { issuers };
}

function syntaxErrorMessage(err: unknown): string {
  if (isTable(err) && typeof err.line === 'number' && typeof err.column === 'number') {
    const message = typeof err.message === 'string' ? err.message : 'syntax error';
    return `Invalid TOML at line ${err.line}, column ${err.column}: ${message}`;
  }
  return `Invalid TOML: ${err instanceof Error ? err.message : String(err)}`;
}

/**
 * Parse a TOML string into a {@link Manifest}.
 *
 * Expected TOML format:
 * ```toml
 * [[issuers]]
 * issuer = "GitLab"
 *
 * [[issuers.credentials]]
 * name = "cli PAT"
 * value = "XYZ"
 * ```
 *
 * @throws ManifestParseError on invalid TOML or a structurally invalid document.
 */
export function parseManifest(input: string): Manifest {
  let raw: unknown;
  try {
    raw = toml.parse(input);
  } catch (err) {
    throw new ManifestParseError(syntaxErrorMessage(err), { cause: err });
  }
  return parseManifestValue(raw);
}

/** Read and parse a manifest file. */
export async function loadManifest(manifestPath: string): Promise<Manifest> {
  let content: string;
  try {
    content = await fs.readFile(manifestPath, 'utf8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ManifestParseError('Manifest file does not exist', { path: manifestPath, cause: err });
    }
    throw new ManifestParseError(
      `Cannot read manifest: ${err instanceof Error ? err.message : String(err)}`,
      { path: manifestPath, cause: err },
    );
  }

  try {
    return parseManifest(content);
  } catch (err) {
    if (err instanceof ManifestParseError) {
      throw new ManifestParseError(err.message, { path: manifestPath, cause: err.cause });
    }
    throw err;
  }
}
