/**
 * Credential update run.
 *
 * Walks the manifest in document order and, for each credential, locates its
 * vault item, picks the field to overwrite and writes the new value. Each
 * credential moves through `pending -> located -> field_selected -> updated`,
 * or ends in `failed`; nothing is retried.
 */

import type { Credential, Issuer, Manifest } from '../manifest/manifest.js';
import { buildSearchKey } from '../manifest/search-key.js';
import type { VaultClient, VaultItem } from '../vault/vault-client.js';
import { describeItem } from '../vault/vault-client.js';
import { selectField } from './field-selector.js';

export type CredentialState = 'pending' | 'located' | 'field_selected' | 'updated' | 'failed';

interface OutcomeBase {
  issuer: string;
  credential: string;
  search_key: string;
}

export interface CredentialSuccess extends OutcomeBase {
  /** `field_selected` on a dry run, `updated` otherwise. */
  state: 'field_selected' | 'updated';
  item: { id: string; title: string };
  field: { id: string; label: string | null };
}

export interface CredentialFailure extends OutcomeBase {
  state: 'failed';
  /** Last state reached before the failure. */
  failed_after: Exclude<CredentialState, 'updated' | 'failed'>;
  error_type: string;
  error: string;
}

export type CredentialOutcome = CredentialSuccess | CredentialFailure;

export interface RunReport {
  vault: string;
  dry_run: boolean;
  total: number;
  updated: number;
  failed: number;
  results: CredentialOutcome[];
}

export interface UpdateOptions {
  vault: string;
  client: VaultClient;
  /** Locate and select fields without writing anything. */
  dryRun?: boolean;
  /** Record failures and move on instead of halting at the first one. */
  keepGoing?: boolean;
  /** Progress sink. Defaults to `console.log`. */
  log?: (line: string) => void;
  /** Failure sink used when continuing past errors. Defaults to `console.error`. */
  warn?: (line: string) => void;
}

/**
 * Thrown when a run halts on a failing credential. Carries where the failure
 * happened and the report of everything processed up to and including it.
 */
export class CredentialUpdateError extends Error {
  public readonly issuer: string;
  public readonly credential: string;
  public readonly searchKey: string;
  public readonly report: RunReport;

  constructor(failure: CredentialFailure, report: RunReport, cause: unknown) {
    super(
      `{issuer=${failure.issuer},cred=${failure.credential}} search key ${JSON.stringify(failure.search_key)}: ${failure.error}`,
      { cause },
    );
    this.name = 'CredentialUpdateError';
    this.issuer = failure.issuer;
    this.credential = failure.credential;
    this.searchKey = failure.search_key;
    this.report = report;
  }
}

class CredentialRun {
  state: Exclude<CredentialState, 'updated' | 'failed'> = 'pending';
  private readonly issuer: Issuer;
  private readonly credential: Credential;
  private readonly searchKey: string;

  constructor(issuer: Issuer, credential: Credential) {
    this.issuer = issuer;
    this.credential = credential;
    this.searchKey = buildSearchKey(issuer.name, credential.name);
  }

  private base(): OutcomeBase {
    return {
      issuer: this.issuer.name,
      credential: this.credential.name,
      search_key: this.searchKey,
    };
  }

  async execute(options: UpdateOptions): Promise<CredentialSuccess> {
    const item: VaultItem = await options.client.findItem(options.vault, this.searchKey);
    this.state = 'located';

    const field = selectField(item);
    this.state = 'field_selected';

    if (!options.dryRun) {
      await options.client.updateField(options.vault, item.id, field, this.credential.value);
    }

    return {
      ...this.base(),
      state: options.dryRun ? 'field_selected' : 'updated',
      item: { id: item.id, title: item.title },
      field: { id: field.id, label: field.label ?? null },
    };
  }

  fail(err: unknown): CredentialFailure {
    return {
      ...this.base(),
      state: 'failed',
      failed_after: this.state,
      error_type: err instanceof Error ? err.name : 'Error',
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

/**
 * Update every credential in the manifest.
 *
 * By default the run stops at the first failing credential and throws a
 * {@link CredentialUpdateError}. With `keepGoing`, failures are recorded in
 * the returned report and processing continues.
 */
export async function updateCredentials(manifest: Manifest, options: UpdateOptions): Promise<RunReport> {
  const log = options.log ?? ((line: string) => console.log(line));
  const warn = options.warn ?? ((line: string) => console.error(line));
  const dryRun = options.dryRun ?? false;

  const report: RunReport = {
    vault: options.vault,
    dry_run: dryRun,
    total: 0,
    updated: 0,
    failed: 0,
    results: [],
  };

  for (const issuer of manifest.issuers) {
    log(`Issuer: ${issuer.name.toLowerCase()}`);

    for (const credential of issuer.credentials) {
      const run = new CredentialRun(issuer, credential);
      report.total += 1;

      let outcome: CredentialSuccess;
      try {
        outcome = await run.execute({ ...options, dryRun });
      } catch (err) {
        const failure = run.fail(err);
        report.results.push(failure);
        report.failed += 1;
        if (!options.keepGoing) {
          throw new CredentialUpdateError(failure, report, err);
        }
        warn(`error: {issuer=${failure.issuer},cred=${failure.credential}} ${failure.error}`);
        continue;
      }

      report.results.push(outcome);
      if (outcome.state === 'updated') report.updated += 1;

      const verb = dryRun ? 'would place' : 'placed';
      const fieldName = outcome.field.label ?? outcome.field.id;
      log(
        `${verb} credential ${JSON.stringify(credential.name)} into field ${JSON.stringify(fieldName)} ` +
          `of vault item ${describeItem(outcome.item)}`,
      );
    }
  }

  return report;
}
