/**
 * Resolution of command-line flags into run settings.
 *
 * Kept apart from `main.ts` so it can be exercised without spawning the CLI.
 */

import { ManifestParseError } from '../manifest/manifest.js';

export interface CliFlags {
  dryRun?: boolean;
  keepGoing?: boolean;
  strict?: boolean;
  opPath?: string;
  json?: boolean;
}

export interface RunOptions {
  manifestPath: string;
  vault: string;
  dryRun: boolean;
  keepGoing: boolean;
  strict: boolean;
  /** `op` executable: `--op-path`, then `$OP_BIN`, then `op` on PATH. */
  opPath: string;
  json: boolean;
}

export const EXIT_OK = 0;
export const EXIT_CREDENTIAL_FAILED = 1;
export const EXIT_MANIFEST_INVALID = 2;

export function resolveRunOptions(
  manifestPath: string,
  vault: string,
  flags: CliFlags,
  env: NodeJS.ProcessEnv = process.env,
): RunOptions {
  const envOp = env.OP_BIN?.trim();
  return {
    manifestPath,
    vault,
    dryRun: flags.dryRun ?? false,
    keepGoing: flags.keepGoing ?? false,
    strict: flags.strict ?? false,
    opPath: flags.opPath ?? (envOp ? envOp : 'op'),
    json: flags.json ?? false,
  };
}

/** Exit status for an error that ended the run. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof ManifestParseError) return EXIT_MANIFEST_INVALID;
  return EXIT_CREDENTIAL_FAILED;
}

/** Exit status for a run that returned a report (continued past failures). */
export function exitCodeForReport(report: { failed: number }): number {
  return report.failed > 0 ? EXIT_CREDENTIAL_FAILED : EXIT_OK;
}

/** One-line message for stderr. */
export function errorLine(err: unknown): string {
  return `error: ${err instanceof Error ? err.message : String(err)}`;
}
