/**
 * The `update_op_creds` command body, separated from argument parsing so it
 * can run against any vault client and captured output.
 */

import { loadManifest } from '../manifest/manifest.js';
import { updateCredentials, CredentialUpdateError, type RunReport } from '../app/update.js';
import { OpVaultClient } from '../vault/op.js';
import type { VaultClient } from '../vault/vault-client.js';
import { errorLine, exitCodeFor, exitCodeForReport, type RunOptions } from './options.js';

export interface CliOutput {
  /** One line of standard output. */
  out(line: string): void;
  /** One line of standard error. */
  err(line: string): void;
}

export interface RunDeps {
  output?: CliOutput;
  createClient?: (opts: RunOptions, output: CliOutput) => VaultClient;
}

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function opClient(opts: RunOptions, output: CliOutput): VaultClient {
  return new OpVaultClient({ opPath: opts.opPath, strict: opts.strict, warn: (m) => output.err(m) });
}

function reportJson(report: RunReport): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Load the manifest, update every credential and return the process exit
 * status. With `json`, standard output carries only the run report.
 */
export async function runUpdate(opts: RunOptions, deps: RunDeps = {}): Promise<number> {
  const output = deps.output ?? consoleOutput;
  const createClient = deps.createClient ?? opClient;
  const log = opts.json ? () => {} : (line: string) => output.out(line);

  try {
    const manifest = await loadManifest(opts.manifestPath);
    const report = await updateCredentials(manifest, {
      vault: opts.vault,
      client: createClient(opts, output),
      dryRun: opts.dryRun,
      keepGoing: opts.keepGoing,
      log,
      warn: (line) => output.err(line),
    });
    if (opts.json) output.out(reportJson(report));
    return exitCodeForReport(report);
  } catch (err) {
    if (opts.json && err instanceof CredentialUpdateError) output.out(reportJson(err.report));
    output.err(errorLine(err));
    return exitCodeFor(err);
  }
}
