#!/usr/bin/env node
import { Command } from 'commander';

import { resolveRunOptions, type CliFlags } from './options.js';
import { runUpdate } from './run.js';

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('update_op_creds')
  .description('Write new credential values from a TOML manifest into 1Password vault items')
  .version('0.1.0')
  .argument('<manifest-path>', 'path to the updated credentials (TOML)')
  .argument('<vault-name>', '1Password vault to update credentials in')
  .option('-n, --dry-run', 'locate items and fields without uploading edits')
  .option('--keep-going', 'continue with the next credential after a failure')
  .option('--strict', 'fail when more than one item title matches a credential')
  .option('--op-path <path>', 'path to the 1Password CLI (default: $OP_BIN or "op")')
  .option('--json', 'print a JSON report on stdout')
  .action(async (manifestPath: string, vault: string, flags: CliFlags) => {
    process.exitCode = await runUpdate(resolveRunOptions(manifestPath, vault, flags));
  });

// ---------------------------------------------------------------------------
// Parse and execute
// ---------------------------------------------------------------------------

await program.parseAsync(process.argv);
