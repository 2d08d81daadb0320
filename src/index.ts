/**
 * update-op-creds: write new credential values from a TOML manifest into
 * 1Password vault items.
 *
 * Re-exports the public API surface from a single entry point.
 */

// ---------------------------------------------------------------------------
// Manifest
// ---------------------------------------------------------------------------

export {
  type Credential,
  type Issuer,
  type Manifest,
  ManifestParseError,
  parseManifest,
  parseManifestValue,
  loadManifest,
  buildSearchKey,
} from './manifest/index.js';

// ---------------------------------------------------------------------------
// Vault access
// ---------------------------------------------------------------------------

export * from './vault/index.js';

// ---------------------------------------------------------------------------
// Update run
// ---------------------------------------------------------------------------

export { FIELD_TIERS, findUpdatableField, selectField } from './app/field-selector.js';
export {
  updateCredentials,
  CredentialUpdateError,
  type CredentialState,
  type CredentialOutcome,
  type CredentialSuccess,
  type CredentialFailure,
  type RunReport,
  type UpdateOptions,
} from './app/update.js';
export { runUpdate, type CliOutput, type RunDeps } from './cli/run.js';
