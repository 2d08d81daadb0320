export type { Credential, Issuer, Manifest } from './manifest.js';
export { ManifestParseError, parseManifest, parseManifestValue, loadManifest } from './manifest.js';
export { buildSearchKey } from './search-key.js';
