export type {
  VaultClient,
  VaultItem,
  VaultField,
  FieldRef,
  FieldSection,
  FieldType,
  KnownFieldType,
} from './vault-client.js';
export { describeItem, sameField, titleMatches } from './vault-client.js';
export {
  VaultError,
  VaultNotFoundError,
  ItemNotFoundError,
  AmbiguousMatchError,
  AuthenticationError,
  NoUpdatableFieldError,
  UpdateError,
  OpCommandError,
} from './errors.js';
export { OpVaultClient, type OpVaultClientOptions, itemFromTemplate, withFieldValue } from './op.js';
export { MemoryVaultClient, type FieldWrite } from './memory.js';
