export { type LookupEntry, LookupTable, normalizeFluorophoreName, normalizeOwnerName } from './lookupTable.js';
export {
  type FluorophoreEntry,
  NameResolver,
  type NameResolverOptions,
  OWNER_CATEGORIES,
  type OwnerFamily,
  type QueryRunner,
} from './nameResolver.js';
