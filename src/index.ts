import "reflect-metadata";

export { createContainer } from "./config/container";
export { TYPES } from "./config/Types";
export { CONFIG, loadConfig, type CompatConfig } from "./config/config";

export { AliasTable } from "./domain/naming/AliasTable";
export {
  ALIAS_TABLES,
  getAliasTable,
  resolveToLegacy,
  resolveDisplay,
  findCatalogEntry,
  humanize,
  humanizeCapitalized,
  describeStatusEffect,
  describeEnchantment,
} from "./domain/naming/Namer";
export { CatalogResolver } from "./domain/naming/CatalogResolver";
export {
  ItemEquivalence,
  SUB_TYPE_EXEMPT_TYPES,
  type EquivalenceOptions,
} from "./domain/items/ItemEquivalence";
export {
  STATUS_EFFECT_ALIASES,
  statusEffectAliases,
} from "./domain/data/StatusEffectAliases";
export {
  ENCHANTMENT_ALIASES,
  enchantmentAliases,
} from "./domain/data/EnchantmentAliases";
export {
  parseHostVersion,
  compareVersions,
  isLegacyHost,
  FLATTENING_VERSION,
  type HostVersion,
} from "./domain/version/HostVersion";

export { AliasCatalog, ItemTypeId, CATALOG_GUIDANCE } from "./shared/constants/CatalogEnums";
export { NotFoundError } from "./shared/errors/NotFoundError";
export { TextUtils } from "./shared/utils/TextUtils";
export type {
  AliasEntry,
  CatalogHandle,
  CatalogLookup,
  HostCatalog,
  ItemRecord,
  NameLike,
  TagStore,
} from "./shared/types/catalog-types";
export { logger, Logger, LogLevel, LogCategory } from "./infrastructure/utils/logger";
