/**
 * Shared types for alias tables, host catalog handles and item records.
 *
 * @module shared/types/catalog-types
 */

/**
 * One row of an alias table.
 */
export interface AliasEntry {
  /** Current-scheme name, unique within its table */
  readonly canonicalName: string;
  /** Legacy-scheme name, unique within its table */
  readonly legacyName: string;
  /** Human-facing name; the legacy name stands in when absent */
  readonly displayName?: string;
}

/**
 * Anything that renders as an identifier: a plain string or an enum value.
 */
export type NameLike = string | number | { toString(): string };

/**
 * Handle returned by the host for a status effect or an enchantment.
 * Only its legacy name is read.
 */
export interface CatalogHandle {
  readonly name: string;
}

/**
 * Lookup into one of the host catalogs, keyed by legacy name.
 */
export type CatalogLookup<H extends CatalogHandle = CatalogHandle> = (
  legacyName: string,
) => H | undefined;

/**
 * The host runtime's effect and enchantment registries.
 */
export interface HostCatalog {
  lookupEffectByName(name: string): CatalogHandle | undefined;
  lookupEnchantmentByName(name: string): CatalogHandle | undefined;
}

/**
 * Per-item key/value store of identity strings attached by other systems.
 */
export interface TagStore {
  has(key: string): boolean;
  get(key: string): string | undefined;
}

/**
 * Read-only view of an item as the host reports it.
 *
 * Damage, amount, enchantments and item flags are deliberately absent:
 * they never take part in equivalence.
 */
export interface ItemRecord {
  readonly typeId: string;
  /** Numeric data value, only meaningful on legacy hosts */
  readonly legacySubType?: number;
  readonly hasMetadata: boolean;
  readonly displayName?: string | null;
  readonly lore?: readonly string[] | null;
  readonly tags: TagStore;
}
