/**
 * Catalog enumerations shared by the naming and item modules.
 *
 * @module shared/constants/CatalogEnums
 */

/**
 * The closed set of alias catalogs. Each one is backed by exactly one
 * {@link AliasTable}.
 */
export enum AliasCatalog {
  STATUS_EFFECT = "status_effect",
  ENCHANTMENT = "enchantment",
}

/**
 * Item type identifiers the comparator treats specially.
 */
export enum ItemTypeId {
  /** Its sub-type is the durability counter, so it never identifies the item. */
  BOW = "BOW",
}

/**
 * Where the valid legacy names of each catalog are documented.
 */
export const CATALOG_GUIDANCE: Record<AliasCatalog, string> = {
  [AliasCatalog.STATUS_EFFECT]:
    "https://hub.spigotmc.org/javadocs/bukkit/org/bukkit/potion/PotionEffectType.html",
  [AliasCatalog.ENCHANTMENT]:
    "https://hub.spigotmc.org/javadocs/spigot/org/bukkit/enchantments/Enchantment.html",
};

/**
 * Human noun used in error messages for each catalog.
 */
export const CATALOG_NOUN: Record<AliasCatalog, string> = {
  [AliasCatalog.STATUS_EFFECT]: "potion",
  [AliasCatalog.ENCHANTMENT]: "enchantment",
};
