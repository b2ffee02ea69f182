/**
 * Dependency injection type symbols.
 *
 * Used by Inversify container to identify and resolve dependencies.
 *
 * @module config
 */
export const TYPES = {
  CompatConfig: Symbol.for("CompatConfig"),
  HostCatalog: Symbol.for("HostCatalog"),
  EquivalenceOptions: Symbol.for("EquivalenceOptions"),

  StatusEffectAliases: Symbol.for("StatusEffectAliases"),
  EnchantmentAliases: Symbol.for("EnchantmentAliases"),

  CatalogResolver: Symbol.for("CatalogResolver"),
  ItemEquivalence: Symbol.for("ItemEquivalence"),
};
