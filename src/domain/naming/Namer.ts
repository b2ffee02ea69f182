import type {
  CatalogHandle,
  CatalogLookup,
  NameLike,
} from "../../shared/types/catalog-types";
import { AliasCatalog, CATALOG_GUIDANCE } from "../../shared/constants/CatalogEnums";
import { NotFoundError } from "../../shared/errors/NotFoundError";
import { TextUtils } from "../../shared/utils/TextUtils";
import { AliasTable } from "./AliasTable";
import { statusEffectAliases } from "../data/StatusEffectAliases";
import { enchantmentAliases } from "../data/EnchantmentAliases";

/**
 * Free functions translating and formatting catalog names.
 *
 * @module domain/naming/Namer
 */

export const ALIAS_TABLES: Readonly<Record<AliasCatalog, AliasTable>> =
  Object.freeze({
    [AliasCatalog.STATUS_EFFECT]: statusEffectAliases,
    [AliasCatalog.ENCHANTMENT]: enchantmentAliases,
  });

export function getAliasTable(catalog: AliasCatalog): AliasTable {
  return ALIAS_TABLES[catalog];
}

/**
 * Translates a canonical or display name to the legacy scheme.
 * Unknown names are returned upper-cased with underscores.
 */
export function resolveToLegacy(catalog: AliasCatalog, name: NameLike): string {
  return ALIAS_TABLES[catalog].toLegacy(name);
}

/**
 * Renders a legacy name the way players see it, e.g. `DAMAGE_ALL` becomes
 * `Sharpness`. Unknown names are capitalized as they are.
 */
export function resolveDisplay(
  catalog: AliasCatalog,
  legacyName: NameLike,
): string {
  return ALIAS_TABLES[catalog].toDisplay(legacyName);
}

/**
 * Looks up a name in a host catalog after translating it to the legacy
 * scheme.
 *
 * @throws {NotFoundError} when the host catalog has no such entry
 */
export function findCatalogEntry<H extends CatalogHandle>(
  lookup: CatalogLookup<H>,
  catalog: AliasCatalog,
  query: NameLike,
): H {
  const legacyName = resolveToLegacy(catalog, query);
  const handle = lookup(legacyName);

  if (handle === undefined) {
    throw new NotFoundError(
      catalog,
      String(query),
      legacyName,
      CATALOG_GUIDANCE[catalog],
    );
  }
  return handle;
}

/**
 * Lower-cases a name and replaces underscores with spaces.
 */
export function humanize(name: NameLike): string {
  return String(name).toLowerCase().replace(/_/g, " ");
}

/**
 * {@link humanize}, then capitalizes every word.
 */
export function humanizeCapitalized(name: NameLike): string {
  return TextUtils.capitalizeFully(humanize(name));
}

function nameOf(value: NameLike | CatalogHandle): NameLike {
  if (
    typeof value === "object" &&
    "name" in value &&
    typeof value.name === "string"
  ) {
    return value.name;
  }
  return value;
}

/**
 * Display name of a status effect given in either scheme,
 * e.g. `INSTANT_HEAL` becomes `Instant Health`.
 */
export function describeStatusEffect(effect: NameLike | CatalogHandle): string {
  const legacyName = resolveToLegacy(AliasCatalog.STATUS_EFFECT, nameOf(effect));
  return resolveDisplay(AliasCatalog.STATUS_EFFECT, legacyName);
}

/**
 * Display name of an enchantment given in either scheme.
 */
export function describeEnchantment(
  enchantment: NameLike | CatalogHandle,
): string {
  const legacyName = resolveToLegacy(
    AliasCatalog.ENCHANTMENT,
    nameOf(enchantment),
  );
  return resolveDisplay(AliasCatalog.ENCHANTMENT, legacyName);
}
