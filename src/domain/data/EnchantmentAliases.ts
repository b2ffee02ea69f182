/**
 * Enchantment names that differ between the legacy registry and the names
 * shown on enchantment tables.
 *
 * The display form of every entry is its canonical name, so `DAMAGE_ALL`
 * renders as `Sharpness`.
 *
 * @module domain/data/EnchantmentAliases
 */

import type { AliasEntry } from "../../shared/types/catalog-types";
import { AliasCatalog } from "../../shared/constants/CatalogEnums";
import { AliasTable } from "../naming/AliasTable";

function enchantment(canonicalName: string, legacyName: string): AliasEntry {
  return { canonicalName, legacyName, displayName: canonicalName };
}

export const ENCHANTMENT_ALIASES: readonly AliasEntry[] = [
  enchantment("PROTECTION", "PROTECTION_ENVIRONMENTAL"),
  enchantment("FIRE_PROTECTION", "PROTECTION_FIRE"),
  enchantment("FEATHER_FALLING", "PROTECTION_FALL"),
  enchantment("BLAST_PROTECTION", "PROTECTION_EXPLOSIONS"),
  enchantment("PROJECTILE_PROTECTION", "PROTECTION_PROJECTILE"),
  enchantment("RESPIRATION", "OXYGEN"),
  enchantment("AQUA_AFFINITY", "WATER_WORKER"),
  enchantment("THORN", "THORNS"),
  enchantment("CURSE_OF_VANISHING", "VANISHING_CURSE"),
  enchantment("CURSE_OF_BINDING", "BINDING_CURSE"),
  enchantment("SHARPNESS", "DAMAGE_ALL"),
  enchantment("SMITE", "DAMAGE_UNDEAD"),
  enchantment("BANE_OF_ARTHROPODS", "DAMAGE_ARTHROPODS"),
  enchantment("LOOTING", "LOOT_BONUS_MOBS"),
  enchantment("SWEEPING_EDGE", "SWEEPING"),
  enchantment("EFFICIENCY", "DIG_SPEED"),
  enchantment("UNBREAKING", "DURABILITY"),
  enchantment("FORTUNE", "LOOT_BONUS_BLOCKS"),
  enchantment("POWER", "ARROW_DAMAGE"),
  enchantment("PUNCH", "ARROW_KNOCKBACK"),
  enchantment("FLAME", "ARROW_FIRE"),
  enchantment("INFINITY", "ARROW_INFINITE"),
  enchantment("LUCK_OF_THE_SEA", "LUCK"),
];

export const enchantmentAliases = new AliasTable(
  AliasCatalog.ENCHANTMENT,
  ENCHANTMENT_ALIASES,
);
