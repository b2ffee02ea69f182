/**
 * Status effect names that differ between the legacy registry and the names
 * players see in game.
 *
 * @module domain/data/StatusEffectAliases
 */

import type { AliasEntry } from "../../shared/types/catalog-types";
import { AliasCatalog } from "../../shared/constants/CatalogEnums";
import { AliasTable } from "../naming/AliasTable";

export const STATUS_EFFECT_ALIASES: readonly AliasEntry[] = [
  { canonicalName: "SLOW", legacyName: "SLOW", displayName: "Slowness" },
  { canonicalName: "STRENGTH", legacyName: "INCREASE_DAMAGE" },
  { canonicalName: "JUMP_BOOST", legacyName: "JUMP" },
  { canonicalName: "INSTANT_HEAL", legacyName: "INSTANT_HEALTH" },
  { canonicalName: "REGEN", legacyName: "REGENERATION" },
];

export const statusEffectAliases = new AliasTable(
  AliasCatalog.STATUS_EFFECT,
  STATUS_EFFECT_ALIASES,
);
