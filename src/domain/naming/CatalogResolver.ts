import { injectable, inject } from "inversify";
import { TYPES } from "../../config/Types";
import type {
  CatalogHandle,
  HostCatalog,
  NameLike,
} from "../../shared/types/catalog-types";
import { AliasCatalog } from "../../shared/constants/CatalogEnums";
import {
  describeEnchantment,
  describeStatusEffect,
  findCatalogEntry,
} from "./Namer";

/**
 * Resolves user-supplied names against the host's effect and enchantment
 * registries.
 */
@injectable()
export class CatalogResolver {
  private readonly catalog: HostCatalog;

  constructor(@inject(TYPES.HostCatalog) catalog: HostCatalog) {
    this.catalog = catalog;
  }

  /**
   * @throws {NotFoundError} when the host has no such effect
   */
  public findStatusEffect(name: NameLike): CatalogHandle {
    return findCatalogEntry(
      (legacyName) => this.catalog.lookupEffectByName(legacyName),
      AliasCatalog.STATUS_EFFECT,
      name,
    );
  }

  /**
   * @throws {NotFoundError} when the host has no such enchantment
   */
  public findEnchantment(name: NameLike): CatalogHandle {
    return findCatalogEntry(
      (legacyName) => this.catalog.lookupEnchantmentByName(legacyName),
      AliasCatalog.ENCHANTMENT,
      name,
    );
  }

  public describeStatusEffect(effect: CatalogHandle): string {
    return describeStatusEffect(effect);
  }

  public describeEnchantment(enchantment: CatalogHandle): string {
    return describeEnchantment(enchantment);
  }
}
