import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { CONFIG, type CompatConfig } from "./config";

/**
 * Dependency injection container configuration.
 *
 * Alias tables and configuration are bound as constants; the resolver and
 * the comparator are singletons built from them.
 *
 * @module config
 */
import type { HostCatalog } from "../shared/types/catalog-types";
import { AliasTable } from "../domain/naming/AliasTable";
import { statusEffectAliases } from "../domain/data/StatusEffectAliases";
import { enchantmentAliases } from "../domain/data/EnchantmentAliases";
import { CatalogResolver } from "../domain/naming/CatalogResolver";
import {
  ItemEquivalence,
  type EquivalenceOptions,
} from "../domain/items/ItemEquivalence";
import { logger, LogCategory } from "../infrastructure/utils/logger";

export function createContainer(
  hostCatalog: HostCatalog,
  config: CompatConfig = CONFIG,
): Container {
  logger.setMinLevel(config.LOG_LEVEL);
  if (config.LOG_TO_FILE) {
    logger.configureFile(config.LOG_DIR);
  }
  const container = new Container();

  container.bind<CompatConfig>(TYPES.CompatConfig).toConstantValue(config);
  container.bind<HostCatalog>(TYPES.HostCatalog).toConstantValue(hostCatalog);
  container
    .bind<EquivalenceOptions>(TYPES.EquivalenceOptions)
    .toConstantValue({
      legacyMode: config.LEGACY_MODE,
      installationKey: config.INSTALLATION_KEY,
      subTypeExemptTypes: config.SUB_TYPE_EXEMPT_TYPES,
    });

  container
    .bind<AliasTable>(TYPES.StatusEffectAliases)
    .toConstantValue(statusEffectAliases);
  container
    .bind<AliasTable>(TYPES.EnchantmentAliases)
    .toConstantValue(enchantmentAliases);

  container
    .bind<CatalogResolver>(TYPES.CatalogResolver)
    .to(CatalogResolver)
    .inSingletonScope();
  container
    .bind<ItemEquivalence>(TYPES.ItemEquivalence)
    .to(ItemEquivalence)
    .inSingletonScope();

  logger.info("Catalog compatibility container ready", LogCategory.CONFIG, {
    hostVersion: config.HOST_VERSION,
    legacyMode: config.LEGACY_MODE,
    installationKey: config.INSTALLATION_KEY,
    statusEffectAliases: statusEffectAliases.size,
    enchantmentAliases: enchantmentAliases.size,
  });

  return container;
}
