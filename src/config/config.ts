import path from "path";
import { ItemTypeId } from "../shared/constants/CatalogEnums";
import { LogLevel } from "../shared/constants/LogEnums";
import { isLegacyHost, parseHostVersion } from "../domain/version/HostVersion";

/**
 * Library configuration loaded from environment variables.
 *
 * @module config
 */

/**
 * @property HOST_VERSION - Version string reported by the host
 * @property LEGACY_MODE - Whether item sub-types take part in equivalence
 * @property INSTALLATION_KEY - Namespace of the identity tags compared on items
 * @property SUB_TYPE_EXEMPT_TYPES - Item types whose sub-type is never compared
 * @property LOG_LEVEL - Minimum level written by the logger
 * @property LOG_TO_FILE - Whether log entries are appended to JSON Lines files
 * @property LOG_DIR - Directory of those files (default: ./logs)
 */
export interface CompatConfig {
  HOST_VERSION: string;
  LEGACY_MODE: boolean;
  INSTALLATION_KEY: string;
  SUB_TYPE_EXEMPT_TYPES: readonly string[];
  LOG_LEVEL: LogLevel;
  LOG_TO_FILE: boolean;
  LOG_DIR: string;
}

const DEFAULT_HOST_VERSION = "1.20.4";
const DEFAULT_INSTALLATION_KEY = "CatalogCompat";

function parseBoolean(name: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case "true":
      return true;
    case "false":
      return false;
    default:
      throw new Error(`${name} must be 'true' or 'false', got '${value}'`);
  }
}

function parseLogLevel(value: string): LogLevel {
  const level = Object.values(LogLevel).find(
    (l) => l === value.trim().toLowerCase(),
  );
  if (!level) {
    throw new Error(
      `LOG_LEVEL must be one of ${Object.values(LogLevel).join(", ")}, got '${value}'`,
    );
  }
  return level;
}

/**
 * Builds the configuration from an environment map.
 *
 * `LEGACY_MODE` overrides the flag derived from `HOST_VERSION`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CompatConfig {
  const hostVersion = env.HOST_VERSION || DEFAULT_HOST_VERSION;
  let legacyMode: boolean;
  try {
    legacyMode = env.LEGACY_MODE
      ? parseBoolean("LEGACY_MODE", env.LEGACY_MODE)
      : isLegacyHost(parseHostVersion(hostVersion));
  } catch (error) {
    throw new Error(
      `Invalid HOST_VERSION/LEGACY_MODE: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const installationKey = (env.INSTALLATION_KEY ?? DEFAULT_INSTALLATION_KEY).trim();
  if (installationKey.length === 0) {
    throw new Error("INSTALLATION_KEY must not be empty");
  }

  const exemptTypes = env.SUB_TYPE_EXEMPT_TYPES
    ? env.SUB_TYPE_EXEMPT_TYPES.split(",")
        .map((t) => t.trim().toUpperCase())
        .filter((t) => t.length > 0)
    : [ItemTypeId.BOW];

  return {
    HOST_VERSION: hostVersion,
    LEGACY_MODE: legacyMode,
    INSTALLATION_KEY: installationKey,
    SUB_TYPE_EXEMPT_TYPES: exemptTypes,
    LOG_LEVEL: env.LOG_LEVEL ? parseLogLevel(env.LOG_LEVEL) : LogLevel.INFO,
    LOG_TO_FILE: env.LOG_TO_FILE
      ? parseBoolean("LOG_TO_FILE", env.LOG_TO_FILE)
      : false,
    LOG_DIR: env.LOG_DIR
      ? path.resolve(env.LOG_DIR)
      : path.join(process.cwd(), "logs"),
  };
}

export const CONFIG: CompatConfig = loadConfig();
