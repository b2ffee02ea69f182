import type { AliasEntry, NameLike } from "../../shared/types/catalog-types";
import { AliasCatalog } from "../../shared/constants/CatalogEnums";
import { TextUtils } from "../../shared/utils/TextUtils";
import { logger, LogCategory } from "../../infrastructure/utils/logger";

/**
 * Immutable, ordered set of name aliases for one catalog.
 *
 * Tables only list the names that differ between schemes, so every lookup
 * falls back to the (normalized) input instead of failing.
 */
export class AliasTable<E extends AliasEntry = AliasEntry> {
  public readonly catalog: AliasCatalog;
  private readonly entries: readonly E[];

  constructor(catalog: AliasCatalog, entries: readonly E[]) {
    const canonical = new Set<string>();
    const legacy = new Set<string>();

    for (const entry of entries) {
      const canonicalKey = TextUtils.normalizeName(entry.canonicalName);
      const legacyKey = TextUtils.normalizeName(entry.legacyName);

      if (canonical.has(canonicalKey)) {
        throw new Error(
          `Duplicate canonical name '${entry.canonicalName}' in ${catalog} aliases`,
        );
      }
      if (legacy.has(legacyKey)) {
        throw new Error(
          `Duplicate legacy name '${entry.legacyName}' in ${catalog} aliases`,
        );
      }
      canonical.add(canonicalKey);
      legacy.add(legacyKey);
    }

    this.catalog = catalog;
    this.entries = Object.freeze(
      entries.map((e) => {
        const copy: E = { ...e };
        Object.freeze(copy);
        return copy;
      }),
    );

    logger.debug(`Built ${catalog} alias table`, LogCategory.NAMING, {
      size: this.entries.length,
    });
  }

  get size(): number {
    return this.entries.length;
  }

  values(): readonly E[] {
    return this.entries;
  }

  /**
   * Entry whose canonical name or display name matches, ignoring case and
   * treating spaces as underscores.
   */
  findByName(name: NameLike): E | undefined {
    const key = TextUtils.normalizeName(name);

    return this.entries.find(
      (e) =>
        TextUtils.normalizeName(e.canonicalName) === key ||
        (e.displayName !== undefined &&
          TextUtils.normalizeName(e.displayName) === key),
    );
  }

  findByLegacy(legacyName: NameLike): E | undefined {
    const key = TextUtils.normalizeName(legacyName);
    return this.entries.find(
      (e) => TextUtils.normalizeName(e.legacyName) === key,
    );
  }

  /**
   * Any name to its legacy form. Unknown names come back normalized, since
   * most names are identical in both schemes.
   */
  toLegacy(name: NameLike): string {
    const key = TextUtils.normalizeName(name);
    return this.findByName(key)?.legacyName ?? key;
  }

  /**
   * Legacy name to its raw display name, or the normalized input.
   */
  getDisplayName(legacyName: NameLike): string {
    const key = TextUtils.normalizeName(legacyName);
    const entry = this.findByLegacy(key);

    if (!entry) return key;
    return entry.displayName ?? entry.legacyName;
  }

  /**
   * Legacy name to its display name, one capitalized word per segment.
   */
  toDisplay(legacyName: NameLike): string {
    return TextUtils.capitalizeFully(
      this.getDisplayName(legacyName).replace(/_/g, " "),
    );
  }
}
