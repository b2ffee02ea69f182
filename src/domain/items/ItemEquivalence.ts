import { injectable, inject } from "inversify";
import { TYPES } from "../../config/Types";
import type { ItemRecord, TagStore } from "../../shared/types/catalog-types";
import { ItemTypeId } from "../../shared/constants/CatalogEnums";
import { TextUtils } from "../../shared/utils/TextUtils";

export interface EquivalenceOptions {
  /** Compare numeric sub-types (hosts before the identifier flattening) */
  legacyMode: boolean;
  /** Prefix of the two identity tags, `<key>` and `<key>_Item` */
  installationKey: string;
  /** Types whose sub-type never identifies the item */
  subTypeExemptTypes?: Iterable<string>;
}

export const SUB_TYPE_EXEMPT_TYPES: ReadonlySet<string> = new Set<string>([
  ItemTypeId.BOW,
]);

/**
 * Decides whether two items are the same thing for matching purposes.
 *
 * Type, sub-type (legacy hosts only), display name, lore and the two
 * installation identity tags are compared. Amount, damage, enchantments and
 * item flags are ignored.
 */
@injectable()
export class ItemEquivalence {
  private readonly legacyMode: boolean;
  private readonly tagKeys: readonly string[];
  private readonly exemptTypes: ReadonlySet<string>;

  constructor(@inject(TYPES.EquivalenceOptions) options: EquivalenceOptions) {
    this.legacyMode = options.legacyMode;
    this.tagKeys = [options.installationKey, `${options.installationKey}_Item`];
    this.exemptTypes = options.subTypeExemptTypes
      ? new Set(
          Array.from(options.subTypeExemptTypes, (t) =>
            TextUtils.normalizeName(t),
          ),
        )
      : SUB_TYPE_EXEMPT_TYPES;
  }

  public isSimilar(
    first: ItemRecord | null | undefined,
    second: ItemRecord | null | undefined,
  ): boolean {
    if (!first || !second) return false;

    if (first.typeId !== second.typeId) return false;
    if (first.hasMetadata !== second.hasMetadata) return false;
    if (!this.subTypesMatch(first, second)) return false;

    const firstName = TextUtils.stripColors(
      TextUtils.getOrEmpty(first.displayName).toLowerCase(),
    );
    const secondName = TextUtils.stripColors(
      TextUtils.getOrEmpty(second.displayName).toLowerCase(),
    );
    if (firstName !== secondName) return false;
    if (!TextUtils.listEquals(first.lore, second.lore)) return false;

    return this.tagKeys.every((key) =>
      this.matchTag(key, first.tags, second.tags),
    );
  }

  /**
   * Equal when neither store has the key, or both hold the same value.
   */
  public matchTag(key: string, first: TagStore, second: TagStore): boolean {
    const firstHas = first.has(key);
    const secondHas = second.has(key);

    if (!firstHas && !secondHas) return true;
    if (firstHas !== secondHas) return false;

    return first.get(key) === second.get(key);
  }

  public isSubTypeExempt(typeId: string): boolean {
    return this.exemptTypes.has(TextUtils.normalizeName(typeId));
  }

  private subTypesMatch(first: ItemRecord, second: ItemRecord): boolean {
    if (!this.legacyMode) return true;
    return (
      first.legacySubType === second.legacySubType ||
      this.isSubTypeExempt(first.typeId)
    );
  }
}
