import type { NameLike } from "../types/catalog-types";

/**
 * String helpers shared by the naming and item modules.
 */
export class TextUtils {
  private static readonly COLOR_PATTERN =
    /[&§]x(?:[&§][0-9a-f]){6}|&#[0-9a-f]{6}|[&§][0-9a-fk-or]/gi;

  /**
   * Upper-cases a name and turns spaces into underscores.
   */
  public static normalizeName(name: NameLike): string {
    return String(name).toUpperCase().replace(/ /g, "_");
  }

  /**
   * Lower-cases the whole string, then upper-cases the first letter of every
   * whitespace-separated word.
   */
  public static capitalizeFully(text: string): string {
    return text
      .toLowerCase()
      .replace(/(^|\s)(\S)/g, (_match, separator: string, first: string) =>
        separator + first.toUpperCase(),
      );
  }

  /**
   * Removes legacy (`&a`, `§l`), section-hex (`§x§f§f...`) and ampersand-hex
   * (`&#ff00aa`) color codes.
   */
  public static stripColors(text: string): string {
    return text.replace(TextUtils.COLOR_PATTERN, "");
  }

  public static getOrEmpty(text: string | null | undefined): string {
    return text ?? "";
  }

  /**
   * Ordered, length-sensitive equality. Two absent lists are equal; an absent
   * list never equals a present one, even an empty one.
   */
  public static listEquals(
    first: readonly string[] | null | undefined,
    second: readonly string[] | null | undefined,
  ): boolean {
    if (first == null || second == null) {
      return first == null && second == null;
    }
    if (first.length !== second.length) return false;

    for (let i = 0; i < first.length; i++) {
      if (first[i] !== second[i]) return false;
    }
    return true;
  }
}
