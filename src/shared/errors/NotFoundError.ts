import { AliasCatalog, CATALOG_NOUN } from "../constants/CatalogEnums";

/**
 * Raised when the host catalog has no entry for a translated name.
 */
export class NotFoundError extends Error {
  public readonly catalog: AliasCatalog;
  /** Name as the caller wrote it */
  public readonly query: string;
  /** Name actually looked up in the host catalog */
  public readonly legacyName: string;
  /** Where the valid names are documented */
  public readonly guidance: string;

  constructor(
    catalog: AliasCatalog,
    query: string,
    legacyName: string,
    guidance: string,
  ) {
    super(
      `Invalid ${CATALOG_NOUN[catalog]} '${query}'! For valid names, see: ${guidance}`,
    );
    this.name = "NotFoundError";
    this.catalog = catalog;
    this.query = query;
    this.legacyName = legacyName;
    this.guidance = guidance;
  }
}
