import { describe, it, expect, beforeEach } from "vitest";
import {
  ItemEquivalence,
  SUB_TYPE_EXEMPT_TYPES,
} from "../../src/domain/items/ItemEquivalence";
import type { ItemRecord } from "../../src/shared/types/catalog-types";
import { createItem, MapTagStore } from "../setup";

const KEY = "installX";

describe("ItemEquivalence", () => {
  let legacy: ItemEquivalence;
  let modern: ItemEquivalence;

  beforeEach(() => {
    legacy = new ItemEquivalence({ legacyMode: true, installationKey: KEY });
    modern = new ItemEquivalence({ legacyMode: false, installationKey: KEY });
  });

  describe("Operandos ausentes", () => {
    it("debe devolver false si falta alguno", () => {
      const item = createItem();
      expect(legacy.isSimilar(null, item)).toBe(false);
      expect(legacy.isSimilar(item, undefined)).toBe(false);
      expect(legacy.isSimilar(null, null)).toBe(false);
    });
  });

  describe("Tipo y metadatos", () => {
    it("debe ser reflexivo", () => {
      const item = createItem({ tags: { [KEY]: "abc" } });
      expect(legacy.isSimilar(item, item)).toBe(true);
      expect(modern.isSimilar(item, item)).toBe(true);
    });

    it("debe distinguir tipos distintos", () => {
      expect(
        modern.isSimilar(createItem(), createItem({ typeId: "IRON_SWORD" })),
      ).toBe(false);
    });

    it("debe distinguir si solo uno tiene metadatos", () => {
      expect(
        modern.isSimilar(createItem(), createItem({ hasMetadata: false })),
      ).toBe(false);
    });
  });

  describe("Subtipo", () => {
    it("debe comparar subtipos en modo legacy", () => {
      const a = createItem({ legacySubType: 0 });
      const b = createItem({ legacySubType: 3 });
      expect(legacy.isSimilar(a, b)).toBe(false);
    });

    it("debe ignorar subtipos fuera del modo legacy", () => {
      const a = createItem({ legacySubType: 0 });
      const b = createItem({ legacySubType: 3 });
      expect(modern.isSimilar(a, b)).toBe(true);
    });

    it("debe ignorar el subtipo del tipo exento en modo legacy", () => {
      const a = createItem({ typeId: "BOW", legacySubType: 5 });
      const b = createItem({ typeId: "BOW", legacySubType: 120 });
      expect(legacy.isSimilar(a, b)).toBe(true);
      expect(legacy.isSubTypeExempt("BOW")).toBe(true);
    });

    it("debe permitir reemplazar los tipos exentos", () => {
      const custom = new ItemEquivalence({
        legacyMode: true,
        installationKey: KEY,
        subTypeExemptTypes: ["FISHING_ROD"],
      });
      const bowA = createItem({ typeId: "BOW", legacySubType: 5 });
      const bowB = createItem({ typeId: "BOW", legacySubType: 120 });
      const rodA = createItem({ typeId: "FISHING_ROD", legacySubType: 1 });
      const rodB = createItem({ typeId: "FISHING_ROD", legacySubType: 40 });

      expect(custom.isSimilar(bowA, bowB)).toBe(false);
      expect(custom.isSimilar(rodA, rodB)).toBe(true);
    });

    it("debe normalizar los tipos exentos recibidos", () => {
      const custom = new ItemEquivalence({
        legacyMode: true,
        installationKey: KEY,
        subTypeExemptTypes: ["bow", "fishing rod"],
      });
      const a = createItem({ typeId: "BOW", legacySubType: 5 });
      const b = createItem({ typeId: "BOW", legacySubType: 120 });

      expect(custom.isSimilar(a, b)).toBe(true);
      expect(custom.isSubTypeExempt("FISHING_ROD")).toBe(true);
    });

    it("debe exponer BOW como tipo exento por defecto", () => {
      expect([...SUB_TYPE_EXEMPT_TYPES]).toEqual(["BOW"]);
    });
  });

  describe("Nombre visible", () => {
    it("debe ignorar colores y mayúsculas", () => {
      const a = createItem({ displayName: "&bBlade" });
      const b = createItem({ displayName: "§bBLADE" });
      expect(modern.isSimilar(a, b)).toBe(true);
    });

    it("debe tratar nombre ausente como vacío", () => {
      const a = createItem({ displayName: undefined });
      const b = createItem({ displayName: "" });
      expect(modern.isSimilar(a, b)).toBe(true);
    });

    it("debe distinguir nombres distintos", () => {
      const a = createItem({ displayName: "Blade" });
      const b = createItem({ displayName: "Blade II" });
      expect(modern.isSimilar(a, b)).toBe(false);
    });
  });

  describe("Lore", () => {
    it("debe respetar el orden", () => {
      const a = createItem({ lore: ["Sharp", "Old"] });
      const b = createItem({ lore: ["Old", "Sharp"] });
      expect(modern.isSimilar(a, b)).toBe(false);
    });

    it("debe distinguir lore ausente de lore vacío", () => {
      const a = createItem({ lore: undefined });
      const b = createItem({ lore: [] });
      expect(modern.isSimilar(a, b)).toBe(false);
    });

    it("debe aceptar lore ausente en ambos", () => {
      const a = createItem({ lore: null });
      const b = createItem({ lore: undefined });
      expect(modern.isSimilar(a, b)).toBe(true);
    });
  });

  describe("Etiquetas de instalación", () => {
    it("debe fallar si solo uno tiene la etiqueta", () => {
      const a = createItem({ tags: { [KEY]: "abc" } });
      const b = createItem();
      expect(modern.isSimilar(a, b)).toBe(false);
    });

    it("debe comparar los valores cuando ambos la tienen", () => {
      const a = createItem({ tags: { [KEY]: "abc" } });
      expect(modern.isSimilar(a, createItem({ tags: { [KEY]: "abc" } }))).toBe(
        true,
      );
      expect(modern.isSimilar(a, createItem({ tags: { [KEY]: "def" } }))).toBe(
        false,
      );
    });

    it("debe comprobar también la etiqueta _Item", () => {
      const a = createItem({ tags: { [`${KEY}_Item`]: "menu-button" } });
      const b = createItem();
      expect(modern.isSimilar(a, b)).toBe(false);
    });

    it("debe ignorar etiquetas de otras instalaciones", () => {
      const a = createItem({ tags: { otherInstall: "abc" } });
      const b = createItem();
      expect(modern.isSimilar(a, b)).toBe(true);
    });

    it("matchTag debe considerar iguales dos almacenes sin la clave", () => {
      expect(legacy.matchTag(KEY, new MapTagStore(), new MapTagStore())).toBe(
        true,
      );
    });
  });

  describe("Simetría", () => {
    it("debe dar el mismo resultado en ambos sentidos", () => {
      const items: ItemRecord[] = [
        createItem(),
        createItem({ typeId: "BOW", legacySubType: 7 }),
        createItem({ typeId: "BOW", legacySubType: 9 }),
        createItem({ legacySubType: 2 }),
        createItem({ displayName: "&cBLADE" }),
        createItem({ lore: undefined }),
        createItem({ lore: [] }),
        createItem({ hasMetadata: false }),
        createItem({ tags: { [KEY]: "abc" } }),
        createItem({ tags: { [`${KEY}_Item`]: "abc" } }),
      ];

      for (const comparator of [legacy, modern]) {
        for (const a of items) {
          for (const b of items) {
            expect(comparator.isSimilar(a, b)).toBe(comparator.isSimilar(b, a));
          }
        }
      }
    });
  });
});
