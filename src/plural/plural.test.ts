import { describe, it, expect } from "vitest";
import {
  defaultPluralRules,
  formCount,
  formIndex,
  fromLocaleFunctions,
  headerFor,
  parseNplurals,
  pluralFormsHeader,
  resolvePluralRule,
} from "./index.js";
import { buildPluralTable, getPluralTable, PLURAL_SELECTORS } from "./rules.js";

const COUNTS = [0, 1, 2, 5, 11, 21, 100, 1000];

describe("Plural rules", () => {
  describe("formIndex", () => {
    it("should select forms for two-form languages", () => {
      expect(formIndex("de", 1)).toBe(0);
      expect(formIndex("de", 0)).toBe(1);
      expect(formIndex("fr", 0)).toBe(0);
      expect(formIndex("fr", 2)).toBe(1);
    });

    it("should select Slavic forms", () => {
      expect([1, 2, 5, 11, 21, 22, 25].map((n) => formIndex("ru", n))).toEqual([
        0, 1, 2, 2, 0, 1, 2,
      ]);
      expect([1, 2, 5, 21, 22].map((n) => formIndex("pl", n))).toEqual([0, 1, 2, 2, 1]);
      expect([1, 3, 5].map((n) => formIndex("cs", n))).toEqual([0, 1, 2]);
    });

    it("should select Arabic forms", () => {
      expect([0, 1, 2, 3, 11, 100, 103, 111].map((n) => formIndex("ar", n))).toEqual([
        0, 1, 2, 3, 4, 5, 3, 4,
      ]);
    });

    it("should always select form 0 for single-form languages", () => {
      expect(COUNTS.map((n) => formIndex("ja", n))).toEqual(COUNTS.map(() => 0));
    });

    it("should reject negative and fractional counts", () => {
      expect(() => formIndex("en", -1)).toThrow(RangeError);
      expect(() => formIndex("en", 1.5)).toThrow(RangeError);
    });

    it("should return a valid form for every supported locale", () => {
      for (const locale of getPluralTable().byLocale.keys()) {
        const forms = formCount(locale);
        for (const count of COUNTS) {
          const index = formIndex(locale, count);
          expect(index, `${locale} n=${count}`).toBeGreaterThanOrEqual(0);
          expect(index, `${locale} n=${count}`).toBeLessThan(forms);
        }
      }
    });
  });

  describe("locale resolution", () => {
    it("should prefer an exact locale over its language", () => {
      expect(resolvePluralRule("pt_BR").family.name).toBe("two_forms_2");
      expect(resolvePluralRule("pt").family.name).toBe("two_forms_1");
    });

    it("should fall back to the language of a regional locale", () => {
      expect(resolvePluralRule("ru_RU").family.name).toBe("three_forms_slavic");
      expect(resolvePluralRule("sr@latin").family.name).toBe(resolvePluralRule("sr").family.name);
    });

    it("should fall back to two forms for unknown locales", () => {
      expect(formCount("xx")).toBe(2);
      expect(formIndex("xx", 1)).toBe(0);
      expect(formIndex("xx", 7)).toBe(1);
    });
  });

  describe("headers", () => {
    it("should build the Plural-Forms header", () => {
      expect(pluralFormsHeader("de")).toBe("nplurals=2; plural=(n != 1);");
      expect(pluralFormsHeader("ja")).toBe("nplurals=1; plural=0;");
    });

    it("should read nplurals from a header", () => {
      expect(parseNplurals("nplurals=3; plural=(n%10==1 ? 0 : 1);")).toBe(3);
      expect(parseNplurals("nplurals = 2")).toBe(2);
      expect(parseNplurals("plural=0;")).toBeNull();
      expect(parseNplurals("nplurals=0;")).toBeNull();
    });
  });

  describe("custom sources", () => {
    it("should wrap per-locale functions", () => {
      const source = fromLocaleFunctions({
        formCount: () => 3,
        formIndex: (_locale, count) => Math.min(count, 2),
      });
      const state = source.init("tlh");

      expect(state).toBe("tlh");
      expect(source.formCount(state)).toBe(3);
      expect(source.formIndex(state, 9)).toBe(2);
      expect(headerFor(source, state)).toBe("nplurals=3;");
      expect(() => source.formIndex(state, -2)).toThrow(RangeError);
    });

    it("should use the source's own header when it has one", () => {
      const state = defaultPluralRules.init("fr");

      expect(headerFor(defaultPluralRules, state)).toBe("nplurals=2; plural=(n > 1);");
    });
  });

  describe("buildPluralTable", () => {
    it("should reject a family without a selector", () => {
      expect(() =>
        buildPluralTable({
          default: "klingon",
          families: { klingon: { forms: 2, expression: "(n != 1)", locales: ["tlh"] } },
        })
      ).toThrow("No plural selector for rule family 'klingon'");
    });

    it("should reject an undefined default family", () => {
      expect(() =>
        buildPluralTable({
          default: "missing",
          families: { one_form: { forms: 1, expression: "0", locales: ["ja"] } },
        })
      ).toThrow("Default plural rule family 'missing' is not defined");
    });

    it("should have a selector for every family in the shipped table", () => {
      const table = getPluralTable();
      for (const family of table.byLocale.values()) {
        expect(PLURAL_SELECTORS[family.name]).toBe(family.select);
      }
    });
  });
});
