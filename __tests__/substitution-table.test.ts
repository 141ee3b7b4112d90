import { expect, test, describe } from "vitest";
import { SubstitutionTable } from "../src/core/substitution-table";

describe("SubstitutionTable", () => {
  describe("apply", () => {
    test("replaces every occurrence of a literal pattern", () => {
      const table = SubstitutionTable.fromEntries([["設定", "Settings"]]);

      expect(table.apply('title("設定") // 設定画面')).toBe(
        'title("Settings") // Settings画面'
      );
    });

    test("later rules see the output of earlier rules", () => {
      const table = SubstitutionTable.fromEntries([
        ["A", "B"],
        ["B", "C"],
      ]);

      expect(table.apply("A")).toBe("C");
    });

    test("reversed order does not cascade", () => {
      const table = SubstitutionTable.fromEntries([
        ["B", "C"],
        ["A", "B"],
      ]);

      expect(table.apply("A")).toBe("B");
    });

    test("matches do not overlap", () => {
      const table = SubstitutionTable.fromEntries([["aa", "X"]]);

      expect(table.apply("aaa")).toBe("Xa");
      expect(table.apply("aaaa")).toBe("XX");
    });

    test("patterns are literal, not regular expressions", () => {
      const table = SubstitutionTable.fromEntries([
        ["a.c", "dot"],
        ["(x)", "paren"],
      ]);

      expect(table.apply("abc a.c (x) x")).toBe("abc dot paren x");
    });

    test("replacement text is inserted as is", () => {
      const table = SubstitutionTable.fromEntries([["name", "$&-$1-$$"]]);

      expect(table.apply("name")).toBe("$&-$1-$$");
    });

    test("a replacement containing its own pattern is not rescanned", () => {
      const table = SubstitutionTable.fromEntries([["a", "aa"]]);

      expect(table.apply("aba")).toBe("aabaa");
    });

    test("longer rules listed first win over their substrings", () => {
      const table = SubstitutionTable.fromEntries([
        ["検索エラー", "Search error"],
        ["検索", "Search"],
      ]);

      expect(table.apply("検索エラー / 検索")).toBe("Search error / Search");
    });

    test("text without any pattern is returned unchanged", () => {
      const table = SubstitutionTable.fromEntries([["準備完了", "Ready"]]);
      const input = 'val s = "Ready"';

      expect(table.apply(input)).toBe(input);
    });
  });

  describe("applyWithStats", () => {
    test("counts replacements per pattern", () => {
      const table = SubstitutionTable.fromEntries([
        ["保存", "Save"],
        ["削除", "Delete"],
        ["戻る", "Back"],
      ]);

      const result = table.applyWithStats("保存 削除 保存");

      expect(result.text).toBe("Save Delete Save");
      expect(result.replacements).toBe(3);
      expect(Array.from(result.hits)).toEqual([
        ["保存", 2],
        ["削除", 1],
      ]);
    });

    test("reports zero replacements for untouched text", () => {
      const table = SubstitutionTable.fromEntries([["x", "y"]]);

      const result = table.applyWithStats("abc");

      expect(result).toEqual({ text: "abc", replacements: 0, hits: new Map() });
    });
  });

  describe("construction", () => {
    test("keeps insertion order", () => {
      const table = SubstitutionTable.fromRules([
        { pattern: "b", replacement: "2" },
        { pattern: "a", replacement: "1" },
      ]);

      expect(table.rules.map(rule => rule.pattern)).toEqual(["b", "a"]);
      expect(table.size).toBe(2);
    });

    test("a duplicate pattern keeps its first position and its last replacement", () => {
      const table = SubstitutionTable.fromEntries([
        ["A", "first"],
        ["B", "A"],
        ["A", "last"],
      ]);

      expect(table.rules).toEqual([
        { pattern: "A", replacement: "last" },
        { pattern: "B", replacement: "A" },
      ]);
      expect(table.apply("AB")).toBe("lastA");
    });

    test("rejects an empty pattern", () => {
      expect(() => SubstitutionTable.fromEntries([["", "x"]])).toThrow(RangeError);
    });

    test("rules cannot be modified after construction", () => {
      const table = SubstitutionTable.fromEntries([["a", "b"]]);

      expect(Object.isFrozen(table.rules)).toBe(true);
      expect(Object.isFrozen(table.rules[0])).toBe(true);
    });

    test("does not mutate the input text", () => {
      const table = SubstitutionTable.fromEntries([["a", "b"]]);
      const input = "aaa";

      table.apply(input);

      expect(input).toBe("aaa");
    });
  });
});
