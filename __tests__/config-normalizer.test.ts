import { expect, test, describe, afterEach } from "vitest";
import path from "path";
import {
  CONFIG_DEFAULTS,
  createDefaultTable,
  loadRulesFile,
  normalizeConfig,
  normalizeExtension,
  parseRuleDocument,
} from "../src/core/config-normalizer";
import { SubstitutionTable } from "../src/core/substitution-table";
import { LocalizeException } from "../src/core/error-handler";
import { cleanupWorkspaces, createWorkspace, writeWorkspaceFile } from "./test-helpers";

afterEach(() => {
  cleanupWorkspaces();
});

function errorCodeOf(action: () => unknown): string | undefined {
  try {
    action();
  } catch (error) {
    return error instanceof LocalizeException ? error.detail.code : undefined;
  }
  return undefined;
}

describe("normalizeConfig", () => {
  test("fills in defaults", () => {
    const cwd = path.join(path.sep, "workspace", "app");

    const normalized = normalizeConfig({ cwd });

    expect(normalized.root).toBe(cwd);
    expect(normalized.extension).toBe(CONFIG_DEFAULTS.EXTENSION);
    expect(normalized.table.size).toBe(createDefaultTable().size);
  });

  test("resolves the root against cwd", () => {
    const cwd = path.join(path.sep, "workspace");

    expect(normalizeConfig({ cwd, root: "app/src" }).root).toBe(
      path.join(cwd, "app", "src")
    );
  });

  test("reuses a prebuilt table", () => {
    const table = SubstitutionTable.fromEntries([["a", "b"]]);

    expect(normalizeConfig({ rules: table }).table).toBe(table);
  });

  test("explicit rules take precedence over a rules file", () => {
    const normalized = normalizeConfig({
      rules: [{ pattern: "x", replacement: "y" }],
      rulesFile: "does-not-exist.json",
    });

    expect(normalized.table.rules).toEqual([{ pattern: "x", replacement: "y" }]);
  });

  test("an empty pattern is a configuration error", () => {
    expect(
      errorCodeOf(() => normalizeConfig({ rules: [{ pattern: "", replacement: "x" }] }))
    ).toBe("CONFIG001");
  });
});

describe("normalizeExtension", () => {
  test("adds a missing leading dot", () => {
    expect(normalizeExtension("kt")).toBe(".kt");
    expect(normalizeExtension(".kt")).toBe(".kt");
    expect(normalizeExtension(" .java ")).toBe(".java");
  });

  test("rejects an empty extension", () => {
    expect(errorCodeOf(() => normalizeExtension(""))).toBe("CONFIG001");
    expect(errorCodeOf(() => normalizeExtension("."))).toBe("CONFIG001");
  });
});

describe("rule documents", () => {
  test("reads an array of rules", () => {
    expect(
      parseRuleDocument(
        [
          { pattern: "今日", replacement: "Today" },
          { pattern: "昨日", replacement: "Yesterday", note: "ignored" },
        ],
        "rules.json"
      )
    ).toEqual([
      { pattern: "今日", replacement: "Today" },
      { pattern: "昨日", replacement: "Yesterday" },
    ]);
  });

  test("reads an object map in key order", () => {
    expect(parseRuleDocument({ 起動: "Launch", 振動: "Vibration" }, "rules.json")).toEqual([
      { pattern: "起動", replacement: "Launch" },
      { pattern: "振動", replacement: "Vibration" },
    ]);
  });

  test("rejects malformed entries", () => {
    expect(errorCodeOf(() => parseRuleDocument([{ pattern: "a" }], "rules.json"))).toBe(
      "CONFIG002"
    );
    expect(errorCodeOf(() => parseRuleDocument({ a: 1 }, "rules.json"))).toBe("CONFIG002");
    expect(errorCodeOf(() => parseRuleDocument("text", "rules.json"))).toBe("CONFIG002");
  });

  test("loads rules from disk", () => {
    const root = createWorkspace();
    const filePath = writeWorkspaceFile(
      root,
      "rules.json",
      JSON.stringify([{ pattern: "戻る", replacement: "Back" }])
    );

    expect(loadRulesFile(filePath)).toEqual([{ pattern: "戻る", replacement: "Back" }]);
  });

  test("a missing or invalid rules file is a configuration error", () => {
    const root = createWorkspace({ "broken.json": "{ not json" });

    expect(errorCodeOf(() => loadRulesFile(path.join(root, "missing.json")))).toBe(
      "CONFIG002"
    );
    expect(errorCodeOf(() => loadRulesFile(path.join(root, "broken.json")))).toBe(
      "CONFIG002"
    );
  });
});

describe("bundled table", () => {
  test("starts with the status strings in their original order", () => {
    const table = createDefaultTable();

    expect(table.rules.slice(0, 3)).toEqual([
      { pattern: "未同期", replacement: "Never synced" },
      { pattern: "準備完了", replacement: "Ready" },
      { pattern: "実行中", replacement: "Running" },
    ]);
  });

  test("translates a typical UI line", () => {
    expect(createDefaultTable().apply('Button(text = "準備完了")')).toBe(
      'Button(text = "Ready")'
    );
  });
});
