/**
 * 配置规范化模块
 * 统一的配置处理中心，处理和规范化所有配置选项，确保配置的一致性
 */

import fs from "fs";
import path from "path";
import type { LocalizeOptions, Rule } from "../types";
import { SubstitutionTable } from "./substitution-table";
import {
  createLocalizeError,
  LocalizeException,
  toError,
} from "./error-handler";
import defaultRules from "../data/default-rules.json";

/**
 * 默认值常量 - 集中定义所有默认值
 */
export const CONFIG_DEFAULTS = {
  ROOT: ".",
  EXTENSION: ".kt",
} as const;

/**
 * 规范化的运行选项，所有配置项都有确定的值
 */
export interface NormalizedLocalizeOptions {
  /** 根目录的绝对路径 */
  root: string;
  /** 带前导点的文件后缀 */
  extension: string;
  table: SubstitutionTable;
}

function configError(message: string, field: string): LocalizeException {
  return new LocalizeException(createLocalizeError("CONFIG001", [message, field]));
}

/**
 * 规范化文件后缀，缺少前导点时补上
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim();
  if (trimmed === "" || trimmed === ".") {
    throw configError(`文件后缀不能为空: "${extension}"`, "extension");
  }
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

function isRule(value: unknown): value is Rule {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, "pattern") === "string" &&
    typeof Reflect.get(value, "replacement") === "string"
  );
}

/**
 * 把规则文件的 JSON 内容转换为规则数组
 * 支持 {pattern, replacement} 数组，或 pattern -> replacement 对象（按键的书写顺序）
 */
export function parseRuleDocument(document: unknown, source: string): Rule[] {
  if (Array.isArray(document)) {
    return document.map((item, index) => {
      if (!isRule(item)) {
        throw new LocalizeException(
          createLocalizeError("CONFIG002", [`${source} (第 ${index} 项格式无效)`])
        );
      }
      return { pattern: item.pattern, replacement: item.replacement };
    });
  }

  if (typeof document === "object" && document !== null) {
    return Object.entries(document).map(([pattern, replacement]) => {
      if (typeof replacement !== "string") {
        throw new LocalizeException(
          createLocalizeError("CONFIG002", [`${source} ("${pattern}" 的值不是字符串)`])
        );
      }
      return { pattern, replacement };
    });
  }

  throw new LocalizeException(createLocalizeError("CONFIG002", [source]));
}

/**
 * 从 JSON 文件加载规则
 */
export function loadRulesFile(filePath: string): Rule[] {
  let document: unknown;
  try {
    document = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new LocalizeException(
      createLocalizeError("CONFIG002", [filePath], {
        filePath,
        originalError: toError(error),
      })
    );
  }
  return parseRuleDocument(document, filePath);
}

/**
 * 内置的日文 -> 英文 UI 字符串替换表
 */
export function createDefaultTable(): SubstitutionTable {
  return SubstitutionTable.fromRules(defaultRules);
}

function normalizeTable(
  userOptions: LocalizeOptions,
  cwd: string
): SubstitutionTable {
  if (userOptions.rules instanceof SubstitutionTable) {
    return userOptions.rules;
  }

  const rules = userOptions.rules
    ? userOptions.rules
    : userOptions.rulesFile
      ? loadRulesFile(path.resolve(cwd, userOptions.rulesFile))
      : defaultRules;

  try {
    return SubstitutionTable.fromRules(rules);
  } catch (error) {
    throw configError(toError(error).message, "rules");
  }
}

/**
 * 规范化用户配置
 */
export function normalizeConfig(
  userOptions: LocalizeOptions = {}
): NormalizedLocalizeOptions {
  const cwd = path.resolve(userOptions.cwd ?? process.cwd());

  return {
    root: path.resolve(cwd, userOptions.root ?? CONFIG_DEFAULTS.ROOT),
    extension: normalizeExtension(
      userOptions.extension ?? CONFIG_DEFAULTS.EXTENSION
    ),
    table: normalizeTable(userOptions, cwd),
  };
}
