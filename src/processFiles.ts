/**
 * 批量替换入口
 * 遍历根目录，对每个文件执行 读取 -> 替换 -> 比较 -> (写回 | 跳过) -> 记录
 */

import fs from "fs";
import path from "path";
import type { FileOutcome, LocalizeOptions, RunReport } from "./types";
import type { SubstitutionTable } from "./core/substitution-table";
import { walkSourceFiles } from "./core/tree-walker";
import { readTextFile, writeTextFileAtomic } from "./core/file-io";
import { normalizeConfig } from "./core/config-normalizer";
import {
  createLocalizeError,
  enhanceError,
  formatErrorForUser,
  type LocalizeError,
  LocalizeException,
  logError,
  toError,
} from "./core/error-handler";

/**
 * 相对根目录的文件标识，统一使用 / 分隔
 */
export function toFileId(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join("/");
}

/**
 * 处理单个文件
 *
 * 读取或写回失败都在文件边界内转换为 failed 结果，不会抛出。
 * 内容没有变化的文件不会以写模式打开。
 *
 * @param id 报告中使用的文件标识，默认为文件路径本身
 */
export function rewriteFile(
  filePath: string,
  table: SubstitutionTable,
  id: string = filePath
): FileOutcome {
  let original: string;
  try {
    original = readTextFile(filePath);
  } catch (error) {
    return {
      status: "failed",
      filePath,
      id,
      error: enhanceError(toError(error), filePath, "read"),
    };
  }

  const { text, replacements } = table.applyWithStats(original);
  // 替换可能出现 A -> B -> A 的情况，次数不为 0 也不代表内容变化
  if (text === original) {
    return { status: "unchanged", filePath, id };
  }

  try {
    writeTextFileAtomic(filePath, text);
  } catch (error) {
    return {
      status: "failed",
      filePath,
      id,
      error: enhanceError(toError(error), filePath, "write"),
    };
  }

  return { status: "changed", filePath, id, replacements };
}

function rootError(root: string, cause: Error): LocalizeException {
  return new LocalizeException(
    createLocalizeError("ROOT001", [root], {
      filePath: root,
      originalError: cause,
    })
  );
}

/**
 * 根目录必须存在、是目录并且可以列出内容
 */
function assertRootDirectory(root: string): void {
  let isDirectory: boolean;
  try {
    isDirectory = fs.statSync(root).isDirectory();
  } catch (error) {
    throw rootError(root, toError(error));
  }

  if (!isDirectory) {
    throw rootError(root, new Error(`Not a directory: ${root}`));
  }

  try {
    fs.readdirSync(root);
  } catch (error) {
    throw rootError(root, toError(error));
  }
}

/**
 * 对根目录下所有匹配后缀的文件执行替换
 *
 * 单个文件或目录的错误会被记录并收集到 report.errors，处理继续进行。
 * 配置无效或根目录无法访问时抛出 LocalizeException。
 */
export function processFiles(options: LocalizeOptions = {}): RunReport {
  const { root, extension, table } = normalizeConfig(options);
  assertRootDirectory(root);

  const report: RunReport = {
    root,
    extension,
    scannedFiles: 0,
    updatedFiles: [],
    totalReplacements: 0,
    errors: [],
  };

  const filePaths = walkSourceFiles(root, extension, {
    onError: error => report.errors.push(error),
  });

  for (const filePath of filePaths) {
    report.scannedFiles += 1;
    const outcome = rewriteFile(filePath, table, toFileId(root, filePath));

    switch (outcome.status) {
      case "changed":
        report.updatedFiles.push(outcome.id);
        report.totalReplacements += outcome.replacements;
        break;
      case "failed":
        logError(outcome.error);
        report.errors.push(outcome.error);
        break;
      case "unchanged":
        break;
    }
  }

  return report;
}

/**
 * 执行替换并提供友好的错误处理
 * 这是推荐给最终用户使用的包装函数，不会抛出异常
 */
export function executeLocalization(options: LocalizeOptions = {}): {
  success: boolean;
  report?: RunReport;
  errors: LocalizeError[];
  friendlyErrorMessage?: string;
} {
  try {
    const report = processFiles(options);

    if (report.errors.length > 0) {
      const errorMessages = report.errors.map(err => formatErrorForUser(err));
      return {
        success: false,
        report,
        errors: report.errors,
        friendlyErrorMessage: `处理过程中发生了 ${report.errors.length} 个错误:\n\n${errorMessages.join("\n\n---------------\n\n")}`,
      };
    }

    return { success: true, report, errors: [] };
  } catch (error) {
    // 顶层异常：配置错误或根目录不可用
    const topLevelError =
      error instanceof LocalizeException
        ? error.detail
        : createLocalizeError("GENERAL001", [toError(error).message], {
            originalError: toError(error),
          });

    return {
      success: false,
      errors: [topLevelError],
      friendlyErrorMessage: formatErrorForUser(topLevelError),
    };
  }
}
