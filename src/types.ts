import type { LocalizeError } from "./core/error-handler";
import type { SubstitutionTable } from "./core/substitution-table";

/**
 * 一条字面量替换规则
 */
export interface Rule {
  /** 要查找的原文，按字面量匹配，不是正则 */
  pattern: string;
  /** 替换后的文本 */
  replacement: string;
}

/**
 * Configuration options for a localization run.
 * 一次替换运行的配置选项。
 */
export interface LocalizeOptions {
  /**
   * Root directory to walk. Resolved against `cwd`.
   * Default is ".".
   * 要遍历的根目录，相对于 `cwd` 解析。
   */
  root?: string;

  /**
   * Base directory used to resolve `root` and `rulesFile`.
   * Default is `process.cwd()`.
   */
  cwd?: string;

  /**
   * File name suffix to select, e.g. ".kt".
   * A missing leading dot is added.
   * 只处理文件名以该后缀结尾的文件，大小写敏感。
   */
  extension?: string;

  /**
   * Ordered replacement rules, or a prebuilt table.
   * Default is the bundled Japanese -> English UI string table.
   * 有序的替换规则，顺序决定级联结果。
   */
  rules?: readonly Rule[] | SubstitutionTable;

  /**
   * JSON file with the replacement rules. Ignored when `rules` is given.
   * 规则文件：{pattern, replacement} 数组，或 pattern -> replacement 对象。
   */
  rulesFile?: string;
}

/**
 * 单个文件的处理结果
 */
export type FileOutcome =
  | {
      status: "changed";
      filePath: string;
      /** 相对根目录的路径，使用 / 分隔 */
      id: string;
      replacements: number;
    }
  | {
      status: "unchanged";
      filePath: string;
      id: string;
    }
  | {
      status: "failed";
      filePath: string;
      id: string;
      error: LocalizeError;
    };

/**
 * 一次运行的汇总报告
 */
export interface RunReport {
  root: string;
  extension: string;
  /** 遍历到的候选文件数（包括失败的文件） */
  scannedFiles: number;
  /** 成功写回的文件，按遍历顺序 */
  updatedFiles: string[];
  totalReplacements: number;
  /** 文件级和目录级的非致命错误 */
  errors: LocalizeError[];
}
