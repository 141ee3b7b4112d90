import { executeLocalization, processFiles, rewriteFile } from "./processFiles";
import type { FileOutcome, LocalizeOptions, Rule, RunReport } from "./types";

export { SubstitutionTable } from "./core/substitution-table";
export type { SubstitutionResult } from "./core/substitution-table";
export { walkSourceFiles } from "./core/tree-walker";
export type { WalkOptions } from "./core/tree-walker";
export {
  normalizeConfig,
  createDefaultTable,
  loadRulesFile,
  CONFIG_DEFAULTS,
} from "./core/config-normalizer";
export type { NormalizedLocalizeOptions } from "./core/config-normalizer";
export {
  ErrorCategory,
  ErrorSeverity,
  LocalizeException,
  formatErrorForUser,
} from "./core/error-handler";
export type { LocalizeError } from "./core/error-handler";
export { formatRunReport } from "./core/report";

export type { Rule, FileOutcome, LocalizeOptions, RunReport };
export { processFiles, rewriteFile, executeLocalization };

/**
 * 统一的替换主函数
 */
export function localize(options: LocalizeOptions = {}): RunReport {
  return processFiles(options);
}

export default localize;
