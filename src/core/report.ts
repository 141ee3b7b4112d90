import type { RunReport } from "../types";
import { ErrorCategory } from "./error-handler";

/**
 * 生成面向终端的汇总文本：更新数量，然后每行一个更新过的文件
 */
export function formatRunReport(report: RunReport): string {
  const lines = [`Updated ${report.updatedFiles.length} files`];
  for (const id of report.updatedFiles) {
    lines.push(`  - ${id}`);
  }

  const failedFiles = new Set(
    report.errors.flatMap(error =>
      error.category === ErrorCategory.READ ||
      error.category === ErrorCategory.WRITE
        ? [error.filePath]
        : []
    )
  );
  if (failedFiles.size > 0) {
    lines.push(`Failed to process ${failedFiles.size} files`);
  }

  return lines.join("\n");
}
