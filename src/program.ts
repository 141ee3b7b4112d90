import { Command } from "commander";
import { executeLocalization } from "./processFiles";
import { CONFIG_DEFAULTS } from "./core/config-normalizer";
import { formatRunReport } from "./core/report";
import type { LocalizeOptions } from "./types";

/**
 * 构建命令行程序，参数解析后执行替换并打印汇总
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("literal-localize")
    .description("按有序的字面量替换表批量改写源码中的字符串")
    .version("1.0.0")
    .argument("[root]", "要遍历的根目录", CONFIG_DEFAULTS.ROOT)
    .option("-e, --ext <ext>", "要处理的文件后缀", CONFIG_DEFAULTS.EXTENSION)
    .option("-r, --rules <rules>", "替换规则 JSON 文件 (默认使用内置的日文 -> 英文表)")
    .action((root: string, cmdOptions: { ext: string; rules?: string }) => {
      const options: LocalizeOptions = {
        root,
        extension: cmdOptions.ext,
        rulesFile: cmdOptions.rules,
      };

      const result = executeLocalization(options);

      if (!result.report) {
        // 没有任何文件被处理
        console.error(result.friendlyErrorMessage);
        process.exitCode = 1;
        return;
      }

      console.log(formatRunReport(result.report));
    });

  return program;
}
