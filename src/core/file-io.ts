/**
 * 文本文件读写
 * 固定使用 UTF-8：无法解码的内容直接报错，不做替换字符兜底
 */

import fs from "fs";
import path from "path";
import { TextDecoder } from "util";

export const TEXT_ENCODING = "utf-8";

// ignoreBOM: BOM 作为内容保留，写回时原样输出
const decoder = new TextDecoder(TEXT_ENCODING, { fatal: true, ignoreBOM: true });

/**
 * 读取并严格解码文本文件
 * @throws 原生 fs 错误，或编码无效时的 ERR_ENCODING_INVALID_ENCODED_DATA
 */
export function readTextFile(filePath: string): string {
  return decoder.decode(fs.readFileSync(filePath));
}

let tempCounter = 0;

/**
 * 原子地覆盖文件内容
 *
 * 先写入目标旁边的临时文件（保留原文件权限），再 rename 覆盖。
 * 目标是符号链接时写入链接指向的真实文件，链接本身保持不变。
 * 任何一步失败都会删除临时文件并重新抛出错误，原文件保持不变。
 */
export function writeTextFileAtomic(filePath: string, content: string): void {
  const target = fs.realpathSync(filePath);
  const { mode } = fs.statSync(target);
  tempCounter += 1;
  const tempPath = path.join(
    path.dirname(target),
    `.${path.basename(target)}.${process.pid}.${tempCounter}.tmp`
  );

  try {
    fs.writeFileSync(tempPath, content, { encoding: "utf8", mode });
    // writeFileSync 的 mode 会被 umask 过滤，需要再显式设置一次
    fs.chmodSync(tempPath, mode & 0o7777);
    fs.renameSync(tempPath, target);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}
