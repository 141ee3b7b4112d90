import fs, { type Dirent } from "fs";
import path from "path";
import {
  enhanceError,
  logError,
  toError,
  type LocalizeError,
} from "./error-handler";

export interface WalkOptions {
  /** 目录无法读取时的回调，目录会被跳过，遍历继续 */
  onError?: (error: LocalizeError) => void;
}

/**
 * 递归遍历根目录，按文件名后缀筛选文件
 *
 * 惰性生成绝对路径。每个目录内按名称的码元顺序访问，子目录就地递归，
 * 所以整体顺序按路径逐段的字典序，结果可复现。
 * 符号链接指向的目录会被跟随，但同一个真实目录只进入一次，遇到链接环也能终止。
 */
export function* walkSourceFiles(
  root: string,
  extension: string,
  options: WalkOptions = {}
): Generator<string, void, undefined> {
  const visited = new Set<string>();
  yield* walkDirectory(path.resolve(root), extension, visited, options);
}

function* walkDirectory(
  directory: string,
  extension: string,
  visited: Set<string>,
  options: WalkOptions
): Generator<string, void, undefined> {
  let entries: Dirent[];
  try {
    const realDirectory = fs.realpathSync(directory);
    if (visited.has(realDirectory)) {
      return;
    }
    visited.add(realDirectory);
    entries = fs.readdirSync(directory, { withFileTypes: true });
  } catch (error) {
    reportTraversalError(error, directory, options);
    return;
  }

  entries.sort((left, right) =>
    left.name < right.name ? -1 : left.name > right.name ? 1 : 0
  );

  for (const entry of entries) {
    const absolute = path.join(directory, entry.name);
    let kind: EntryKind;
    try {
      kind = resolveKind(entry, absolute);
    } catch (error) {
      // 例如指向自身的链接 (ELOOP)
      reportTraversalError(error, absolute, options);
      continue;
    }

    if (kind === "directory") {
      yield* walkDirectory(absolute, extension, visited, options);
    } else if (kind === "file" && entry.name.endsWith(extension)) {
      yield absolute;
    }
  }
}

function reportTraversalError(
  error: unknown,
  location: string,
  options: WalkOptions
): void {
  const traversalError = enhanceError(toError(error), location, "traverse");
  logError(traversalError);
  options.onError?.(traversalError);
}

type EntryKind = "directory" | "file" | "other";

function resolveKind(entry: Dirent, absolute: string): EntryKind {
  if (entry.isDirectory()) {
    return "directory";
  }
  if (entry.isFile()) {
    return "file";
  }
  if (!entry.isSymbolicLink()) {
    return "other";
  }

  // 悬空链接 stat 失败，当作其他类型跳过
  const stats = fs.statSync(absolute, { throwIfNoEntry: false });
  if (stats?.isDirectory()) {
    return "directory";
  }
  return stats?.isFile() ? "file" : "other";
}
