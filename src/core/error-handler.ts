/**
 * 错误处理模块
 * 提供统一的错误处理机制，包括错误类型、错误生成和格式化方法
 */

// 错误类别枚举
export enum ErrorCategory {
  CONFIG = "ConfigError", // 配置错误
  ROOT = "RootError", // 根目录无法访问
  READ = "ReadError", // 读取或解码失败
  WRITE = "WriteError", // 写回失败
  TRAVERSAL = "TraversalError", // 目录无法列出
  UNKNOWN = "UnknownError", // 未知错误
}

// 错误严重级别
export enum ErrorSeverity {
  WARNING = "WARNING", // 警告，不会中断处理
  ERROR = "ERROR", // 错误，跳过当前文件
  FATAL = "FATAL", // 致命错误，中断整个处理流程
}

// 统一错误接口
export interface LocalizeError {
  code: string; // 错误代码，例如 READ001
  category: ErrorCategory;
  message: string;
  details?: string; // 底层错误信息
  filePath?: string;
  severity: ErrorSeverity;
  suggestion?: string; // 修复建议
  originalError?: Error;
}

interface ErrorDefinition {
  code: string;
  category: ErrorCategory;
  messageTemplate: string;
  severity: ErrorSeverity;
  suggestionTemplate?: string;
}

const errorDefinitions: Record<string, ErrorDefinition> = {
  // 配置错误
  CONFIG001: {
    code: "CONFIG001",
    category: ErrorCategory.CONFIG,
    messageTemplate: "配置无效: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请检查配置项 {1}",
  },
  CONFIG002: {
    code: "CONFIG002",
    category: ErrorCategory.CONFIG,
    messageTemplate: "无法加载替换规则文件: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate:
      "规则文件必须是 JSON，内容为 {pattern, replacement} 数组或 pattern -> replacement 对象",
  },

  // 根目录错误
  ROOT001: {
    code: "ROOT001",
    category: ErrorCategory.ROOT,
    messageTemplate: "无法访问根目录: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请确认根目录存在、是一个目录并且有读取权限",
  },

  // 文件读取错误
  READ001: {
    code: "READ001",
    category: ErrorCategory.READ,
    messageTemplate: "读取文件失败: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "请确认文件存在且有读取权限",
  },
  READ002: {
    code: "READ002",
    category: ErrorCategory.READ,
    messageTemplate: "文件不是有效的 UTF-8 文本: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "请将文件转换为 UTF-8 编码，或从处理范围中排除该文件",
  },

  // 文件写入错误
  WRITE001: {
    code: "WRITE001",
    category: ErrorCategory.WRITE,
    messageTemplate: "写入文件失败: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "请确认文件所在目录有写入权限，检查磁盘空间是否足够",
  },

  // 目录遍历错误
  TRAVERSE001: {
    code: "TRAVERSE001",
    category: ErrorCategory.TRAVERSAL,
    messageTemplate: "无法读取目录: {0}",
    severity: ErrorSeverity.WARNING,
    suggestionTemplate: "该目录已被跳过，请检查目录权限",
  },

  // 通用错误
  GENERAL001: {
    code: "GENERAL001",
    category: ErrorCategory.UNKNOWN,
    messageTemplate: "未知错误: {0}",
    severity: ErrorSeverity.ERROR,
  },
};

/**
 * 创建格式化的错误对象
 */
export function createLocalizeError(
  errorCode: string,
  params: string[] = [],
  options: {
    filePath?: string;
    originalError?: Error;
  } = {}
): LocalizeError {
  const definition = errorDefinitions[errorCode] || errorDefinitions.GENERAL001;

  let message = definition.messageTemplate;
  let suggestion = definition.suggestionTemplate || "";

  params.forEach((param, index) => {
    message = message.replace(`{${index}}`, param);
    suggestion = suggestion.replace(`{${index}}`, param);
  });

  return {
    code: definition.code,
    category: definition.category,
    message,
    details: options.originalError?.message,
    filePath: options.filePath,
    severity: definition.severity,
    suggestion: suggestion || undefined,
    originalError: options.originalError,
  };
}

/**
 * 致命错误的异常形式，由顶层入口捕获
 */
export class LocalizeException extends Error {
  constructor(readonly detail: LocalizeError) {
    super(detail.message);
    this.name = "LocalizeException";
  }
}

/**
 * 格式化错误，用于诊断日志
 */
export function formatError(error: LocalizeError): string {
  let formattedMessage = `[${error.code}] ${error.message}`;

  if (error.filePath) {
    formattedMessage += `\n文件: ${error.filePath}`;
  }

  if (error.details && error.details !== error.message) {
    formattedMessage += `\n详情: ${error.details}`;
  }

  if (error.suggestion) {
    formattedMessage += `\n建议: ${error.suggestion}`;
  }

  return formattedMessage;
}

/**
 * 记录错误
 */
export function logError(error: LocalizeError): void {
  const formattedError = formatError(error);

  if (error.severity === ErrorSeverity.WARNING) {
    console.warn(formattedError);
  } else {
    console.error(formattedError);
  }
}

/**
 * 提供给最终用户的错误格式化方法
 */
export function formatErrorForUser(error: LocalizeError): string {
  let message = `错误(${error.code}): ${error.message}`;

  if (error.filePath && !error.message.includes(error.filePath)) {
    message += `\n文件位置: ${error.filePath}`;
  }

  if (error.details && error.details !== error.message) {
    message += `\n原因: ${error.details}`;
  }

  if (error.suggestion) {
    message += `\n\n修复建议:\n${error.suggestion}`;
  }

  return message;
}

/**
 * 把未知的抛出值统一成 Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export type FileStage = "read" | "write" | "traverse";

const STAGE_ERROR_CODES: Record<FileStage, string> = {
  read: "READ001",
  write: "WRITE001",
  traverse: "TRAVERSE001",
};

function errnoOf(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" ? code : undefined;
}

/**
 * 根据发生阶段和底层错误码，把原生错误转换为 LocalizeError
 */
export function enhanceError(
  error: Error,
  filePath: string,
  stage: FileStage
): LocalizeError {
  if (error instanceof LocalizeException) {
    return error.detail;
  }

  const errorCode =
    stage === "read" && errnoOf(error) === "ERR_ENCODING_INVALID_ENCODED_DATA"
      ? "READ002"
      : STAGE_ERROR_CODES[stage];

  return createLocalizeError(errorCode, [filePath], {
    filePath,
    originalError: error,
  });
}
