/**
 * 错误类型
 * 请求头提交前的错误走普通 JSON 响应；提交后只能通过 SSE error 事件告知客户端
 */

export class HelpDeskError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidRoleError extends HelpDeskError {
  readonly role: string;

  constructor(role: string) {
    super("INVALID_ROLE", `未知的消息角色: ${role}`);
    this.role = role;
  }
}

export class TemplateRenderError extends HelpDeskError {}

/** 模板中存在未提供的变量 */
export class MissingVariableError extends TemplateRenderError {
  readonly missing: readonly string[];

  constructor(missing: readonly string[]) {
    super("MISSING_VARIABLE", `模板变量缺失: ${missing.join(", ")}`);
    this.missing = missing;
  }
}

/** 意图分类输出不是 1-7 的单个数字 */
export class ClassificationParseError extends HelpDeskError {
  readonly output: string;

  constructor(output: string) {
    super("CLASSIFICATION_PARSE", `无法解析意图分类结果: ${JSON.stringify(output)}`);
    this.output = output;
  }
}

export class ModelStreamError extends HelpDeskError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MODEL_STREAM", message, options);
  }
}

export class RequestMalformedError extends HelpDeskError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("REQUEST_MALFORMED", message, options);
  }
}

export class ConfigError extends HelpDeskError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "string") return e;
  return "服务器错误";
}
