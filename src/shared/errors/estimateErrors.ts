import type { ZodError } from "zod";

export type EstimateErrorCode =
  | "schema_source_invalid"
  | "invalid_document"
  | "schema_not_found"
  | "validation_failed"
  | "mapping_failed"
  | "mapper_unavailable"
  | "unsupported_service_type"
  | "automation_failed"
  | "cancelled"
  | "session_fatal";

/**
 * 所有领域错误的基类，`code` 为稳定的机器可读标识，用于报告与 HTTP 响应。
 */
export class EstimateError extends Error {
  public readonly code: EstimateErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: EstimateErrorCode,
    message: string,
    options: { details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "EstimateError";
    this.code = code;
    this.details = options.details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): { code: EstimateErrorCode; message: string; details?: Record<string, unknown> } {
    return this.details
      ? { code: this.code, message: this.message, details: this.details }
      : { code: this.code, message: this.message };
  }
}

function describeZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `  [${issue.path.join(".") || "<root>"}] ${issue.message}`)
    .join("\n");
}

/**
 * 服务 Schema 声明文件非法（JSON、结构或语义错误），加载阶段即失败。
 */
export class SchemaSourceError extends EstimateError {
  public readonly source: string;

  constructor(source: string, reason: string | ZodError, cause?: unknown) {
    const brief = typeof reason === "string" ? reason : `结构校验失败：\n${describeZodIssues(reason)}`;
    super("schema_source_invalid", `服务 Schema 文件 ${source} 无效：${brief}`, {
      details: { source },
      cause: cause ?? (typeof reason === "string" ? undefined : reason)
    });
    this.name = "SchemaSourceError";
    this.source = source;
  }
}

export class InputDocumentError extends EstimateError {
  constructor(reason: string | ZodError) {
    const brief = typeof reason === "string" ? reason : `结构校验失败：\n${describeZodIssues(reason)}`;
    super("invalid_document", `输入文档无效：${brief}`);
    this.name = "InputDocumentError";
  }
}

export class SchemaNotFoundError extends EstimateError {
  public readonly serviceType: string;

  constructor(serviceType: string) {
    super("schema_not_found", `未找到服务类型 ${serviceType} 的 Schema`, {
      details: { serviceType }
    });
    this.name = "SchemaNotFoundError";
    this.serviceType = serviceType;
  }
}

export type ValidationIssueCode =
  | "missing_required"
  | "invalid_kind"
  | "not_in_enum"
  | "out_of_range"
  | "not_integer"
  | "unknown_field";

export interface ValidationIssue {
  readonly field: string;
  readonly code: ValidationIssueCode;
  readonly message: string;
  readonly expected?: string;
  readonly allowed?: readonly string[];
}

/**
 * 单个服务请求的全部字段问题，一次性汇总返回。
 */
export class ConfigValidationError extends EstimateError {
  public readonly serviceType: string;
  public readonly issues: readonly ValidationIssue[];

  constructor(serviceType: string, issues: readonly ValidationIssue[]) {
    const brief = issues.map((issue) => issue.message).join("; ");
    super("validation_failed", `服务 ${serviceType} 配置校验失败：${brief}`, {
      details: { serviceType, issues }
    });
    this.name = "ConfigValidationError";
    this.serviceType = serviceType;
    this.issues = issues;
  }
}

export class MappingError extends EstimateError {
  constructor(serviceName: string, reason: string, cause?: unknown) {
    super("mapping_failed", `SOW 条目 ${serviceName} 映射失败：${reason}`, {
      details: { serviceName },
      cause
    });
    this.name = "MappingError";
  }
}

/**
 * 提交了 SOW 文档，但未配置模型凭据，无法映射。
 */
export class MapperUnavailableError extends EstimateError {
  constructor() {
    super("mapper_unavailable", "SOW 文档需要模型映射，请配置 OPENAI_API_KEY 或改为提交预归一化文档");
    this.name = "MapperUnavailableError";
  }
}

export class UnsupportedServiceTypeError extends EstimateError {
  public readonly serviceType: string;

  constructor(serviceType: string) {
    super("unsupported_service_type", `服务类型 ${serviceType} 暂不支持自动化配置`, {
      details: { serviceType }
    });
    this.name = "UnsupportedServiceTypeError";
    this.serviceType = serviceType;
  }
}

export type AutomationStage = "locate" | "apply" | "recover" | "finalize";

/**
 * 单个条目的自动化失败；会话仍可继续使用。
 */
export class AutomationError extends EstimateError {
  public readonly stage: AutomationStage;

  constructor(
    stage: AutomationStage,
    message: string,
    options: { details?: Record<string, unknown>; cause?: unknown; code?: "automation_failed" | "cancelled" } = {}
  ) {
    super(options.code ?? "automation_failed", message, {
      details: { stage, ...options.details },
      cause: options.cause
    });
    this.name = "AutomationError";
    this.stage = stage;
  }
}

/**
 * 会话已不可用（浏览器退出、页面崩溃、无法打开），整个运行随之终止。
 */
export class SessionFatalError extends EstimateError {
  constructor(message: string, cause?: unknown) {
    super("session_fatal", message, { cause });
    this.name = "SessionFatalError";
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
