import {
  ConfigValidationError,
  SchemaNotFoundError,
  type ValidationIssue
} from "../../shared/errors/estimateErrors.js";
import type { SchemaRegistry } from "./registry.js";
import type { FieldSchema, FieldValue, ServiceRequest, ValidatedConfig } from "./types.js";

export type ValidationResult =
  | { readonly ok: true; readonly config: ValidatedConfig }
  | { readonly ok: false; readonly error: SchemaNotFoundError | ConfigValidationError };

type Coercion = { readonly ok: true; readonly value: FieldValue } | { readonly ok: false; readonly issue: ValidationIssue };

const NUMERIC_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * 按 Schema 校验单个服务请求。纯函数：不修改入参，可并发调用。
 *
 * 字段按声明顺序处理，全部问题一次性收集；请求中 Schema 未声明的键记为 unknown_field。
 * `null` 视同未提供。
 */
export function validateServiceRequest(
  request: ServiceRequest,
  registry: SchemaRegistry
): ValidationResult {
  const schema = registry.getSchema(request.serviceType);
  if (!schema) {
    return { ok: false, error: new SchemaNotFoundError(request.serviceType) };
  }

  const issues: ValidationIssue[] = [];
  const values: Record<string, FieldValue> = {};

  for (const field of schema.fields) {
    const supplied = Object.hasOwn(request.fields, field.name) ? request.fields[field.name] : undefined;
    if (supplied === undefined || supplied === null) {
      if (field.required) {
        issues.push({
          field: field.name,
          code: "missing_required",
          message: `缺少必填字段 ${field.name}`,
          expected: field.kind
        });
      } else if (field.default !== null) {
        values[field.name] = field.default;
      }
      continue;
    }

    const coerced = coerceField(field, supplied);
    if (coerced.ok) {
      values[field.name] = coerced.value;
    } else {
      issues.push(coerced.issue);
    }
  }

  const declared = new Set(schema.fields.map((field) => field.name));
  for (const key of Object.keys(request.fields)) {
    if (!declared.has(key)) {
      issues.push({ field: key, code: "unknown_field", message: `未知字段 ${key}` });
    }
  }

  if (issues.length > 0) {
    return { ok: false, error: new ConfigValidationError(schema.serviceType, issues) };
  }

  return {
    ok: true,
    config: Object.freeze({ serviceType: schema.serviceType, values: Object.freeze(values) })
  };
}

export function coerceField(field: FieldSchema, raw: unknown): Coercion {
  switch (field.kind) {
    case "number":
      return coerceNumber(field, raw);
    case "boolean":
      return coerceBoolean(field, raw);
    case "string":
      return coerceString(field, raw);
    case "enum":
      return coerceEnum(field, raw);
  }
}

function invalidKind(field: FieldSchema, raw: unknown): Coercion {
  return {
    ok: false,
    issue: {
      field: field.name,
      code: "invalid_kind",
      message: `字段 ${field.name} 需要 ${field.kind}，实际为 ${describeValue(raw)}`,
      expected: field.kind
    }
  };
}

function coerceNumber(field: FieldSchema, raw: unknown): Coercion {
  let value: number;
  if (typeof raw === "number") {
    value = raw;
  } else if (typeof raw === "string" && NUMERIC_TEXT.test(raw.trim())) {
    // 仅接受纯数字文本；"500 GB" 之类带单位的写法由上游归一化负责
    value = Number(raw.trim());
  } else {
    return invalidKind(field, raw);
  }
  if (!Number.isFinite(value)) {
    return invalidKind(field, raw);
  }
  if (field.integer && !Number.isInteger(value)) {
    return {
      ok: false,
      issue: { field: field.name, code: "not_integer", message: `字段 ${field.name} 需要整数，实际为 ${value}` }
    };
  }
  if ((field.min !== undefined && value < field.min) || (field.max !== undefined && value > field.max)) {
    return {
      ok: false,
      issue: {
        field: field.name,
        code: "out_of_range",
        message: `字段 ${field.name} 的取值 ${value} 超出范围 [${field.min ?? "-∞"}, ${field.max ?? "+∞"}]`
      }
    };
  }
  return { ok: true, value };
}

function coerceBoolean(field: FieldSchema, raw: unknown): Coercion {
  if (typeof raw === "boolean") {
    return { ok: true, value: raw };
  }
  if (typeof raw === "string") {
    const normalized = raw.trim().toLowerCase();
    if (normalized === "true") {
      return { ok: true, value: true };
    }
    if (normalized === "false") {
      return { ok: true, value: false };
    }
  }
  return invalidKind(field, raw);
}

function coerceString(field: FieldSchema, raw: unknown): Coercion {
  if (typeof raw === "string") {
    return { ok: true, value: raw };
  }
  if (typeof raw === "number" || typeof raw === "boolean") {
    return { ok: true, value: String(raw) };
  }
  return invalidKind(field, raw);
}

function coerceEnum(field: FieldSchema, raw: unknown): Coercion {
  const allowed = field.values ?? [];
  if (typeof raw !== "string" && typeof raw !== "number") {
    return invalidKind(field, raw);
  }
  const text = String(raw).trim();
  const exact = allowed.find((value) => value === text);
  const matched = exact ?? allowed.find((value) => value.toLowerCase() === text.toLowerCase());
  if (matched !== undefined) {
    return { ok: true, value: matched };
  }
  return {
    ok: false,
    issue: {
      field: field.name,
      code: "not_in_enum",
      message: `字段 ${field.name} 的取值 ${text} 不在允许范围内：${allowed.join(", ")}`,
      allowed
    }
  };
}

function describeValue(raw: unknown): string {
  if (typeof raw === "string") {
    return JSON.stringify(raw);
  }
  if (Array.isArray(raw)) {
    return "array";
  }
  if (typeof raw === "object") {
    return "object";
  }
  return String(raw);
}
