export type FieldKind = "number" | "string" | "boolean" | "enum";

export type FieldValue = string | number | boolean;

export interface FieldSchema {
  readonly name: string;
  readonly kind: FieldKind;
  readonly required: boolean;
  readonly default: FieldValue | null;
  /** 仅 enum 字段 */
  readonly values?: readonly string[];
  readonly min?: number;
  readonly max?: number;
  readonly integer?: boolean;
  readonly description?: string;
}

export interface ServiceSchema {
  readonly serviceType: string;
  readonly displayName: string;
  readonly aliases: readonly string[];
  readonly fields: readonly FieldSchema[];
}

/**
 * 调用方提交的原始请求，字段值尚未校验。
 */
export interface ServiceRequest {
  readonly serviceType: string;
  readonly fields: Readonly<Record<string, unknown>>;
}

/**
 * 通过校验的不可变配置：包含全部必填字段与默认值非空的可选字段。
 */
export interface ValidatedConfig {
  readonly serviceType: string;
  readonly values: Readonly<Record<string, FieldValue>>;
}
