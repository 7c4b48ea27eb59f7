import { z } from "zod";

export const FIELD_KINDS = ["number", "string", "boolean", "enum"] as const;

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const FieldSourceObject = z
  .object({
    name: z.string().regex(/^[a-z][a-z0-9_]*$/, "字段名需为 snake_case"),
    kind: z.enum(FIELD_KINDS),
    required: z.boolean().default(false),
    default: ScalarSchema.nullable().default(null),
    values: z.array(z.string().min(1)).min(1).optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    integer: z.boolean().optional(),
    description: z.string().optional()
  })
  .strict();

export const FieldSourceSchema = FieldSourceObject.superRefine((field, ctx) => {
  if (field.kind === "enum" && !field.values) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `枚举字段 ${field.name} 必须声明 values` });
  }
  if (field.kind !== "enum" && field.values) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `非枚举字段 ${field.name} 不允许声明 values` });
  }
  if (field.kind !== "number" && (field.min !== undefined || field.max !== undefined || field.integer !== undefined)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `非数值字段 ${field.name} 不允许声明 min/max/integer` });
  }
  if (field.values && new Set(field.values).size !== field.values.length) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `字段 ${field.name} 的 values 存在重复项` });
  }
  if (field.min !== undefined && field.max !== undefined && field.min > field.max) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `字段 ${field.name} 的 min 大于 max` });
  }
  const problem = checkDefault(field);
  if (problem) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["default"], message: problem });
  }
});

function checkDefault(field: z.infer<typeof FieldSourceObject>): string | null {
  const value = field.default;
  if (value === null) {
    return null;
  }
  switch (field.kind) {
    case "number": {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        return `字段 ${field.name} 的默认值必须是数值`;
      }
      if (field.integer && !Number.isInteger(value)) {
        return `字段 ${field.name} 的默认值必须是整数`;
      }
      if ((field.min !== undefined && value < field.min) || (field.max !== undefined && value > field.max)) {
        return `字段 ${field.name} 的默认值超出取值范围`;
      }
      return null;
    }
    case "string":
      return typeof value === "string" ? null : `字段 ${field.name} 的默认值必须是字符串`;
    case "boolean":
      return typeof value === "boolean" ? null : `字段 ${field.name} 的默认值必须是布尔值`;
    case "enum":
      return typeof value === "string" && (field.values ?? []).includes(value)
        ? null
        : `字段 ${field.name} 的默认值不在枚举集合中`;
  }
}

export const ServiceSourceSchema = z
  .object({
    type: z.string().regex(/^[a-z][a-z0-9_]*$/, "服务类型需为 snake_case"),
    displayName: z.string().min(1),
    aliases: z.array(z.string().min(1)).default([]),
    fields: z.array(FieldSourceSchema).min(1)
  })
  .strict()
  .superRefine((service, ctx) => {
    const seen = new Set<string>();
    service.fields.forEach((field, index) => {
      if (seen.has(field.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["fields", index, "name"],
          message: `服务 ${service.type} 中字段 ${field.name} 重复`
        });
      }
      seen.add(field.name);
    });
  });

export const ServiceSchemaSourceDocument = z
  .object({
    version: z.literal(1).default(1),
    services: z.array(ServiceSourceSchema).min(1)
  })
  .strict()
  .superRefine((document, ctx) => {
    const types = new Set<string>();
    const aliasOwners = new Map<string, string>();
    document.services.forEach((service, index) => {
      if (types.has(service.type)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["services", index, "type"],
          message: `服务类型 ${service.type} 重复声明`
        });
      }
      types.add(service.type);
      for (const alias of service.aliases) {
        const owner = aliasOwners.get(alias);
        if (owner && owner !== service.type) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["services", index, "aliases"],
            message: `别名 ${alias} 同时属于 ${owner} 与 ${service.type}`
          });
        }
        aliasOwners.set(alias, service.type);
      }
    });
    for (const [alias, owner] of aliasOwners) {
      if (types.has(alias) && alias !== owner) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["services"],
          message: `别名 ${alias} 与服务类型同名`
        });
      }
    }
  });

export type FieldSource = z.infer<typeof FieldSourceSchema>;
export type ServiceSource = z.infer<typeof ServiceSourceSchema>;
export type ServiceSchemaSource = z.infer<typeof ServiceSchemaSourceDocument>;
