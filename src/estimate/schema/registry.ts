import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { SchemaSourceError } from "../../shared/errors/estimateErrors.js";
import { joinConfigPath } from "../../shared/environment/pathResolver.js";
import { createLoggerFacade } from "../../shared/logging/logger.js";
import { ServiceSchemaSourceDocument } from "../../shared/schemas/serviceSchema.js";
import type { ServiceSource } from "../../shared/schemas/serviceSchema.js";
import type { FieldSchema, ServiceSchema } from "./types.js";

const logger = createLoggerFacade("schema-registry");

export const BUNDLED_SCHEMAS_PATH = fileURLToPath(
  new URL("../../../config/service-schemas.json", import.meta.url)
);
const USER_SCHEMAS_FILE = "service-schemas.json";

/**
 * 进程级只读的服务 Schema 注册表；加载后深度冻结。
 */
export class SchemaRegistry {
  private readonly aliasIndex: ReadonlyMap<string, string>;

  private constructor(
    private readonly schemas: ReadonlyMap<string, ServiceSchema>,
    readonly source: string
  ) {
    const aliases = new Map<string, string>();
    for (const schema of schemas.values()) {
      for (const alias of schema.aliases) {
        aliases.set(alias, schema.serviceType);
      }
    }
    this.aliasIndex = aliases;
  }

  static fromDocument(raw: unknown, source = "<inline>"): SchemaRegistry {
    const parsed = ServiceSchemaSourceDocument.safeParse(raw);
    if (!parsed.success) {
      throw new SchemaSourceError(source, parsed.error);
    }
    const schemas = new Map<string, ServiceSchema>();
    for (const service of parsed.data.services) {
      schemas.set(service.type, toServiceSchema(service));
    }
    return new SchemaRegistry(schemas, source);
  }

  static async fromFile(filePath: string): Promise<SchemaRegistry> {
    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (error) {
      const reason =
        error instanceof Error && "code" in error && error.code === "ENOENT" ? "文件不存在" : "读取失败";
      throw new SchemaSourceError(filePath, reason, error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new SchemaSourceError(filePath, "JSON 解析失败", error);
    }
    return SchemaRegistry.fromDocument(raw, filePath);
  }

  getSchema(serviceType: string): ServiceSchema | null {
    return this.schemas.get(serviceType) ?? null;
  }

  has(serviceType: string): boolean {
    return this.schemas.has(serviceType);
  }

  list(): ServiceSchema[] {
    return Array.from(this.schemas.values());
  }

  /**
   * 别名 → 服务类型；未登记的别名返回 null。
   */
  resolveAlias(alias: string): string | null {
    return this.aliasIndex.get(alias) ?? null;
  }

  aliases(): ReadonlyMap<string, string> {
    return this.aliasIndex;
  }
}

function toServiceSchema(service: ServiceSource): ServiceSchema {
  const fields: FieldSchema[] = service.fields.map((field) =>
    Object.freeze({
      name: field.name,
      kind: field.kind,
      required: field.required,
      default: field.default,
      ...(field.values ? { values: Object.freeze([...field.values]) } : {}),
      ...(field.min !== undefined ? { min: field.min } : {}),
      ...(field.max !== undefined ? { max: field.max } : {}),
      ...(field.integer !== undefined ? { integer: field.integer } : {}),
      ...(field.description ? { description: field.description } : {})
    })
  );
  return Object.freeze({
    serviceType: service.type,
    displayName: service.displayName,
    aliases: Object.freeze([...service.aliases]),
    fields: Object.freeze(fields)
  });
}

export interface LoadSchemaRegistryOptions {
  /** 显式指定 Schema 文件，优先级最高 */
  readonly filePath?: string;
  readonly reload?: boolean;
}

let cachedRegistry: { path: string; registry: SchemaRegistry } | null = null;

export function resolveSchemasPath(explicit?: string): string {
  if (explicit) {
    return explicit;
  }
  const fromEnv = process.env.SERVICE_SCHEMAS_PATH?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  const userPath = joinConfigPath(USER_SCHEMAS_FILE);
  return existsSync(userPath) ? userPath : BUNDLED_SCHEMAS_PATH;
}

export async function loadSchemaRegistry(options: LoadSchemaRegistryOptions = {}): Promise<SchemaRegistry> {
  const filePath = resolveSchemasPath(options.filePath);
  if (!options.reload && cachedRegistry?.path === filePath) {
    return cachedRegistry.registry;
  }
  const registry = await SchemaRegistry.fromFile(filePath);
  cachedRegistry = { path: filePath, registry };
  logger.info("服务 Schema 已加载", { source: filePath, services: registry.list().length });
  return registry;
}
