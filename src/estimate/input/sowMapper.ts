import type { OpenAI } from "openai";
import pLimit from "p-limit";

import { MappingError, toErrorMessage } from "../../shared/errors/estimateErrors.js";
import { createLoggerFacade, type LoggerFacade } from "../../shared/logging/logger.js";
import type { NormalizedDocument, SowEntry } from "../../shared/schemas/estimateInput.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { ServiceSchema } from "../schema/types.js";
import { isRecord } from "./document.js";
import { normalizeServiceName } from "./serviceNames.js";
import type { MappingFailure } from "./types.js";

export interface SowMappingRequest {
  readonly entry: SowEntry;
  readonly serviceType: string;
  readonly schema: ServiceSchema;
}

/**
 * 将一条 SOW 条目映射为该服务 Schema 的字段表。失败时抛出 MappingError。
 */
export interface SowMapper {
  map(request: SowMappingRequest): Promise<Record<string, unknown>>;
}

export interface CompletionPrompt {
  readonly system: string;
  readonly user: string;
}

export type CompletionFn = (prompt: CompletionPrompt) => Promise<string | null>;

export function createOpenAICompletion(client: OpenAI, model: string): CompletionFn {
  return async ({ system, user }) => {
    const completion = await client.chat.completions.create({
      model,
      temperature: 0,
      response_format: { type: "json_object" },
      messages: [
        { role: "system", content: system },
        { role: "user", content: user }
      ]
    });
    return completion.choices[0]?.message.content ?? null;
  };
}

const SYSTEM_PROMPT = [
  "You convert cloud service requirements into calculator configuration fields.",
  "Reply with one JSON object whose keys are field names from the given schema.",
  "Use plain numbers for numeric fields and convert units to the unit in the field name (\"50 GB\" -> 50, \"1 TB\" -> 1024 for *_gb fields).",
  "Use only the allowed values for enum fields. Omit fields you cannot infer. Default region is us-east-1."
].join("\n");

export function buildMappingPrompt(request: SowMappingRequest): CompletionPrompt {
  const fields = request.schema.fields.map((field) => ({
    name: field.name,
    kind: field.kind,
    required: field.required,
    ...(field.values ? { values: field.values } : {}),
    ...(field.description ? { description: field.description } : {})
  }));
  const user = JSON.stringify(
    {
      service_type: request.serviceType,
      schema: fields,
      entry: {
        service_name: request.entry.service_name,
        description: request.entry.description,
        configurations: request.entry.configurations
      }
    },
    null,
    2
  );
  return { system: SYSTEM_PROMPT, user };
}

/**
 * 解析模型输出中的首个 JSON 对象；兼容 `{ "fields": {...} }` 包装。
 */
export function parseMappingResponse(content: string, serviceName: string): Record<string, unknown> {
  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new MappingError(serviceName, "模型输出中没有 JSON 对象");
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(content.slice(start, end + 1));
  } catch (error) {
    throw new MappingError(serviceName, "模型输出不是合法 JSON", error);
  }
  if (!isRecord(parsed)) {
    throw new MappingError(serviceName, "模型输出不是 JSON 对象");
  }
  const fields = parsed.fields;
  return isRecord(fields) ? fields : parsed;
}

export class LlmSowMapper implements SowMapper {
  constructor(private readonly complete: CompletionFn) {}

  async map(request: SowMappingRequest): Promise<Record<string, unknown>> {
    let content: string | null;
    try {
      content = await this.complete(buildMappingPrompt(request));
    } catch (error) {
      throw new MappingError(request.entry.service_name, `模型调用失败：${toErrorMessage(error)}`, error);
    }
    if (!content) {
      throw new MappingError(request.entry.service_name, "模型未返回内容");
    }
    return parseMappingResponse(content, request.entry.service_name);
  }
}

export interface SowNormalizerOptions {
  readonly concurrency?: number;
  readonly logger?: LoggerFacade;
}

export interface SowNormalization {
  readonly document: NormalizedDocument;
  readonly failures: readonly MappingFailure[];
}

type EntryResult =
  | { readonly ok: true; readonly serviceType: string; readonly fields: Record<string, unknown> }
  | { readonly ok: false; readonly failure: MappingFailure };

/**
 * SOW → 预归一化文档。条目并发映射（有界），结果按服务类型首次出现顺序分组。
 * 无 Schema 的服务原样保留，由校验阶段报告 schema_not_found。
 */
export class SowNormalizer {
  private readonly logger: LoggerFacade;

  constructor(
    private readonly registry: SchemaRegistry,
    private readonly mapper: SowMapper,
    private readonly options: SowNormalizerOptions = {}
  ) {
    this.logger = options.logger ?? createLoggerFacade("sow-normalizer");
  }

  async normalize(entries: readonly SowEntry[], projectName?: string): Promise<SowNormalization> {
    const limit = pLimit(this.options.concurrency ?? 3);
    const results = await Promise.all(entries.map((entry) => limit(() => this.mapEntry(entry))));

    const services: Record<string, Record<string, unknown>[]> = {};
    const failures: MappingFailure[] = [];
    for (const result of results) {
      if (result.ok) {
        (services[result.serviceType] ??= []).push(result.fields);
      } else {
        failures.push(result.failure);
      }
    }

    this.logger.info("SOW 映射完成", { entries: entries.length, failures: failures.length });
    return {
      document: { ...(projectName !== undefined ? { project_name: projectName } : {}), services },
      failures
    };
  }

  private async mapEntry(entry: SowEntry): Promise<EntryResult> {
    const serviceType = normalizeServiceName(entry.service_name, this.registry);
    const schema = this.registry.getSchema(serviceType);
    const description = entry.description;
    if (!schema) {
      this.logger.warn("SOW 条目没有对应的服务 Schema", { serviceName: entry.service_name, serviceType });
      return { ok: true, serviceType, fields: description !== undefined ? { description } : {} };
    }

    try {
      const fields = await this.mapper.map({ entry, serviceType, schema });
      const hasDescriptionField = schema.fields.some((field) => field.name === "description");
      if (hasDescriptionField && description !== undefined && fields.description === undefined) {
        return { ok: true, serviceType, fields: { ...fields, description } };
      }
      return { ok: true, serviceType, fields };
    } catch (error) {
      const mappingError =
        error instanceof MappingError
          ? error
          : new MappingError(entry.service_name, toErrorMessage(error), error);
      this.logger.error("SOW 条目映射失败", mappingError, { serviceType });
      return {
        ok: false,
        failure: {
          serviceType,
          error: mappingError,
          ...(description !== undefined ? { description } : {})
        }
      };
    }
  }
}
