import { InputDocumentError } from "../../shared/errors/estimateErrors.js";
import {
  NormalizedDocumentSchema,
  SowFlatDocumentSchema,
  SowResultDocumentSchema,
  type NormalizedDocument,
  type SowEntry
} from "../../shared/schemas/estimateInput.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { normalizeServiceName } from "./serviceNames.js";
import type { SubmittedRequest } from "./types.js";

export type ParsedDocument =
  | { readonly kind: "normalized"; readonly document: NormalizedDocument }
  | { readonly kind: "sow"; readonly projectName?: string; readonly entries: readonly SowEntry[] };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * 识别输入文档格式：含 `services` 为预归一化文档，含 `result.estimate` 或 `estimate` 为 SOW。
 */
export function parseEstimateDocument(raw: unknown): ParsedDocument {
  if (!isRecord(raw)) {
    throw new InputDocumentError("文档必须是 JSON 对象");
  }

  if ("services" in raw) {
    const parsed = NormalizedDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InputDocumentError(parsed.error);
    }
    return { kind: "normalized", document: parsed.data };
  }

  if ("result" in raw) {
    const parsed = SowResultDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InputDocumentError(parsed.error);
    }
    return sowDocument(parsed.data.result.estimate, parsed.data.project_name);
  }

  if ("estimate" in raw) {
    const parsed = SowFlatDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InputDocumentError(parsed.error);
    }
    return sowDocument(parsed.data.estimate, parsed.data.project_name);
  }

  throw new InputDocumentError("无法识别文档格式：需要 services（预归一化文档）或 result.estimate（SOW 文档）");
}

function sowDocument(entries: readonly SowEntry[], projectName: string | undefined): ParsedDocument {
  return { kind: "sow", entries, ...(projectName !== undefined ? { projectName } : {}) };
}

/**
 * 按服务键顺序、再按数组顺序展开为有序请求列表。服务键经别名归一化，
 * 多个键归一到同一类型时实例序号连续计数。
 */
export function flattenNormalizedDocument(
  document: NormalizedDocument,
  registry: SchemaRegistry,
  startPosition = 1
): SubmittedRequest[] {
  const requests: SubmittedRequest[] = [];
  const instances = new Map<string, number>();
  let position = startPosition;

  for (const [key, entries] of Object.entries(document.services)) {
    const serviceType = normalizeServiceName(key, registry);
    for (const fields of entries) {
      const instance = (instances.get(serviceType) ?? 0) + 1;
      instances.set(serviceType, instance);
      const description = typeof fields.description === "string" ? fields.description : undefined;
      requests.push({
        position,
        instance,
        ...(description !== undefined ? { description } : {}),
        request: { serviceType, fields }
      });
      position += 1;
    }
  }

  return requests;
}
