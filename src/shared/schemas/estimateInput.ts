import { z } from "zod";

/**
 * 预归一化文档：服务类型 → 该类型的若干字段表，按键序再按数组序展开。
 */
export const NormalizedDocumentSchema = z.object({
  project_name: z.string().optional(),
  services: z.record(z.array(z.record(z.unknown())))
});

export const SowEntrySchema = z
  .object({
    service_name: z.string().min(1),
    description: z.string().optional(),
    configurations: z.union([z.record(z.unknown()), z.array(z.unknown()), z.string()]).optional()
  })
  .passthrough();

const SowEstimateListSchema = z.array(SowEntrySchema).min(1, "estimate 列表不能为空");

/**
 * SOW 分析结果：`{ result: { estimate: [...] } }`。
 */
export const SowResultDocumentSchema = z
  .object({
    project_name: z.string().optional(),
    result: z.object({ estimate: SowEstimateListSchema }).passthrough()
  })
  .passthrough();

/** 省略 result 的扁平写法：`{ estimate: [...] }` */
export const SowFlatDocumentSchema = z
  .object({
    project_name: z.string().optional(),
    estimate: SowEstimateListSchema
  })
  .passthrough();

export type NormalizedDocument = z.infer<typeof NormalizedDocumentSchema>;
export type SowEntry = z.infer<typeof SowEntrySchema>;

/**
 * HTTP 请求体中与文档并列的运行选项。
 */
export const EstimateRequestOptionsSchema = z
  .object({
    validate_only: z.boolean().optional(),
    headless: z.boolean().optional(),
    use_mock_session: z.boolean().optional()
  })
  .passthrough();

export type EstimateRequestOptions = z.infer<typeof EstimateRequestOptionsSchema>;
