import { randomUUID } from "node:crypto";

import {
  InputDocumentError,
  MapperUnavailableError,
  type SessionFatalError
} from "../shared/errors/estimateErrors.js";
import { createLoggerFacade, type LoggerFacade } from "../shared/logging/logger.js";
import type { ConfiguratorRegistry } from "./configurators/base.js";
import { flattenNormalizedDocument, parseEstimateDocument } from "./input/document.js";
import { SowNormalizer, type SowMapper } from "./input/sowMapper.js";
import type { MappingFailure, SubmittedRequest } from "./input/types.js";
import { SessionOrchestrator } from "./orchestrator/sessionOrchestrator.js";
import type {
  ItemError,
  ItemOutcome,
  OrchestrationItem,
  OrchestratorEventPayloads
} from "./orchestrator/types.js";
import { aggregateReport, aggregateWithoutSession, type EstimateReport } from "./report/aggregator.js";
import type { SchemaRegistry } from "./schema/registry.js";
import { validateServiceRequest } from "./schema/validator.js";
import type { SessionFactory } from "./session/types.js";

export interface PositionedMappingFailure {
  readonly position: number;
  readonly instance: number;
  readonly failure: MappingFailure;
}

export interface PreparedEstimate {
  readonly projectName?: string;
  readonly source: "normalized" | "sow";
  readonly requests: readonly SubmittedRequest[];
  readonly mappingFailures: readonly PositionedMappingFailure[];
}

export interface ValidationItem {
  readonly position: number;
  readonly instance: number;
  readonly serviceType: string;
  readonly description?: string;
  readonly valid: boolean;
  /** 通过校验且有对应配置器 */
  readonly automatable: boolean;
  readonly error?: ItemError;
}

export interface ValidationSummary {
  readonly items: readonly ValidationItem[];
  readonly valid: number;
  readonly automatable: number;
  readonly total: number;
}

export interface ValidatedEstimate {
  readonly summary: ValidationSummary;
  /** 通过校验的条目，按 position 升序 */
  readonly items: readonly OrchestrationItem[];
  /** 未通过校验或映射失败的条目结果 */
  readonly rejected: readonly ItemOutcome[];
}

export type EstimateRunResult =
  | { readonly kind: "validation-only"; readonly projectName?: string; readonly validation: ValidationSummary }
  | {
      readonly kind: "session-fatal";
      readonly projectName?: string;
      readonly error: SessionFatalError;
      readonly validation: ValidationSummary;
    }
  | { readonly kind: "estimate"; readonly report: EstimateReport; readonly validation: ValidationSummary };

export interface EstimatePipelineDeps {
  readonly schemaRegistry: SchemaRegistry;
  readonly configuratorRegistry: ConfiguratorRegistry;
  readonly sessionFactory: SessionFactory;
  readonly sowMapper?: SowMapper | null;
  readonly mappingConcurrency?: number;
  readonly runTimeoutMs?: number;
  readonly logger?: LoggerFacade;
}

export interface EstimateRunOptions {
  readonly validateOnly?: boolean;
  readonly headless?: boolean;
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number;
  /** 覆盖默认会话工厂（如 HTTP 请求指定 use_mock_session） */
  readonly sessionFactory?: SessionFactory;
  readonly onStateChange?: (payload: OrchestratorEventPayloads["orchestrator:state-change"]) => void;
  readonly onItemComplete?: (payload: OrchestratorEventPayloads["orchestrator:item-complete"]) => void;
}

/**
 * 文档 → 有序请求 → 校验 → 单会话编排 → 报告。
 */
export class EstimatePipeline {
  private readonly logger: LoggerFacade;

  constructor(private readonly deps: EstimatePipelineDeps) {
    this.logger = deps.logger ?? createLoggerFacade("estimate-pipeline");
  }

  get schemaRegistry(): SchemaRegistry {
    return this.deps.schemaRegistry;
  }

  get configuratorRegistry(): ConfiguratorRegistry {
    return this.deps.configuratorRegistry;
  }

  async prepare(raw: unknown): Promise<PreparedEstimate> {
    const parsed = parseEstimateDocument(raw);
    const registry = this.deps.schemaRegistry;

    if (parsed.kind === "normalized") {
      const requests = flattenNormalizedDocument(parsed.document, registry);
      ensureNotEmpty(requests.length);
      return {
        source: "normalized",
        requests,
        mappingFailures: [],
        ...(parsed.document.project_name !== undefined ? { projectName: parsed.document.project_name } : {})
      };
    }

    const mapper = this.deps.sowMapper;
    if (!mapper) {
      throw new MapperUnavailableError();
    }
    const normalizer = new SowNormalizer(registry, mapper, {
      concurrency: this.deps.mappingConcurrency,
      logger: this.logger
    });
    const normalization = await normalizer.normalize(parsed.entries, parsed.projectName);
    const requests = flattenNormalizedDocument(normalization.document, registry);

    // 映射失败的条目排在已映射条目之后
    const instances = new Map<string, number>();
    for (const request of requests) {
      instances.set(request.request.serviceType, request.instance);
    }
    let position = requests.length;
    const mappingFailures = normalization.failures.map((failure): PositionedMappingFailure => {
      const instance = (instances.get(failure.serviceType) ?? 0) + 1;
      instances.set(failure.serviceType, instance);
      position += 1;
      return { position, instance, failure };
    });

    ensureNotEmpty(requests.length + mappingFailures.length);
    return {
      source: "sow",
      requests,
      mappingFailures,
      ...(parsed.projectName !== undefined ? { projectName: parsed.projectName } : {})
    };
  }

  validate(prepared: PreparedEstimate): ValidatedEstimate {
    const items: OrchestrationItem[] = [];
    const rejected: ItemOutcome[] = [];
    const summaryItems: ValidationItem[] = [];

    for (const submitted of prepared.requests) {
      const base = {
        position: submitted.position,
        instance: submitted.instance,
        serviceType: submitted.request.serviceType,
        ...(submitted.description !== undefined ? { description: submitted.description } : {})
      };
      const result = validateServiceRequest(submitted.request, this.deps.schemaRegistry);
      if (result.ok) {
        items.push({
          position: submitted.position,
          instance: submitted.instance,
          config: result.config,
          ...(submitted.description !== undefined ? { description: submitted.description } : {})
        });
        summaryItems.push({
          ...base,
          valid: true,
          automatable: this.deps.configuratorRegistry.has(base.serviceType)
        });
      } else {
        const error = result.error.toJSON();
        rejected.push({ ...base, status: "validation-failed", error });
        summaryItems.push({ ...base, valid: false, automatable: false, error });
      }
    }

    for (const { position, instance, failure } of prepared.mappingFailures) {
      const base = {
        position,
        instance,
        serviceType: failure.serviceType,
        ...(failure.description !== undefined ? { description: failure.description } : {})
      };
      const error = failure.error.toJSON();
      rejected.push({ ...base, status: "validation-failed", error });
      summaryItems.push({ ...base, valid: false, automatable: false, error });
    }

    summaryItems.sort((a, b) => a.position - b.position);
    return {
      items,
      rejected,
      summary: {
        items: summaryItems,
        valid: items.length,
        automatable: summaryItems.filter((item) => item.automatable).length,
        total: summaryItems.length
      }
    };
  }

  async run(raw: unknown, options: EstimateRunOptions = {}): Promise<EstimateRunResult> {
    const runId = randomUUID();
    const logger = this.logger.child({ runId });
    const prepared = await this.prepare(raw);
    const validated = this.validate(prepared);
    const { summary } = validated;
    const projectName = prepared.projectName;
    logger.info("输入校验完成", { source: prepared.source, total: summary.total, valid: summary.valid });

    if (options.validateOnly) {
      return { kind: "validation-only", validation: summary, ...(projectName !== undefined ? { projectName } : {}) };
    }

    if (validated.items.length === 0) {
      logger.warn("没有通过校验的条目，不打开会话", { total: summary.total });
      return { kind: "estimate", report: aggregateWithoutSession(validated.rejected, projectName), validation: summary };
    }

    const runSignal = createRunSignal(options.timeoutMs ?? this.deps.runTimeoutMs, options.signal);
    try {
      const orchestrator = new SessionOrchestrator({
        sessionFactory: options.sessionFactory ?? this.deps.sessionFactory,
        configurators: this.deps.configuratorRegistry,
        logger
      });
      if (options.onStateChange) {
        orchestrator.onEvent("orchestrator:state-change", options.onStateChange);
      }
      if (options.onItemComplete) {
        orchestrator.onEvent("orchestrator:item-complete", options.onItemComplete);
      }

      const result = await orchestrator.run(validated.items, {
        headless: options.headless ?? false,
        signal: runSignal.signal
      });
      if (result.state === "failed") {
        return {
          kind: "session-fatal",
          error: result.error,
          validation: summary,
          ...(projectName !== undefined ? { projectName } : {})
        };
      }

      const report = aggregateReport({
        outcomes: [...validated.rejected, ...result.outcomes],
        finalization: result.finalization,
        ...(result.fatal ? { fatal: result.fatal } : {}),
        ...(projectName !== undefined ? { projectName } : {})
      });
      logger.info("估算完成", {
        status: report.status,
        succeeded: report.totals.succeeded,
        total: report.totals.total,
        cancelled: result.cancelled
      });
      return { kind: "estimate", report, validation: summary };
    } finally {
      runSignal.dispose();
    }
  }
}

function ensureNotEmpty(count: number): void {
  if (count === 0) {
    throw new InputDocumentError("文档中没有任何服务条目");
  }
}

/**
 * 合并调用方的取消信号与整体超时。
 */
export function createRunSignal(
  timeoutMs: number | undefined,
  parent?: AbortSignal
): { readonly signal: AbortSignal; dispose(): void } {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }
  const timer =
    timeoutMs !== undefined && timeoutMs > 0
      ? setTimeout(() => controller.abort(new Error(`运行超时（${timeoutMs}ms）`)), timeoutMs)
      : undefined;
  return {
    signal: controller.signal,
    dispose() {
      if (timer) {
        clearTimeout(timer);
      }
      parent?.removeEventListener("abort", onParentAbort);
    }
  };
}
