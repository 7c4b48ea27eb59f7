import type { EstimateErrorCode, SessionFatalError } from "../../shared/errors/estimateErrors.js";
import type { ValidatedConfig } from "../schema/types.js";

export type OrchestratorState =
  | "idle"
  | "session-open"
  | "item-pending"
  | "item-locating"
  | "item-applying"
  | "item-done"
  | "finalizing"
  | "finalized"
  | "failed";

export type ItemStatus = "succeeded" | "validation-failed" | "automation-failed";

export interface ItemError {
  readonly code: EstimateErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

/**
 * 运行中单个条目的最终结果；position 为整次运行内从 1 开始的提交序号。
 */
export interface ItemOutcome {
  readonly position: number;
  /** 同一服务类型内从 1 开始的序号 */
  readonly instance: number;
  readonly serviceType: string;
  readonly description?: string;
  readonly status: ItemStatus;
  readonly error?: ItemError;
  readonly attempts?: number;
  /** 成功定位时命中的搜索关键字 */
  readonly searchTerm?: string;
}

export interface OrchestrationItem {
  readonly position: number;
  readonly instance: number;
  readonly description?: string;
  readonly config: ValidatedConfig;
}

export interface FinalizationSummary {
  readonly attempted: boolean;
  readonly succeeded: boolean;
  readonly shareableUrl: string | null;
  readonly error?: ItemError;
}

export type OrchestrationResult =
  | { readonly state: "failed"; readonly error: SessionFatalError }
  | {
      readonly state: "finalized";
      readonly sessionId: string;
      readonly outcomes: readonly ItemOutcome[];
      readonly finalization: FinalizationSummary;
      readonly fatal?: ItemError;
      readonly cancelled: boolean;
    };

export type OrchestratorEvent = "orchestrator:state-change" | "orchestrator:item-complete";

export interface OrchestratorEventPayloads {
  "orchestrator:state-change": {
    readonly state: OrchestratorState;
    readonly position?: number;
    readonly serviceType?: string;
  };
  "orchestrator:item-complete": { readonly outcome: ItemOutcome; readonly total: number };
}

export interface OrchestratorRunOptions {
  readonly headless: boolean;
  readonly signal?: AbortSignal;
}
