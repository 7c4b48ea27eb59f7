import type { MappingError } from "../../shared/errors/estimateErrors.js";
import type { ServiceRequest } from "../schema/types.js";

/**
 * 带运行内位置信息的请求。position 为整次运行内的提交序号（从 1 开始），
 * instance 为同一服务类型内的序号。
 */
export interface SubmittedRequest {
  readonly position: number;
  readonly instance: number;
  readonly description?: string;
  readonly request: ServiceRequest;
}

export interface MappingFailure {
  readonly serviceType: string;
  readonly description?: string;
  readonly error: MappingError;
}
