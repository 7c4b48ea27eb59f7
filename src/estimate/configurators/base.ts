import { UnsupportedServiceTypeError, type AutomationError } from "../../shared/errors/estimateErrors.js";
import type { LoggerFacade } from "../../shared/logging/logger.js";
import type { ValidatedConfig } from "../schema/types.js";
import type { CalculatorSession } from "../session/types.js";

export interface ConfiguratorContext {
  readonly logger: LoggerFacade;
  readonly signal?: AbortSignal;
}

export type LocateResult =
  | { readonly found: true; readonly term: string; readonly attempts: number }
  | {
      readonly found: false;
      readonly tried: readonly string[];
      readonly attempts: number;
      readonly error: AutomationError;
    };

export type ApplyResult =
  | { readonly applied: true; readonly attempts: number; readonly fieldsApplied: readonly string[] }
  | { readonly applied: false; readonly attempts: number; readonly error: AutomationError };

/**
 * 某一服务类型的页面配置器：先定位服务表单，再按已校验配置填写并提交。
 *
 * 除 SessionFatalError 与取消外，失败均以结果对象返回，不抛出。
 */
export interface Configurator {
  readonly serviceType: string;
  locate(session: CalculatorSession, context: ConfiguratorContext): Promise<LocateResult>;
  apply(session: CalculatorSession, config: ValidatedConfig, context: ConfiguratorContext): Promise<ApplyResult>;
  describeSearchTerms(): readonly string[];
}

export type ConfiguratorRegistry = ReadonlyMap<string, Configurator>;

export type ConfiguratorResolution =
  | { readonly ok: true; readonly configurator: Configurator }
  | { readonly ok: false; readonly error: UnsupportedServiceTypeError };

export function resolveConfigurator(registry: ConfiguratorRegistry, serviceType: string): ConfiguratorResolution {
  const configurator = registry.get(serviceType);
  if (!configurator) {
    return { ok: false, error: new UnsupportedServiceTypeError(serviceType) };
  }
  return { ok: true, configurator };
}
