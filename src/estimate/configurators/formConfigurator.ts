import {
  AutomationError,
  EstimateError,
  SessionFatalError,
  toErrorMessage,
  type AutomationStage
} from "../../shared/errors/estimateErrors.js";
import { retryWithBackoff, type RetryOptions } from "../../shared/retry/retryWithBackoff.js";
import type { FieldValue, ValidatedConfig } from "../schema/types.js";
import type { CalculatorSession, FieldTarget } from "../session/types.js";
import type { ApplyResult, Configurator, ConfiguratorContext, LocateResult } from "./base.js";

type LabelSource = string | ((values: Readonly<Record<string, FieldValue>>) => string);

export type FieldBinding =
  | { readonly control: "input"; readonly label: LabelSource; readonly placeholder?: string }
  | {
      readonly control: "select";
      readonly label: LabelSource;
      /** 配置值 → 页面选项文本；未列出的值原样使用 */
      readonly options?: Readonly<Record<string, string>>;
    }
  | { readonly control: "toggle"; readonly label: LabelSource };

/**
 * 服务表单的声明式描述：搜索关键字（首个为主关键字）与字段到页面控件的绑定。
 * 绑定按声明顺序填写。
 */
export interface FormDefinition {
  readonly serviceType: string;
  readonly searchTerms: readonly [string, ...string[]];
  readonly fields: Readonly<Record<string, FieldBinding>>;
}

export interface FormConfiguratorOptions {
  /** 定位失败后整轮关键字的重试次数 */
  readonly locateRetries?: number;
  /** 填写/提交失败后的重试次数 */
  readonly applyRetries?: number;
  readonly retryBaseDelayMs?: number;
}

export function defineFormConfigurator(
  definition: FormDefinition,
  options: FormConfiguratorOptions = {}
): Configurator {
  const locateRetries = options.locateRetries ?? 2;
  const applyRetries = options.applyRetries ?? 1;
  const baseDelay = options.retryBaseDelayMs ?? 500;

  const retryOptions = (stage: AutomationStage, retries: number, context: ConfiguratorContext): RetryOptions => ({
    retries,
    baseDelay,
    signal: context.signal,
    shouldRetry: ({ error }) => !(error instanceof SessionFatalError),
    onFailedAttempt: ({ error, attemptNumber, retriesLeft }) => {
      context.logger.warn(`${stage} 失败，准备重试`, {
        serviceType: definition.serviceType,
        attemptNumber,
        retriesLeft,
        error: error.message
      });
    }
  });

  return {
    serviceType: definition.serviceType,

    describeSearchTerms() {
      return [...definition.searchTerms];
    },

    async locate(session, context): Promise<LocateResult> {
      const tried = new Set<string>();
      let attempts = 0;
      try {
        const term = await retryWithBackoff(async () => {
          attempts += 1;
          for (const candidate of definition.searchTerms) {
            context.signal?.throwIfAborted();
            tried.add(candidate);
            if (await session.searchService(candidate)) {
              return candidate;
            }
            context.logger.debug("关键字未命中", { serviceType: definition.serviceType, term: candidate });
          }
          throw new AutomationError("locate", `未能在计价器中找到服务 ${definition.serviceType}`, {
            details: { tried: Array.from(tried) }
          });
        }, retryOptions("locate", locateRetries, context));
        return { found: true, term, attempts };
      } catch (error) {
        throwIfTerminal(error, "locate", context);
        return {
          found: false,
          tried: Array.from(tried),
          attempts,
          error: toAutomationError("locate", error)
        };
      }
    },

    async apply(session, config, context): Promise<ApplyResult> {
      const baseline = await session.countItems();
      let attempts = 0;
      try {
        const fieldsApplied = await retryWithBackoff(async () => {
          attempts += 1;
          // 上一次尝试的提交可能已生效（确认阶段失败），此时不得重复提交
          if (attempts > 1 && (await session.countItems()) > baseline) {
            context.logger.warn("检测到条目已提交，跳过重复提交", { serviceType: definition.serviceType });
            return Object.keys(definition.fields).filter((name) => name in config.values);
          }
          const applied = await fillForm(session, definition, config, context);
          context.signal?.throwIfAborted();
          await session.saveItem();
          if ((await session.countItems()) <= baseline) {
            throw new AutomationError("apply", "提交后估算条目数未增加");
          }
          return applied;
        }, retryOptions("apply", applyRetries, context));
        return { applied: true, attempts, fieldsApplied };
      } catch (error) {
        throwIfTerminal(error, "apply", context);
        return { applied: false, attempts, error: toAutomationError("apply", error) };
      }
    }
  };
}

async function fillForm(
  session: CalculatorSession,
  definition: FormDefinition,
  config: ValidatedConfig,
  context: ConfiguratorContext
): Promise<string[]> {
  const applied: string[] = [];
  for (const [name, binding] of Object.entries(definition.fields)) {
    const value = config.values[name];
    if (value === undefined) {
      continue;
    }
    context.signal?.throwIfAborted();
    const target: FieldTarget = {
      label: typeof binding.label === "function" ? binding.label(config.values) : binding.label,
      ...(binding.control === "input" && binding.placeholder ? { placeholder: binding.placeholder } : {})
    };
    try {
      switch (binding.control) {
        case "input":
          await session.fillInput(target, String(value));
          break;
        case "select":
          await session.selectOption(target, binding.options?.[String(value)] ?? String(value));
          break;
        case "toggle":
          await session.setToggle(target, value === true || value === "true");
          break;
      }
    } catch (error) {
      if (error instanceof SessionFatalError) {
        throw error;
      }
      throw new AutomationError("apply", `字段 ${name} 填写失败：${toErrorMessage(error)}`, {
        details: { field: name, label: target.label },
        cause: error
      });
    }
    applied.push(name);
  }

  const unbound = Object.keys(config.values).filter((name) => !(name in definition.fields));
  if (unbound.length > 0) {
    context.logger.debug("以下字段没有页面控件，未填写", { serviceType: definition.serviceType, fields: unbound });
  }
  return applied;
}

function throwIfTerminal(error: unknown, stage: AutomationStage, context: ConfiguratorContext): void {
  if (error instanceof SessionFatalError) {
    throw error;
  }
  if (context.signal?.aborted) {
    throw new AutomationError(stage, "运行已取消", { code: "cancelled", cause: error });
  }
}

function toAutomationError(stage: AutomationStage, error: unknown): AutomationError {
  if (error instanceof AutomationError) {
    return error;
  }
  if (error instanceof EstimateError) {
    return new AutomationError(stage, error.message, { details: error.details, cause: error });
  }
  return new AutomationError(stage, toErrorMessage(error), { cause: error });
}
