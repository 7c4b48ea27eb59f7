import { EventEmitter } from "node:events";

import {
  AutomationError,
  EstimateError,
  SessionFatalError,
  toErrorMessage
} from "../../shared/errors/estimateErrors.js";
import { createLoggerFacade, type LoggerFacade } from "../../shared/logging/logger.js";
import { resolveConfigurator, type ConfiguratorRegistry } from "../configurators/base.js";
import type { CalculatorSession, SessionFactory } from "../session/types.js";
import type {
  FinalizationSummary,
  ItemError,
  ItemOutcome,
  OrchestrationItem,
  OrchestrationResult,
  OrchestratorEvent,
  OrchestratorEventPayloads,
  OrchestratorRunOptions,
  OrchestratorState
} from "./types.js";

export interface SessionOrchestratorParams {
  readonly sessionFactory: SessionFactory;
  readonly configurators: ConfiguratorRegistry;
  readonly logger?: LoggerFacade;
}

interface HaltReason {
  readonly code: "session_fatal" | "cancelled";
  readonly error: ItemError;
}

interface ItemProgress {
  readonly outcome: ItemOutcome;
  readonly halt: HaltReason | null;
}

type OutcomeBase = Pick<ItemOutcome, "position" | "instance" | "serviceType" | "description">;

/**
 * 在单个计价器会话上按提交顺序逐条配置服务。
 *
 * 条目级失败只影响该条目；会话失效时剩余条目记为 session_fatal 并跳过收尾；
 * 取消时剩余条目记为 cancelled，但仍尝试生成分享链接。会话总在运行结束时关闭。
 */
export class SessionOrchestrator extends EventEmitter {
  private state: OrchestratorState = "idle";

  private running = false;

  private readonly logger: LoggerFacade;

  constructor(private readonly params: SessionOrchestratorParams) {
    super();
    this.logger = params.logger ?? createLoggerFacade("orchestrator");
  }

  get currentState(): OrchestratorState {
    return this.state;
  }

  onEvent<T extends OrchestratorEvent>(event: T, listener: (payload: OrchestratorEventPayloads[T]) => void): this {
    return this.on(event, listener);
  }

  async run(items: readonly OrchestrationItem[], options: OrchestratorRunOptions): Promise<OrchestrationResult> {
    if (this.running) {
      throw new Error("编排器已在运行，单个实例不支持并发运行");
    }
    this.running = true;
    try {
      return await this.execute([...items].sort((a, b) => a.position - b.position), options);
    } finally {
      this.running = false;
    }
  }

  private emitEvent<T extends OrchestratorEvent>(event: T, payload: OrchestratorEventPayloads[T]): void {
    this.emit(event, payload);
  }

  private transition(state: OrchestratorState, item?: OrchestrationItem): void {
    this.state = state;
    this.emitEvent("orchestrator:state-change", {
      state,
      ...(item ? { position: item.position, serviceType: item.config.serviceType } : {})
    });
  }

  private async execute(items: OrchestrationItem[], options: OrchestratorRunOptions): Promise<OrchestrationResult> {
    this.transition("idle");

    let session: CalculatorSession;
    try {
      session = await this.params.sessionFactory.open({ headless: options.headless, signal: options.signal });
    } catch (error) {
      const fatal =
        error instanceof SessionFatalError
          ? error
          : new SessionFatalError(`无法打开计价器会话：${toErrorMessage(error)}`, error);
      this.logger.error("会话打开失败，未处理任何条目", fatal, { items: items.length });
      this.transition("failed");
      return { state: "failed", error: fatal };
    }

    this.transition("session-open");
    const runLogger = this.logger.child({ sessionId: session.id });
    runLogger.info("开始编排", { items: items.length, headless: options.headless });

    const outcomes: ItemOutcome[] = [];
    let halt: HaltReason | null = null;
    let fatal: ItemError | undefined;
    let finalization: FinalizationSummary = { attempted: false, succeeded: false, shareableUrl: null };

    try {
      for (const item of items) {
        if (!halt && options.signal?.aborted) {
          halt = { code: "cancelled", error: { code: "cancelled", message: "运行已取消" } };
        }
        const progress: ItemProgress = halt
          ? { outcome: haltedOutcome(outcomeBase(item), halt), halt }
          : await this.processItem(session, item, options.signal, runLogger);
        halt = progress.halt;
        outcomes.push(progress.outcome);
        this.emitEvent("orchestrator:item-complete", { outcome: progress.outcome, total: items.length });
      }

      this.transition("finalizing");
      if (halt?.code === "session_fatal") {
        fatal = halt.error;
        runLogger.warn("会话已失效，跳过生成分享链接", { completed: outcomes.length });
      } else {
        const result = await this.finalize(session, outcomes, runLogger);
        finalization = result.summary;
        fatal = result.fatal;
      }
    } finally {
      await this.release(session, runLogger);
      this.transition("finalized");
    }

    return {
      state: "finalized",
      sessionId: session.id,
      outcomes,
      finalization,
      cancelled: halt?.code === "cancelled",
      ...(fatal ? { fatal } : {})
    };
  }

  private async processItem(
    session: CalculatorSession,
    item: OrchestrationItem,
    signal: AbortSignal | undefined,
    runLogger: LoggerFacade
  ): Promise<ItemProgress> {
    const base = outcomeBase(item);
    const logger = runLogger.child({ position: item.position, serviceType: base.serviceType });
    this.transition("item-pending", item);

    const resolution = resolveConfigurator(this.params.configurators, base.serviceType);
    if (!resolution.ok) {
      logger.warn("服务类型没有配置器，跳过", {});
      return this.completeItem(item, {
        ...base,
        status: "validation-failed",
        error: resolution.error.toJSON()
      }, null);
    }

    const { configurator } = resolution;
    const context = { logger, signal };
    try {
      this.transition("item-locating", item);
      const located = await configurator.locate(session, context);
      if (!located.found) {
        logger.warn("定位服务失败", { tried: located.tried, attempts: located.attempts });
        return this.failItem(session, item, base, located.error, located.attempts, logger);
      }

      this.transition("item-applying", item);
      const applied = await configurator.apply(session, item.config, context);
      if (!applied.applied) {
        logger.warn("配置服务失败", { attempts: applied.attempts, error: applied.error.message });
        return this.failItem(session, item, base, applied.error, applied.attempts, logger);
      }

      logger.info("条目已加入估算", { term: located.term, fields: applied.fieldsApplied.length });
      const halt = await this.recover(session, logger);
      return this.completeItem(item, {
        ...base,
        status: "succeeded",
        attempts: applied.attempts,
        searchTerm: located.term
      }, halt);
    } catch (error) {
      if (error instanceof SessionFatalError) {
        logger.error("会话失效", error);
        const itemError = error.toJSON();
        return this.completeItem(item, { ...base, status: "automation-failed", error: itemError }, {
          code: "session_fatal",
          error: itemError
        });
      }
      if (signal?.aborted || (error instanceof EstimateError && error.code === "cancelled")) {
        logger.warn("条目处理被取消", {});
        const cancelled: ItemError = { code: "cancelled", message: "运行已取消，条目未完成" };
        const halt = await this.recover(session, logger);
        return this.completeItem(item, { ...base, status: "automation-failed", error: cancelled }, halt ?? {
          code: "cancelled",
          error: cancelled
        });
      }
      const automationError =
        error instanceof AutomationError
          ? error
          : new AutomationError("apply", toErrorMessage(error), { cause: error });
      logger.error("配置器异常", error);
      return this.failItem(session, item, base, automationError, undefined, logger);
    }
  }

  private async failItem(
    session: CalculatorSession,
    item: OrchestrationItem,
    base: OutcomeBase,
    error: AutomationError,
    attempts: number | undefined,
    logger: LoggerFacade
  ): Promise<ItemProgress> {
    const halt = await this.recover(session, logger);
    return this.completeItem(
      item,
      {
        ...base,
        status: "automation-failed",
        error: error.toJSON(),
        ...(attempts !== undefined ? { attempts } : {})
      },
      halt
    );
  }

  private completeItem(item: OrchestrationItem, outcome: ItemOutcome, halt: HaltReason | null): ItemProgress {
    this.transition("item-done", item);
    return { outcome, halt };
  }

  /**
   * 尽力回到服务搜索页；仅当会话确认失效时返回终止原因。
   */
  private async recover(session: CalculatorSession, logger: LoggerFacade): Promise<HaltReason | null> {
    try {
      await session.returnToServiceSearch();
      return null;
    } catch (error) {
      if (!(error instanceof SessionFatalError) && (await probeAlive(session))) {
        logger.warn("返回服务搜索页失败，会话仍可用", { error: toErrorMessage(error) });
        return null;
      }
      logger.error("恢复失败且会话已失效，终止剩余条目", error);
      const fatal =
        error instanceof SessionFatalError
          ? error
          : new SessionFatalError(`会话在恢复时失效：${toErrorMessage(error)}`, error);
      return { code: "session_fatal", error: fatal.toJSON() };
    }
  }

  private async finalize(
    session: CalculatorSession,
    outcomes: readonly ItemOutcome[],
    logger: LoggerFacade
  ): Promise<{ summary: FinalizationSummary; fatal?: ItemError }> {
    const succeeded = outcomes.filter((outcome) => outcome.status === "succeeded").length;
    try {
      const shareableUrl = await session.finalize();
      if (!shareableUrl) {
        const message = "未获得分享链接";
        if (succeeded > 0) {
          logger.warn(message, { succeeded });
        } else {
          logger.info(`${message}（没有成功条目）`, {});
        }
        return {
          summary: {
            attempted: true,
            succeeded: false,
            shareableUrl: null,
            error: { code: "automation_failed", message }
          }
        };
      }
      logger.info("分享链接已生成", { succeeded });
      return { summary: { attempted: true, succeeded: true, shareableUrl } };
    } catch (error) {
      const alive = !(error instanceof SessionFatalError) && (await probeAlive(session));
      const wrapped = alive
        ? new AutomationError("finalize", `生成分享链接失败：${toErrorMessage(error)}`, { cause: error })
        : error instanceof SessionFatalError
          ? error
          : new SessionFatalError(`会话在生成分享链接时失效：${toErrorMessage(error)}`, error);
      if (succeeded > 0) {
        logger.error("生成分享链接失败", error, { succeeded });
      } else {
        logger.info("没有成功条目，生成分享链接失败", { error: toErrorMessage(error) });
      }
      const itemError = wrapped.toJSON();
      return {
        summary: { attempted: true, succeeded: false, shareableUrl: null, error: itemError },
        ...(alive ? {} : { fatal: itemError })
      };
    }
  }

  private async release(session: CalculatorSession, logger: LoggerFacade): Promise<void> {
    try {
      await session.close();
      logger.info("会话已关闭", {});
    } catch (error) {
      logger.error("关闭会话失败", error);
    }
  }
}

function outcomeBase(item: OrchestrationItem): OutcomeBase {
  return {
    position: item.position,
    instance: item.instance,
    serviceType: item.config.serviceType,
    ...(item.description !== undefined ? { description: item.description } : {})
  };
}

function haltedOutcome(base: OutcomeBase, halt: HaltReason): ItemOutcome {
  const message = halt.code === "cancelled" ? "运行已取消，条目未处理" : "会话已失效，条目未处理";
  return { ...base, status: "automation-failed", error: { code: halt.code, message } };
}

async function probeAlive(session: CalculatorSession): Promise<boolean> {
  try {
    return await session.isAlive();
  } catch {
    return false;
  }
}
