/**
 * DI 容器配置
 *
 * 生命周期：全部为 SINGLETON（进程级只读依赖）；会话不进入容器，由每次运行的编排器持有。
 */

import { asFunction, asValue, createContainer, InjectionMode, Lifetime } from "awilix";
import type { AwilixContainer } from "awilix";
import pLimit, { type LimitFunction } from "p-limit";

import type { ConfiguratorRegistry } from "../../../estimate/configurators/base.js";
import { createConfiguratorsFromSettings, createSessionFactory, createSowMapper } from "../../../estimate/factory.js";
import type { SowMapper } from "../../../estimate/input/sowMapper.js";
import { EstimatePipeline } from "../../../estimate/pipeline.js";
import type { SchemaRegistry } from "../../../estimate/schema/registry.js";
import { MockSessionFactory } from "../../../estimate/session/mockSession.js";
import type { SessionFactory } from "../../../estimate/session/types.js";
import type { Settings } from "../../../shared/config/settings.js";
import { createLoggerFacade } from "../../../shared/logging/logger.js";

export interface EstimateCradle {
  settings: Settings;
  schemaRegistry: SchemaRegistry;
  configuratorRegistry: ConfiguratorRegistry;
  sessionFactory: SessionFactory;
  /** 请求体 use_mock_session=true 时使用 */
  mockSessionFactory: SessionFactory;
  sowMapper: SowMapper | null;
  estimatePipeline: EstimatePipeline;
  /** 串行化估算运行 */
  runLimiter: LimitFunction;
}

export interface ContainerOptions {
  readonly settings: Settings;
  readonly schemaRegistry: SchemaRegistry;
  readonly sessionFactory?: SessionFactory;
  readonly mockSessionFactory?: SessionFactory;
  readonly sowMapper?: SowMapper | null;
}

export function createEstimateContainer(options: ContainerOptions): AwilixContainer<EstimateCradle> {
  const container = createContainer<EstimateCradle>({
    injectionMode: InjectionMode.CLASSIC
  });

  container.register({
    settings: asValue(options.settings),
    schemaRegistry: asValue(options.schemaRegistry),
    configuratorRegistry: asFunction((settings: Settings) => createConfiguratorsFromSettings(settings), {
      lifetime: Lifetime.SINGLETON
    }),
    sessionFactory: options.sessionFactory
      ? asValue(options.sessionFactory)
      : asFunction((settings: Settings) => createSessionFactory(settings), { lifetime: Lifetime.SINGLETON }),
    mockSessionFactory: asValue(options.mockSessionFactory ?? new MockSessionFactory()),
    sowMapper:
      options.sowMapper !== undefined
        ? asValue(options.sowMapper)
        : asFunction((settings: Settings) => createSowMapper(settings), { lifetime: Lifetime.SINGLETON }),
    runLimiter: asFunction((settings: Settings) => pLimit(settings.service.maxConcurrentRuns), {
      lifetime: Lifetime.SINGLETON
    })
  });

  container.register({
    estimatePipeline: asFunction(
      (
        settings: Settings,
        schemaRegistry: SchemaRegistry,
        configuratorRegistry: ConfiguratorRegistry,
        sessionFactory: SessionFactory,
        sowMapper: SowMapper | null
      ) =>
        new EstimatePipeline({
          schemaRegistry,
          configuratorRegistry,
          sessionFactory,
          sowMapper,
          mappingConcurrency: settings.openai.concurrency,
          runTimeoutMs: settings.runTimeoutMs,
          logger: createLoggerFacade("estimate-service")
        }),
      { lifetime: Lifetime.SINGLETON }
    )
  });

  return container;
}
