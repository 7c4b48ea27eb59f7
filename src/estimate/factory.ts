import type { Settings } from "../shared/config/settings.js";
import type { LoggerFacade } from "../shared/logging/logger.js";
import { createOpenAIClient } from "../utils/openaiClient.js";
import type { ConfiguratorRegistry } from "./configurators/base.js";
import { createDefaultConfigurators } from "./configurators/defaults.js";
import { LlmSowMapper, createOpenAICompletion, type SowMapper } from "./input/sowMapper.js";
import { EstimatePipeline } from "./pipeline.js";
import { loadSchemaRegistry, type SchemaRegistry } from "./schema/registry.js";
import { MockSessionFactory } from "./session/mockSession.js";
import { PlaywrightSessionFactory } from "./session/playwrightSession.js";
import type { SessionFactory } from "./session/types.js";

export function createConfiguratorsFromSettings(settings: Settings): ConfiguratorRegistry {
  return createDefaultConfigurators({
    locateRetries: settings.retry.locateRetries,
    applyRetries: settings.retry.applyRetries,
    retryBaseDelayMs: settings.retry.baseDelayMs
  });
}

export function createSessionFactory(settings: Settings, useMockSession = false): SessionFactory {
  if (useMockSession) {
    return new MockSessionFactory();
  }
  return new PlaywrightSessionFactory({
    calculatorUrl: settings.calculatorUrl,
    ...(settings.browser.executablePath ? { executablePath: settings.browser.executablePath } : {}),
    ...(settings.browser.channel ? { channel: settings.browser.channel } : {})
  });
}

/**
 * 未配置 OPENAI_API_KEY 时返回 null，此时只接受预归一化文档。
 */
export function createSowMapper(settings: Settings): SowMapper | null {
  if (!settings.openai.apiKey) {
    return null;
  }
  const client = createOpenAIClient(settings.openai);
  return new LlmSowMapper(createOpenAICompletion(client, settings.openai.model));
}

export interface BuildPipelineOptions {
  readonly settings: Settings;
  readonly schemasPath?: string;
  readonly useMockSession?: boolean;
  readonly schemaRegistry?: SchemaRegistry;
  readonly sessionFactory?: SessionFactory;
  readonly sowMapper?: SowMapper | null;
  readonly logger?: LoggerFacade;
}

export async function buildEstimatePipeline(options: BuildPipelineOptions): Promise<EstimatePipeline> {
  const { settings } = options;
  const schemaRegistry =
    options.schemaRegistry ?? (await loadSchemaRegistry({ filePath: options.schemasPath ?? settings.schemasPath }));
  return new EstimatePipeline({
    schemaRegistry,
    configuratorRegistry: createConfiguratorsFromSettings(settings),
    sessionFactory: options.sessionFactory ?? createSessionFactory(settings, options.useMockSession),
    sowMapper: options.sowMapper === undefined ? createSowMapper(settings) : options.sowMapper,
    mappingConcurrency: settings.openai.concurrency,
    runTimeoutMs: settings.runTimeoutMs,
    ...(options.logger ? { logger: options.logger } : {})
  });
}
