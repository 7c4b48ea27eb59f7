import fastify, { type FastifyError, type FastifyInstance } from "fastify";
import type { AwilixContainer } from "awilix";

import type { SowMapper } from "../../estimate/input/sowMapper.js";
import { loadSchemaRegistry, type SchemaRegistry } from "../../estimate/schema/registry.js";
import type { SessionFactory } from "../../estimate/session/types.js";
import { loadSettings, type Settings } from "../../shared/config/settings.js";
import { EstimateError, type EstimateErrorCode } from "../../shared/errors/estimateErrors.js";
import { createLoggerFacade } from "../../shared/logging/logger.js";
import { createEstimateContainer, type EstimateCradle } from "./di/container.js";
import { estimatesPlugin } from "./plugins/estimates.plugin.js";
import { servicesPlugin } from "./plugins/services.plugin.js";

export interface EstimateServiceOptions {
  readonly basePath?: string;
  readonly settings?: Settings;
  readonly schemaRegistry?: SchemaRegistry;
  readonly sessionFactory?: SessionFactory;
  readonly mockSessionFactory?: SessionFactory;
  readonly sowMapper?: SowMapper | null;
}

const STATUS_BY_CODE: Record<EstimateErrorCode, number> = {
  invalid_document: 400,
  validation_failed: 400,
  schema_not_found: 404,
  unsupported_service_type: 422,
  mapping_failed: 502,
  automation_failed: 502,
  mapper_unavailable: 503,
  session_fatal: 503,
  cancelled: 503,
  schema_source_invalid: 500
};

const serviceLogger = createLoggerFacade("estimate-service");

export function statusForError(error: EstimateError): number {
  return STATUS_BY_CODE[error.code];
}

export async function createEstimateService(options: EstimateServiceOptions = {}): Promise<{
  app: FastifyInstance;
  container: AwilixContainer<EstimateCradle>;
}> {
  const settings = options.settings ?? loadSettings();
  const basePath = options.basePath ?? settings.service.basePath;
  const schemaRegistry =
    options.schemaRegistry ?? (await loadSchemaRegistry({ filePath: settings.schemasPath }));

  const container = createEstimateContainer({
    settings,
    schemaRegistry,
    ...(options.sessionFactory ? { sessionFactory: options.sessionFactory } : {}),
    ...(options.mockSessionFactory ? { mockSessionFactory: options.mockSessionFactory } : {}),
    ...(options.sowMapper !== undefined ? { sowMapper: options.sowMapper } : {})
  });
  const { estimatePipeline, configuratorRegistry, runLimiter, mockSessionFactory } = container.cradle;

  const app = fastify({ logger: false });

  app.setErrorHandler((error: FastifyError | EstimateError, _request, reply) => {
    if (error instanceof EstimateError) {
      const statusCode = statusForError(error);
      if (statusCode >= 500) {
        serviceLogger.error("估算请求失败", error, { code: error.code });
      }
      void reply.code(statusCode).send({ error: { code: error.code, message: error.message } });
      return;
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      serviceLogger.error("未处理的服务端错误", error);
    }
    // 请求体无法解析为 JSON 等 4xx 统一视为文档无效
    const code = statusCode === 400 ? "invalid_document" : statusCode >= 500 ? "internal_error" : error.code;
    void reply.code(statusCode).send({ error: { code, message: error.message } });
  });

  app.get("/health", async () => ({
    status: "ok",
    services: schemaRegistry.list().length,
    automated: configuratorRegistry.size,
    timestamp: new Date().toISOString()
  }));

  await app.register(servicesPlugin, { basePath, registry: schemaRegistry, configurators: configuratorRegistry });
  await app.register(estimatesPlugin, {
    basePath,
    pipeline: estimatePipeline,
    limiter: runLimiter,
    mockSessionFactory,
    defaultHeadless: settings.browser.headless
  });

  app.addHook("onClose", async () => {
    runLimiter.clearQueue();
    await container.dispose();
  });

  return { app, container };
}
