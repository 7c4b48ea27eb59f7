import type { FastifyPluginAsync } from "fastify";
import type { LimitFunction } from "p-limit";

import type { EstimatePipeline } from "../../../estimate/pipeline.js";
import { describeReport } from "../../../estimate/report/aggregator.js";
import type { SessionFactory } from "../../../estimate/session/types.js";
import { InputDocumentError } from "../../../shared/errors/estimateErrors.js";
import { createLoggerFacade } from "../../../shared/logging/logger.js";
import { EstimateRequestOptionsSchema } from "../../../shared/schemas/estimateInput.js";

interface EstimatesPluginOptions {
  basePath: string;
  pipeline: EstimatePipeline;
  limiter: LimitFunction;
  mockSessionFactory: SessionFactory;
  defaultHeadless: boolean;
}

const logger = createLoggerFacade("estimates-route");

export const estimatesPlugin: FastifyPluginAsync<EstimatesPluginOptions> = async (app, options) => {
  const { pipeline, limiter } = options;

  // POST /api/v1/estimates - 提交文档并运行估算
  app.post<{ Body: unknown }>(`${options.basePath}/estimates`, async (request) => {
    const body: unknown = request.body;
    if (typeof body !== "object" || body === null || Array.isArray(body)) {
      throw new InputDocumentError("请求体必须是 JSON 对象");
    }
    const parsed = EstimateRequestOptionsSchema.safeParse(body);
    if (!parsed.success) {
      throw new InputDocumentError(parsed.error);
    }
    const { validate_only, headless, use_mock_session, ...document } = parsed.data;

    if (limiter.pendingCount > 0 || limiter.activeCount >= limiter.concurrency) {
      logger.info("估算请求排队等待", { pending: limiter.pendingCount + 1 });
    }
    const result = await limiter(() =>
      pipeline.run(document, {
        validateOnly: validate_only ?? false,
        headless: headless ?? options.defaultHeadless,
        ...(use_mock_session ? { sessionFactory: options.mockSessionFactory } : {})
      })
    );
    const timestamp = new Date().toISOString();

    switch (result.kind) {
      case "session-fatal":
        throw result.error;
      case "validation-only":
        return {
          status: "validated",
          message: `校验通过 ${result.validation.valid}/${result.validation.total}`,
          shareableUrl: null,
          report: null,
          validation: result.validation,
          timestamp
        };
      case "estimate":
        return {
          status: result.report.status,
          message: describeReport(result.report),
          shareableUrl: result.report.shareableUrl,
          report: result.report,
          validation: result.validation,
          timestamp
        };
    }
  });
};
