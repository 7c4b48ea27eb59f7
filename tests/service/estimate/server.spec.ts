import type { FastifyInstance } from "fastify";
import { afterEach, beforeAll, describe, expect, it } from "vitest";

import type { SchemaRegistry } from "../../../src/estimate/schema/registry.js";
import { MockSessionFactory } from "../../../src/estimate/session/mockSession.js";
import { createEstimateService, statusForError } from "../../../src/service/estimate/server.js";
import { loadSettings } from "../../../src/shared/config/settings.js";
import { MapperUnavailableError, SessionFatalError } from "../../../src/shared/errors/estimateErrors.js";
import { loadBundledRegistry } from "../../support/registry.js";

describe("estimate service", () => {
  let schemaRegistry: SchemaRegistry;
  let app: FastifyInstance | undefined;

  beforeAll(async () => {
    schemaRegistry = await loadBundledRegistry();
  });

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  async function start(
    sessionFactory = new MockSessionFactory(),
    mockSessionFactory = new MockSessionFactory()
  ): Promise<FastifyInstance> {
    const service = await createEstimateService({
      settings: loadSettings({}),
      schemaRegistry,
      sessionFactory,
      mockSessionFactory,
      sowMapper: null
    });
    app = service.app;
    return service.app;
  }

  it("reports health with catalogue sizes", async () => {
    const server = await start();
    const response = await server.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: "ok", services: 15, automated: 8 });
  });

  it("lists services with their automation flag", async () => {
    const server = await start();
    const response = await server.inject({ method: "GET", url: "/api/v1/services" });
    const body = response.json<{ total: number; services: Array<{ serviceType: string; automated: boolean }> }>();

    expect(body.total).toBe(15);
    expect(body.services[0]).toMatchObject({
      serviceType: "s3",
      displayName: "Amazon Simple Storage Service (S3)",
      automated: true
    });
    expect(body.services.find((service) => service.serviceType === "kms")?.automated).toBe(false);
  });

  it("resolves service details by type or alias", async () => {
    const server = await start();
    const byAlias = await server.inject({ method: "GET", url: "/api/v1/services/fargate" });

    expect(byAlias.statusCode).toBe(200);
    const body = byAlias.json<{ serviceType: string; fields: Array<{ name: string }> }>();
    expect(body.serviceType).toBe("ecs_fargate");
    expect(body.fields.length).toBeGreaterThan(0);

    const missing = await server.inject({ method: "GET", url: "/api/v1/services/dynamodb" });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({
      error: { code: "service_not_found", message: "未找到服务类型 dynamodb" }
    });
  });

  it("runs an estimate and returns the share link", async () => {
    const sessions = new MockSessionFactory();
    const server = await start(sessions);
    const response = await server.inject({
      method: "POST",
      url: "/api/v1/estimates",
      payload: { project_name: "Portal", services: { s3: [{ storage_gb: 100 }] } }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      status: "complete",
      shareableUrl: "https://calculator.aws/#/estimate?id=mock-session-1",
      message: "已加入 1/1 个服务；分享链接：https://calculator.aws/#/estimate?id=mock-session-1",
      report: { projectName: "Portal", totals: { succeeded: 1, failed: 0, total: 1 } }
    });
    expect(sessions.sessions).toHaveLength(1);
  });

  it("validates without opening a session", async () => {
    const sessions = new MockSessionFactory();
    const server = await start(sessions);
    const response = await server.inject({
      method: "POST",
      url: "/api/v1/estimates",
      payload: { validate_only: true, services: { s3: [{ storage_gb: 100 }, { storage_gb: -1 }] } }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      status: "validated",
      message: "校验通过 1/2",
      shareableUrl: null,
      report: null,
      validation: { valid: 1, total: 2 }
    });
    expect(sessions.sessions).toHaveLength(0);
  });

  it("routes use_mock_session runs to the mock factory", async () => {
    const real = new MockSessionFactory();
    const mock = new MockSessionFactory();
    const server = await start(real, mock);
    const response = await server.inject({
      method: "POST",
      url: "/api/v1/estimates",
      payload: { use_mock_session: true, services: { lambda: [{ number_of_requests: 1000, duration_ms: 100 }] } }
    });

    expect(response.statusCode).toBe(200);
    expect(real.sessions).toHaveLength(0);
    expect(mock.sessions).toHaveLength(1);
  });

  it("rejects bodies that are not documents", async () => {
    const server = await start();
    const notObject = await server.inject({ method: "POST", url: "/api/v1/estimates", payload: [1, 2] });
    expect(notObject.statusCode).toBe(400);
    expect(notObject.json()).toEqual({
      error: { code: "invalid_document", message: "输入文档无效：请求体必须是 JSON 对象" }
    });

    const malformed = await server.inject({
      method: "POST",
      url: "/api/v1/estimates",
      headers: { "content-type": "application/json" },
      payload: "{ services:"
    });
    expect(malformed.statusCode).toBe(400);
    expect(malformed.json<{ error: { code: string } }>().error.code).toBe("invalid_document");
  });

  it("answers 503 when the mapper or the session is unavailable", async () => {
    const server = await start(new MockSessionFactory({ openError: new Error("no browser") }));

    const sow = await server.inject({
      method: "POST",
      url: "/api/v1/estimates",
      payload: { estimate: [{ service_name: "Amazon S3" }] }
    });
    expect(sow.statusCode).toBe(503);
    expect(sow.json<{ error: { code: string } }>().error.code).toBe("mapper_unavailable");

    const fatal = await server.inject({
      method: "POST",
      url: "/api/v1/estimates",
      payload: { services: { s3: [{ storage_gb: 1 }] } }
    });
    expect(fatal.statusCode).toBe(503);
    expect(fatal.json()).toEqual({
      error: { code: "session_fatal", message: "无法打开计价器会话：no browser" }
    });
  });

  it("maps error codes to HTTP statuses", () => {
    expect(statusForError(new MapperUnavailableError())).toBe(503);
    expect(statusForError(new SessionFatalError("gone"))).toBe(503);
  });
});
