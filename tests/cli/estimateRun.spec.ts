import { access, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";

import { EXIT_CODES, resolveExitCode, runEstimateFromFile } from "../../src/cli/runtime/estimateRun.js";
import { createDefaultConfigurators } from "../../src/estimate/configurators/defaults.js";
import { EstimatePipeline } from "../../src/estimate/pipeline.js";
import type { SchemaRegistry } from "../../src/estimate/schema/registry.js";
import { MockSessionFactory, type MockSessionFactoryOptions } from "../../src/estimate/session/mockSession.js";
import { InputDocumentError } from "../../src/shared/errors/estimateErrors.js";
import { silentLogger } from "../support/logger.js";
import { loadBundledRegistry } from "../support/registry.js";

const SHARE_URL = "https://calculator.aws/#/estimate?id=mock-session-1";

describe("estimate:build runtime", () => {
  let schemaRegistry: SchemaRegistry;
  let dir: string;

  beforeAll(async () => {
    schemaRegistry = await loadBundledRegistry();
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "estimate-cli-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function pipeline(options: MockSessionFactoryOptions = {}) {
    return new EstimatePipeline({
      schemaRegistry,
      configuratorRegistry: createDefaultConfigurators({ locateRetries: 0, applyRetries: 0, retryBaseDelayMs: 0 }),
      sessionFactory: new MockSessionFactory(options),
      logger: silentLogger()
    });
  }

  async function run(document: unknown, extra: { validateOnly?: boolean; factory?: MockSessionFactoryOptions } = {}) {
    const inputPath = join(dir, "input.json");
    const outputPath = join(dir, "estimate_url.txt");
    const reportPath = join(dir, "report.json");
    await writeFile(inputPath, JSON.stringify(document), "utf-8");
    const lines: string[] = [];
    const output = await runEstimateFromFile({
      inputPath,
      outputPath,
      reportPath,
      pipeline: pipeline(extra.factory),
      validateOnly: extra.validateOnly ?? false,
      headless: true,
      log: (line) => lines.push(line)
    });
    return { ...output, lines, outputPath, reportPath };
  }

  it("writes the share link and exits with 0", async () => {
    const { exitCode, lines, outputPath, reportPath } = await run({ services: { s3: [{ storage_gb: 100 }] } });

    expect(exitCode).toBe(EXIT_CODES.success);
    expect(await readFile(outputPath, "utf-8")).toBe(SHARE_URL);
    expect(lines).toEqual([
      "[1/1] ✓ s3#1",
      `已加入 1/1 个服务；分享链接：${SHARE_URL}`,
      "  s3: 1/1",
      `分享链接已写入 ${outputPath}`
    ]);
    const report: unknown = JSON.parse(await readFile(reportPath, "utf-8"));
    expect(report).toMatchObject({ kind: "estimate", report: { status: "complete", shareableUrl: SHARE_URL } });
  });

  it("exits with 2 on partial success", async () => {
    const { exitCode, lines } = await run({ services: { s3: [{ storage_gb: 100 }], kms: [{ customer_managed_keys: 2 }] } });
    expect(exitCode).toBe(EXIT_CODES.partial);
    expect(lines[1]).toBe("[2/2] ✗ kms#1 unsupported_service_type: 服务类型 kms 暂不支持自动化配置");
  });

  it("exits with 3 for validation-only runs and writes no link", async () => {
    const { exitCode, lines, outputPath } = await run(
      { services: { s3: [{ storage_gb: 100 }, {}] } },
      { validateOnly: true }
    );
    expect(exitCode).toBe(EXIT_CODES.validationOnly);
    expect(lines).toEqual([
      "校验通过 1/2，可自动化 1",
      "  #2 s3: 服务 s3 配置校验失败：缺少必填字段 storage_gb"
    ]);
    await expect(access(outputPath)).rejects.toThrow();
  });

  it("exits with 4 when the session dies or cannot open", async () => {
    const crashed = await run({ services: { s3: [{ storage_gb: 100 }] } }, { factory: { script: { crashOnSearch: 1 } } });
    expect(crashed.exitCode).toBe(EXIT_CODES.fatal);
    expect(crashed.result.kind === "estimate" && crashed.result.report.status).toBe("failed");

    const unopened = await run({ services: { s3: [{ storage_gb: 100 }] } }, { factory: { openError: new Error("no browser") } });
    expect(unopened.exitCode).toBe(EXIT_CODES.fatal);
    expect(unopened.lines.at(-1)).toBe("会话无法打开：无法打开计价器会话：no browser");
  });

  it("rejects unreadable input", async () => {
    const inputPath = join(dir, "broken.json");
    await writeFile(inputPath, "{ services:", "utf-8");
    const attempt = runEstimateFromFile({
      inputPath,
      outputPath: join(dir, "out.txt"),
      pipeline: pipeline(),
      log: () => undefined
    });
    await expect(attempt).rejects.toBeInstanceOf(InputDocumentError);
  });

  it("maps report statuses to exit codes", () => {
    const validation = { items: [], valid: 0, automatable: 0, total: 0 };
    expect(resolveExitCode({ kind: "validation-only", validation })).toBe(3);
  });
});
