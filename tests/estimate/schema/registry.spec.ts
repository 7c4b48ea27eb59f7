import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  BUNDLED_SCHEMAS_PATH,
  SchemaRegistry,
  loadSchemaRegistry,
  resolveSchemasPath
} from "../../../src/estimate/schema/registry.js";
import { SchemaSourceError } from "../../../src/shared/errors/estimateErrors.js";

const minimalService = {
  type: "widget",
  displayName: "Widget",
  aliases: ["gadget"],
  fields: [
    { name: "count", kind: "number", required: true, min: 0, integer: true },
    { name: "tier", kind: "enum", values: ["basic", "pro"], default: "basic" }
  ]
};

function expectSourceError(raw: unknown, fragment: string): void {
  let caught: unknown;
  try {
    SchemaRegistry.fromDocument(raw, "inline.json");
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(SchemaSourceError);
  expect(caught instanceof SchemaSourceError && caught.code).toBe("schema_source_invalid");
  expect(caught instanceof Error ? caught.message : "").toContain(fragment);
}

describe("SchemaRegistry", () => {
  it("loads the bundled schema file", async () => {
    const registry = await SchemaRegistry.fromFile(BUNDLED_SCHEMAS_PATH);
    expect(registry.list().map((schema) => schema.serviceType)).toEqual([
      "s3",
      "ecs_fargate",
      "alb",
      "lambda",
      "sqs",
      "ec2",
      "api_gateway",
      "cloudwatch",
      "bedrock",
      "kms",
      "iam",
      "shield",
      "waf",
      "vpc",
      "opensearch"
    ]);
    expect(registry.resolveAlias("fargate")).toBe("ecs_fargate");
    expect(registry.resolveAlias("firewall")).toBe("waf");
    expect(registry.resolveAlias("network")).toBe("vpc");
    expect(registry.resolveAlias("nope")).toBeNull();
  });

  it("normalizes field defaults and freezes schemas", () => {
    const registry = SchemaRegistry.fromDocument({ services: [minimalService] });
    const schema = registry.getSchema("widget");
    expect(schema?.fields).toEqual([
      { name: "count", kind: "number", required: true, default: null, min: 0, integer: true },
      { name: "tier", kind: "enum", required: false, default: "basic", values: ["basic", "pro"] }
    ]);
    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema?.fields[0])).toBe(true);
    expect(registry.getSchema("missing")).toBeNull();
    expect(registry.has("widget")).toBe(true);
  });

  it("rejects enum fields without values", () => {
    expectSourceError(
      { services: [{ ...minimalService, fields: [{ name: "tier", kind: "enum" }] }] },
      "枚举字段 tier 必须声明 values"
    );
  });

  it("rejects unknown field kinds", () => {
    expectSourceError(
      { services: [{ ...minimalService, fields: [{ name: "count", kind: "integer" }] }] },
      "[services.0.fields.0.kind]"
    );
  });

  it("rejects defaults outside the declared range", () => {
    expectSourceError(
      { services: [{ ...minimalService, fields: [{ name: "count", kind: "number", min: 1, default: 0 }] }] },
      "字段 count 的默认值超出取值范围"
    );
  });

  it("rejects duplicate field names", () => {
    expectSourceError(
      {
        services: [
          {
            ...minimalService,
            fields: [
              { name: "count", kind: "number" },
              { name: "count", kind: "string" }
            ]
          }
        ]
      },
      "服务 widget 中字段 count 重复"
    );
  });

  it("rejects duplicate service types and shared aliases", () => {
    expectSourceError({ services: [minimalService, minimalService] }, "服务类型 widget 重复声明");
    expectSourceError(
      { services: [minimalService, { ...minimalService, type: "other" }] },
      "别名 gadget 同时属于 widget 与 other"
    );
  });

  it("rejects unknown keys on field declarations", () => {
    expectSourceError(
      { services: [{ ...minimalService, fields: [{ name: "count", kind: "number", unit: "GB" }] }] },
      "inline.json"
    );
  });

  describe("fromFile", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "schema-registry-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("reports a missing file", async () => {
      const filePath = join(dir, "absent.json");
      await expect(SchemaRegistry.fromFile(filePath)).rejects.toThrow(`服务 Schema 文件 ${filePath} 无效：文件不存在`);
    });

    it("reports malformed JSON", async () => {
      const filePath = join(dir, "broken.json");
      await writeFile(filePath, "{ services: ", "utf-8");
      await expect(SchemaRegistry.fromFile(filePath)).rejects.toThrow("JSON 解析失败");
    });

    it("caches by resolved path until reload is requested", async () => {
      const filePath = join(dir, "schemas.json");
      await writeFile(filePath, JSON.stringify({ services: [minimalService] }), "utf-8");
      const first = await loadSchemaRegistry({ filePath });
      const second = await loadSchemaRegistry({ filePath });
      const reloaded = await loadSchemaRegistry({ filePath, reload: true });
      expect(second).toBe(first);
      expect(reloaded).not.toBe(first);
      expect(reloaded.source).toBe(filePath);
    });
  });

  describe("resolveSchemasPath", () => {
    const original = process.env.SERVICE_SCHEMAS_PATH;

    afterEach(() => {
      if (original === undefined) {
        delete process.env.SERVICE_SCHEMAS_PATH;
      } else {
        process.env.SERVICE_SCHEMAS_PATH = original;
      }
    });

    it("prefers the explicit path, then the environment, then the bundled file", () => {
      delete process.env.SERVICE_SCHEMAS_PATH;
      expect(resolveSchemasPath("/tmp/explicit.json")).toBe("/tmp/explicit.json");
      expect(resolveSchemasPath()).toBe(BUNDLED_SCHEMAS_PATH);
      process.env.SERVICE_SCHEMAS_PATH = "/tmp/from-env.json";
      expect(resolveSchemasPath()).toBe("/tmp/from-env.json");
    });
  });
});
