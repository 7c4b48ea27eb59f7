import { beforeAll, describe, expect, it } from "vitest";

import type { SchemaRegistry } from "../../../src/estimate/schema/registry.js";
import type { FieldSchema, FieldValue } from "../../../src/estimate/schema/types.js";
import { validateServiceRequest } from "../../../src/estimate/schema/validator.js";
import { ConfigValidationError, SchemaNotFoundError } from "../../../src/shared/errors/estimateErrors.js";
import { loadBundledRegistry } from "../../support/registry.js";

function sampleValue(field: FieldSchema): FieldValue {
  switch (field.kind) {
    case "number":
      return field.min ?? 1;
    case "boolean":
      return true;
    case "string":
      return "sample";
    case "enum":
      return field.values?.[0] ?? "";
  }
}

describe("validateServiceRequest", () => {
  let registry: SchemaRegistry;

  beforeAll(async () => {
    registry = await loadBundledRegistry();
  });

  it("coerces numeric text and fills non-null defaults", () => {
    const result = validateServiceRequest({ serviceType: "s3", fields: { storage_gb: "500" } }, registry);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.config).toEqual({ serviceType: "s3", values: { region: "us-east-1", storage_gb: 500 } });
    expect(Object.isFrozen(result.config.values)).toBe(true);
  });

  it("records unknown fields alongside other issues", () => {
    const result = validateServiceRequest(
      { serviceType: "s3", fields: { storage_gb: 10, bogus_field: 1 } },
      registry
    );
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ConfigValidationError);
    expect(result.error.code).toBe("validation_failed");
    const issues = result.error instanceof ConfigValidationError ? result.error.issues : [];
    expect(issues.map((issue) => [issue.field, issue.code])).toEqual([["bogus_field", "unknown_field"]]);
  });

  it("collects every problem in one pass", () => {
    const result = validateServiceRequest(
      {
        serviceType: "lambda",
        fields: { architecture: "mips", number_of_requests: 1.5, duration_ms: 0 }
      },
      registry
    );
    expect(result.ok).toBe(false);
    if (result.ok || !(result.error instanceof ConfigValidationError)) return;
    expect(result.error.issues.map((issue) => [issue.field, issue.code])).toEqual([
      ["architecture", "not_in_enum"],
      ["number_of_requests", "not_integer"],
      ["duration_ms", "out_of_range"]
    ]);
    expect(result.error.issues[0]?.allowed).toEqual(["x86", "arm"]);
  });

  it("matches enum values case-insensitively and returns the canonical value", () => {
    const result = validateServiceRequest(
      { serviceType: "ecs_fargate", fields: { operating_system: "Windows", number_of_tasks: 2, average_duration_minutes: 60, memory_gb: 2 } },
      registry
    );
    expect(result.ok && result.config.values.operating_system).toBe("windows");
  });

  it("treats null as omitted and reports missing required fields", () => {
    const result = validateServiceRequest({ serviceType: "s3", fields: { storage_gb: null } }, registry);
    expect(result.ok).toBe(false);
    if (result.ok || !(result.error instanceof ConfigValidationError)) return;
    expect(result.error.issues).toEqual([
      { field: "storage_gb", code: "missing_required", message: "缺少必填字段 storage_gb", expected: "number" }
    ]);
  });

  it("rejects numbers carrying units", () => {
    const result = validateServiceRequest({ serviceType: "s3", fields: { storage_gb: "500 GB" } }, registry);
    expect(result.ok).toBe(false);
    if (result.ok || !(result.error instanceof ConfigValidationError)) return;
    expect(result.error.issues[0]?.code).toBe("invalid_kind");
    expect(result.error.issues[0]?.message).toBe('字段 storage_gb 需要 number，实际为 "500 GB"');
  });

  it("coerces boolean and string kinds", () => {
    const result = validateServiceRequest(
      { serviceType: "ec2", fields: { number_of_instances: "3", enable_monitoring: "TRUE", description: 42 } },
      registry
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.config.values).toEqual({
      description: "42",
      region: "us-east-1",
      operating_system: "linux",
      number_of_instances: 3,
      enable_monitoring: true
    });
  });

  it("returns schema_not_found for unknown service types", () => {
    const result = validateServiceRequest({ serviceType: "quantum_ledger", fields: {} }, registry);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SchemaNotFoundError);
    expect(result.error.code).toBe("schema_not_found");
  });

  it("does not mutate the request", () => {
    const fields = { storage_gb: "12" };
    validateServiceRequest({ serviceType: "s3", fields }, registry);
    expect(fields).toEqual({ storage_gb: "12" });
  });

  it("accepts a request with only the required fields for every bundled schema", () => {
    for (const schema of registry.list()) {
      const fields = Object.fromEntries(
        schema.fields.filter((field) => field.required).map((field) => [field.name, sampleValue(field)])
      );
      const result = validateServiceRequest({ serviceType: schema.serviceType, fields }, registry);
      expect(result.ok, schema.serviceType).toBe(true);
    }
  });

  it("returns the same result when validating twice", () => {
    const request = { serviceType: "lambda", fields: { number_of_requests: "1000", duration_ms: 100 } };
    const first = validateServiceRequest(request, registry);
    const second = validateServiceRequest(request, registry);
    expect(second).toEqual(first);
    expect(first.ok).toBe(true);
  });
});
