import { beforeAll, describe, expect, it } from "vitest";

import {
  normalizeServiceName,
  serviceNameCandidates,
  slugifyServiceName
} from "../../../src/estimate/input/serviceNames.js";
import type { SchemaRegistry } from "../../../src/estimate/schema/registry.js";
import { loadBundledRegistry } from "../../support/registry.js";

describe("service name normalization", () => {
  let registry: SchemaRegistry;

  beforeAll(async () => {
    registry = await loadBundledRegistry();
  });

  it("slugifies free text", () => {
    expect(slugifyServiceName("  Amazon API-Gateway (REST) ")).toBe("amazon_api_gateway_rest");
  });

  it("orders candidates by stripped body, raw body, then parenthetical text", () => {
    expect(serviceNameCandidates("Amazon Simple Storage Service (S3)")).toEqual([
      "simple_storage",
      "amazon_simple_storage_service",
      "s3"
    ]);
  });

  it.each([
    ["Amazon S3", "s3"],
    ["Amazon Simple Storage Service (S3)", "s3"],
    ["AWS Lambda Functions", "lambda"],
    ["Application Load Balancer", "alb"],
    ["Amazon ECS on Fargate", "ecs_fargate"],
    ["Nightly Lambda job", "lambda"],
    ["Amazon S3 archive", "s3"],
    ["AWS WAF", "waf"],
    ["AWS Shield", "shield"],
    ["Amazon VPC", "vpc"],
    ["Amazon OpenSearch Service", "opensearch"],
    ["AWS IAM Access Analyzer", "iam"],
    ["firewall", "waf"]
  ])("maps %s to %s", (name, expected) => {
    expect(normalizeServiceName(name, registry)).toBe(expected);
  });

  it("keeps ambiguous names unresolved", () => {
    expect(normalizeServiceName("Lambda queue worker", registry)).toBe("lambda_queue_worker");
  });

  it("returns the cleaned name for unknown services", () => {
    expect(normalizeServiceName("Quantum Ledger Database", registry)).toBe("quantum_ledger_database");
  });
});
