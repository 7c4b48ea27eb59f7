import { describe, expect, it } from "vitest";

import type { FinalizationSummary, ItemOutcome } from "../../../src/estimate/orchestrator/types.js";
import {
  aggregateReport,
  aggregateWithoutSession,
  describeReport
} from "../../../src/estimate/report/aggregator.js";

const shared: FinalizationSummary = {
  attempted: true,
  succeeded: true,
  shareableUrl: "https://calculator.aws/#/estimate?id=abc123"
};

const ok = (position: number, serviceType: string, instance = 1): ItemOutcome => ({
  position,
  instance,
  serviceType,
  status: "succeeded"
});

const failed = (position: number, serviceType: string): ItemOutcome => ({
  position,
  instance: 1,
  serviceType,
  status: "automation-failed",
  error: { code: "automation_failed", message: "未能定位" }
});

describe("aggregateReport", () => {
  it("marks a fully successful run complete", () => {
    const report = aggregateReport({
      outcomes: [ok(2, "sqs"), ok(1, "s3")],
      finalization: shared,
      projectName: "Demo"
    });
    expect(report.status).toBe("complete");
    expect(report.projectName).toBe("Demo");
    expect(report.shareableUrl).toBe("https://calculator.aws/#/estimate?id=abc123");
    expect(report.outcomes.map((outcome) => outcome.position)).toEqual([1, 2]);
    expect(report.totals).toEqual({ succeeded: 2, failed: 0, total: 2 });
  });

  it("tallies per service with failed positions", () => {
    const report = aggregateReport({
      outcomes: [ok(1, "s3"), failed(2, "s3"), ok(3, "s3", 3), failed(4, "lambda")],
      finalization: shared
    });
    expect(report.status).toBe("partial");
    expect(report.services).toEqual([
      { serviceType: "s3", succeeded: 2, total: 3, failedPositions: [2] },
      { serviceType: "lambda", succeeded: 0, total: 1, failedPositions: [4] }
    ]);
    expect(describeReport(report)).toBe(`已加入 2/4 个服务；分享链接：${shared.shareableUrl}`);
  });

  it("withholds the link when nothing succeeded", () => {
    const report = aggregateReport({ outcomes: [failed(1, "s3")], finalization: shared });
    expect(report.shareableUrl).toBeNull();
    expect(report.status).toBe("partial");
  });

  it("reports failed when the session died", () => {
    const report = aggregateReport({
      outcomes: [ok(1, "s3"), failed(2, "lambda")],
      finalization: { attempted: false, succeeded: false, shareableUrl: null },
      fatal: { code: "session_fatal", message: "浏览器已退出" }
    });
    expect(report.status).toBe("failed");
    expect(describeReport(report)).toBe("已加入 1/2 个服务；会话中途失效：浏览器已退出；未生成分享链接");
  });

  it("builds a report without a session", () => {
    const rejected: ItemOutcome = {
      position: 1,
      instance: 1,
      serviceType: "kms",
      status: "validation-failed",
      error: { code: "validation_failed", message: "缺少必填字段 customer_managed_keys" }
    };
    const report = aggregateWithoutSession([rejected], "Empty");
    expect(report.finalization).toEqual({ attempted: false, succeeded: false, shareableUrl: null });
    expect(report.shareableUrl).toBeNull();
    expect(report.status).toBe("partial");
    expect(describeReport(report)).toBe("已加入 0/1 个服务；1 个服务未通过校验或不支持自动化；未生成分享链接");
  });
});
