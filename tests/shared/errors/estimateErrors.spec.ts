import { describe, expect, it } from "vitest";

import {
  AutomationError,
  ConfigValidationError,
  EstimateError,
  SessionFatalError,
  toErrorMessage
} from "../../../src/shared/errors/estimateErrors.js";

describe("estimate errors", () => {
  it("keeps the subclass prototype and a stable code", () => {
    const error = new SessionFatalError("浏览器已退出");
    expect(error).toBeInstanceOf(EstimateError);
    expect(error).toBeInstanceOf(SessionFatalError);
    expect(error.name).toBe("SessionFatalError");
    expect(error.toJSON()).toEqual({ code: "session_fatal", message: "浏览器已退出" });
  });

  it("summarizes every validation issue in the message", () => {
    const error = new ConfigValidationError("s3", [
      { field: "storage_gb", code: "missing_required", message: "缺少必填字段 storage_gb" },
      { field: "bogus", code: "unknown_field", message: "未知字段 bogus" }
    ]);
    expect(error.message).toBe("服务 s3 配置校验失败：缺少必填字段 storage_gb; 未知字段 bogus");
    expect(error.details).toEqual({ serviceType: "s3", issues: error.issues });
  });

  it("records the automation stage in details", () => {
    const cause = new Error("timeout");
    const error = new AutomationError("locate", "未能定位", { details: { tried: ["S3"] }, cause });
    expect(error.details).toEqual({ stage: "locate", tried: ["S3"] });
    expect(error.cause).toBe(cause);
    expect(error.code).toBe("automation_failed");
    expect(error.toJSON()).toEqual({
      code: "automation_failed",
      message: "未能定位",
      details: { stage: "locate", tried: ["S3"] }
    });
  });

  it("formats unknown thrown values", () => {
    expect(toErrorMessage(new Error("x"))).toBe("x");
    expect(toErrorMessage(42)).toBe("42");
  });
});
