import { Writable } from "node:stream";

import pino from "pino";
import { describe, expect, it } from "vitest";

import { wrapLogger } from "../../../src/shared/logging/logger.js";

function captureLogger() {
  const lines: Record<string, unknown>[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const parsed: unknown = JSON.parse(chunk.toString());
      if (typeof parsed === "object" && parsed !== null) {
        lines.push({ ...parsed });
      }
      callback();
    }
  });
  const facade = wrapLogger(pino({ level: "debug", base: null, timestamp: false }, stream));
  return { facade, lines };
}

describe("logging facade", () => {
  it("writes message and context as one JSON line", () => {
    const { facade, lines } = captureLogger();
    facade.info("条目已加入估算", { serviceType: "s3", position: 1 });
    expect(lines).toEqual([{ level: 30, msg: "条目已加入估算", serviceType: "s3", position: 1 }]);
  });

  it("serializes errors with name, message and code", () => {
    const { facade, lines } = captureLogger();
    const error = Object.assign(new Error("浏览器已退出"), { code: "session_fatal" });
    facade.error("会话失效", error, { runId: "run-1" });

    const [line] = lines;
    expect(line?.msg).toBe("会话失效");
    expect(line?.runId).toBe("run-1");
    expect(line?.error).toMatchObject({ name: "Error", message: "浏览器已退出", code: "session_fatal" });
  });

  it("carries child context into every line", () => {
    const { facade, lines } = captureLogger();
    const child = facade.child({ runId: "run-2" }).child({ position: 3 });
    child.warn("定位服务失败");
    child.debug("关键字未命中", { term: "S3" });
    expect(lines).toEqual([
      { level: 40, msg: "定位服务失败", runId: "run-2", position: 3 },
      { level: 20, msg: "关键字未命中", runId: "run-2", position: 3, term: "S3" }
    ]);
  });
});
