import { beforeEach, describe, expect, it, vi } from "vitest";

const launch = vi.hoisted(() => vi.fn());

vi.mock("playwright-core", () => ({ chromium: { launch } }));

import { PlaywrightSessionFactory } from "../../../src/estimate/session/playwrightSession.js";
import { SessionFatalError } from "../../../src/shared/errors/estimateErrors.js";
import { silentLogger } from "../../support/logger.js";

describe("PlaywrightSessionFactory", () => {
  beforeEach(() => {
    launch.mockReset();
  });

  function createFactory() {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, "warn");
    const factory = new PlaywrightSessionFactory({ calculatorUrl: "https://calculator.aws/#/", logger });
    return { factory, warn };
  }

  it("wraps launch failures as session-fatal", async () => {
    launch.mockRejectedValue(new Error("no chromium"));
    const { factory } = createFactory();

    const attempt = factory.open({ headless: true });
    await expect(attempt).rejects.toBeInstanceOf(SessionFatalError);
    await expect(attempt).rejects.toThrow("无法启动浏览器：no chromium");
  });

  it("keeps the open error when closing the browser also fails", async () => {
    const browser = {
      newPage: vi.fn().mockRejectedValue(new Error("page crashed")),
      close: vi.fn().mockRejectedValue(new Error("browser already gone"))
    };
    launch.mockResolvedValue(browser);
    const { factory, warn } = createFactory();

    await expect(factory.open({ headless: true })).rejects.toThrow(
      new SessionFatalError("无法打开计价器：page crashed")
    );
    expect(browser.close).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("打开失败后关闭浏览器出错", { error: "browser already gone" });
  });

  it("does not launch when the run is already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const { factory } = createFactory();

    await expect(factory.open({ headless: true, signal: controller.signal })).rejects.toThrow();
    expect(launch).not.toHaveBeenCalled();
  });
});
