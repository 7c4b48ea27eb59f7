import { randomUUID } from "node:crypto";

import { chromium, type Browser, type Locator, type Page } from "playwright-core";

import { SessionFatalError, toErrorMessage } from "../../shared/errors/estimateErrors.js";
import { joinArtifactsPath } from "../../shared/environment/pathResolver.js";
import { createLoggerFacade, type LoggerFacade } from "../../shared/logging/logger.js";
import type { CalculatorSession, FieldTarget, SessionFactory, SessionOpenOptions } from "./types.js";

const SEARCH_INPUT = "input[placeholder='Search for a service']";
const SAVE_BUTTON = "button[aria-label='Save and add service']";
const PUBLIC_LINK_INPUT = "input[aria-label='Copy public link']";

const NAVIGATION_TIMEOUT_MS = 60_000;
const ACTION_TIMEOUT_MS = 15_000;
const SEARCH_SETTLE_MS = 1_000;

export interface PlaywrightSessionFactoryOptions {
  readonly calculatorUrl: string;
  readonly executablePath?: string;
  readonly channel?: string;
  readonly logger?: LoggerFacade;
}

/**
 * 基于 playwright-core 驱动公开计价器页面。不下载浏览器：
 * 需通过 BROWSER_EXECUTABLE_PATH 或 BROWSER_CHANNEL 指向本机已安装的 Chromium/Chrome。
 */
export class PlaywrightSessionFactory implements SessionFactory {
  private readonly logger: LoggerFacade;

  constructor(private readonly options: PlaywrightSessionFactoryOptions) {
    this.logger = options.logger ?? createLoggerFacade("calculator-session");
  }

  async open(options: SessionOpenOptions): Promise<CalculatorSession> {
    options.signal?.throwIfAborted();
    let browser: Browser;
    try {
      browser = await chromium.launch({
        headless: options.headless,
        executablePath: this.options.executablePath,
        channel: this.options.channel
      });
    } catch (error) {
      throw new SessionFatalError(`无法启动浏览器：${toErrorMessage(error)}`, error);
    }

    try {
      const session = new PlaywrightCalculatorSession(browser, await browser.newPage(), this.logger);
      await session.openEstimate(this.options.calculatorUrl);
      return session;
    } catch (error) {
      await this.closeAfterFailure(browser);
      if (error instanceof SessionFatalError) {
        throw error;
      }
      throw new SessionFatalError(`无法打开计价器：${toErrorMessage(error)}`, error);
    }
  }

  // 关闭失败只记录，向上抛出的仍是打开阶段的原始错误
  private async closeAfterFailure(browser: Browser): Promise<void> {
    try {
      await browser.close();
    } catch (closeError) {
      this.logger.warn("打开失败后关闭浏览器出错", { error: toErrorMessage(closeError) });
    }
  }
}

export class PlaywrightCalculatorSession implements CalculatorSession {
  readonly id = randomUUID();

  private committed = 0;

  private pendingSave = false;

  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly logger: LoggerFacade
  ) {
    page.setDefaultTimeout(ACTION_TIMEOUT_MS);
    page.setDefaultNavigationTimeout(NAVIGATION_TIMEOUT_MS);
  }

  async openEstimate(calculatorUrl: string): Promise<void> {
    await this.page.goto(calculatorUrl, { waitUntil: "domcontentloaded" });
    await this.page.getByRole("button", { name: "Create estimate" }).first().click();
    await this.page.locator(SEARCH_INPUT).waitFor({ state: "visible" });
    this.logger.info("计价器会话已打开", { sessionId: this.id });
  }

  async searchService(term: string): Promise<boolean> {
    return this.guard("search", async () => {
      const input = this.page.locator(SEARCH_INPUT);
      await input.fill("");
      await input.fill(term);
      await this.page.waitForTimeout(SEARCH_SETTLE_MS);
      const configure = this.page.locator(`button[aria-label="Configure ${escapeAttribute(term)}"]`);
      if ((await configure.count()) === 0) {
        return false;
      }
      await configure.first().click();
      await this.page.locator(SAVE_BUTTON).waitFor({ state: "visible" });
      return true;
    });
  }

  async fillInput(target: FieldTarget, value: string): Promise<void> {
    await this.guard(`fill ${target.label}`, async () => {
      await this.control("input", target).fill(value);
    });
  }

  async selectOption(target: FieldTarget, option: string): Promise<void> {
    await this.guard(`select ${target.label}`, async () => {
      await this.control("*", target).click();
      await this.page.getByRole("option", { name: option }).first().click();
    });
  }

  async setToggle(target: FieldTarget, enabled: boolean): Promise<void> {
    await this.guard(`toggle ${target.label}`, async () => {
      await this.control("input", target).setChecked(enabled);
    });
  }

  async saveItem(): Promise<void> {
    await this.guard("save", async () => {
      this.pendingSave = true;
      await this.page.locator(SAVE_BUTTON).click();
      await this.page.locator(SAVE_BUTTON).waitFor({ state: "detached" });
      this.pendingSave = false;
      this.committed += 1;
    });
  }

  async countItems(): Promise<number> {
    return this.guard("count", async () => {
      // 上次保存未确认：表单已离开视为已提交
      if (this.pendingSave && (await this.page.locator(SAVE_BUTTON).count()) === 0) {
        this.pendingSave = false;
        this.committed += 1;
      }
      return this.committed;
    });
  }

  async returnToServiceSearch(): Promise<void> {
    await this.guard("return", async () => {
      this.pendingSave = false;
      if (await this.page.locator(SEARCH_INPUT).isVisible()) {
        return;
      }
      const addService = this.page.getByRole("button", { name: "Add service" }).first();
      if ((await addService.count()) > 0) {
        await addService.click();
      } else {
        const target = new URL(this.page.url());
        target.hash = "#/addService";
        await this.page.goto(target.toString(), { waitUntil: "domcontentloaded" });
      }
      await this.page.locator(SEARCH_INPUT).waitFor({ state: "visible" });
    });
  }

  async finalize(): Promise<string | null> {
    return this.guard("finalize", async () => {
      await this.page.getByRole("button", { name: "View summary" }).first().click();
      await this.page.getByRole("button", { name: "Share" }).first().click();
      const agree = this.page.getByRole("button", { name: "Agree and continue" }).first();
      if ((await agree.count()) > 0) {
        await agree.click();
      }
      const link = this.page.locator(PUBLIC_LINK_INPUT);
      await link.waitFor({ state: "visible" });
      const value = (await link.inputValue()).trim();
      return value.startsWith("https://") ? value : null;
    });
  }

  async isAlive(): Promise<boolean> {
    return this.browser.isConnected() && !this.page.isClosed();
  }

  async close(): Promise<void> {
    if (this.browser.isConnected()) {
      await this.browser.close();
    }
  }

  private control(tag: string, target: FieldTarget): Locator {
    const placeholder = target.placeholder ? `[placeholder*="${escapeAttribute(target.placeholder)}"]` : "";
    return this.page.locator(`${tag}[aria-label*="${escapeAttribute(target.label)}"]${placeholder}`).first();
  }

  private async guard<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (!(await this.isAlive())) {
        throw new SessionFatalError(`会话在 ${action} 时失效：${toErrorMessage(error)}`, error);
      }
      await this.captureScreenshot(action);
      throw error;
    }
  }

  private async captureScreenshot(action: string): Promise<void> {
    const file = joinArtifactsPath(`${this.id}-${action.replace(/[^a-z0-9]+/gi, "-")}-${Date.now()}.png`);
    try {
      await this.page.screenshot({ path: file, fullPage: true });
    } catch (error) {
      this.logger.warn("失败截图保存失败", { action, error: toErrorMessage(error) });
    }
  }
}

function escapeAttribute(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}
