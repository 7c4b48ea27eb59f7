import { SessionFatalError } from "../../shared/errors/estimateErrors.js";
import type { CalculatorSession, FieldTarget, SessionFactory, SessionOpenOptions } from "./types.js";

export type MockFieldValue = string | boolean;

export interface MockEstimateItem {
  readonly term: string;
  readonly fields: Readonly<Record<string, MockFieldValue>>;
}

/**
 * 内存会话的脚本化行为，用于 `--mock-session` 试运行与测试。
 */
export interface MockCalculatorScript {
  /** 可被搜索到的关键字（忽略大小写）；缺省时任何关键字都能找到 */
  readonly catalog?: readonly string[];
  /** label（带 placeholder 时为 `label [placeholder]`）→ 填写失败次数 */
  readonly failFill?: Readonly<Record<string, number>>;
  /** saveItem 前 n 次失败 */
  readonly failSave?: number;
  /** 为真时失败的 saveItem 仍然落地条目（模拟提交成功但确认超时） */
  readonly commitBeforeSaveFailure?: boolean;
  /** 第 n 次 searchService 调用时会话崩溃 */
  readonly crashOnSearch?: number;
  readonly failReturnToSearch?: boolean;
  readonly failFinalize?: boolean;
  /** finalize 返回的链接；null 表示无法生成 */
  readonly shareUrl?: string | null;
  readonly onSearch?: (term: string, session: MockCalculatorSession) => void;
}

type MockPage = "search" | "form" | "summary";

export class MockCalculatorSession implements CalculatorSession {
  readonly items: MockEstimateItem[] = [];

  readonly calls: string[] = [];

  readonly headless: boolean;

  private page: MockPage = "search";

  private draft: { term: string; fields: Record<string, MockFieldValue> } | null = null;

  private searchCount = 0;

  private crashed = false;

  private closed = false;

  private readonly fillFailures: Map<string, number>;

  private saveFailures: number;

  constructor(
    readonly id: string,
    private readonly script: MockCalculatorScript = {},
    options: SessionOpenOptions = { headless: true }
  ) {
    this.headless = options.headless;
    this.fillFailures = new Map(Object.entries(script.failFill ?? {}));
    this.saveFailures = script.failSave ?? 0;
  }

  crash(): void {
    this.crashed = true;
  }

  get closedCount(): number {
    return this.calls.filter((call) => call === "close").length;
  }

  async searchService(term: string): Promise<boolean> {
    this.calls.push(`search:${term}`);
    this.searchCount += 1;
    if (this.script.crashOnSearch === this.searchCount) {
      this.crash();
    }
    this.assertAlive();
    this.script.onSearch?.(term, this);
    if (this.page !== "search") {
      throw new Error(`当前不在服务搜索页（${this.page}）`);
    }
    const catalog = this.script.catalog;
    if (catalog && !catalog.some((entry) => entry.toLowerCase() === term.toLowerCase())) {
      return false;
    }
    this.page = "form";
    this.draft = { term, fields: {} };
    return true;
  }

  async fillInput(target: FieldTarget, value: string): Promise<void> {
    this.setField("fill", target, value);
  }

  async selectOption(target: FieldTarget, option: string): Promise<void> {
    this.setField("select", target, option);
  }

  async setToggle(target: FieldTarget, enabled: boolean): Promise<void> {
    this.setField("toggle", target, enabled);
  }

  async saveItem(): Promise<void> {
    this.calls.push("save");
    const draft = this.requireDraft();
    if (this.saveFailures > 0) {
      this.saveFailures -= 1;
      if (this.script.commitBeforeSaveFailure) {
        this.commit(draft);
      }
      throw new Error("保存条目超时");
    }
    this.commit(draft);
  }

  async countItems(): Promise<number> {
    this.assertAlive();
    return this.items.length;
  }

  async returnToServiceSearch(): Promise<void> {
    this.calls.push("return");
    this.assertAlive();
    if (this.script.failReturnToSearch) {
      throw new Error("无法返回服务搜索页");
    }
    this.draft = null;
    this.page = "search";
  }

  async finalize(): Promise<string | null> {
    this.calls.push("finalize");
    this.assertAlive();
    if (this.script.failFinalize) {
      throw new Error("生成分享链接失败");
    }
    if (this.items.length === 0) {
      return null;
    }
    if (this.script.shareUrl !== undefined) {
      return this.script.shareUrl;
    }
    return `https://calculator.aws/#/estimate?id=${this.id}`;
  }

  async isAlive(): Promise<boolean> {
    return !this.crashed && !this.closed;
  }

  async close(): Promise<void> {
    this.calls.push("close");
    this.closed = true;
  }

  private setField(kind: string, target: FieldTarget, value: MockFieldValue): void {
    const label = target.placeholder ? `${target.label} [${target.placeholder}]` : target.label;
    this.calls.push(`${kind}:${label}=${String(value)}`);
    const draft = this.requireDraft();
    const remaining = this.fillFailures.get(label) ?? 0;
    if (remaining > 0) {
      this.fillFailures.set(label, remaining - 1);
      throw new Error(`无法填写字段 ${label}`);
    }
    draft.fields[label] = value;
  }

  private commit(draft: { term: string; fields: Record<string, MockFieldValue> }): void {
    this.items.push({ term: draft.term, fields: { ...draft.fields } });
    this.draft = null;
    this.page = "summary";
  }

  private requireDraft(): { term: string; fields: Record<string, MockFieldValue> } {
    this.assertAlive();
    if (this.page !== "form" || !this.draft) {
      throw new Error("当前没有打开的服务表单");
    }
    return this.draft;
  }

  private assertAlive(): void {
    if (this.closed) {
      throw new SessionFatalError(`会话 ${this.id} 已关闭`);
    }
    if (this.crashed) {
      throw new SessionFatalError(`会话 ${this.id} 已崩溃`);
    }
  }
}

export interface MockSessionFactoryOptions {
  readonly script?: MockCalculatorScript;
  /** 设置后 open() 直接失败 */
  readonly openError?: Error;
}

export class MockSessionFactory implements SessionFactory {
  readonly sessions: MockCalculatorSession[] = [];

  constructor(private readonly options: MockSessionFactoryOptions = {}) {}

  async open(options: SessionOpenOptions): Promise<MockCalculatorSession> {
    options.signal?.throwIfAborted();
    if (this.options.openError) {
      throw this.options.openError;
    }
    const session = new MockCalculatorSession(
      `mock-session-${this.sessions.length + 1}`,
      this.options.script,
      options
    );
    this.sessions.push(session);
    return session;
  }

  get lastSession(): MockCalculatorSession | undefined {
    return this.sessions.at(-1);
  }
}
