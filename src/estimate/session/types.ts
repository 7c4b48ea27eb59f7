/**
 * 表单控件定位：aria-label 子串，必要时以 placeholder 区分同名控件。
 */
export interface FieldTarget {
  readonly label: string;
  readonly placeholder?: string;
}

/**
 * 计价器会话：对第三方页面的一次活动连接。一次编排运行独占一个会话，
 * 所有条目累积到同一份估算中。
 *
 * 约定：会话已不可用时方法应抛出 SessionFatalError，其余失败抛普通错误。
 */
export interface CalculatorSession {
  readonly id: string;

  /** 在服务搜索页按关键字查找并打开服务配置表单，未找到返回 false */
  searchService(term: string): Promise<boolean>;

  fillInput(target: FieldTarget, value: string): Promise<void>;

  selectOption(target: FieldTarget, option: string): Promise<void>;

  setToggle(target: FieldTarget, enabled: boolean): Promise<void>;

  /** 提交当前表单，将条目加入估算 */
  saveItem(): Promise<void>;

  /** 已加入估算的条目数，用于判断提交是否已经生效 */
  countItems(): Promise<number>;

  /** 放弃当前表单（若有）并回到服务搜索页 */
  returnToServiceSearch(): Promise<void>;

  /** 生成可分享的估算链接；无法生成时返回 null */
  finalize(): Promise<string | null>;

  isAlive(): Promise<boolean>;

  close(): Promise<void>;
}

export interface SessionOpenOptions {
  readonly headless: boolean;
  readonly signal?: AbortSignal;
}

export interface SessionFactory {
  open(options: SessionOpenOptions): Promise<CalculatorSession>;
}
