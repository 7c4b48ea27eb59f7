import { resolve as resolvePath } from "node:path";

import { Command, Flags } from "@oclif/core";

import { buildEstimatePipeline } from "../../../estimate/factory.js";
import type { EstimatePipeline } from "../../../estimate/pipeline.js";
import { loadSettings } from "../../../shared/config/settings.js";
import { EstimateError, toErrorMessage } from "../../../shared/errors/estimateErrors.js";
import { EXIT_CODES, runEstimateFromFile, type EstimateRunOutput } from "../../runtime/estimateRun.js";

export default class EstimateBuild extends Command {
  static override summary = "根据服务清单生成计价估算";

  static override description =
    "读取归一化文档或 SOW 映射结果，校验后在单个浏览器会话中逐条录入，输出分享链接与汇总报告。";

  static override examples = [
    "<%= config.bin %> estimate:build --input services.json",
    "<%= config.bin %> estimate:build --input sow.json --validate-only"
  ];

  static override flags = {
    input: Flags.string({ char: "i", description: "输入 JSON 文件路径", required: true }),
    headless: Flags.boolean({ description: "无头模式运行浏览器", default: false }),
    "validate-only": Flags.boolean({ description: "只校验输入，不打开浏览器会话", default: false }),
    output: Flags.string({ char: "o", description: "分享链接输出文件", default: "estimate_url.txt" }),
    report: Flags.string({ description: "将完整结果写入该 JSON 文件" }),
    "mock-session": Flags.boolean({ description: "使用内存模拟的计价器会话", default: false }),
    schemas: Flags.string({ description: "服务 schema 文件路径（覆盖默认查找顺序）" }),
    timeout: Flags.integer({ description: "整体运行超时（毫秒）", min: 1 }),
    json: Flags.boolean({ description: "以 JSON 输出结果", default: false })
  } as const;

  override async run(): Promise<void> {
    const { flags } = await this.parse(EstimateBuild);

    const pipeline = await this.createPipeline(flags.schemas, flags["mock-session"]);
    const controller = new AbortController();
    const onInterrupt = () => controller.abort(new Error("用户中断"));
    process.once("SIGINT", onInterrupt);

    let output: EstimateRunOutput;
    try {
      output = await runEstimateFromFile({
        inputPath: resolvePath(flags.input),
        outputPath: resolvePath(flags.output),
        ...(flags.report ? { reportPath: resolvePath(flags.report) } : {}),
        pipeline,
        validateOnly: flags["validate-only"],
        headless: flags.headless,
        ...(flags.timeout !== undefined ? { timeoutMs: flags.timeout } : {}),
        signal: controller.signal,
        log: (line) => {
          if (!flags.json) {
            this.log(line);
          }
        }
      });
    } catch (error) {
      if (error instanceof EstimateError) {
        this.error(`${error.code}: ${error.message}`, { exit: EXIT_CODES.usage });
      }
      throw error;
    } finally {
      process.removeListener("SIGINT", onInterrupt);
    }

    if (flags.json) {
      this.log(JSON.stringify(output.result, null, 2));
    }
    if (output.exitCode !== EXIT_CODES.success) {
      this.exit(output.exitCode);
    }
  }

  private async createPipeline(schemasPath: string | undefined, useMockSession: boolean): Promise<EstimatePipeline> {
    try {
      const settings = loadSettings();
      return await buildEstimatePipeline({
        settings,
        useMockSession,
        ...(schemasPath ? { schemasPath: resolvePath(schemasPath) } : {})
      });
    } catch (error) {
      this.error(`初始化失败：${toErrorMessage(error)}`, { exit: EXIT_CODES.usage });
    }
  }
}
