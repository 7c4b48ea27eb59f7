import { readFile, writeFile } from "node:fs/promises";

import { InputDocumentError, toErrorMessage } from "../../shared/errors/estimateErrors.js";
import type { EstimatePipeline, EstimateRunResult, ValidationSummary } from "../../estimate/pipeline.js";
import type { ItemOutcome } from "../../estimate/orchestrator/types.js";
import { describeReport, type EstimateReport } from "../../estimate/report/aggregator.js";

export const EXIT_CODES = {
  success: 0,
  usage: 1,
  partial: 2,
  validationOnly: 3,
  fatal: 4
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function resolveExitCode(result: EstimateRunResult): ExitCode {
  switch (result.kind) {
    case "validation-only":
      return EXIT_CODES.validationOnly;
    case "session-fatal":
      return EXIT_CODES.fatal;
    case "estimate":
      if (result.report.status === "failed") {
        return EXIT_CODES.fatal;
      }
      return result.report.status === "complete" ? EXIT_CODES.success : EXIT_CODES.partial;
  }
}

export interface EstimateRunInput {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly reportPath?: string;
  readonly pipeline: EstimatePipeline;
  readonly validateOnly?: boolean;
  readonly headless?: boolean;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  readonly log: (line: string) => void;
}

export interface EstimateRunOutput {
  readonly result: EstimateRunResult;
  readonly exitCode: ExitCode;
}

export async function readEstimateDocument(inputPath: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(inputPath, "utf-8");
  } catch (error) {
    throw new InputDocumentError(`无法读取输入文件 ${inputPath}：${toErrorMessage(error)}`);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InputDocumentError(`输入文件不是合法 JSON：${toErrorMessage(error)}`);
  }
}

export async function runEstimateFromFile(input: EstimateRunInput): Promise<EstimateRunOutput> {
  const raw = await readEstimateDocument(input.inputPath);
  const result = await input.pipeline.run(raw, {
    validateOnly: input.validateOnly ?? false,
    headless: input.headless ?? false,
    ...(input.timeoutMs !== undefined ? { timeoutMs: input.timeoutMs } : {}),
    ...(input.signal ? { signal: input.signal } : {}),
    onItemComplete: ({ outcome, total }) => input.log(formatOutcome(outcome, total))
  });

  for (const line of renderResult(result)) {
    input.log(line);
  }

  if (result.kind === "estimate" && result.report.shareableUrl) {
    await writeFile(input.outputPath, result.report.shareableUrl, "utf-8");
    input.log(`分享链接已写入 ${input.outputPath}`);
  }
  if (input.reportPath) {
    await writeFile(input.reportPath, `${JSON.stringify(result, null, 2)}\n`, "utf-8");
  }

  return { result, exitCode: resolveExitCode(result) };
}

export function formatOutcome(outcome: ItemOutcome, total?: number): string {
  const progress = total !== undefined ? `[${outcome.position}/${total}]` : `[${outcome.position}]`;
  const label = `${outcome.serviceType}#${outcome.instance}`;
  if (outcome.status === "succeeded") {
    return `${progress} ✓ ${label}`;
  }
  const reason = outcome.error ? `${outcome.error.code}: ${outcome.error.message}` : outcome.status;
  return `${progress} ✗ ${label} ${reason}`;
}

export function renderValidationSummary(summary: ValidationSummary): string[] {
  const lines = [`校验通过 ${summary.valid}/${summary.total}，可自动化 ${summary.automatable}`];
  for (const item of summary.items) {
    if (!item.valid && item.error) {
      lines.push(`  #${item.position} ${item.serviceType}: ${item.error.message}`);
    }
  }
  return lines;
}

export function renderReport(report: EstimateReport): string[] {
  const lines = [describeReport(report)];
  for (const tally of report.services) {
    lines.push(`  ${tally.serviceType}: ${tally.succeeded}/${tally.total}`);
  }
  return lines;
}

function renderResult(result: EstimateRunResult): string[] {
  switch (result.kind) {
    case "validation-only":
      return renderValidationSummary(result.validation);
    case "session-fatal":
      return [...renderValidationSummary(result.validation), `会话无法打开：${result.error.message}`];
    case "estimate":
      return renderReport(result.report);
  }
}
