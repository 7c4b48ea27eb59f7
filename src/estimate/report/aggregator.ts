import type { FinalizationSummary, ItemError, ItemOutcome } from "../orchestrator/types.js";

export interface ServiceTally {
  readonly serviceType: string;
  readonly succeeded: number;
  readonly total: number;
  /** 失败条目的 position，升序 */
  readonly failedPositions: readonly number[];
}

export type ReportStatus = "complete" | "partial" | "failed";

export interface EstimateReport {
  readonly projectName?: string;
  readonly status: ReportStatus;
  readonly shareableUrl: string | null;
  readonly outcomes: readonly ItemOutcome[];
  readonly services: readonly ServiceTally[];
  readonly totals: { readonly succeeded: number; readonly failed: number; readonly total: number };
  readonly finalization: FinalizationSummary;
  readonly fatal?: ItemError;
}

export interface AggregateInput {
  readonly outcomes: readonly ItemOutcome[];
  readonly finalization: FinalizationSummary;
  readonly fatal?: ItemError;
  readonly projectName?: string;
}

const NOT_ATTEMPTED: FinalizationSummary = { attempted: false, succeeded: false, shareableUrl: null };

/**
 * 汇总逐条结果为最终报告。纯函数。
 *
 * 仅当收尾成功且至少一个条目成功时才附带分享链接。
 */
export function aggregateReport(input: AggregateInput): EstimateReport {
  const outcomes = [...input.outcomes].sort((a, b) => a.position - b.position);

  const tallies = new Map<string, { succeeded: number; total: number; failedPositions: number[] }>();
  for (const outcome of outcomes) {
    const tally = tallies.get(outcome.serviceType) ?? { succeeded: 0, total: 0, failedPositions: [] };
    tally.total += 1;
    if (outcome.status === "succeeded") {
      tally.succeeded += 1;
    } else {
      tally.failedPositions.push(outcome.position);
    }
    tallies.set(outcome.serviceType, tally);
  }

  const succeeded = outcomes.filter((outcome) => outcome.status === "succeeded").length;
  const shareableUrl =
    input.finalization.succeeded && succeeded > 0 ? input.finalization.shareableUrl : null;

  let status: ReportStatus;
  if (input.fatal) {
    status = "failed";
  } else if (outcomes.length > 0 && succeeded === outcomes.length && shareableUrl) {
    status = "complete";
  } else {
    status = "partial";
  }

  return {
    ...(input.projectName !== undefined ? { projectName: input.projectName } : {}),
    status,
    shareableUrl,
    outcomes,
    services: Array.from(tallies, ([serviceType, tally]) => ({ serviceType, ...tally })),
    totals: { succeeded, failed: outcomes.length - succeeded, total: outcomes.length },
    finalization: input.finalization,
    ...(input.fatal ? { fatal: input.fatal } : {})
  };
}

/**
 * 未打开会话（全部条目校验失败）时的报告。
 */
export function aggregateWithoutSession(outcomes: readonly ItemOutcome[], projectName?: string): EstimateReport {
  return aggregateReport({ outcomes, finalization: NOT_ATTEMPTED, projectName });
}

export function describeReport(report: EstimateReport): string {
  const { succeeded, total } = report.totals;
  const skipped = report.outcomes.filter((outcome) => outcome.status === "validation-failed").length;
  const parts = [`已加入 ${succeeded}/${total} 个服务`];
  if (skipped > 0) {
    parts.push(`${skipped} 个服务未通过校验或不支持自动化`);
  }
  if (report.fatal) {
    parts.push(`会话中途失效：${report.fatal.message}`);
  }
  parts.push(report.shareableUrl ? `分享链接：${report.shareableUrl}` : "未生成分享链接");
  return parts.join("；");
}
