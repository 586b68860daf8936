import type { ReconcileReport } from "@clusterboot/bootstrap/engine";
import type { StepResult } from "@clusterboot/bootstrap/step";
import { formatSummary, type AgentSummary } from "@clusterboot/bootstrap/summary";
import { formatArrayTable } from "./cli-output";

export type StepRow = {
  step: string;
  status: StepResult["status"];
  attempts: number;
  detail: string;
};

export type ReportData = {
  mode: ReconcileReport["mode"];
  address: string;
  ok: boolean;
  steps: StepRow[];
  pending: string[];
  summary?: AgentSummary[];
};

export function reportData(report: ReconcileReport, summary?: AgentSummary[]): ReportData {
  return {
    mode: report.mode,
    address: report.address.address,
    ok: report.ok,
    steps: report.results.map(({ id, status, attempts, detail }) => ({
      step: id,
      status,
      attempts,
      detail,
    })),
    pending: report.results.filter(({ status }) => status === "pending").map(({ id }) => id),
    ...(summary ? { summary } : {}),
  };
}

function isReportData(data: unknown): data is ReportData {
  return (
    data != null &&
    typeof data === "object" &&
    "steps" in data &&
    Array.isArray(data.steps) &&
    "pending" in data &&
    Array.isArray(data.pending)
  );
}

export function formatReport(data: unknown): string | undefined {
  if (!isReportData(data)) return undefined;
  const lines = [formatArrayTable(data.steps, `${data.mode} (${data.address})`)];
  if (data.mode === "plan") {
    lines.push(
      data.pending.length === 0
        ? "host is in sync"
        : `${data.pending.length} step(s) would change the host: ${data.pending.join(", ")}`,
    );
  }
  if (data.summary) {
    lines.push("", ...formatSummary(data.summary));
  }
  return lines.join("\n");
}
