import type { EntryOutcome, VerificationReport } from "@dirseal/core-domain";
import type { BuildFileEvent, BuildResult, SingleFileCheck } from "@dirseal/core-application";

export const RULE = "-".repeat(50);

export function renderBuildEvent(event: BuildFileEvent): string {
  if (event.type === "recorded") return `  + ${event.path}`;
  return `  ! ${event.path}: ${event.error.message}`;
}

export function renderBuildSummary(result: Pick<BuildResult, "processed" | "failures">, outputPath: string): string[] {
  const lines = [RULE, `Done. Files processed: ${result.processed}`];
  if (result.failures.length > 0) lines.push(`Files skipped: ${result.failures.length}`);
  lines.push(`Checksums saved to: ${outputPath}`);
  return lines;
}

export function renderOutcome(outcome: EntryOutcome): string[] {
  switch (outcome.status) {
    case "matched":
      return [`  OK         ${outcome.path}`];
    case "missing":
      return [`  MISSING    ${outcome.path}`];
    case "mismatched":
      if (outcome.actual === null) {
        return [`  UNREADABLE ${outcome.path}: ${outcome.error ?? "unknown error"}`];
      }
      return [
        `  CHANGED    ${outcome.path}`,
        `    expected: ${outcome.expected}`,
        `    actual:   ${outcome.actual}`,
      ];
  }
}

export function renderReportSummary(report: VerificationReport): string[] {
  return [
    RULE,
    "Results:",
    `Total files checked: ${report.total}`,
    `Passed:  ${report.passed}`,
    `Failed:  ${report.failed}`,
    `Missing: ${report.missing}`,
    "",
    report.verdict === "intact" ? "Verdict: INTACT (all files match)" : "Verdict: COMPROMISED (integrity problems found)",
  ];
}

export function renderSingleFile(check: SingleFileCheck): string[] {
  const lines = [
    `File:      ${check.path}`,
    `Size:      ${check.size} bytes`,
    `Algorithm: ${check.algorithm.toUpperCase()}`,
    `Digest:    ${check.hash}`,
  ];
  if (check.matches === true) lines.push("Match:     yes");
  if (check.matches === false) lines.push("Match:     NO (file differs from the expected digest)");
  return lines;
}
