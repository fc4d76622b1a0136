import type { HashAlgorithm } from "../value-objects/hash-algorithm";
import type { FileHash } from "./file-record";
import type { RelativePath } from "./manifest";

export type MatchedOutcome = {
  status: "matched";
  path: RelativePath;
  hash: FileHash;
};

export type MismatchedOutcome = {
  status: "mismatched";
  path: RelativePath;
  expected: FileHash;
  // null when the file exists but could not be hashed
  actual: FileHash | null;
  error?: string;
};

export type MissingOutcome = {
  status: "missing";
  path: RelativePath;
  expected: FileHash;
};

export type EntryOutcome = MatchedOutcome | MismatchedOutcome | MissingOutcome;

export type EntryStatus = EntryOutcome["status"];

export type Verdict = "intact" | "compromised";

export type VerificationCounts = {
  total: number;
  passed: number;
  failed: number;
  missing: number;
};

export type VerificationReport = VerificationCounts & {
  algorithm: HashAlgorithm;
  targetDirectory: string;
  verdict: Verdict;
  outcomes: EntryOutcome[];
};

export function verdictFor(counts: Pick<VerificationCounts, "failed" | "missing">): Verdict {
  return counts.failed === 0 && counts.missing === 0 ? "intact" : "compromised";
}

/**
 * Tallies outcomes into counts. Counting from the outcomes themselves keeps
 * the numbers exact whatever order the entries were decided in.
 */
export function summarizeOutcomes(
  outcomes: readonly EntryOutcome[]
): VerificationCounts & { verdict: Verdict } {
  const counts: VerificationCounts = { total: outcomes.length, passed: 0, failed: 0, missing: 0 };

  for (const o of outcomes) {
    switch (o.status) {
      case "matched":
        counts.passed++;
        break;
      case "mismatched":
        counts.failed++;
        break;
      case "missing":
        counts.missing++;
        break;
    }
  }

  return { ...counts, verdict: verdictFor(counts) };
}
