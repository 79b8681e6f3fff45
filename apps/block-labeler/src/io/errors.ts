import type { ClassifierFailureReason } from "./contracts.js";

export type PartialPageWarning = {
  kind: "partial_page";
  documentId: string;
  pageNo: number;
  missingStreams: Array<"raw" | "classified">;
  incompleteStreams: Array<"raw" | "classified">;
};

export type AmbiguousMatchWarning = {
  kind: "ambiguous_match";
  documentId: string;
  blockId: string;
  spanIndices: number[];
  chosenSpanIndex: number;
  similarity: number;
};

export type ClassifierUnavailableWarning = {
  kind: "classifier_unavailable";
  documentId: string;
  blockId: string;
  reason: ClassifierFailureReason;
  message: string;
};

export type TierAlarmWarning = {
  kind: "tier_alarm";
  documentId: string;
  unresolvedFraction: number;
  threshold: number;
};

export type PipelineWarning =
  | PartialPageWarning
  | AmbiguousMatchWarning
  | ClassifierUnavailableWarning
  | TierAlarmWarning;

export type ValidationIssue = {
  path: string;
  message: string;
};

export class CorruptDocumentError extends Error {
  readonly documentId: string;
  readonly issues: ValidationIssue[];

  constructor(documentId: string, message: string, issues: ValidationIssue[] = []) {
    super(`Corrupt document ${documentId}: ${message}`);
    this.name = "CorruptDocumentError";
    this.documentId = documentId;
    this.issues = issues;
  }
}

export const describeWarning = (warning: PipelineWarning): string => {
  switch (warning.kind) {
    case "partial_page": {
      const problems: string[] = [];
      if (warning.missingStreams.length > 0) {
        problems.push(`is missing ${warning.missingStreams.join(" and ")} text`);
      }
      if (warning.incompleteStreams.length > 0) {
        problems.push(`has unreadable ${warning.incompleteStreams.join(" and ")} fragments`);
      }
      return `page ${warning.pageNo} ${problems.join(" and ")}`;
    }
    case "ambiguous_match":
      return `block ${warning.blockId} tied across spans ${warning.spanIndices.join(", ")}`;
    case "classifier_unavailable":
      return `classifier unavailable for block ${warning.blockId} (${warning.reason})`;
    case "tier_alarm":
      return `unresolved fraction ${warning.unresolvedFraction.toFixed(3)} exceeds ${warning.threshold}`;
  }
};
