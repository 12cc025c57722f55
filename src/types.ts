import type {
  Citation,
  Complexity,
  EvidenceCounts,
  Intent,
  RejectionCheck,
  RetrievalFailureNote,
  ValidationOutcome
} from "./pipeline/types";

export interface AnswerRequest {
  query: string;
  conversationId: string;
  /** Falls back to the configured default workspace. */
  tenantId?: string;
}

export interface AnswerDiagnostics {
  intent: Intent;
  complexity: Complexity;
  evidenceCounts: EvidenceCounts;
  outcome: ValidationOutcome;
  rejectionReason?: string;
  failedCheck?: RejectionCheck;
  retrievalFailures: RetrievalFailureNote[];
  warnings: string[];
}

export interface AnswerResponse {
  answer: string;
  citations: Citation[];
  grounded: boolean;
  diagnostics: AnswerDiagnostics;
}

export type AnswerStreamEvent =
  | {
      type: "delta";
      text: string;
    }
  | {
      type: "final";
      response: AnswerResponse;
    };
