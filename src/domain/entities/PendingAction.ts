import { AnalysisResult } from "./AnalysisResult";

export const ACTION_TYPES = [
  "send-message",
  "accept-offer",
  "reject-offer",
  "block-user",
  "share-contact"
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export type ApprovalOutcome = "pending" | "approved" | "rejected" | "expired";

export interface PendingActionPayload {
  originalMessage: string;
  analysis: AnalysisResult;
  candidateResponse: string | null;
}

export interface PendingAction {
  id: string;
  type: ActionType;
  buyerId: string;
  payload: PendingActionPayload;
  createdAt: Date;
  expiresAt: Date;
  outcome: ApprovalOutcome;
  resolvedAt?: Date;
  resolvedBy?: string;
}
