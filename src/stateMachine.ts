import { ChangeSetStatus } from "./types.js";

const TRANSITIONS: Record<ChangeSetStatus, readonly ChangeSetStatus[]> = {
  draft: ["previewed"],
  previewed: ["approved", "rejected", "failed"],
  approved: ["applied", "rejected", "failed"],
  applied: [],
  rejected: [],
  failed: []
};

export const ACTIVE_STATUSES: readonly ChangeSetStatus[] = ["draft", "previewed", "approved"];

export function isTerminal(status: ChangeSetStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: ChangeSetStatus | null, to: ChangeSetStatus): boolean {
  if (from === null) {
    return to === "draft";
  }
  return TRANSITIONS[from].includes(to);
}
