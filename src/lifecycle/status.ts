import * as core from "@actions/core";
import { NotFoundError, ValidationError } from "../errors.js";
import type { Store } from "../store/types.js";
import { CANDIDATE_STATUSES, isCandidateStatus, type Candidate } from "../types.js";

export interface StatusChange {
  candidate: Candidate;
  previousStatus: Candidate["status"];
}

/**
 * Moves a candidate to `status`. Any valid status may be entered from any
 * other; entering `approved` also logs a `new` change event, which is what
 * puts the candidate in front of the update tracker.
 */
export async function setStatus(
  store: Store,
  candidateId: number,
  status: string,
  reason?: string | null
): Promise<StatusChange> {
  if (!isCandidateStatus(status)) {
    throw new ValidationError(
      `Invalid status "${status}". Must be one of: ${CANDIDATE_STATUSES.join(", ")}`,
      { candidateId, status }
    );
  }

  const change = await store.transaction(async (tx) => {
    const existing = await tx.getCandidate(candidateId);
    if (!existing) throw new NotFoundError("Candidate", candidateId);

    await tx.setStatus(candidateId, status, reason?.trim() || null);

    if (status === "approved") {
      await tx.appendChangeEvent({
        candidateId,
        changeType: "new",
        description: `Approved for tracking: ${existing.name}`,
        sourceUrl: existing.url || null,
      });
    }

    const updated = await tx.getCandidate(candidateId);
    if (!updated) throw new NotFoundError("Candidate", candidateId);
    return { candidate: updated, previousStatus: existing.status };
  });

  core.info(
    `Candidate #${candidateId} "${change.candidate.name}": ${change.previousStatus} -> ${status}`
  );
  return change;
}
