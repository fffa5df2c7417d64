export enum ApplicationStatus {
  SUBMITTED = 'submitted',
  UNDER_REVIEW = 'under_review',
  APPROVED = 'approved',
  DECLINED = 'declined',
  WAITLISTED = 'waitlisted',
  DOCUMENTS_PENDING = 'documents_pending',
}

/** Statuses from which staff may approve, decline or waitlist. */
export function isAwaitingDecision(status: ApplicationStatus): boolean {
  switch (status) {
    case ApplicationStatus.SUBMITTED:
    case ApplicationStatus.UNDER_REVIEW:
      return true;
    case ApplicationStatus.APPROVED:
    case ApplicationStatus.DECLINED:
    case ApplicationStatus.WAITLISTED:
    case ApplicationStatus.DOCUMENTS_PENDING:
      return false;
    default: {
      const unreachable: never = status;
      throw new Error(`Unknown application status ${String(unreachable)}`);
    }
  }
}

/** Final outcomes; nothing moves an application out of these. */
export function isFinalStatus(status: ApplicationStatus): boolean {
  return status === ApplicationStatus.APPROVED || status === ApplicationStatus.DECLINED;
}

// Statuses that may re-enter review.
export function canEnterReview(status: ApplicationStatus): boolean {
  switch (status) {
    case ApplicationStatus.SUBMITTED:
    case ApplicationStatus.DOCUMENTS_PENDING:
    case ApplicationStatus.WAITLISTED:
      return true;
    case ApplicationStatus.UNDER_REVIEW:
    case ApplicationStatus.APPROVED:
    case ApplicationStatus.DECLINED:
      return false;
    default: {
      const unreachable: never = status;
      throw new Error(`Unknown application status ${String(unreachable)}`);
    }
  }
}
