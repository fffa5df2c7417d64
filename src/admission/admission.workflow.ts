import { AdmissionApplication } from './entities/admission-application.entity';
import {
  ApplicationStatus,
  canEnterReview,
  isAwaitingDecision,
} from './enums/application-status.enum';
import {
  DEFAULT_REQUIRED_DOCUMENTS,
  getDocumentsRequired,
  getDocumentsVerified,
  resetChecklist,
  setDocumentsVerified,
} from './admission.checklist';
import { temporaryPasswordFor } from './utils/application-id.util';
import { ApplicationApprovedEvent } from './events/application-approved.event';
import { WorkflowResult, fail, succeed } from '../common/types/workflow-result';

export const NOT_PENDING = 'Application is not in pending status';
export const NO_SEATS = 'No available seats in the selected course';
export const ALREADY_ENROLLED = 'A student record already exists for this application';

export interface DecisionInput {
  staffId: string;
  remarks?: string | null;
}

export interface DeclineInput {
  staffId: string;
  reason: string;
}

export interface DocumentRequestInput {
  staffId: string;
  documents: string[];
  remarks?: string | null;
}

export type ApprovalDecision =
  | { success: true; message: string; event: ApplicationApprovedEvent }
  | { success: false; message: string };

/** Initializes the default checklist on a fresh submission. */
export function submitApplication(app: AdmissionApplication): WorkflowResult {
  if (app.status !== ApplicationStatus.SUBMITTED || getDocumentsRequired(app).length > 0) {
    return fail('Application already submitted');
  }
  resetChecklist(app, DEFAULT_REQUIRED_DOCUMENTS);
  return succeed('Application submitted successfully');
}

export function markUnderReview(app: AdmissionApplication, remarks?: string | null): WorkflowResult {
  if (!canEnterReview(app.status)) {
    return fail(`Application cannot move to review from ${app.status}`);
  }
  app.status = ApplicationStatus.UNDER_REVIEW;
  if (remarks !== undefined) app.remarks = remarks;
  return succeed('Application moved to review');
}

/**
 * Approves and returns the event that creates the student. The caller must
 * set `studentId` once the handler has produced a roll number.
 */
export function approveApplication(
  app: AdmissionApplication,
  input: DecisionInput,
  availableSeats: number,
  now: Date = new Date(),
): ApprovalDecision {
  if (!isAwaitingDecision(app.status)) return { success: false, message: NOT_PENDING };
  if (app.studentId !== null) return { success: false, message: ALREADY_ENROLLED };
  if (availableSeats <= 0) return { success: false, message: NO_SEATS };

  app.status = ApplicationStatus.APPROVED;
  app.staffId = input.staffId;
  app.remarks = input.remarks ?? null;
  app.processedOn = now;

  const event: ApplicationApprovedEvent = {
    applicationId: app.applicationId,
    courseId: app.courseId,
    approvedOn: now,
    staffId: input.staffId,
    temporaryPassword: temporaryPasswordFor(app.applicationId),
    applicant: {
      name: app.name,
      email: app.email,
      phone: app.phone,
      dateOfBirth: app.dateOfBirth,
      gender: app.gender,
      address: app.address,
      city: app.city,
      state: app.state,
      pincode: app.pincode,
      fatherName: app.fatherName,
      motherName: app.motherName,
      guardianPhone: app.guardianPhone,
      guardianEmail: app.guardianEmail,
    },
  };
  return { success: true, message: 'Application approved', event };
}

export function declineApplication(
  app: AdmissionApplication,
  input: DeclineInput,
  now: Date = new Date(),
): WorkflowResult {
  if (!isAwaitingDecision(app.status)) return fail(NOT_PENDING);

  app.status = ApplicationStatus.DECLINED;
  app.staffId = input.staffId;
  app.rejectionReason = input.reason;
  app.processedOn = now;
  return succeed('Application declined successfully');
}

export function waitlistApplication(
  app: AdmissionApplication,
  input: DecisionInput,
  now: Date = new Date(),
): WorkflowResult {
  if (!isAwaitingDecision(app.status)) return fail(NOT_PENDING);

  app.status = ApplicationStatus.WAITLISTED;
  app.staffId = input.staffId;
  app.remarks = input.remarks ?? null;
  app.processedOn = now;
  return succeed('Application waitlisted');
}

/**
 * Sends the application back for documents from any status except approved:
 * `studentId` is set exactly when the status is approved.
 */
export function requestDocuments(
  app: AdmissionApplication,
  input: DocumentRequestInput,
  now: Date = new Date(),
): WorkflowResult {
  if (app.status === ApplicationStatus.APPROVED) {
    return fail('Application already approved');
  }

  app.status = ApplicationStatus.DOCUMENTS_PENDING;
  app.staffId = input.staffId;
  app.remarks = input.remarks ?? null;
  app.processedOn = now;
  resetChecklist(app, input.documents);
  return succeed('Document verification request sent');
}

export function verifyDocument(app: AdmissionApplication, document: string, verified: boolean): WorkflowResult {
  if (!getDocumentsRequired(app).includes(document)) {
    return fail(`Document "${document}" is not on the checklist`);
  }
  const statuses = getDocumentsVerified(app);
  statuses[document] = verified;
  setDocumentsVerified(app, statuses);
  return succeed(verified ? `${document} verified` : `${document} marked unverified`);
}
