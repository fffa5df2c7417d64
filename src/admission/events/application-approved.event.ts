import { EntityManager } from 'typeorm';
import { Gender } from '../../common/enums/gender.enum';

/**
 * Raised when staff approve an admission application. The handler creates
 * the Student record inside the approving transaction.
 */
export interface ApplicationApprovedEvent {
  applicationId: string;
  courseId: string;
  approvedOn: Date;
  staffId: string;
  temporaryPassword: string;
  applicant: {
    name: string;
    email: string;
    phone: string;
    dateOfBirth: string;
    gender: Gender;
    address: string | null;
    city: string | null;
    state: string | null;
    pincode: string | null;
    fatherName: string | null;
    motherName: string | null;
    guardianPhone: string | null;
    guardianEmail: string | null;
  };
}

export interface ApplicationApprovedOutcome {
  rollNo: string;
}

export interface ApplicationApprovedHandler {
  handleApplicationApproved(
    event: ApplicationApprovedEvent,
    manager: EntityManager,
  ): Promise<ApplicationApprovedOutcome>;
}

export const APPLICATION_APPROVED_HANDLER = 'APPLICATION_APPROVED_HANDLER';
