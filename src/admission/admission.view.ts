import { AdmissionApplication } from './entities/admission-application.entity';
import { ApplicationStatus } from './enums/application-status.enum';
import { GeneratedBy } from './enums/generated-by.enum';
import { getDocumentsRequired, getDocumentsVerified, pendingDocuments } from './admission.checklist';
import { Gender } from '../common/enums/gender.enum';
import { courseDisplayName } from '../course/entities/course.entity';

export interface ApplicationView {
  id: string;
  applicationId: string;
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
  guardianName: string | null;
  guardianPhone: string | null;
  guardianEmail: string | null;
  courseId: string;
  courseName: string | null;
  tenthPercentage: number | null;
  twelfthPercentage: number | null;
  entranceExamScore: number | null;
  status: ApplicationStatus;
  generatedBy: GeneratedBy;
  studentId: string | null;
  remarks: string | null;
  rejectionReason: string | null;
  processedOn: string | null;
  documentsVerified: Record<string, boolean>;
  documentsRequired: string[];
  pendingDocuments: string[];
  applicationDate: string;
  staffId?: string | null;
  updatedOn?: string | null;
}

export interface ApplicationStatusView {
  applicationId: string;
  name: string;
  courseName: string | null;
  status: ApplicationStatus;
  applicationDate: string;
  processedOn: string | null;
  remarks: string | null;
}

export function toApplicationView(app: AdmissionApplication, includeSensitive = false): ApplicationView {
  const view: ApplicationView = {
    id: app.id,
    applicationId: app.applicationId,
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
    guardianName: app.guardianName,
    guardianPhone: app.guardianPhone,
    guardianEmail: app.guardianEmail,
    courseId: app.courseId,
    courseName: app.course ? courseDisplayName(app.course) : null,
    tenthPercentage: app.tenthPercentage,
    twelfthPercentage: app.twelfthPercentage,
    entranceExamScore: app.entranceExamScore,
    status: app.status,
    generatedBy: app.generatedBy,
    studentId: app.studentId,
    remarks: app.remarks,
    rejectionReason: app.rejectionReason,
    processedOn: app.processedOn ? app.processedOn.toISOString() : null,
    documentsVerified: getDocumentsVerified(app),
    documentsRequired: getDocumentsRequired(app),
    pendingDocuments: pendingDocuments(app),
    applicationDate: app.applicationDate.toISOString(),
  };

  if (includeSensitive) {
    view.staffId = app.staffId;
    view.updatedOn = app.updatedOn ? app.updatedOn.toISOString() : null;
  }
  return view;
}

// Public lookup: staff remarks are only shown for declined or waitlisted applications.
export function toApplicationStatusView(app: AdmissionApplication): ApplicationStatusView {
  const showRemarks = app.status === ApplicationStatus.DECLINED || app.status === ApplicationStatus.WAITLISTED;
  return {
    applicationId: app.applicationId,
    name: app.name,
    courseName: app.course ? courseDisplayName(app.course) : null,
    status: app.status,
    applicationDate: app.applicationDate.toISOString(),
    processedOn: app.processedOn ? app.processedOn.toISOString() : null,
    remarks: showRemarks ? app.rejectionReason ?? app.remarks : null,
  };
}
