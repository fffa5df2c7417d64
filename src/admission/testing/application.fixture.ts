import { AdmissionApplication } from '../entities/admission-application.entity';
import { ApplicationStatus } from '../enums/application-status.enum';
import { GeneratedBy } from '../enums/generated-by.enum';
import { Gender } from '../../common/enums/gender.enum';

export function buildApplication(overrides: Partial<AdmissionApplication> = {}): AdmissionApplication {
  return Object.assign(new AdmissionApplication(), {
    id: 'app-uuid-1',
    applicationId: 'ADM2025000042',
    name: 'Ravi Kumar',
    email: 'ravi@example.test',
    phone: '9000000002',
    dateOfBirth: '2006-08-14',
    gender: Gender.MALE,
    address: null,
    city: 'Chennai',
    state: 'Tamil Nadu',
    pincode: null,
    fatherName: null,
    motherName: null,
    guardianName: null,
    guardianPhone: null,
    guardianEmail: null,
    emergencyContact: null,
    medicalConditions: null,
    previousEducation: null,
    courseId: 'course-1',
    tenthPercentage: 82,
    twelfthPercentage: 76,
    entranceExamScore: null,
    passwordHash: 'hashed:test-secret',
    status: ApplicationStatus.SUBMITTED,
    generatedBy: GeneratedBy.STUDENT,
    staffId: null,
    studentId: null,
    remarks: null,
    rejectionReason: null,
    processedOn: null,
    documentsVerified: null,
    documentsRequired: null,
    applicationDate: new Date(2025, 5, 1),
    updatedOn: new Date(2025, 5, 1),
    ...overrides,
  });
}
