import { BadRequestException, ConflictException, UnauthorizedException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { AdmissionService } from './admission.service';
import { AdmissionApplication } from './entities/admission-application.entity';
import { ApplicationStatus } from './enums/application-status.enum';
import { APPLICATION_APPROVED_HANDLER } from './events/application-approved.event';
import { NOT_PENDING, NO_SEATS } from './admission.workflow';
import { buildApplication } from './testing/application.fixture';
import { DEFAULT_REQUIRED_DOCUMENTS } from './admission.checklist';
import { ConfigService } from '../config/config.service';
import { Course } from '../course/entities/course.entity';
import { CourseService } from '../course/course.service';
import { StaffService } from '../staff/staff.service';
import { Gender } from '../common/enums/gender.enum';

jest.mock('bcrypt', () => ({
  hash: jest.fn(async (plain: string) => `hashed:${plain}`),
  compare: jest.fn(async (plain: string, hash: string) => hash === `hashed:${plain}`),
}));

describe('AdmissionService', () => {
  let service: AdmissionService;

  const course = Object.assign(new Course(), {
    id: 'course-1',
    programLevel: 'B.Tech',
    courseName: 'Computer Science',
    courseCode: 'CS',
    totalSeats: 60,
    isActive: true,
  });

  const applicationRepository = { findOne: jest.fn(), find: jest.fn() };
  const manager = {
    count: jest.fn(),
    findOne: jest.fn(),
    create: jest.fn((_target: unknown, data: Partial<AdmissionApplication>) =>
      Object.assign(new AdmissionApplication(), data),
    ),
    save: jest.fn(async (app: AdmissionApplication) => Object.assign(app, { id: app.id ?? 'app-uuid-new' })),
  };
  const dataSource = {
    transaction: jest.fn(async (work: (m: typeof manager) => Promise<unknown>) => work(manager)),
  };
  const courseService = {
    findOne: jest.fn(),
    isAcceptingApplications: jest.fn(),
    getAvailableSeats: jest.fn(),
  };
  const staffService = { findActive: jest.fn() };
  const configService = { getNumber: jest.fn((_key: string, fallback: number) => fallback) };
  const approvedHandler = { handleApplicationApproved: jest.fn() };

  // Routes manager.findOne by entity so one transaction can load both rows.
  const loadInTransaction = (application: AdmissionApplication | null) => {
    manager.findOne.mockImplementation(async (target: unknown) => (target === Course ? course : application));
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AdmissionService,
        { provide: getRepositoryToken(AdmissionApplication), useValue: applicationRepository },
        { provide: DataSource, useValue: dataSource },
        { provide: CourseService, useValue: courseService },
        { provide: StaffService, useValue: staffService },
        { provide: ConfigService, useValue: configService },
        { provide: APPLICATION_APPROVED_HANDLER, useValue: approvedHandler },
      ],
    }).compile();

    service = module.get<AdmissionService>(AdmissionService);
  });

  describe('createApplication', () => {
    const dto = {
      name: 'Meera Iyer',
      email: 'meera@example.test',
      phone: '9000000003',
      dateOfBirth: '2007-02-11',
      gender: Gender.FEMALE,
      courseId: 'course-1',
      password: 'test-secret',
      twelfthPercentage: 88,
    };

    it('stores a submitted application with the default checklist', async () => {
      courseService.findOne.mockResolvedValueOnce(course);
      courseService.isAcceptingApplications.mockResolvedValueOnce(true);
      applicationRepository.findOne.mockResolvedValueOnce(null);
      manager.count.mockResolvedValueOnce(0);

      const view = await service.createApplication(dto, new Date(2025, 5, 1));

      expect(view.applicationId).toBe('ADM2025000001');
      expect(view.status).toBe(ApplicationStatus.SUBMITTED);
      expect(view.courseName).toBe('B.Tech in Computer Science');
      expect(view.documentsRequired).toHaveLength(6);
      expect(view.pendingDocuments).toEqual([...DEFAULT_REQUIRED_DOCUMENTS]);
      expect(view.tenthPercentage).toBeNull();
      expect(view.twelfthPercentage).toBe(88);
      expect(manager.save).toHaveBeenCalledWith(expect.objectContaining({ passwordHash: 'hashed:test-secret' }));
    });

    it('rejects a second live application for the same course', async () => {
      courseService.findOne.mockResolvedValueOnce(course);
      courseService.isAcceptingApplications.mockResolvedValueOnce(true);
      applicationRepository.findOne.mockResolvedValueOnce(buildApplication({ email: dto.email }));

      await expect(service.createApplication(dto)).rejects.toThrow(ConflictException);
      expect(dataSource.transaction).not.toHaveBeenCalled();
    });

    it('rejects a course that is not accepting applications', async () => {
      courseService.findOne.mockResolvedValueOnce(course);
      courseService.isAcceptingApplications.mockResolvedValueOnce(false);

      await expect(service.createApplication(dto)).rejects.toThrow(BadRequestException);
    });
  });

  it('numbers applications within the calendar year', async () => {
    manager.count.mockResolvedValueOnce(41);
    await expect(service.nextApplicationId(manager as unknown as EntityManager, new Date(2025, 8, 30))).resolves.toBe('ADM2025000042');
  });

  describe('approve', () => {
    it('creates the student and records the roll number', async () => {
      const application = buildApplication({ status: ApplicationStatus.UNDER_REVIEW });
      loadInTransaction(application);
      staffService.findActive.mockResolvedValueOnce({ id: 'staff-1' });
      courseService.getAvailableSeats.mockResolvedValueOnce(5);
      approvedHandler.handleApplicationApproved.mockResolvedValueOnce({ rollNo: '2025CS0007' });

      const response = await service.approve('ADM2025000042', { staffId: 'staff-1' });

      expect(response.success).toBe(true);
      expect(response.message).toBe(
        'Application approved. Student roll number: 2025CS0007, Temporary password: temp0042',
      );
      expect(response.application.status).toBe(ApplicationStatus.APPROVED);
      expect(response.application.studentId).toBe('2025CS0007');
      expect(response.application.staffId).toBe('staff-1');
      expect(courseService.getAvailableSeats).toHaveBeenCalledWith(course, manager);
      expect(approvedHandler.handleApplicationApproved).toHaveBeenCalledWith(
        expect.objectContaining({ applicationId: 'ADM2025000042', temporaryPassword: 'temp0042' }),
        manager,
      );
      expect(manager.save).toHaveBeenCalledWith(application);
    });

    it('does not create a student when the course is full', async () => {
      const application = buildApplication();
      loadInTransaction(application);
      staffService.findActive.mockResolvedValueOnce({ id: 'staff-1' });
      courseService.getAvailableSeats.mockResolvedValueOnce(0);

      const response = await service.approve('ADM2025000042', { staffId: 'staff-1' });

      expect(response.success).toBe(false);
      expect(response.message).toBe(NO_SEATS);
      expect(response.application.status).toBe(ApplicationStatus.SUBMITTED);
      expect(response.application.studentId).toBeNull();
      expect(approvedHandler.handleApplicationApproved).not.toHaveBeenCalled();
      expect(manager.save).not.toHaveBeenCalled();
    });
  });

  it('does not save a rejected decline', async () => {
    loadInTransaction(buildApplication({ status: ApplicationStatus.APPROVED, studentId: '2025CS0001' }));
    staffService.findActive.mockResolvedValueOnce({ id: 'staff-1' });

    const response = await service.decline('ADM2025000042', { staffId: 'staff-1', reason: 'Late' });

    expect(response).toEqual(expect.objectContaining({ success: false, message: NOT_PENDING }));
    expect(manager.save).not.toHaveBeenCalled();
  });

  it('drops verified documents from the pending list', async () => {
    loadInTransaction(
      buildApplication({
        documentsRequired: JSON.stringify(['Passport Photo', 'Transfer Certificate']),
        documentsVerified: JSON.stringify({ 'Passport Photo': false, 'Transfer Certificate': false }),
      }),
    );

    const response = await service.verifyDocument('ADM2025000042', { document: 'Passport Photo', verified: true });

    expect(response.success).toBe(true);
    expect(response.application.pendingDocuments).toEqual(['Transfer Certificate']);
  });

  describe('trackApplication', () => {
    it('returns the application for the right password', async () => {
      applicationRepository.findOne.mockResolvedValueOnce(buildApplication());
      const view = await service.trackApplication('ADM2025000042', 'test-secret');
      expect(view.applicationId).toBe('ADM2025000042');
      expect(view.staffId).toBeUndefined();
    });

    it('rejects a wrong password', async () => {
      applicationRepository.findOne.mockResolvedValueOnce(buildApplication());
      await expect(service.trackApplication('ADM2025000042', 'wrong')).rejects.toThrow(UnauthorizedException);
    });
  });

  it('reports eligibility with the age at application', async () => {
    applicationRepository.findOne.mockResolvedValueOnce(buildApplication());

    await expect(service.checkEligibility('ADM2025000042')).resolves.toEqual({
      applicationId: 'ADM2025000042',
      ageAtApplication: 18,
      eligible: true,
      message: 'Eligible for admission',
    });
  });

  it('summarizes statistics and echoes the date range', async () => {
    applicationRepository.find.mockResolvedValueOnce([
      buildApplication({ status: ApplicationStatus.APPROVED, processedOn: new Date(2025, 5, 3), course }),
      buildApplication({ status: ApplicationStatus.SUBMITTED, course }),
    ]);

    const report = await service.getStatistics({ dateFrom: '2025-01-01' });

    expect(report.summary.totalApplications).toBe(2);
    expect(report.summary.conversionRate).toBe(50);
    expect(report.summary.averageProcessingTimeDays).toBe(2);
    expect(report.byCourse).toEqual({ 'B.Tech in Computer Science': 2 });
    expect(report.dateRange).toEqual({ from: '2025-01-01', to: null });
  });
});
