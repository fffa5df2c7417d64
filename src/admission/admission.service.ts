import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Between,
  DataSource,
  EntityManager,
  FindOptionsWhere,
  In,
  LessThanOrEqual,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import { endOfDay, endOfYear, startOfYear } from 'date-fns';
import { AdmissionApplication } from './entities/admission-application.entity';
import { ApplicationStatus } from './enums/application-status.enum';
import { GeneratedBy } from './enums/generated-by.enum';
import { CreateApplicationDto } from './dtos/create-application.dto';
import {
  ApproveApplicationDto,
  DeclineApplicationDto,
  RequestDocumentsDto,
  VerifyDocumentDto,
  WaitlistApplicationDto,
} from './dtos/decision.dto';
import { ListApplicationsQueryDto, StatisticsQueryDto } from './dtos/application-query.dto';
import {
  approveApplication,
  declineApplication,
  markUnderReview,
  requestDocuments,
  submitApplication,
  verifyDocument,
  waitlistApplication,
} from './admission.workflow';
import {
  ApplicationStatusView,
  ApplicationView,
  toApplicationStatusView,
  toApplicationView,
} from './admission.view';
import { AdmissionStatistics, summarizeAdmissions } from './admission.statistics';
import { EligibilityPolicy, EligibilityResult, checkEligibility, getAgeAtApplication } from './eligibility';
import { formatApplicationId } from './utils/application-id.util';
import {
  APPLICATION_APPROVED_HANDLER,
  ApplicationApprovedHandler,
} from './events/application-approved.event';
import { WorkflowResult, succeed } from '../common/types/workflow-result';
import { checkPassword, hashPassword } from '../common/utils/credentials.util';
import { ConfigService } from '../config/config.service';
import { Course, courseDisplayName } from '../course/entities/course.entity';
import { CourseService } from '../course/course.service';
import { StaffService } from '../staff/staff.service';

export interface ApplicationWorkflowResponse extends WorkflowResult {
  application: ApplicationView;
}

export interface EligibilityReport extends EligibilityResult {
  applicationId: string;
  ageAtApplication: number;
}

export interface AdmissionStatisticsReport extends AdmissionStatistics {
  dateRange: { from: string | null; to: string | null };
}

type WorkflowStep = (app: AdmissionApplication, manager: EntityManager) => Promise<WorkflowResult> | WorkflowResult;

const PENDING_STATUSES = [ApplicationStatus.SUBMITTED, ApplicationStatus.UNDER_REVIEW];
// A live or accepted application blocks a new one for the same course.
const DUPLICATE_STATUSES = [...PENDING_STATUSES, ApplicationStatus.APPROVED];

@Injectable()
export class AdmissionService {
  private readonly logger = new Logger(AdmissionService.name);
  private readonly eligibilityPolicy: EligibilityPolicy;

  constructor(
    @InjectRepository(AdmissionApplication)
    private readonly applicationRepository: Repository<AdmissionApplication>,
    private readonly dataSource: DataSource,
    private readonly courseService: CourseService,
    private readonly staffService: StaffService,
    private readonly configService: ConfigService,
    @Inject(APPLICATION_APPROVED_HANDLER)
    private readonly approvedHandler: ApplicationApprovedHandler,
  ) {
    this.eligibilityPolicy = {
      minAge: configService.getNumber('ADMISSION_MIN_AGE', 17),
      maxAge: configService.getNumber('ADMISSION_MAX_AGE', 25),
      minPercentage: configService.getNumber('ADMISSION_MIN_PERCENTAGE', 60),
    };
  }

  async createApplication(dto: CreateApplicationDto, now: Date = new Date()): Promise<ApplicationView> {
    const course = await this.courseService.findOne(dto.courseId);
    if (!(await this.courseService.isAcceptingApplications(course))) {
      throw new BadRequestException('Course is not accepting applications currently');
    }

    const existing = await this.applicationRepository.findOne({
      where: { email: dto.email, courseId: dto.courseId, status: In(DUPLICATE_STATUSES) },
    });
    if (existing) {
      throw new ConflictException({
        message: 'Application already exists for this course',
        applicationId: existing.applicationId,
      });
    }

    const passwordHash = await hashPassword(dto.password, this.configService.getNumber('BCRYPT_ROUNDS', 10));

    const saved = await this.dataSource.transaction(async (manager) => {
      const application = manager.create(AdmissionApplication, {
        applicationId: await this.nextApplicationId(manager, now),
        name: dto.name,
        email: dto.email,
        phone: dto.phone,
        dateOfBirth: dto.dateOfBirth.slice(0, 10),
        gender: dto.gender,
        address: dto.address ?? null,
        city: dto.city ?? null,
        state: dto.state ?? null,
        pincode: dto.pincode ?? null,
        fatherName: dto.fatherName ?? null,
        motherName: dto.motherName ?? null,
        guardianName: dto.guardianName ?? null,
        guardianPhone: dto.guardianPhone ?? null,
        guardianEmail: dto.guardianEmail ?? null,
        emergencyContact: dto.emergencyContact ?? null,
        medicalConditions: dto.medicalConditions ?? null,
        previousEducation: dto.previousEducation ?? null,
        courseId: course.id,
        tenthPercentage: dto.tenthPercentage ?? null,
        twelfthPercentage: dto.twelfthPercentage ?? null,
        entranceExamScore: dto.entranceExamScore ?? null,
        passwordHash,
        status: ApplicationStatus.SUBMITTED,
        generatedBy: dto.generatedBy ?? GeneratedBy.STUDENT,
        staffId: null,
        studentId: null,
        remarks: null,
        rejectionReason: null,
        processedOn: null,
        documentsRequired: null,
        documentsVerified: null,
        applicationDate: now,
      });
      submitApplication(application);
      return manager.save(application);
    });

    saved.course = course;
    this.logger.log(`New admission application submitted: ${saved.applicationId}`);
    return toApplicationView(saved);
  }

  /** Serial counts the applications already dated in the same calendar year. */
  async nextApplicationId(manager: EntityManager, applicationDate: Date): Promise<string> {
    const existing = await manager.count(AdmissionApplication, {
      where: { applicationDate: Between(startOfYear(applicationDate), endOfYear(applicationDate)) },
    });
    return formatApplicationId(applicationDate.getFullYear(), existing + 1);
  }

  async findByApplicationId(applicationId: string): Promise<AdmissionApplication> {
    const application = await this.applicationRepository.findOne({
      where: { applicationId },
      relations: ['course'],
    });
    if (!application) throw new NotFoundException('Application not found');
    return application;
  }

  async getApplication(applicationId: string, includeSensitive = false): Promise<ApplicationView> {
    return toApplicationView(await this.findByApplicationId(applicationId), includeSensitive);
  }

  async getStatusView(applicationId: string): Promise<ApplicationStatusView> {
    return toApplicationStatusView(await this.findByApplicationId(applicationId));
  }

  async trackApplication(applicationId: string, password: string): Promise<ApplicationView> {
    const application = await this.findByApplicationId(applicationId);
    if (!(await checkPassword(application, password))) {
      throw new UnauthorizedException('Invalid application ID or password');
    }
    return toApplicationView(application);
  }

  async list(query: ListApplicationsQueryDto): Promise<ApplicationView[]> {
    const where: FindOptionsWhere<AdmissionApplication> = {};
    if (query.status) where.status = query.status;
    if (query.courseId) where.courseId = query.courseId;

    const applications = await this.applicationRepository.find({
      where,
      relations: ['course'],
      order: { applicationDate: 'DESC' },
    });
    return applications.map((a) => toApplicationView(a));
  }

  async getPendingApplications(): Promise<ApplicationView[]> {
    const applications = await this.applicationRepository.find({
      where: { status: In(PENDING_STATUSES) },
      relations: ['course'],
      order: { applicationDate: 'ASC' },
    });
    return applications.map((a) => toApplicationView(a));
  }

  async checkEligibility(applicationId: string): Promise<EligibilityReport> {
    const application = await this.findByApplicationId(applicationId);
    return {
      applicationId,
      ageAtApplication: getAgeAtApplication(application),
      ...checkEligibility(application, this.eligibilityPolicy),
    };
  }

  async markUnderReview(applicationId: string, remarks?: string): Promise<ApplicationWorkflowResponse> {
    return this.runWorkflow(applicationId, null, (app) => markUnderReview(app, remarks));
  }

  async approve(applicationId: string, dto: ApproveApplicationDto): Promise<ApplicationWorkflowResponse> {
    return this.runWorkflow(applicationId, dto.staffId, async (app, manager) => {
      const course = await manager.findOne(Course, { where: { id: app.courseId } });
      if (!course) throw new NotFoundException('Course not found');

      const seats = await this.courseService.getAvailableSeats(course, manager);
      const decision = approveApplication(app, { staffId: dto.staffId, remarks: dto.remarks }, seats);
      if (!decision.success) return decision;

      const { rollNo } = await this.approvedHandler.handleApplicationApproved(decision.event, manager);
      app.studentId = rollNo;
      return succeed(
        `Application approved. Student roll number: ${rollNo}, Temporary password: ${decision.event.temporaryPassword}`,
      );
    });
  }

  async decline(applicationId: string, dto: DeclineApplicationDto): Promise<ApplicationWorkflowResponse> {
    return this.runWorkflow(applicationId, dto.staffId, (app) =>
      declineApplication(app, { staffId: dto.staffId, reason: dto.reason }),
    );
  }

  async waitlist(applicationId: string, dto: WaitlistApplicationDto): Promise<ApplicationWorkflowResponse> {
    return this.runWorkflow(applicationId, dto.staffId, (app) =>
      waitlistApplication(app, { staffId: dto.staffId, remarks: dto.remarks }),
    );
  }

  async requestDocuments(applicationId: string, dto: RequestDocumentsDto): Promise<ApplicationWorkflowResponse> {
    return this.runWorkflow(applicationId, dto.staffId, (app) =>
      requestDocuments(app, { staffId: dto.staffId, documents: dto.documents, remarks: dto.remarks }),
    );
  }

  async verifyDocument(applicationId: string, dto: VerifyDocumentDto): Promise<ApplicationWorkflowResponse> {
    return this.runWorkflow(applicationId, null, (app) => verifyDocument(app, dto.document, dto.verified));
  }

  async getStatistics(query: StatisticsQueryDto): Promise<AdmissionStatisticsReport> {
    const from = query.dateFrom ? new Date(query.dateFrom) : null;
    const to = query.dateTo ? endOfDay(new Date(query.dateTo)) : null;

    const where: FindOptionsWhere<AdmissionApplication> = {};
    if (from && to) where.applicationDate = Between(from, to);
    else if (from) where.applicationDate = MoreThanOrEqual(from);
    else if (to) where.applicationDate = LessThanOrEqual(to);

    const applications = await this.applicationRepository.find({ where, relations: ['course'] });
    const statistics = summarizeAdmissions(
      applications.map((a) => ({
        status: a.status,
        applicationDate: a.applicationDate,
        processedOn: a.processedOn,
        updatedOn: a.updatedOn,
        courseName: a.course ? courseDisplayName(a.course) : 'Unknown',
      })),
    );
    return { ...statistics, dateRange: { from: query.dateFrom ?? null, to: query.dateTo ?? null } };
  }

  /**
   * Loads the application inside a transaction, runs one workflow step and
   * persists only when the step succeeds.
   */
  private async runWorkflow(
    applicationId: string,
    staffId: string | null,
    step: WorkflowStep,
  ): Promise<ApplicationWorkflowResponse> {
    if (staffId) await this.staffService.findActive(staffId);

    return this.dataSource.transaction(async (manager) => {
      const application = await manager.findOne(AdmissionApplication, {
        where: { applicationId },
        relations: ['course'],
      });
      if (!application) throw new NotFoundException('Application not found');

      const previousStatus = application.status;
      const result = await step(application, manager);
      if (result.success) {
        await manager.save(application);
        this.logger.log(
          `Application ${applicationId} ${previousStatus} -> ${application.status}: ${result.message}`,
        );
      } else {
        this.logger.warn(`Application ${applicationId} unchanged: ${result.message}`);
      }
      return { success: result.success, message: result.message, application: toApplicationView(application, true) };
    });
  }
}
