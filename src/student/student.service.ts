import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { Student } from './entities/student.entity';
import { Course } from '../course/entities/course.entity';
import { ConfigService } from '../config/config.service';
import { hashPassword } from '../common/utils/credentials.util';
import {
  ApplicationApprovedEvent,
  ApplicationApprovedHandler,
  ApplicationApprovedOutcome,
} from '../admission/events/application-approved.event';

export function formatRollNumber(admissionYear: number, courseCode: string, serial: number): string {
  return `${admissionYear}${courseCode}${String(serial).padStart(4, '0')}`;
}

@Injectable()
export class StudentsService implements ApplicationApprovedHandler {
  private readonly logger = new Logger(StudentsService.name);

  constructor(private readonly configService: ConfigService) {}

  /** Serial is scoped to the course and admission year. */
  async generateRollNumber(course: Course, admissionYear: number, manager: EntityManager): Promise<string> {
    const existing = await manager.count(Student, {
      where: { courseId: course.id, admissionYear },
    });
    return formatRollNumber(admissionYear, course.courseCode, existing + 1);
  }

  async handleApplicationApproved(
    event: ApplicationApprovedEvent,
    manager: EntityManager,
  ): Promise<ApplicationApprovedOutcome> {
    const course = await manager.findOne(Course, { where: { id: event.courseId } });
    if (!course) {
      throw new NotFoundException(`Course ${event.courseId} not found`);
    }

    const admissionYear = event.approvedOn.getFullYear();
    const rollNo = await this.generateRollNumber(course, admissionYear, manager);
    const rounds = this.configService.getNumber('BCRYPT_ROUNDS', 10);

    const student = manager.create(Student, {
      ...event.applicant,
      rollNo,
      courseId: course.id,
      admissionYear,
      currentSemester: 1,
      passwordHash: await hashPassword(event.temporaryPassword, rounds),
      isActive: true,
    });
    await manager.save(student);

    this.logger.log(`Created student ${rollNo} from application ${event.applicationId}`);
    return { rollNo };
  }
}
