import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { Examination } from './entities/examination.entity';
import { ClassPerformance, calculateGpa, summarizeClassPerformance } from './reporting/performance';
import { ClassPerformanceQueryDto } from './dtos/report-query.dto';

export interface SemesterSummary {
  semester: number;
  sgpa: number;
  subjects: number;
  passed: number;
}

export interface StudentTranscript {
  studentId: string;
  semesters: SemesterSummary[];
  cgpa: number;
}

@Injectable()
export class ExaminationReportsService {
  private readonly logger = new Logger(ExaminationReportsService.name);

  constructor(
    @InjectRepository(Examination)
    private readonly examinationRepository: Repository<Examination>,
  ) {}

  async calculateSgpa(studentId: string, semester: number): Promise<number> {
    const results = await this.examinationRepository.find({ where: { studentId, semester } });
    return calculateGpa(results);
  }

  async calculateCgpa(studentId: string): Promise<number> {
    const results = await this.examinationRepository.find({ where: { studentId } });
    return calculateGpa(results);
  }

  async getStudentTranscript(studentId: string): Promise<StudentTranscript> {
    const results = await this.examinationRepository.find({
      where: { studentId },
      order: { semester: 'ASC', subjectName: 'ASC' },
    });

    const bySemester = new Map<number, Examination[]>();
    for (const result of results) {
      const bucket = bySemester.get(result.semester) ?? [];
      bucket.push(result);
      bySemester.set(result.semester, bucket);
    }

    const semesters = [...bySemester.entries()]
      .sort(([a], [b]) => a - b)
      .map(([semester, rows]) => ({
        semester,
        sgpa: calculateGpa(rows),
        subjects: rows.length,
        passed: rows.filter((r) => r.isPass === true).length,
      }));

    return { studentId, semesters, cgpa: calculateGpa(results) };
  }

  async getClassPerformance(query: ClassPerformanceQueryDto): Promise<ClassPerformance> {
    const where: FindOptionsWhere<Examination> = {
      courseId: query.courseId,
      semester: query.semester,
      academicYear: query.academicYear,
    };
    if (query.subjectCode) where.subjectCode = query.subjectCode;

    const results = await this.examinationRepository.find({ where });
    const summary = summarizeClassPerformance(results);

    if (summary.statistics && !summary.statistics.maxMarksUniform) {
      this.logger.warn(
        `Mixed maxMarks for course ${query.courseId} semester ${query.semester} ${query.academicYear}; class average uses per-result percentages`,
      );
    }
    return summary;
  }
}
