import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, IsNull, Repository } from 'typeorm';
import { Examination } from './entities/examination.entity';
import { ExamType } from './enums/exam-type.enum';
import { ScheduleExaminationDto } from './dtos/schedule-examination.dto';
import { DeclareResultDto, UpdateResultDto } from './dtos/result.dto';
import { declareResult, resultStateOf, updateResult } from './examination.workflow';
import { ExaminationView, toExaminationView } from './examination.view';
import { WorkflowResult } from '../common/types/workflow-result';
import { StaffService } from '../staff/staff.service';

export interface ResultWorkflowResponse extends WorkflowResult {
  examination: ExaminationView;
}

const RESULT_RELATIONS = ['student', 'course'];

@Injectable()
export class ExaminationService {
  private readonly logger = new Logger(ExaminationService.name);

  constructor(
    @InjectRepository(Examination)
    private readonly examinationRepository: Repository<Examination>,
    private readonly dataSource: DataSource,
    private readonly staffService: StaffService,
  ) {}

  async schedule(dto: ScheduleExaminationDto): Promise<ExaminationView> {
    const exam = this.examinationRepository.create({
      studentId: dto.studentId,
      courseId: dto.courseId,
      examType: dto.examType ?? ExamType.SEMESTER,
      subjectName: dto.subjectName,
      subjectCode: dto.subjectCode,
      semester: dto.semester,
      academicYear: dto.academicYear,
      examDate: new Date(dto.examDate),
      maxMarks: dto.maxMarks ?? 100,
      marksObtained: null,
      grade: null,
      gradePoints: null,
      isPass: null,
      resultDeclaredDate: null,
    });
    const saved = await this.examinationRepository.save(exam);
    return toExaminationView(saved);
  }

  async findOne(id: string, includeSensitive = false): Promise<ExaminationView> {
    const exam = await this.examinationRepository.findOne({ where: { id }, relations: RESULT_RELATIONS });
    if (!exam) throw new NotFoundException('Examination not found');
    return toExaminationView(exam, includeSensitive);
  }

  async declareResult(id: string, dto: DeclareResultDto): Promise<ResultWorkflowResponse> {
    if (dto.staffId) await this.staffService.findActive(dto.staffId);

    return this.dataSource.transaction(async (manager) => {
      const exam = await this.loadForUpdate(manager, id);
      this.assertWithinMaxMarks(exam, dto);

      const result = declareResult(exam, { ...dto, marksObtained: dto.marksObtained ?? 0 });
      await manager.save(exam);

      this.logger.log(`Declared result for examination ${id}: grade ${exam.grade}`);
      return { ...result, examination: toExaminationView(exam, true) };
    });
  }

  async updateResult(id: string, dto: UpdateResultDto): Promise<ResultWorkflowResponse> {
    if (dto.staffId) await this.staffService.findActive(dto.staffId);

    return this.dataSource.transaction(async (manager) => {
      const exam = await this.loadForUpdate(manager, id);
      if (resultStateOf(exam) === 'declared') {
        this.assertWithinMaxMarks(exam, {
          ...dto,
          isAbsent: dto.isAbsent ?? exam.isAbsent,
          hasMalpractice: dto.hasMalpractice ?? exam.hasMalpractice,
          internalMarks: dto.internalMarks ?? exam.internalMarks,
        });
      }

      const result = updateResult(exam, { ...dto, marksObtained: dto.marksObtained ?? 0 });
      if (result.success) {
        await manager.save(exam);
        this.logger.log(`Amended result for examination ${id}: grade ${exam.grade}`);
      } else {
        this.logger.warn(`Rejected amendment for examination ${id}: ${result.message}`);
      }
      return { ...result, examination: toExaminationView(exam, true) };
    });
  }

  async getStudentResults(studentId: string, semester?: number): Promise<ExaminationView[]> {
    const results = await this.examinationRepository.find({
      where: semester === undefined ? { studentId } : { studentId, semester },
      relations: RESULT_RELATIONS,
      order: { semester: 'ASC', subjectName: 'ASC' },
    });
    return results.map((r) => toExaminationView(r));
  }

  async getSemesterResults(courseId: string, semester: number, academicYear: string): Promise<ExaminationView[]> {
    const results = await this.examinationRepository.find({
      where: { courseId, semester, academicYear },
      relations: RESULT_RELATIONS,
      order: { studentId: 'ASC', subjectCode: 'ASC' },
    });
    return results.map((r) => toExaminationView(r));
  }

  async getPendingResults(): Promise<ExaminationView[]> {
    const results = await this.examinationRepository.find({
      where: { resultDeclaredDate: IsNull() },
      relations: RESULT_RELATIONS,
      order: { examDate: 'ASC' },
    });
    return results.map((r) => toExaminationView(r));
  }

  private async loadForUpdate(manager: EntityManager, id: string): Promise<Examination> {
    const exam = await manager.findOne(Examination, { where: { id } });
    if (!exam) throw new NotFoundException('Examination not found');
    return exam;
  }

  private assertWithinMaxMarks(exam: Examination, dto: DeclareResultDto) {
    if (dto.isAbsent || dto.hasMalpractice) return;
    if (dto.marksObtained !== undefined && dto.marksObtained > exam.maxMarks) {
      throw new BadRequestException(`marksObtained cannot exceed maxMarks (${exam.maxMarks})`);
    }
    if (dto.internalMarks !== undefined && dto.marksObtained !== undefined && dto.internalMarks > dto.marksObtained) {
      throw new BadRequestException('internalMarks cannot exceed marksObtained');
    }
  }
}
