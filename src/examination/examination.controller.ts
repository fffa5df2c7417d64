import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Param,
  ParseBoolPipe,
  ParseIntPipe,
  ParseUUIDPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ExaminationService, ResultWorkflowResponse } from './examination.service';
import { ExaminationReportsService } from './examination-reports.service';
import { ScheduleExaminationDto } from './dtos/schedule-examination.dto';
import { DeclareResultDto, UpdateResultDto } from './dtos/result.dto';
import { ClassPerformanceQueryDto, RequiredSemesterQueryDto, SemesterQueryDto } from './dtos/report-query.dto';

@ApiTags('Examinations')
@Controller('examinations')
export class ExaminationController {
  constructor(
    private readonly examinationService: ExaminationService,
    private readonly reportsService: ExaminationReportsService,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Schedule an examination attempt' })
  schedule(@Body() dto: ScheduleExaminationDto) {
    return this.examinationService.schedule(dto);
  }

  @Get('pending')
  @ApiOperation({ summary: 'Attempts without a declared result' })
  pending() {
    return this.examinationService.getPendingResults();
  }

  @Get('class-performance')
  @ApiOperation({ summary: 'Pass rate and mark statistics for a course semester' })
  classPerformance(@Query() query: ClassPerformanceQueryDto) {
    return this.reportsService.getClassPerformance(query);
  }

  @Get('courses/:courseId/semesters/:semester')
  @ApiOperation({ summary: 'All results of a course semester' })
  semesterResults(
    @Param('courseId', ParseUUIDPipe) courseId: string,
    @Param('semester', ParseIntPipe) semester: number,
    @Query('academicYear') academicYear: string,
  ) {
    if (!academicYear) throw new BadRequestException('academicYear is required');
    return this.examinationService.getSemesterResults(courseId, semester, academicYear);
  }

  @Get('students/:studentId/results')
  studentResults(@Param('studentId') studentId: string, @Query() query: SemesterQueryDto) {
    return this.examinationService.getStudentResults(studentId, query.semester);
  }

  @Get('students/:studentId/sgpa')
  async sgpa(@Param('studentId') studentId: string, @Query() query: RequiredSemesterQueryDto) {
    const sgpa = await this.reportsService.calculateSgpa(studentId, query.semester);
    return { studentId, semester: query.semester, sgpa };
  }

  @Get('students/:studentId/cgpa')
  async cgpa(@Param('studentId') studentId: string) {
    const cgpa = await this.reportsService.calculateCgpa(studentId);
    return { studentId, cgpa };
  }

  @Get('students/:studentId/transcript')
  transcript(@Param('studentId') studentId: string) {
    return this.reportsService.getStudentTranscript(studentId);
  }

  @Get(':id')
  findOne(
    @Param('id', ParseUUIDPipe) id: string,
    @Query('includeSensitive', new ParseBoolPipe({ optional: true })) includeSensitive?: boolean,
  ) {
    return this.examinationService.findOne(id, includeSensitive ?? false);
  }

  @Post(':id/declare')
  @ApiOperation({ summary: 'Declare the result of an attempt' })
  declare(@Param('id', ParseUUIDPipe) id: string, @Body() dto: DeclareResultDto) {
    return this.examinationService.declareResult(id, dto);
  }

  @Put(':id/result')
  @ApiOperation({ summary: 'Amend a declared result' })
  @ApiResponse({ status: 400, description: 'Result not yet declared' })
  async update(@Param('id', ParseUUIDPipe) id: string, @Body() dto: UpdateResultDto): Promise<ResultWorkflowResponse> {
    const response = await this.examinationService.updateResult(id, dto);
    if (!response.success) throw new BadRequestException(response.message);
    return response;
  }
}
