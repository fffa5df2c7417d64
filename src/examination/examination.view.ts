import { Examination } from './entities/examination.entity';
import { ExamType } from './enums/exam-type.enum';
import { Grade } from './enums/grade.enum';
import { calculatePercentage } from './grading/grade-calculator';
import { ResultState, resultStateOf } from './examination.workflow';
import { courseDisplayName } from '../course/entities/course.entity';

export interface ExaminationView {
  id: string;
  studentId: string;
  studentName: string | null;
  courseId: string;
  courseName: string | null;
  examType: ExamType;
  subjectName: string;
  subjectCode: string;
  semester: number;
  academicYear: string;
  examDate: string;
  resultState: ResultState;
  resultDeclaredDate: string | null;
  maxMarks: number;
  marksObtained: number | null;
  internalMarks: number;
  externalMarks: number;
  percentage: number;
  grade: Grade | null;
  gradePoints: number | null;
  isPass: boolean | null;
  isAbsent: boolean;
  hasMalpractice: boolean;
  remarks: string | null;
  createdOn: string | null;
  resultProcessedBy?: string | null;
  updatedOn?: string | null;
}

export function toExaminationView(exam: Examination, includeSensitive = false): ExaminationView {
  const view: ExaminationView = {
    id: exam.id,
    studentId: exam.studentId,
    studentName: exam.student ? exam.student.name : null,
    courseId: exam.courseId,
    courseName: exam.course ? courseDisplayName(exam.course) : null,
    examType: exam.examType,
    subjectName: exam.subjectName,
    subjectCode: exam.subjectCode,
    semester: exam.semester,
    academicYear: exam.academicYear,
    examDate: exam.examDate.toISOString(),
    resultState: resultStateOf(exam),
    resultDeclaredDate: exam.resultDeclaredDate ? exam.resultDeclaredDate.toISOString() : null,
    maxMarks: exam.maxMarks,
    marksObtained: exam.marksObtained,
    internalMarks: exam.internalMarks,
    externalMarks: exam.externalMarks,
    percentage: calculatePercentage(exam.marksObtained, exam.maxMarks),
    grade: exam.grade,
    gradePoints: exam.gradePoints,
    isPass: exam.isPass,
    isAbsent: exam.isAbsent,
    hasMalpractice: exam.hasMalpractice,
    remarks: exam.remarks,
    createdOn: exam.createdOn ? exam.createdOn.toISOString() : null,
  };

  if (includeSensitive) {
    view.resultProcessedBy = exam.resultProcessedBy;
    view.updatedOn = exam.updatedOn ? exam.updatedOn.toISOString() : null;
  }
  return view;
}
