import { Examination } from './entities/examination.entity';
import { ExamType } from './enums/exam-type.enum';
import { Grade } from './enums/grade.enum';
import { declareResult, resultStateOf, updateResult } from './examination.workflow';

function scheduledExam(overrides: Partial<Examination> = {}): Examination {
  const exam = new Examination();
  Object.assign(exam, {
    id: 'exam-1',
    studentId: '2025CS0001',
    courseId: 'course-1',
    examType: ExamType.SEMESTER,
    subjectName: 'Data Structures',
    subjectCode: 'CS201',
    semester: 3,
    academicYear: '2025-26',
    examDate: new Date(2025, 10, 20),
    resultDeclaredDate: null,
    maxMarks: 100,
    marksObtained: null,
    grade: null,
    gradePoints: null,
    internalMarks: 0,
    externalMarks: 0,
    isPass: null,
    isAbsent: false,
    hasMalpractice: false,
    remarks: null,
    resultProcessedBy: null,
    ...overrides,
  });
  return exam;
}

describe('examination workflow', () => {
  const declaredOn = new Date(2025, 11, 5);

  describe('declareResult', () => {
    it('records marks, grade and pass flag', () => {
      const exam = scheduledExam();

      const result = declareResult(exam, { marksObtained: 75, internalMarks: 25, staffId: 'staff-1' }, declaredOn);

      expect(result).toEqual({ success: true, message: 'Result declared successfully. Grade: A' });
      expect(exam.grade).toBe(Grade.A);
      expect(exam.gradePoints).toBe(8);
      expect(exam.isPass).toBe(true);
      expect(exam.internalMarks).toBe(25);
      expect(exam.externalMarks).toBe(50);
      expect(exam.resultProcessedBy).toBe('staff-1');
      expect(exam.resultDeclaredDate).toBe(declaredOn);
      expect(resultStateOf(exam)).toBe('declared');
    });

    it('keeps an explicit zero for external marks', () => {
      const exam = scheduledExam();
      declareResult(exam, { marksObtained: 30, internalMarks: 30, externalMarks: 0 }, declaredOn);
      expect(exam.externalMarks).toBe(0);
    });

    it('zeroes marks for an absent student', () => {
      const exam = scheduledExam();

      const result = declareResult(exam, { marksObtained: 60, internalMarks: 20, isAbsent: true }, declaredOn);

      expect(result.message).toBe('Result declared successfully. Grade: AB');
      expect(exam.grade).toBe(Grade.AB);
      expect(exam.gradePoints).toBe(0);
      expect(exam.marksObtained).toBe(0);
      expect(exam.internalMarks).toBe(0);
      expect(exam.externalMarks).toBe(0);
      expect(exam.isPass).toBe(false);
    });

    it('records malpractice as MP', () => {
      const exam = scheduledExam();
      declareResult(exam, { marksObtained: 88, hasMalpractice: true }, declaredOn);
      expect(exam.grade).toBe(Grade.MP);
      expect(exam.isPass).toBe(false);
    });

    it('overwrites an earlier declaration', () => {
      const exam = scheduledExam();
      declareResult(exam, { marksObtained: 35, remarks: 'Recheck' }, declaredOn);
      declareResult(exam, { marksObtained: 92 }, declaredOn);
      expect(exam.grade).toBe(Grade.O);
      expect(exam.remarks).toBeNull();
    });
  });

  describe('updateResult', () => {
    it('fails on an undeclared result without touching it', () => {
      const exam = scheduledExam();

      const result = updateResult(exam, { marksObtained: 80 });

      expect(result).toEqual({ success: false, message: 'Result not yet declared' });
      expect(exam.marksObtained).toBeNull();
      expect(exam.grade).toBeNull();
      expect(exam.isPass).toBeNull();
    });

    it('regrades and keeps omitted fields', () => {
      const exam = scheduledExam();
      declareResult(exam, { marksObtained: 38, internalMarks: 18, remarks: 'Borderline', staffId: 'staff-1' }, declaredOn);
      const updatedOn = new Date(2025, 11, 9);

      const result = updateResult(exam, { marksObtained: 52 }, updatedOn);

      expect(result).toEqual({ success: true, message: 'Result updated successfully' });
      expect(exam.grade).toBe(Grade.C);
      expect(exam.gradePoints).toBe(5);
      expect(exam.isPass).toBe(true);
      expect(exam.internalMarks).toBe(18);
      expect(exam.externalMarks).toBe(34);
      expect(exam.remarks).toBe('Borderline');
      expect(exam.resultProcessedBy).toBe('staff-1');
      expect(exam.resultDeclaredDate).toBe(declaredOn);
      expect(exam.updatedOn).toBe(updatedOn);
    });

    it('rejects a total below the retained internal marks', () => {
      const exam = scheduledExam();
      declareResult(exam, { marksObtained: 80, internalMarks: 30 }, declaredOn);

      expect(updateResult(exam, { marksObtained: 20 })).toEqual({
        success: false,
        message: 'Internal marks cannot exceed marks obtained',
      });
      expect(exam.marksObtained).toBe(80);
      expect(exam.internalMarks).toBe(30);
      expect(exam.externalMarks).toBe(50);
      expect(exam.grade).toBe(Grade.A_PLUS);
    });

    it('accepts a lower total once internal marks are lowered with it', () => {
      const exam = scheduledExam();
      declareResult(exam, { marksObtained: 80, internalMarks: 30 }, declaredOn);

      expect(updateResult(exam, { marksObtained: 20, internalMarks: 10 }).success).toBe(true);
      expect(exam.externalMarks).toBe(10);
    });

    it('keeps an absence flag unless it is cleared', () => {
      const exam = scheduledExam();
      declareResult(exam, { marksObtained: 0, isAbsent: true }, declaredOn);

      updateResult(exam, { marksObtained: 70 });
      expect(exam.grade).toBe(Grade.AB);

      updateResult(exam, { marksObtained: 70, isAbsent: false });
      expect(exam.grade).toBe(Grade.A);
      expect(exam.marksObtained).toBe(70);
    });
  });
});
