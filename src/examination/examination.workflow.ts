import { Examination } from './entities/examination.entity';
import { calculateGrade, isPassingMarks } from './grading/grade-calculator';
import { WorkflowResult, fail, succeed } from '../common/types/workflow-result';

export interface DeclareResultInput {
  marksObtained: number;
  internalMarks?: number | null;
  externalMarks?: number | null;
  isAbsent?: boolean;
  hasMalpractice?: boolean;
  remarks?: string | null;
  staffId?: string | null;
}

export interface UpdateResultInput {
  marksObtained: number;
  internalMarks?: number | null;
  externalMarks?: number | null;
  isAbsent?: boolean;
  hasMalpractice?: boolean;
  remarks?: string | null;
  staffId?: string | null;
}

export type ResultState = 'pending' | 'declared';

export function resultStateOf(exam: Pick<Examination, 'resultDeclaredDate'>): ResultState {
  return exam.resultDeclaredDate ? 'declared' : 'pending';
}

function applyMarks(
  exam: Examination,
  input: { marksObtained: number; internalMarks?: number | null; externalMarks?: number | null },
  isAbsent: boolean,
  hasMalpractice: boolean,
  previousInternal: number,
) {
  exam.isAbsent = isAbsent;
  exam.hasMalpractice = hasMalpractice;

  if (isAbsent || hasMalpractice) {
    exam.marksObtained = 0;
    exam.internalMarks = 0;
    exam.externalMarks = 0;
  } else {
    const internal = input.internalMarks ?? previousInternal;
    exam.marksObtained = input.marksObtained;
    exam.internalMarks = internal;
    exam.externalMarks = input.externalMarks ?? input.marksObtained - internal;
  }

  const gradeInput = {
    marksObtained: exam.marksObtained,
    maxMarks: exam.maxMarks,
    isAbsent,
    hasMalpractice,
  };
  const outcome = calculateGrade(gradeInput);
  exam.grade = outcome ? outcome.grade : null;
  exam.gradePoints = outcome ? outcome.gradePoints : null;
  exam.isPass = isPassingMarks(gradeInput);
}

/**
 * Records marks and grade. Always succeeds; a repeated call overwrites the
 * previous declaration. Absence or malpractice zeroes every mark.
 */
export function declareResult(exam: Examination, input: DeclareResultInput, now: Date = new Date()): WorkflowResult {
  applyMarks(exam, input, input.isAbsent ?? false, input.hasMalpractice ?? false, 0);
  exam.remarks = input.remarks ?? null;
  exam.resultProcessedBy = input.staffId ?? null;
  exam.resultDeclaredDate = now;

  return succeed(`Result declared successfully. Grade: ${exam.grade ?? 'N/A'}`);
}

/**
 * Amends a declared result. Flags and internal marks not supplied keep their
 * current values, so the new total is checked against the retained internal
 * marks.
 */
export function updateResult(exam: Examination, input: UpdateResultInput, now: Date = new Date()): WorkflowResult {
  if (resultStateOf(exam) === 'pending') {
    return fail('Result not yet declared');
  }

  const isAbsent = input.isAbsent ?? exam.isAbsent;
  const hasMalpractice = input.hasMalpractice ?? exam.hasMalpractice;
  const internal = input.internalMarks ?? exam.internalMarks;
  if (!isAbsent && !hasMalpractice && internal > input.marksObtained) {
    return fail('Internal marks cannot exceed marks obtained');
  }

  applyMarks(exam, input, isAbsent, hasMalpractice, exam.internalMarks);
  if (input.remarks !== undefined) exam.remarks = input.remarks;
  if (input.staffId !== undefined) exam.resultProcessedBy = input.staffId;
  exam.updatedOn = now;

  return succeed('Result updated successfully');
}
