import { Grade } from '../enums/grade.enum';
import { roundTo } from '../../common/utils/number.util';

export interface GradeInput {
  marksObtained: number | null;
  maxMarks: number;
  isAbsent: boolean;
  hasMalpractice: boolean;
}

export interface GradeOutcome {
  grade: Grade;
  gradePoints: number;
}

export const PASS_FRACTION = 0.4;

// Lower bounds (inclusive), highest first. Anything under the last bound is F.
const GRADE_BOUNDARIES: ReadonlyArray<readonly [number, Grade]> = [
  [90, Grade.O],
  [80, Grade.A_PLUS],
  [70, Grade.A],
  [60, Grade.B_PLUS],
  [55, Grade.B],
  [50, Grade.C],
  [40, Grade.P],
];

export function gradeForPercentage(percentage: number): Grade {
  for (const [lowerBound, grade] of GRADE_BOUNDARIES) {
    if (percentage >= lowerBound) return grade;
  }
  return Grade.F;
}

export function gradePointsFor(grade: Grade): number {
  switch (grade) {
    case Grade.O:
      return 10.0;
    case Grade.A_PLUS:
      return 9.0;
    case Grade.A:
      return 8.0;
    case Grade.B_PLUS:
      return 7.0;
    case Grade.B:
      return 6.0;
    case Grade.C:
      return 5.0;
    case Grade.P:
      return 4.0;
    case Grade.F:
    case Grade.AB:
    case Grade.MP:
      return 0.0;
    default: {
      const unreachable: never = grade;
      throw new Error(`Unknown grade ${String(unreachable)}`);
    }
  }
}

/** AB and MP are recorded but never enter a grade-point average. */
export function countsTowardGpa(grade: Grade | null): grade is Grade {
  return grade !== null && grade !== Grade.AB && grade !== Grade.MP;
}

/**
 * Absence wins over malpractice, malpractice over any score. Returns null
 * when there are no marks to grade yet.
 */
export function calculateGrade(input: GradeInput): GradeOutcome | null {
  let grade: Grade;
  if (input.isAbsent) {
    grade = Grade.AB;
  } else if (input.hasMalpractice) {
    grade = Grade.MP;
  } else if (input.marksObtained === null) {
    return null;
  } else {
    const percentage = input.maxMarks > 0 ? (input.marksObtained / input.maxMarks) * 100 : 0;
    grade = gradeForPercentage(percentage);
  }
  return { grade, gradePoints: gradePointsFor(grade) };
}

export function isPassingMarks(input: GradeInput): boolean {
  if (input.isAbsent || input.hasMalpractice || input.marksObtained === null) return false;
  return input.marksObtained >= input.maxMarks * PASS_FRACTION;
}

export function calculatePercentage(marksObtained: number | null, maxMarks: number): number {
  if (marksObtained === null || maxMarks === 0) return 0.0;
  return roundTo((marksObtained / maxMarks) * 100, 2);
}
