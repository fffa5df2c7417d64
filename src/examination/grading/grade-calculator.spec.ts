import { Grade } from '../enums/grade.enum';
import {
  calculateGrade,
  calculatePercentage,
  countsTowardGpa,
  gradeForPercentage,
  gradePointsFor,
  isPassingMarks,
} from './grade-calculator';

const scored = (marksObtained: number | null, maxMarks = 100) => ({
  marksObtained,
  maxMarks,
  isAbsent: false,
  hasMalpractice: false,
});

describe('grade calculator', () => {
  it.each([
    [100, Grade.O],
    [90, Grade.O],
    [89.99, Grade.A_PLUS],
    [80, Grade.A_PLUS],
    [75, Grade.A],
    [60, Grade.B_PLUS],
    [55, Grade.B],
    [54, Grade.C],
    [50, Grade.C],
    [40, Grade.P],
    [39.9, Grade.F],
    [0, Grade.F],
  ])('grades %p%% as %s', (percentage, grade) => {
    expect(gradeForPercentage(percentage)).toBe(grade);
  });

  it('maps each grade to its points', () => {
    expect(gradePointsFor(Grade.O)).toBe(10);
    expect(gradePointsFor(Grade.B_PLUS)).toBe(7);
    expect(gradePointsFor(Grade.P)).toBe(4);
    expect(gradePointsFor(Grade.AB)).toBe(0);
    expect(gradePointsFor(Grade.MP)).toBe(0);
  });

  it('grades scored marks against the maximum', () => {
    expect(calculateGrade(scored(75))).toEqual({ grade: Grade.A, gradePoints: 8 });
    expect(calculateGrade(scored(45, 50))).toEqual({ grade: Grade.O, gradePoints: 10 });
  });

  it('lets absence win over malpractice', () => {
    expect(calculateGrade({ marksObtained: 80, maxMarks: 100, isAbsent: true, hasMalpractice: true })).toEqual({
      grade: Grade.AB,
      gradePoints: 0,
    });
    expect(calculateGrade({ marksObtained: 80, maxMarks: 100, isAbsent: false, hasMalpractice: true })).toEqual({
      grade: Grade.MP,
      gradePoints: 0,
    });
  });

  it('returns null when there are no marks', () => {
    expect(calculateGrade(scored(null))).toBeNull();
  });

  it('treats a zero maximum as 0%', () => {
    expect(calculateGrade(scored(10, 0))).toEqual({ grade: Grade.F, gradePoints: 0 });
    expect(calculatePercentage(10, 0)).toBe(0);
  });

  it('passes at 40% of the maximum', () => {
    expect(isPassingMarks(scored(40))).toBe(true);
    expect(isPassingMarks(scored(39))).toBe(false);
    expect(isPassingMarks(scored(20, 50))).toBe(true);
    expect(isPassingMarks({ ...scored(90), isAbsent: true })).toBe(false);
  });

  it('rounds percentages to two decimals', () => {
    expect(calculatePercentage(2, 3)).toBe(66.67);
    expect(calculatePercentage(null, 100)).toBe(0);
  });

  it('excludes AB and MP from grade point averages', () => {
    expect(countsTowardGpa(Grade.F)).toBe(true);
    expect(countsTowardGpa(Grade.AB)).toBe(false);
    expect(countsTowardGpa(Grade.MP)).toBe(false);
    expect(countsTowardGpa(null)).toBe(false);
  });
});
