import { Examination } from '../entities/examination.entity';
import { calculatePercentage, countsTowardGpa } from '../grading/grade-calculator';
import { average, roundTo } from '../../common/utils/number.util';

export type GpaRow = Pick<Examination, 'grade' | 'gradePoints'>;

export type PerformanceRow = Pick<
  Examination,
  'marksObtained' | 'maxMarks' | 'isPass' | 'isAbsent' | 'hasMalpractice'
>;

export interface ClassPerformanceStatistics {
  passedStudents: number;
  failedStudents: number;
  passPercentage: number;
  highestMarks: number;
  lowestMarks: number;
  averageMarks: number;
  classAveragePercentage: number;
  // false when the results were marked out of different maxima
  maxMarksUniform: boolean;
}

export interface ClassPerformance {
  totalStudents: number;
  appearedStudents: number;
  absentStudents: number;
  malpracticeCases: number;
  statistics: ClassPerformanceStatistics | null;
}

/** Mean grade points over declared results, AB and MP excluded. */
export function calculateGpa(results: GpaRow[]): number {
  const points = results
    .filter((r) => countsTowardGpa(r.grade))
    .map((r) => r.gradePoints ?? 0);
  if (points.length === 0) return 0.0;
  return roundTo(average(points), 2);
}

export function summarizeClassPerformance(results: PerformanceRow[]): ClassPerformance {
  const appeared = results.filter(
    (r): r is PerformanceRow & { marksObtained: number } =>
      !r.isAbsent && !r.hasMalpractice && r.marksObtained !== null,
  );

  const summary: ClassPerformance = {
    totalStudents: results.length,
    appearedStudents: appeared.length,
    absentStudents: results.filter((r) => r.isAbsent).length,
    malpracticeCases: results.filter((r) => r.hasMalpractice).length,
    statistics: null,
  };
  if (appeared.length === 0) return summary;

  const marks = appeared.map((r) => r.marksObtained);
  const passed = appeared.filter((r) => r.isPass === true).length;
  const meanMarks = average(marks);
  const maxMarksUniform = appeared.every((r) => r.maxMarks === appeared[0].maxMarks);

  let classAveragePercentage: number;
  if (maxMarksUniform) {
    const maxMarks = appeared[0].maxMarks;
    classAveragePercentage = maxMarks > 0 ? roundTo((meanMarks / maxMarks) * 100, 2) : 0;
  } else {
    classAveragePercentage = roundTo(
      average(appeared.map((r) => calculatePercentage(r.marksObtained, r.maxMarks))),
      2,
    );
  }

  summary.statistics = {
    passedStudents: passed,
    failedStudents: appeared.length - passed,
    passPercentage: roundTo((passed / appeared.length) * 100, 2),
    highestMarks: Math.max(...marks),
    lowestMarks: Math.min(...marks),
    averageMarks: roundTo(meanMarks, 2),
    classAveragePercentage,
    maxMarksUniform,
  };
  return summary;
}
