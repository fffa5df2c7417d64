import { differenceInCalendarDays, format } from 'date-fns';
import { AdmissionApplication } from './entities/admission-application.entity';
import { ApplicationStatus, isFinalStatus } from './enums/application-status.enum';
import { roundTo } from '../common/utils/number.util';

export type StatisticsRow = Pick<AdmissionApplication, 'status' | 'applicationDate' | 'processedOn' | 'updatedOn'> & {
  courseName: string;
};

export interface AdmissionStatistics {
  summary: {
    totalApplications: number;
    approved: number;
    declined: number;
    pending: number;
    conversionRate: number;
    averageProcessingTimeDays: number;
  };
  byStatus: Record<ApplicationStatus, number>;
  byCourse: Record<string, number>;
  byMonth: Record<string, number>;
}

function emptyStatusCounts(): Record<ApplicationStatus, number> {
  return {
    [ApplicationStatus.SUBMITTED]: 0,
    [ApplicationStatus.UNDER_REVIEW]: 0,
    [ApplicationStatus.APPROVED]: 0,
    [ApplicationStatus.DECLINED]: 0,
    [ApplicationStatus.WAITLISTED]: 0,
    [ApplicationStatus.DOCUMENTS_PENDING]: 0,
  };
}

export function summarizeAdmissions(rows: StatisticsRow[]): AdmissionStatistics {
  const byStatus = emptyStatusCounts();
  const byCourse: Record<string, number> = {};
  const byMonth: Record<string, number> = {};

  for (const row of rows) {
    byStatus[row.status] += 1;
    byCourse[row.courseName] = (byCourse[row.courseName] ?? 0) + 1;
    const month = format(row.applicationDate, 'yyyy-MM');
    byMonth[month] = (byMonth[month] ?? 0) + 1;
  }

  const total = rows.length;
  const decided = rows.filter((r) => isFinalStatus(r.status));
  const processingDays = decided.map((r) =>
    differenceInCalendarDays(r.processedOn ?? r.updatedOn, r.applicationDate),
  );
  const averageDays = processingDays.length
    ? processingDays.reduce((sum, d) => sum + d, 0) / processingDays.length
    : 0;

  return {
    summary: {
      totalApplications: total,
      approved: byStatus[ApplicationStatus.APPROVED],
      declined: byStatus[ApplicationStatus.DECLINED],
      pending: byStatus[ApplicationStatus.SUBMITTED] + byStatus[ApplicationStatus.UNDER_REVIEW],
      conversionRate: total > 0 ? roundTo((byStatus[ApplicationStatus.APPROVED] / total) * 100, 2) : 0,
      averageProcessingTimeDays: roundTo(averageDays, 1),
    },
    byStatus,
    byCourse,
    byMonth,
  };
}
