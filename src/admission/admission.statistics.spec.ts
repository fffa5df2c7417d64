import { ApplicationStatus } from './enums/application-status.enum';
import { StatisticsRow, summarizeAdmissions } from './admission.statistics';

const row = (
  status: ApplicationStatus,
  applicationDate: Date,
  processedOn: Date | null = null,
  courseName = 'B.Tech in Computer Science',
): StatisticsRow => ({ status, applicationDate, processedOn, updatedOn: applicationDate, courseName });

describe('summarizeAdmissions', () => {
  it('returns zeros for no applications', () => {
    const stats = summarizeAdmissions([]);
    expect(stats.summary).toEqual({
      totalApplications: 0,
      approved: 0,
      declined: 0,
      pending: 0,
      conversionRate: 0,
      averageProcessingTimeDays: 0,
    });
    expect(stats.byStatus[ApplicationStatus.WAITLISTED]).toBe(0);
  });

  it('counts by status, course and month', () => {
    const stats = summarizeAdmissions([
      row(ApplicationStatus.APPROVED, new Date(2025, 4, 10), new Date(2025, 4, 13)),
      row(ApplicationStatus.DECLINED, new Date(2025, 4, 20), new Date(2025, 4, 30)),
      row(ApplicationStatus.SUBMITTED, new Date(2025, 5, 2)),
      row(ApplicationStatus.UNDER_REVIEW, new Date(2025, 5, 3), null, 'Diploma in Civil Engineering'),
      row(ApplicationStatus.WAITLISTED, new Date(2025, 5, 4), new Date(2025, 5, 6)),
      row(ApplicationStatus.DOCUMENTS_PENDING, new Date(2025, 5, 5)),
    ]);

    expect(stats.summary).toEqual({
      totalApplications: 6,
      approved: 1,
      declined: 1,
      pending: 2,
      conversionRate: 16.67,
      averageProcessingTimeDays: 6.5,
    });
    expect(stats.byStatus).toEqual({
      [ApplicationStatus.SUBMITTED]: 1,
      [ApplicationStatus.UNDER_REVIEW]: 1,
      [ApplicationStatus.APPROVED]: 1,
      [ApplicationStatus.DECLINED]: 1,
      [ApplicationStatus.WAITLISTED]: 1,
      [ApplicationStatus.DOCUMENTS_PENDING]: 1,
    });
    expect(stats.byCourse).toEqual({
      'B.Tech in Computer Science': 5,
      'Diploma in Civil Engineering': 1,
    });
    expect(stats.byMonth).toEqual({ '2025-05': 2, '2025-06': 4 });
  });

  it('falls back to the last update when processedOn is missing', () => {
    const stats = summarizeAdmissions([
      { ...row(ApplicationStatus.APPROVED, new Date(2025, 0, 1)), updatedOn: new Date(2025, 0, 5) },
    ]);
    expect(stats.summary.averageProcessingTimeDays).toBe(4);
  });
});
