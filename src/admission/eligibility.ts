import { differenceInYears, parseISO, startOfDay } from 'date-fns';
import { AdmissionApplication } from './entities/admission-application.entity';

export interface EligibilityPolicy {
  minAge: number;
  maxAge: number;
  minPercentage: number;
}

export const DEFAULT_ELIGIBILITY_POLICY: EligibilityPolicy = {
  minAge: 17,
  maxAge: 25,
  minPercentage: 60,
};

export interface EligibilityResult {
  eligible: boolean;
  message: string;
}

type EligibilityInput = Pick<
  AdmissionApplication,
  'dateOfBirth' | 'applicationDate' | 'tenthPercentage' | 'twelfthPercentage'
>;

/** Completed years between birth and the day the application was made. */
export function getAgeAtApplication(app: Pick<AdmissionApplication, 'dateOfBirth' | 'applicationDate'>): number {
  return differenceInYears(startOfDay(app.applicationDate), parseISO(app.dateOfBirth));
}

// Age bounds are inclusive: a 17-year-old and a 25-year-old both qualify.
export function checkEligibility(
  app: EligibilityInput,
  policy: EligibilityPolicy = DEFAULT_ELIGIBILITY_POLICY,
): EligibilityResult {
  const age = getAgeAtApplication(app);
  if (age < policy.minAge || age > policy.maxAge) {
    return {
      eligible: false,
      message: `Age not within eligible range (${policy.minAge}-${policy.maxAge} years)`,
    };
  }

  if (app.tenthPercentage !== null && app.tenthPercentage < policy.minPercentage) {
    return { eligible: false, message: `Minimum ${policy.minPercentage}% required in 10th standard` };
  }

  if (app.twelfthPercentage !== null && app.twelfthPercentage < policy.minPercentage) {
    return { eligible: false, message: `Minimum ${policy.minPercentage}% required in 12th standard` };
  }

  return { eligible: true, message: 'Eligible for admission' };
}
