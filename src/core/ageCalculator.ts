import { TEEN_POLICY, type TeenPolicy } from './config.js';
import { canonicalDateFromJsDate, compareCanonicalDates, formatCanonicalDate, type CanonicalDate } from './dateNormalizer.js';
import { InvalidDateError } from './errors.js';

export interface AgeProfile {
  ageYears: number;
  isTeen: boolean;
}

function toCanonicalAsOf(asOf: CanonicalDate | Date): CanonicalDate {
  if (!(asOf instanceof Date)) return asOf;
  const converted = canonicalDateFromJsDate(asOf);
  if (!converted) {
    throw new InvalidDateError('as-of date is not a valid date');
  }
  return converted;
}

/**
 * Whole years elapsed between dob and asOf.
 */
export function calculateAge(dob: CanonicalDate, asOf: CanonicalDate | Date = new Date()): number {
  const reference = toCanonicalAsOf(asOf);
  if (compareCanonicalDates(reference, dob) < 0) {
    throw new InvalidDateError(
      `as-of date ${formatCanonicalDate(reference)} precedes date of birth ${formatCanonicalDate(dob)}`
    );
  }

  let years = reference.year - dob.year;
  if (reference.month < dob.month || (reference.month === dob.month && reference.day < dob.day)) {
    years -= 1;
  }
  return years;
}

export function classifyTeen(ageYears: number, policy: TeenPolicy = TEEN_POLICY): boolean {
  switch (policy.kind) {
    case 'band':
      return ageYears >= policy.minAge && ageYears <= policy.maxAge;
    case 'under':
      return ageYears < policy.limit;
  }
}

export function deriveAgeProfile(
  dob: CanonicalDate,
  asOf: CanonicalDate | Date = new Date(),
  policy: TeenPolicy = TEEN_POLICY
): AgeProfile {
  const ageYears = calculateAge(dob, asOf);
  return { ageYears, isTeen: classifyTeen(ageYears, policy) };
}
