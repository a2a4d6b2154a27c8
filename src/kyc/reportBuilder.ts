import type { AgeProfile } from '../core/ageCalculator.js';
import type { FieldMatch, VerificationReport } from './types.js';
import { maskString } from './validators.js';

export interface FieldMatches {
  name: FieldMatch;
  dob: FieldMatch;
  idNumber: FieldMatch;
}

export interface SummaryOptions {
  /** Mask all but the last four ID digits */
  redacted?: boolean;
}

/**
 * Aggregates the three field matches and the age profile (derived from the
 * extracted DOB) into one frozen report.
 */
export function buildVerificationReport(matches: FieldMatches, age: AgeProfile | null): VerificationReport {
  const name = Object.freeze({ ...matches.name });
  const dob = Object.freeze({ ...matches.dob });
  const idNumber = Object.freeze({ ...matches.idNumber });

  return Object.freeze({
    name,
    dob,
    idNumber,
    allMatch: name.matched && dob.matched && idNumber.matched,
    ageYears: age ? age.ageYears : null,
    isTeen: age ? age.isTeen : null,
    extracted: Object.freeze({
      name: name.extractedValue,
      dob: dob.extractedValue,
      idNumber: idNumber.extractedValue,
    }),
  });
}

const yesNo = (value: boolean) => (value ? 'Yes' : 'No');

/**
 * Renders the report as the plain-text summary printed by the CLI.
 */
export function formatVerificationSummary(report: VerificationReport, options: SummaryOptions = {}): string {
  const idValue = report.extracted.idNumber
    ? options.redacted
      ? maskString(report.extracted.idNumber, 4)
      : report.extracted.idNumber
    : null;
  const shown = (value: string | null) => value ?? 'Not found';

  const lines = [
    'ID Verification Results:',
    `All details match: ${yesNo(report.allMatch)}`,
    `Name matches: ${yesNo(report.name.matched)} (${shown(report.extracted.name)}, similarity ${report.name.similarityScore.toFixed(2)})`,
    `DOB matches: ${yesNo(report.dob.matched)} (${shown(report.extracted.dob)})`,
    `ID number matches: ${yesNo(report.idNumber.matched)} (${shown(idValue)})`,
    '',
    'Extracted Details:',
    `Name: ${shown(report.extracted.name)}`,
    `DOB: ${shown(report.extracted.dob)}`,
    `ID number: ${shown(idValue)}`,
  ];

  if (report.ageYears !== null && report.isTeen !== null) {
    lines.push(`Age: ${report.ageYears} (${report.isTeen ? 'Teen' : 'Not teen'})`);
  }
  return lines.join('\n');
}
