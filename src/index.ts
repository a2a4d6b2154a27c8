export { verify, verifyVariants, verifyWithDetails, type VerificationDetails } from './kyc/verifier.js';
export { runVerification, type VerificationRequest, type VerificationRun } from './kyc/verificationService.js';
export { formatVerificationSummary, type SummaryOptions } from './kyc/reportBuilder.js';
export { loadReferenceRecord, parseReferenceRecord } from './kyc/referenceLoader.js';
export { matchDob, matchIdNumber, matchName, nameSimilarity } from './kyc/matchEngine.js';
export { maskString, sanitizeIdNumber } from './kyc/validators.js';
export type {
  AbsentReason,
  ExtractedFields,
  Extraction,
  FieldMatch,
  FieldName,
  OcrTextVariant,
  RawText,
  ReferenceRecord,
  ReferenceRecordInput,
  TextSpan,
  VerificationReport,
} from './kyc/types.js';

export { extractFields, extractFieldsFromVariants } from './extractors/fieldExtractor.js';
export { extractDob } from './extractors/dobExtractor.js';
export { extractIdNumber } from './extractors/idNumberExtractor.js';
export { extractName } from './extractors/nameExtractor.js';

export {
  DEFAULT_ENGINE_CONFIG,
  TEEN_POLICY,
  UNDER_18_POLICY,
  loadEngineConfig,
  resolveEngineConfig,
  type EngineConfig,
  type TeenPolicy,
} from './core/config.js';
export {
  formatCanonicalDate,
  normalizeDate,
  tryNormalizeDate,
  type CanonicalDate,
} from './core/dateNormalizer.js';
export { calculateAge, classifyTeen, deriveAgeProfile, type AgeProfile } from './core/ageCalculator.js';
export { normalizeOcrText } from './core/textNormalizer.js';
export { canonicalizeName, compareNames } from './core/canonicalizer.js';
export {
  DateParseError,
  InvalidDateError,
  InvalidInputError,
  VerificationError,
  isVerificationError,
} from './core/errors.js';
