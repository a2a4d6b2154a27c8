/**
 * MCP Tools Index
 */

export { verifyIdentityText, handleVerifyIdentityText, VERIFY_IDENTITY_TEXT_INPUT } from './verifyIdentityText.js';
export { normalizeDateValue, handleNormalizeDate, NORMALIZE_DATE_INPUT } from './normalizeDate.js';
export { handleListVerificationFields } from './listVerificationFields.js';
