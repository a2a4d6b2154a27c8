import { loadEngineConfig } from '../../core/config.js';
import { ReferenceRecordJsonSchema } from '../../schemas/referenceRecord.js';
import { errorResponseFrom, okResponse, type McpToolResponse } from '../responses.js';

const VERIFIED_FIELDS = [
  { field: 'name', rule: 'fuzzy, order-insensitive edit similarity against nameThreshold' },
  { field: 'dob', rule: 'exact calendar date after normalizing both sides' },
  { field: 'idNumber', rule: 'exact digits after stripping separators; both sides must be well-formed' },
];

export async function handleListVerificationFields(): Promise<McpToolResponse> {
  try {
    return okResponse({
      fields: VERIFIED_FIELDS,
      reference_schema: ReferenceRecordJsonSchema,
      config: loadEngineConfig(),
    });
  } catch (error) {
    return errorResponseFrom(error);
  }
}
