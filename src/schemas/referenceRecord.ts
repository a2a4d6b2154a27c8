import { z } from 'zod';

const FieldValue = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value).trim()));

// Missing fields become empty strings.
export const ReferenceRecordZodSchema = z.object({
  name: FieldValue,
  dob: FieldValue,
  idNumber: FieldValue,
});

// `aadhaar` is accepted as an alias of `idNumber`; idNumber wins when both are set.
export const ReferenceFileZodSchema = ReferenceRecordZodSchema.extend({ aadhaar: FieldValue }).transform(
  ({ name, dob, idNumber, aadhaar }) => ({ name, dob, idNumber: idNumber || aadhaar })
);

export const ReferenceRecordJsonSchema = {
  type: 'object',
  properties: {
    name: { type: 'string', description: 'Full name as the holder claims it' },
    dob: { type: 'string', description: 'Date of birth, e.g. 15/08/1995, 1995-08-15 or 15 Aug 1995' },
    idNumber: { type: 'string', description: '12-digit ID number; spaces and dashes allowed' },
    aadhaar: { type: 'string', description: 'Alias of idNumber' },
  },
  required: ['name', 'dob'],
  additionalProperties: false,
} as const;
