import { isVerificationError } from '../core/errors.js';

export type McpToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export function okResponse(data: unknown): McpToolResponse {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify({ ok: true, data }, null, 2)
      }
    ]
  };
}

export function errorResponse(error_code: string, message: string): McpToolResponse {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify({ ok: false, error_code, message }, null, 2)
      }
    ],
    isError: true
  };
}

/**
 * Maps a thrown error onto an error response, keeping engine error codes.
 */
export function errorResponseFrom(error: unknown): McpToolResponse {
  if (isVerificationError(error)) {
    return errorResponse(error.code, error.message);
  }
  const message = error instanceof Error ? error.message : String(error);
  return errorResponse("INTERNAL_ERROR", message);
}
