import type { AnalysisResult } from "../analysis/types.js";

export interface SuccessResponse {
  success: true;
  message?: string;
  data?: unknown;
}

export interface ErrorResponse {
  success: false;
  error: string;
  code?: string;
}

function textContent(payload: unknown) {
  return [
    {
      type: "text" as const,
      text: JSON.stringify(payload, null, 2),
    },
  ];
}

export function formatSuccess(data: Omit<SuccessResponse, "success">) {
  return { content: textContent({ success: true, ...data }) };
}

export function formatError(error: string, code?: string) {
  return {
    content: textContent({ success: false, error, code } satisfies ErrorResponse),
    isError: true as const,
  };
}

/** An analysis is returned whole either way; a failed one is flagged as a tool error. */
export function formatAnalysis(result: AnalysisResult) {
  return {
    content: textContent(result),
    isError: !result.success,
  };
}
