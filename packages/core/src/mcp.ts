/**
 * MCP tool response helpers.
 */

import type { Result } from "./result.js";
import { describeFault, isAnalysisFault } from "./errors.js";

export interface TextContent {
  type: "text";
  text: string;
}

/**
 * Shape returned by every tool handler. The index signature keeps it
 * assignable to the SDK's CallToolResult.
 */
export interface ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
}

export type FailurePayload = { success: false; error: string; remediation?: string };

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

/**
 * Tool failure. Configuration faults keep their remediation hint in both the
 * text and the structured payload.
 */
export function errorResponse(error: string | Error): ToolResponse<FailurePayload> {
  if (isAnalysisFault(error)) {
    const payload: FailurePayload =
      error.kind === "configuration"
        ? { success: false, error: error.message, remediation: error.remediation }
        : { success: false, error: error.message };
    return {
      content: [{ type: "text", text: describeFault(error) }],
      structuredContent: payload,
      isError: true,
    };
  }
  const message = typeof error === "string" ? error : error.message;
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
    isError: true,
  };
}

export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data: T
): ToolResponse<T & { success: true }> {
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}

/**
 * Convert a Result into a tool response; the formatter produces both the
 * human text and the structured data of a success.
 */
export function resultToResponse<T, E extends string | Error, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse<(S & { success: true }) | FailurePayload> {
  if (!result.ok) {
    return errorResponse(result.error);
  }
  const { text, data } = formatter(result.value);
  return successResponse(text, data);
}
