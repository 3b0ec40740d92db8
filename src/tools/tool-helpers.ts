/**
 * Helpers shared by the MCP tools
 */

import { z } from "zod";

export type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
};

export interface ToolErrorOutput {
  success: false;
  error: {
    code: string;
    message: string;
  };
}

export const projectPathSchema = z
  .string()
  .optional()
  .describe("Root path of the project. Defaults to current working directory.");

/**
 * Wrap a tool output as MCP text content
 */
export function toToolResponse(output: unknown): ToolResponse {
  return {
    content: [{ type: "text", text: JSON.stringify(output, null, 2) }],
  };
}

export function invalidPathOutput(filePath: string): ToolErrorOutput {
  return {
    success: false,
    error: {
      code: "INVALID_PATH",
      message: `Path '${filePath}' is outside the project directory`,
    },
  };
}
