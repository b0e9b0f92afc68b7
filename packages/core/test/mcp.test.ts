import { describe, it, expect } from "vitest";
import { textResponse, errorResponse, successResponse, resultToResponse } from "../src/mcp.js";
import { ConfigurationError, InvariantViolation } from "../src/errors.js";
import { Ok, Err, type Result } from "../src/result.js";

describe("MCP utilities", () => {
  describe("textResponse", () => {
    it("creates a text-only response", () => {
      expect(textResponse("Hello")).toEqual({
        content: [{ type: "text", text: "Hello" }],
      });
    });
  });

  describe("errorResponse", () => {
    it("formats plain messages", () => {
      expect(errorResponse("Something went wrong")).toEqual({
        content: [{ type: "text", text: "Error: Something went wrong" }],
        structuredContent: { success: false, error: "Something went wrong" },
        isError: true,
      });
    });

    it("keeps the remediation of configuration faults", () => {
      const fault = new ConfigurationError("No entry points found", "Set entry.files");
      const response = errorResponse(fault);
      expect(response.content[0].text).toBe(
        "Configuration error: No entry points found\n  Fix: Set entry.files"
      );
      expect(response.structuredContent).toEqual({
        success: false,
        error: "No entry points found",
        remediation: "Set entry.files",
      });
    });

    it("describes invariant violations with their context", () => {
      const fault = new InvariantViolation("duplicate symbol id", { id: "a.ts#f" });
      const response = errorResponse(fault);
      expect(response.content[0].text).toBe(
        "Internal error (please report): duplicate symbol id\n  id: a.ts#f"
      );
    });
  });

  describe("successResponse", () => {
    it("merges data with the success flag", () => {
      expect(successResponse("ok", { count: 3 })).toEqual({
        content: [{ type: "text", text: "ok" }],
        structuredContent: { count: 3, success: true },
      });
    });
  });

  describe("resultToResponse", () => {
    it("formats successes", () => {
      const result: Result<number, Error> = Ok(5);
      const response = resultToResponse(result, (n) => ({ text: `n=${n}`, data: { n } }));
      expect(response.content[0].text).toBe("n=5");
      expect(response.structuredContent).toEqual({ n: 5, success: true });
    });

    it("formats failures", () => {
      const result: Result<number, Error> = Err(new Error("failed"));
      const response = resultToResponse(result, (n) => ({ text: `n=${n}`, data: { n } }));
      expect(response.content[0].text).toBe("Error: failed");
      expect(response.isError).toBe(true);
    });
  });
});
