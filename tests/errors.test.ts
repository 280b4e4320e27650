import { describe, expect, it } from "vitest";
import {
  ErrorCategory,
  createLLMError,
  createLogicalError,
  createRateLimitError,
  createSchemaError,
  getUserFriendlyError,
  toStageFailure
} from "../src/shared/errors.js";

describe("toStageFailure", () => {
  it("keeps schema and logical categories", () => {
    expect(toStageFailure("Critique failed", createSchemaError("bad score"))).toEqual({
      category: ErrorCategory.SCHEMA_VIOLATION,
      message: "Critique failed: Schema violation: bad score"
    });
    expect(toStageFailure("Refinement failed", createLogicalError("No draft"))).toEqual({
      category: ErrorCategory.LOGICAL,
      message: "Refinement failed: No draft"
    });
  });

  it("counts provider failures as transport", () => {
    expect(toStageFailure("Generation failed", createRateLimitError("openai")).category).toBe(ErrorCategory.TRANSPORT);
    expect(toStageFailure("Generation failed", createLLMError("overloaded"))).toEqual({
      category: ErrorCategory.TRANSPORT,
      message: "Generation failed: LLM error: overloaded"
    });
  });

  it("handles values that are not errors", () => {
    expect(toStageFailure("Generation failed", "boom")).toEqual({
      category: ErrorCategory.TRANSPORT,
      message: "Generation failed: boom"
    });
  });
});

describe("getUserFriendlyError", () => {
  it("uses the error's own user message", () => {
    expect(getUserFriendlyError(createLogicalError("x"))).toBe("The workflow is missing something it needs to continue.");
  });

  it("recognizes connection failures", () => {
    expect(getUserFriendlyError(new Error("connect ECONNREFUSED 127.0.0.1:443")))
      .toBe("Couldn't connect to the service — try again in a minute?");
  });
});
