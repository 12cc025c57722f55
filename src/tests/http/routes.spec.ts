import { describe, expect, it } from "vitest";
import { SynthesisFailure } from "../../errors";
import { errorStatus } from "../../routes";

describe("errorStatus", () => {
  it("maps pipeline failures to a retryable service error", () => {
    expect(errorStatus(new SynthesisFailure("Answer generation failed"))).toEqual({
      status: 503,
      body: { message: "Answer generation failed", code: "SYNTHESIS_FAILURE", retryable: true }
    });
  });

  it("hides unexpected errors behind a generic message", () => {
    expect(errorStatus(new TypeError("cannot read x"))).toEqual({
      status: 500,
      body: { message: "Unexpected server error" }
    });
  });
});
