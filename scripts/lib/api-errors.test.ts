import { describe, expect, it } from "vitest";
import { describeApiError, friendlyApiError, isApiError } from "./api-errors.js";

function googleError(status: number, reason: string, message: string) {
  return Object.assign(new Error(message), {
    response: {
      status,
      data: { error: { code: status, message, errors: [{ reason, message }] } },
    },
  });
}

describe("describeApiError", () => {
  it("pulls status and reason from a Google error body", () => {
    const err = googleError(403, "commentsDisabled", "The video has disabled comments.");
    expect(describeApiError(err)).toEqual({
      status: 403,
      reason: "commentsDisabled",
      message: "The video has disabled comments.",
    });
  });

  it("falls back to the error message for anything else", () => {
    expect(describeApiError(new Error("socket hang up"))).toEqual({ message: "socket hang up" });
    expect(describeApiError("boom")).toEqual({ message: "boom" });
  });
});

describe("friendlyApiError", () => {
  it("maps known reasons to a short sentence", () => {
    expect(friendlyApiError(googleError(403, "quotaExceeded", "Quota exceeded"))).toBe(
      "YouTube API quota exceeded. Try again tomorrow."
    );
  });

  it("includes the status for unknown reasons", () => {
    expect(friendlyApiError(googleError(400, "badRequest", "Invalid filter"))).toBe(
      "YouTube API error (400): Invalid filter"
    );
  });
});

describe("isApiError", () => {
  it("recognizes only errors with a Google response body", () => {
    expect(isApiError(googleError(404, "videoNotFound", "Not found"))).toBe(true);
    expect(isApiError(new Error("ENOENT"))).toBe(false);
  });
});
