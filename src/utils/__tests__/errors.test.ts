import { describe, expect, it } from "vitest";
import { formatError } from "../errors";

describe("formatError", () => {
  it("joins the cause chain", () => {
    const error = new Error("Failed to download gs://test-bucket/a.mp4", {
      cause: new Error("403 Forbidden"),
    });
    expect(formatError(error)).toBe("Failed to download gs://test-bucket/a.mp4: 403 Forbidden");
  });

  it("formats non-error values", () => {
    expect(formatError("boom")).toBe("boom");
    expect(formatError(undefined)).toBe("Unknown error");
  });
});
