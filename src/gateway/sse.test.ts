import { describe, expect, it } from "vitest";
import { formatSseComment } from "./sse.js";

describe("formatSseComment", () => {
  it("writes a comment line", () => {
    expect(formatSseComment("keepalive")).toBe(": keepalive\n\n");
  });

  it("keeps comments on one line", () => {
    expect(formatSseComment("keep\nalive")).toBe(": keep alive\n\n");
  });
});
