import { describe, expect, it } from "vitest";
import { isTraceId, parseTraceId } from "../../src/utils/traceId";

describe("parseTraceId", () => {
  it("should split at the first colon", () => {
    expect(parseTraceId("550e8400-e29b-41d4-a716-446655440000:2025-11-20T03:47:14Z")).toEqual({
      uuid: "550e8400-e29b-41d4-a716-446655440000",
      timestamp: "2025-11-20T03:47:14Z",
    });
  });

  it("should accept fractional seconds", () => {
    expect(isTraceId("550e8400-e29b-41d4-a716-446655440000:2025-11-20T03:47:14.123Z")).toBe(true);
  });

  it.each([
    ["a non-UTC timestamp", "550e8400-e29b-41d4-a716-446655440000:2025-11-20T03:47:14+01:00"],
    ["a non-v4 uuid", "550e8400-e29b-11d4-a716-446655440000:2025-11-20T03:47:14Z"],
    ["a missing timestamp", "550e8400-e29b-41d4-a716-446655440000"],
    ["an impossible date", "550e8400-e29b-41d4-a716-446655440000:2025-13-40T03:47:14Z"],
    ["a short uuid", "550e8400-e29b-41d4-a716-44665544:2025-11-20T03:47:14Z"],
  ])("should reject %s", (_label, value) => {
    expect(parseTraceId(value)).toBeUndefined();
  });
});
