// backend/services/shared/test/securityLog.spec.ts
import { describe, expect, it } from "vitest";
import { maskSecret } from "../src/utils/securityLog";

describe("maskSecret", () => {
  it("marks absent values", () => {
    expect(maskSecret(undefined)).toBe("<none>");
    expect(maskSecret("")).toBe("<none>");
  });

  it("fully hides short values", () => {
    expect(maskSecret("abc")).toBe("****");
    expect(maskSecret("123456789012")).toBe("****");
  });

  it("keeps four characters at each end of longer values", () => {
    expect(maskSecret("eyJhbGciOiJIUzI1NiJ9.payload.sig")).toBe("eyJh….sig");
  });
});
