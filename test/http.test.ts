import { describe, expect, it } from "vitest";
import { isRetryableStatus, isSuccessStatus, isTextualContentType } from "../src/lib/http.js";

describe("http", () => {
  it("isSuccessStatus accepts 2xx only", () => {
    expect(isSuccessStatus(200)).toBe(true);
    expect(isSuccessStatus(204)).toBe(true);
    expect(isSuccessStatus(301)).toBe(false);
    expect(isSuccessStatus(404)).toBe(false);
  });

  it("isRetryableStatus covers throttling and server errors", () => {
    expect(isRetryableStatus(408)).toBe(true);
    expect(isRetryableStatus(429)).toBe(true);
    expect(isRetryableStatus(503)).toBe(true);
    expect(isRetryableStatus(404)).toBe(false);
    expect(isRetryableStatus(403)).toBe(false);
  });

  it("isTextualContentType accepts markup, json and text", () => {
    expect(isTextualContentType(null)).toBe(true);
    expect(isTextualContentType("text/html; charset=utf-8")).toBe(true);
    expect(isTextualContentType("application/json")).toBe(true);
    expect(isTextualContentType("application/xml")).toBe(true);
    expect(isTextualContentType("text/plain")).toBe(true);
    expect(isTextualContentType("image/png")).toBe(false);
    expect(isTextualContentType("application/pdf")).toBe(false);
  });
});
