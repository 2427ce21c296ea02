/**
 * @fileoverview Tests for the API key check of the SSE host.
 */

import { describe, it, expect } from "vitest";
import { isAuthorized } from "../../src/servers/http-host.js";

describe("isAuthorized", () => {
  it("accepts the exact key", () => {
    expect(isAuthorized({ "x-api-key": "test-secret" }, "test-secret")).toBe(true);
  });

  it("rejects a missing, wrong or differently sized key", () => {
    expect(isAuthorized({}, "test-secret")).toBe(false);
    expect(isAuthorized({ "x-api-key": "test-secreT" }, "test-secret")).toBe(false);
    expect(isAuthorized({ "x-api-key": "test" }, "test-secret")).toBe(false);
  });

  it("rejects a key sent in another header", () => {
    expect(isAuthorized({ authorization: "Bearer test-secret" }, "test-secret")).toBe(false);
  });
});
