import { describe, it, expect, afterEach, vi } from "vitest";
import { log, redact, setLogLevel } from "../../src/utils/logger.js";

describe("redact", () => {
  it("masks bearer tokens and subscription keys", () => {
    expect(redact("Authorization: Bearer test-token-value")).toBe(
      "Authorization: Bearer test-tok...REDACTED",
    );
    expect(redact('{"XiO-subscription-key":"test-token-value"}')).toBe(
      '{"XiO-subscription-key":"test-tok...REDACTED"}',
    );
  });

  it("masks long token-like strings", () => {
    expect(redact(`key ${"a".repeat(45)}`)).toBe("key aaaaaaaa...REDACTED");
  });

  it("leaves ordinary text alone", () => {
    expect(redact("00.10.7f.b1.e3.00: Device claimed successfully")).toBe(
      "00.10.7f.b1.e3.00: Device claimed successfully",
    );
  });
});

describe("log", () => {
  afterEach(() => {
    setLogLevel("INFO");
  });

  it("writes to stderr at or above the configured level", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("WARN");

    log("INFO", "quiet");
    log("ERROR", "request failed with Bearer abcdefghijkl");

    expect(stderr).toHaveBeenCalledTimes(1);
    const [line] = stderr.mock.calls[0];
    expect(line).toMatch(/^\[\S+\] \[ERROR\] request failed with Bearer abcdefgh\.\.\.REDACTED$/);
  });
});
