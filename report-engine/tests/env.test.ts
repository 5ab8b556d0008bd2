import { concurrencyLimit } from "../lib/env";
import { MAX_CONCURRENT_FILES } from "../lib/limits";

describe("Environment settings", () => {
  it("defaults the concurrency limit", () => {
    expect(concurrencyLimit("")).toBe(MAX_CONCURRENT_FILES);
  });

  it("takes a positive integer override", () => {
    expect(concurrencyLimit("4")).toBe(4);
  });

  it("ignores values that aren't positive integers", () => {
    expect(concurrencyLimit("0")).toBe(MAX_CONCURRENT_FILES);
    expect(concurrencyLimit("-3")).toBe(MAX_CONCURRENT_FILES);
    expect(concurrencyLimit("lots")).toBe(MAX_CONCURRENT_FILES);
  });
});
