import { describe, it, expect } from "vitest";
import { formatDuration } from "../../src/format/duration.js";

describe("formatDuration", () => {
  it("should print zero as 0s", () => {
    expect(formatDuration(0n)).toBe("0s");
  });

  it("should use sub-second units below one second", () => {
    expect(formatDuration(999n)).toBe("999ns");
    expect(formatDuration(1500n)).toBe("1.5µs");
    expect(formatDuration(1_500_000n)).toBe("1.5ms");
    expect(formatDuration(1_000_001n)).toBe("1.000001ms");
  });

  it("should combine hours, minutes and seconds", () => {
    expect(formatDuration(3_723_500_000_000n)).toBe("1h2m3.5s");
    expect(formatDuration(120_000_000_000n)).toBe("2m0s");
    expect(formatDuration(3_600_000_000_000n)).toBe("1h0m0s");
  });

  it("should prefix negative durations", () => {
    expect(formatDuration(-1_500_000_000n)).toBe("-1.5s");
  });
});
