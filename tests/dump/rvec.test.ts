import { describe, it, expect } from "vitest";
import { RVecDumper } from "../../src/dump/rvec.js";
import { t } from "../../src/schema/dsl.js";
import { collection, newExtractor } from "../../src/export/extractor.js";
import { RFormat } from "../../src/format/format.js";
import { sampleExtractor } from "./fixtures.js";

describe("RVecDumper", () => {
  it("should write one vector per column", () => {
    expect(new RVecDumper().dump(sampleExtractor(["B", "P"]), RFormat)).toBe('B <- c("Hello", "World")\nP <- c(8, NA)\n');
  });

  it("should break lines after every ten values", () => {
    const Num = t.record("Num", { N: t.int() });
    const data = Array.from({ length: 12 }, (_, i) => ({ N: i + 1 }));
    const ex = newExtractor(collection(Num, data), ["N"]);
    expect(new RVecDumper().dump(ex, RFormat)).toBe("N <- c(1, 2, 3, 4, 5, 6, 7, 8, 9, 10,\n11, 12)\n");
  });

  it("should add a data frame on request", () => {
    expect(new RVecDumper({ dataFrame: "df" }).dump(sampleExtractor(["B", "P"]), RFormat)).toBe(
      'B <- c("Hello", "World")\nP <- c(8, NA)\ndf <- data.frame(B, P)\n'
    );
  });
});
