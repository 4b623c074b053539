import { t } from "../../src/schema/dsl.js";
import { collection, newExtractor, type Extractor } from "../../src/export/extractor.js";

export const Rec = t.record("Rec", { A: t.float(), B: t.string, P: t.ptr(t.int()) });

export const rows = [
  { A: 3.14, B: "Hello", P: 8 },
  { A: 2.72, B: "World", P: null },
];

export function sampleExtractor(columns: string[] = ["A", "B", "P"]): Extractor {
  return newExtractor(collection(Rec, rows), columns);
}
