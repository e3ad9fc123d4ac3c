import { describe, expect, it } from "vitest";
import type { RawEntry } from "../reconcile/domain/models/reconciliation.ts";
import { parseYear, titleOverlap, tokenizeTitle, validate } from "../_shared/candidate-validator.ts";

function original(fields: Record<string, string>): RawEntry {
  return { entryId: "o1", entryType: "article", fields };
}

function words(prefix: string, from: number, to: number): string[] {
  return Array.from({ length: to - from }, (_, idx) => `${prefix}${from + idx}`);
}

describe("candidate validator: title overlap", () => {
  it("strips braces and punctuation before comparing", () => {
    expect([...tokenizeTitle("{D}eep {L}earning: A Survey")]).toEqual(["deep", "learning", "a", "survey"]);
    expect(titleOverlap("{D}eep {L}earning: A Survey", "Deep learning - a survey")).toBe(1);
  });

  it("divides by the smaller token set", () => {
    expect(titleOverlap("Deep Residual Learning", "Deep Residual Learning for Image Recognition")).toBe(1);
  });

  it("accepts exactly three shared tokens out of five", () => {
    const verdict = validate(
      original({ title: "alpha beta gamma delta epsilon" }),
      { fields: { title: "alpha beta gamma zeta eta" } },
      { identifier: null },
    );
    expect(verdict.verdict).toBe("ACCEPT");
    expect(verdict.metrics.titleOverlap).toBeCloseTo(0.6, 10);
    expect(verdict.reason).toBe("all checks passed");
  });

  it("rejects an overlap of 0.59", () => {
    const base = words("t", 0, 100).join(" ");
    const candidate = [...words("t", 0, 59), ...words("u", 59, 100)].join(" ");

    const verdict = validate(original({ title: base }), { fields: { title: candidate } }, { identifier: null });

    expect(verdict.verdict).toBe("REJECT");
    expect(verdict.failedChecks).toEqual(["title"]);
    expect(verdict.reason).toBe("title overlap 0.59 below 0.6");
  });

  it("fails the title check when the candidate has no title", () => {
    const verdict = validate(original({ title: "Some Paper" }), { fields: { journal: "J" } }, { identifier: null });
    expect(verdict.verdict).toBe("REJECT");
    expect(verdict.metrics.titleOverlap).toBe(0);
    expect(verdict.reason).toBe("title overlap 0.00 below 0.6");
  });

  it("skips the title check when the original has none", () => {
    const verdict = validate(original({ year: "2020" }), { fields: { title: "Anything" } }, { identifier: null });
    expect(verdict.verdict).toBe("ACCEPT");
    expect(verdict.metrics).toEqual({ titleOverlap: null, yearDelta: null, identifierMatch: null });
  });
});

describe("candidate validator: year and identifier", () => {
  it("parses the first four-digit year", () => {
    expect(parseYear("Spring 2019")).toBe(2019);
    expect(parseYear("n.d.")).toBeNull();
  });

  it("tolerates a one-year difference", () => {
    const verdict = validate(
      original({ title: "Same Title", year: "2016" }),
      { fields: { title: "Same Title", year: "2017" } },
      { identifier: null },
    );
    expect(verdict.verdict).toBe("ACCEPT");
    expect(verdict.metrics.yearDelta).toBe(1);
  });

  it("lists every failed check in the reason", () => {
    const verdict = validate(
      original({ title: "Graph Neural Networks", year: "2015" }),
      { fields: { title: "Protein Folding", year: "2020" } },
      { identifier: null },
    );
    expect(verdict.verdict).toBe("REJECT");
    expect(verdict.failedChecks).toEqual(["title", "year"]);
    expect(verdict.reason).toBe("title overlap 0.00 below 0.6; year delta 5 exceeds 1");
  });

  it("rejects an identifier mismatch", () => {
    const verdict = validate(
      original({ title: "Same Title" }),
      { fields: { title: "Same Title", doi: "10.1/B" } },
      { identifier: "10.1/a" },
    );
    expect(verdict.verdict).toBe("REJECT");
    expect(verdict.metrics.identifierMatch).toBe(false);
    expect(verdict.reason).toBe("identifier mismatch 10.1/b != 10.1/a");
  });

  it("compares identifiers after normalization", () => {
    const verdict = validate(
      original({ title: "Same Title" }),
      { fields: { title: "Same Title", doi: "https://doi.org/10.1/A" } },
      { identifier: "10.1/a" },
    );
    expect(verdict.verdict).toBe("ACCEPT");
    expect(verdict.metrics.identifierMatch).toBe(true);
  });
});

describe("candidate validator: interactive mode", () => {
  it("turns a title or year rejection into UNCERTAIN", () => {
    const verdict = validate(
      original({ title: "Graph Neural Networks", year: "2015" }),
      { fields: { title: "Graph Methods Survey", year: "2015" } },
      { identifier: null, interactive: true },
    );
    expect(verdict.verdict).toBe("UNCERTAIN");
  });

  it("never softens an identifier mismatch", () => {
    const verdict = validate(
      original({ title: "Graph Neural Networks" }),
      { fields: { title: "Other", doi: "10.1/b" } },
      { identifier: "10.1/a", interactive: true },
    );
    expect(verdict.verdict).toBe("REJECT");
    expect(verdict.failedChecks).toEqual(["title", "identifier"]);
  });
});
