import { describe, it, expect } from "vitest";
import {
  DEFAULT_MAX_RESULTS,
  SchemeMatcher,
  summarizeMatches,
} from "../src/domain/schemes/scheme-matcher.js";
import { makeCatalog, makeFullProfile, makeProfile, makeScheme } from "./fixtures.js";

describe("SchemeMatcher", () => {
  it("scores an eligible farmer scheme with the occupation bonus", () => {
    const profile = makeProfile({
      age: 35,
      gender: "female",
      state: "Bihar",
      occupation: "farmer",
      category: "general",
      annual_income: 80_000,
    });
    const matcher = new SchemeMatcher(
      makeCatalog([
        makeScheme({ eligibility: { occupations: ["farmer"], income_max: 200_000 } }),
      ]),
    );

    const matches = matcher.match(profile);
    expect(matches).toHaveLength(1);
    expect(matches[0].score).toBe(65);
  });

  it("excludes schemes the profile fails, whatever they would score", () => {
    const matcher = new SchemeMatcher(
      makeCatalog([
        makeScheme({
          scheme_id: "senior-cap",
          benefit_amount: "₹3 lakh",
          eligibility: { age_max: 60 },
        }),
      ]),
    );
    expect(matcher.match(makeProfile({ age: 70 }))).toEqual([]);
  });

  it("adds the BPL bonus when BPL is required and held", () => {
    const matcher = new SchemeMatcher(
      makeCatalog([makeScheme({ eligibility: { bpl_required: true } })]),
    );
    const [match] = matcher.match(makeProfile({ bpl_status: true }));
    expect(match.score).toBe(60);
  });

  it("returns nothing from an empty catalog", () => {
    const matcher = new SchemeMatcher(makeCatalog([]));
    expect(matcher.match(makeFullProfile())).toEqual([]);
    expect(matcher.match(makeProfile())).toEqual([]);
  });

  it("includes rule-free schemes for an empty profile", () => {
    const matcher = new SchemeMatcher(
      makeCatalog([
        makeScheme({ scheme_id: "open" }),
        makeScheme({ scheme_id: "adults", eligibility: { age_min: 18 } }),
      ]),
    );
    expect(matcher.match(makeProfile()).map((m) => m.scheme.scheme_id)).toEqual([
      "open",
      "adults",
    ]);
  });

  it("orders by score and keeps catalog order between equal scores", () => {
    const matcher = new SchemeMatcher(
      makeCatalog([
        makeScheme({ scheme_id: "plain-1" }),
        makeScheme({ scheme_id: "lakh", benefit_amount: "₹1 lakh" }),
        makeScheme({ scheme_id: "plain-2" }),
        makeScheme({ scheme_id: "farm", eligibility: { occupations: ["farmer"] } }),
        makeScheme({ scheme_id: "plain-3" }),
      ]),
    );

    const ranked = matcher.match(makeProfile({ occupation: "farmer" }));
    expect(ranked.map((m) => [m.scheme.scheme_id, m.score])).toEqual([
      ["farm", 65],
      ["lakh", 55],
      ["plain-1", 50],
      ["plain-2", 50],
      ["plain-3", 50],
    ]);
  });

  it("truncates to the requested limit", () => {
    const schemes = Array.from({ length: 10 }, (_, i) =>
      makeScheme({ scheme_id: `s-${i}` }),
    );
    const matcher = new SchemeMatcher(makeCatalog(schemes));

    expect(matcher.match(makeProfile())).toHaveLength(DEFAULT_MAX_RESULTS);
    expect(matcher.match(makeProfile(), 3).map((m) => m.scheme.scheme_id)).toEqual([
      "s-0",
      "s-1",
      "s-2",
    ]);
    expect(matcher.match(makeProfile(), 0)).toEqual([]);
    expect(new SchemeMatcher(makeCatalog(schemes), { maxResults: 2 }).match(makeProfile()))
      .toHaveLength(2);
  });

  it("does not change the catalog between calls", () => {
    const catalog = makeCatalog([
      makeScheme({ scheme_id: "a" }),
      makeScheme({ scheme_id: "b", benefit_amount: "₹2 lakh" }),
    ]);
    const matcher = new SchemeMatcher(catalog);
    matcher.match(makeProfile());

    expect(catalog.all().map((s) => s.scheme_id)).toEqual(["a", "b"]);
  });
});

describe("summarizeMatches", () => {
  it("projects name, benefit and score", () => {
    const matcher = new SchemeMatcher(
      makeCatalog([makeScheme({ name: "Housing Aid", benefit_amount: "₹1.2 lakh" })]),
    );
    expect(summarizeMatches(matcher.match(makeProfile()))).toEqual([
      { name: "Housing Aid", benefit: "₹1.2 lakh", score: 55 },
    ]);
  });
});
