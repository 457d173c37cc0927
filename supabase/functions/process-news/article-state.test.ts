import { describe, expect, it } from "vitest";

import { ArticleLifecycle, canTransition, IllegalTransitionError } from "./article-state.ts";

describe("ArticleLifecycle", () => {
  it("walks the happy path to PERSISTED", () => {
    const lc = new ArticleLifecycle();
    for (const s of ["HASHED", "NEW", "GENERATING", "FUSING", "CONFIRMING", "PERSISTED"] as const) lc.advance(s);
    expect(lc.state).toBe("PERSISTED");
    expect(lc.terminal).toBe(true);
  });

  it("ends a duplicate at DUPLICATE", () => {
    const lc = new ArticleLifecycle();
    lc.advance("HASHED");
    lc.advance("DUPLICATE");
    expect(lc.terminal).toBe(true);
    expect(() => lc.advance("GENERATING")).toThrow(IllegalTransitionError);
  });

  it("rejects skipping stages", () => {
    const lc = new ArticleLifecycle();
    expect(() => lc.advance("NEW")).toThrow("illegal article transition FETCHED → NEW");
    expect(lc.state).toBe("FETCHED");
  });

  it("allows FAILED from every in-flight stage", () => {
    for (const from of ["FETCHED", "HASHED", "NEW", "GENERATING", "FUSING", "CONFIRMING"] as const) {
      expect(canTransition(from, "FAILED")).toBe(true);
    }
    expect(canTransition("PERSISTED", "FAILED")).toBe(false);
    expect(canTransition("DUPLICATE", "FAILED")).toBe(false);
  });
});
