import { describe, expect, it } from "vitest";
import { InvalidFilterError } from "./errors.js";
import { createMockWindow } from "./test-utils.js";
import { compileMatcher, windowMatches } from "./window-matching.js";

describe("window matching", () => {
  const browser = createMockWindow({ id: 1, appId: "org.example.Browser", title: "Inbox - Browser" });
  const untitled = createMockWindow({ id: 2, appId: "org.example.Editor", title: undefined });

  it("matches every window without filters", () => {
    expect(windowMatches(browser, {})).toBe(true);
    expect(windowMatches(untitled, {})).toBe(true);
  });

  it("searches anywhere in the attribute", () => {
    expect(windowMatches(browser, { appId: "Browser" })).toBe(true);
    expect(windowMatches(browser, { title: "^Inbox" })).toBe(true);
    expect(windowMatches(browser, { title: "^Browser" })).toBe(false);
  });

  it("requires every present filter to match", () => {
    expect(windowMatches(browser, { appId: "Browser", title: "Inbox" })).toBe(true);
    expect(windowMatches(browser, { appId: "Browser", title: "Drafts" })).toBe(false);
  });

  it("treats a missing attribute as a non-match", () => {
    expect(windowMatches(untitled, { title: ".*" })).toBe(false);
    expect(windowMatches(untitled, { appId: "Editor" })).toBe(true);
  });

  it("reuses a compiled matcher across windows", () => {
    const matcher = compileMatcher({ appId: "org\\.example\\." });

    expect([browser, untitled].filter(matcher).map((window) => window.id)).toEqual([1, 2]);
  });

  it("rejects invalid patterns", () => {
    expect(() => compileMatcher({ appId: "(" })).toThrow(InvalidFilterError);
    expect(() => compileMatcher({ title: "[" })).toThrow(/^invalid filter '\['/);
  });
});
