/**
 * Window selection by regular expressions over app id and title.
 */

import { InvalidFilterError, errorMessage } from "./errors.js";
import type { MatchOptions, Window } from "./types.js";

export type WindowMatcher = (window: Window) => boolean;

function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    throw new InvalidFilterError(source, errorMessage(error));
  }
}

/**
 * Compiles match options into a predicate.
 *
 * Patterns are unanchored. Each present filter must match; a window lacking
 * the attribute a filter inspects does not match. With no filters every
 * window matches.
 *
 * @throws {InvalidFilterError} When a pattern does not compile
 */
export function compileMatcher(options: MatchOptions): WindowMatcher {
  const appId = options.appId === undefined ? undefined : compilePattern(options.appId);
  const title = options.title === undefined ? undefined : compilePattern(options.title);

  return (window) => {
    if (appId && (window.appId === undefined || !appId.test(window.appId))) {
      return false;
    }
    if (title && (window.title === undefined || !title.test(window.title))) {
      return false;
    }
    return true;
  };
}

/**
 * One-shot form of {@link compileMatcher}.
 */
export function windowMatches(window: Window, options: MatchOptions): boolean {
  return compileMatcher(options)(window);
}
