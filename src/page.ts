// Page root: a loadable seeded with the display/URL check

import type { LoadValidation } from "./types/loadable";
import { Loadable, loadValidationRegistry } from "./runtime/loadable";

/**
 * A whole page under test.
 *
 * Unless default load validations are disabled, every page first checks that
 * it is displayed, reporting the current URL and the expected matcher when it
 * is not. The checks themselves are supplied by the subclass.
 */
export abstract class Page extends Loadable {
  /**
   * Whether the page is currently shown (typically: the URL matches)
   */
  abstract isDisplayed(): boolean;

  /**
   * Location currently shown, for diagnostics
   */
  abstract currentUrl(): string;

  /**
   * What the location is expected to match, for diagnostics
   */
  abstract urlMatcher(): string | RegExp | undefined;
}

/**
 * Format a URL matcher for messages. Regular expressions keep their slashes.
 */
export function describeUrlMatcher(
  matcher: string | RegExp | undefined,
): string {
  return matcher === undefined ? "" : String(matcher);
}

export const displayedValidation: LoadValidation<Page> = function displayed(
  page,
) {
  if (page.isDisplayed()) return true;

  return [
    false,
    `Expected ${page.currentUrl()} to match ${describeUrlMatcher(page.urlMatcher())} but it did not.`,
  ];
};

loadValidationRegistry.seedDefault(Page, displayedValidation, {
  name: "displayed",
});
