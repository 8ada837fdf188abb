// Basic usage: a page object with inherited readiness checks
//
// The "browser" here is a plain object standing in for whatever driver the
// test suite uses; load validations only see what the page exposes.

import {
  Page,
  Section,
  failed,
  passed,
  onLoadEvent,
  createConsoleHandler,
  isNotLoadedError,
} from "../src/index";

interface Browser {
  url: string;
  visibleText: string[];
}

class ShopPage extends Page {
  protected readonly browser: Browser;

  constructor(browser: Browser) {
    super();
    this.browser = browser;
  }

  isDisplayed(): boolean {
    const matcher = this.urlMatcher();
    return matcher instanceof RegExp
      ? matcher.test(this.browser.url)
      : this.browser.url === matcher;
  }

  currentUrl(): string {
    return this.browser.url;
  }

  urlMatcher(): string | RegExp | undefined {
    return /^https:\/\/shop\.test\//;
  }
}

class CartPage extends ShopPage {
  urlMatcher(): RegExp {
    return /\/cart$/;
  }

  itemCount(): number {
    return this.browser.visibleText.filter((t) => t.startsWith("item:"))
      .length;
  }
}

CartPage.loadValidation(function hasItems(page) {
  return page.itemCount() > 0 ? passed() : failed("The cart has no items");
});

class CartSummary extends Section {
  readonly total: string | undefined;

  constructor(page: CartPage, total: string | undefined) {
    super(page);
    this.total = total;
  }
}

CartSummary.loadValidation((summary) => [
  summary.total !== undefined,
  "No total shown",
]);

function main(): void {
  onLoadEvent(createConsoleHandler());

  const browser: Browser = {
    url: "https://shop.test/cart",
    visibleText: ["item:socks", "item:hat"],
  };
  const cart = new CartPage(browser);

  const count = cart.whenLoaded((page) => {
    const summary = new CartSummary(page, "$12.00");
    return summary.whenLoaded(() => page.itemCount());
  });
  console.log(`Cart holds ${count} item(s)`);

  browser.visibleText = [];
  try {
    cart.whenLoaded((page) => page.itemCount());
  } catch (error) {
    if (isNotLoadedError(error)) {
      console.log(`Not ready: ${error.loadError}`);
    } else {
      throw error;
    }
  }
}

main();
