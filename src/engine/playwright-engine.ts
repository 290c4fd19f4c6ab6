import type { Locator, Page } from '@playwright/test';
import { normalizeSpace } from '../selectors/xpath-escape';
import type { AutomationEngine, ElementRef } from './automation-engine';

class PlaywrightElementRef implements ElementRef {
  constructor(
    readonly selector: string,
    readonly locator: Locator,
  ) {}
}

/**
 * Automation engine backed by a Playwright page.
 *
 * Selectors carry their engine prefix (`xpath=` or `css=`) and are handed to
 * `page.locator()` unchanged. Playwright locators are lazy, so every state
 * read below queries the live DOM.
 */
export class PlaywrightEngine implements AutomationEngine {
  constructor(protected page: Page) {}

  async resolve(selector: string): Promise<ElementRef> {
    return new PlaywrightElementRef(selector, this.page.locator(selector));
  }

  async isPresent(ref: ElementRef): Promise<boolean> {
    return (await this.locatorOf(ref).count()) > 0;
  }

  async isEnabled(ref: ElementRef): Promise<boolean> {
    const locator = this.locatorOf(ref);
    if ((await locator.count()) === 0) {
      return false;
    }
    return locator.first().isEnabled();
  }

  async isDisplayed(ref: ElementRef): Promise<boolean> {
    // isVisible() does not wait and reports false for detached elements
    return this.locatorOf(ref).first().isVisible();
  }

  async click(ref: ElementRef): Promise<void> {
    await this.locatorOf(ref).first().click();
  }

  async getText(ref: ElementRef): Promise<string> {
    const text = await this.locatorOf(ref).first().textContent();
    return normalizeSpace(text ?? '');
  }

  private locatorOf(ref: ElementRef): Locator {
    if (ref instanceof PlaywrightElementRef) {
      return ref.locator;
    }
    return this.page.locator(ref.selector);
  }
}
