import type { AutomationEngine, ElementRef } from '../engine/automation-engine';
import { LocatorExpression } from '../selectors/locator-expression';
import { ElementProbe } from './element-probe';

/**
 * A named, addressable element. Holds no element state: every probe, click
 * and text read resolves the locator again.
 */
export class WebElement {
  readonly present: ElementProbe;
  readonly enabled: ElementProbe;
  readonly displayed: ElementProbe;
  /** Displayed and enabled */
  readonly clickable: ElementProbe;

  constructor(
    readonly name: string,
    protected readonly engine: AutomationEngine,
    readonly locator: LocatorExpression,
  ) {
    this.present = new ElementProbe(`${name} Present`, async () =>
      this.engine.isPresent(await this.resolve()),
    );
    this.enabled = new ElementProbe(`${name} Enabled`, async () =>
      this.engine.isEnabled(await this.resolve()),
    );
    this.displayed = new ElementProbe(`${name} Displayed`, async () =>
      this.engine.isDisplayed(await this.resolve()),
    );
    this.clickable = new ElementProbe(`${name} Clickable`, async () => {
      const ref = await this.resolve();
      return (await this.engine.isDisplayed(ref)) && (await this.engine.isEnabled(ref));
    });
  }

  async click(): Promise<void> {
    await this.engine.click(await this.resolve());
  }

  async getText(): Promise<string> {
    return this.engine.getText(await this.resolve());
  }

  /**
   * Element located relative to this one; both locators must share a family.
   */
  find(name: string, locator: LocatorExpression): WebElement {
    return new WebElement(name, this.engine, LocatorExpression.chain(this.locator, locator));
  }

  toString(): string {
    return `${this.name} (${this.locator.selector})`;
  }

  protected resolve(): Promise<ElementRef> {
    return this.engine.resolve(this.locator.selector);
  }
}
