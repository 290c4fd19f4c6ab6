import { WebElement } from '../controls/web-element';
import type { AutomationEngine } from '../engine/automation-engine';
import { By, LocatorExpression } from '../selectors/locator-expression';
import { IndexedCollection } from './indexed-collection';
import type { WaitPolicy } from './wait-policy';

/**
 * Builds the element for one index from its positional locator
 */
export type RecordFactory<E> = (
  index: number,
  locator: LocatorExpression,
  engine: AutomationEngine,
) => E;

/**
 * List of elements sharing one locator, addressed by position.
 *
 * @example
 * const results = WebList.of('Search results', engine, By.cssSelector('li.result'), {
 *   firstTimeoutSeconds: 15,
 * });
 * const titles = await results.getTexts();
 */
export class WebList<E extends WebElement = WebElement> extends IndexedCollection<E> {
  readonly locator: LocatorExpression;

  constructor(
    name: string,
    protected readonly engine: AutomationEngine,
    locator: LocatorExpression | string,
    protected readonly factory: RecordFactory<E>,
    waitPolicy: Partial<WaitPolicy> = {},
  ) {
    super(name, waitPolicy);
    this.locator = typeof locator === 'string' ? By.xpath(locator) : locator;
  }

  /**
   * List of plain WebElements named `<list name> <index>`
   */
  static of(
    name: string,
    engine: AutomationEngine,
    locator: LocatorExpression | string,
    waitPolicy: Partial<WaitPolicy> = {},
  ): WebList<WebElement> {
    return new WebList<WebElement>(
      name,
      engine,
      locator,
      (index, positional, listEngine) => new WebElement(`${name} ${index}`, listEngine, positional),
      waitPolicy,
    );
  }

  getRecord(index: number): E {
    return this.factory(index, this.locator.nth(index), this.engine);
  }
}
