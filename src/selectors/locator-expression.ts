/**
 * Logical locators and their resolution into engine selectors.
 *
 * Every locator resolves to a query in one of two families: XPath or CSS.
 * The engine-facing `selector` carries the family as a prefix so the
 * automation engine never has to guess how to evaluate it.
 */

import { InvalidArgumentError, InvalidLocatorError } from '../common/errors';
import { escapeXPathLiteral, normalizeSpace } from './xpath-escape';

export type LogicalLocator =
  | { type: 'id'; id: string }
  | { type: 'name'; name: string }
  | { type: 'className'; className: string }
  | { type: 'tagName'; tagName: string }
  | { type: 'xpath'; xpath: string }
  | { type: 'css'; css: string }
  | { type: 'linkText'; text: string }
  | { type: 'partialLinkText'; text: string };

export type LocatorKind = LogicalLocator['type'] | 'chain' | 'nth';

export type LocatorFamily = 'xpath' | 'css';

function requireValue(kind: string, value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidLocatorError(`Cannot build a ${kind} locator from a blank value`);
  }
  return value.trim();
}

export class LocatorExpression {
  private constructor(
    readonly kind: LocatorKind,
    readonly family: LocatorFamily,
    readonly query: string,
  ) {}

  /**
   * The string handed to the automation engine, e.g. `xpath=//a` or `css=a.b`
   */
  get selector(): string {
    return `${this.family}=${this.query}`;
  }

  static from(locator: LogicalLocator): LocatorExpression {
    switch (locator.type) {
      case 'id': {
        const id = requireValue('id', locator.id);
        return new LocatorExpression('id', 'xpath', `//*[@id=${escapeXPathLiteral(id)}]`);
      }
      case 'name': {
        const name = requireValue('name', locator.name);
        return new LocatorExpression('name', 'xpath', `//*[@name=${escapeXPathLiteral(name)}]`);
      }
      case 'className': {
        const className = requireValue('className', locator.className);
        if (/\s/.test(className)) {
          throw new InvalidLocatorError(
            `Compound class names are not supported: "${className}"`,
          );
        }
        return new LocatorExpression(
          'className',
          'xpath',
          `//*[contains(concat(' ', normalize-space(@class), ' '), ${escapeXPathLiteral(` ${className} `)})]`,
        );
      }
      case 'tagName': {
        const tagName = requireValue('tagName', locator.tagName);
        if (!/^[A-Za-z][\w.-]*$/.test(tagName)) {
          throw new InvalidLocatorError(`Invalid tag name: "${tagName}"`);
        }
        return new LocatorExpression('tagName', 'xpath', `//${tagName}`);
      }
      case 'xpath':
        return new LocatorExpression('xpath', 'xpath', requireValue('xpath', locator.xpath));
      case 'css':
        return new LocatorExpression('css', 'css', requireValue('css', locator.css));
      case 'linkText': {
        const text = normalizeSpace(requireValue('linkText', locator.text));
        return new LocatorExpression(
          'linkText',
          'xpath',
          `//a[normalize-space(.)=${escapeXPathLiteral(text)}]`,
        );
      }
      case 'partialLinkText': {
        const text = normalizeSpace(requireValue('partialLinkText', locator.text));
        return new LocatorExpression(
          'partialLinkText',
          'xpath',
          `//a[contains(normalize-space(.), ${escapeXPathLiteral(text)})]`,
        );
      }
      default: {
        const unknownLocator: never = locator;
        throw new InvalidLocatorError(`Unsupported locator: ${JSON.stringify(unknownLocator)}`);
      }
    }
  }

  /**
   * Joins locators into one path. XPath queries are concatenated; CSS queries
   * are chained with `>>` so a positional part keeps its own scope. Mixing the
   * two is rejected.
   */
  static chain(...locators: LocatorExpression[]): LocatorExpression {
    if (locators.length === 0) {
      throw new InvalidLocatorError('Cannot chain an empty list of locators');
    }

    const family = locators[0].family;
    const mixed = locators.find((locator) => locator.family !== family);
    if (mixed) {
      throw new InvalidLocatorError(
        `Cannot chain ${mixed.family} locator "${mixed.query}" onto ${family} locators`,
      );
    }

    if (locators.length === 1) {
      return locators[0];
    }

    const query =
      family === 'xpath'
        ? locators.map((locator) => locator.query).join('')
        : locators.map((locator) => locator.query).join(' >> ');
    return new LocatorExpression('chain', family, query);
  }

  /**
   * Positional form of this locator; `index` is zero based.
   */
  nth(index: number): LocatorExpression {
    if (!Number.isInteger(index) || index < 0) {
      throw new InvalidArgumentError(`Index must be a non-negative integer, got ${index}`);
    }
    const query =
      this.family === 'xpath' ? `(${this.query})[${index + 1}]` : `${this.query} >> nth=${index}`;
    return new LocatorExpression('nth', this.family, query);
  }

  toString(): string {
    return this.selector;
  }
}

/**
 * Factory shortcuts for the logical locator kinds
 *
 * @example
 * const next = By.linkText('Next');
 * const rows = By.xpath("//table[@id='users']/tbody/tr");
 */
export const By = {
  id: (id: string) => LocatorExpression.from({ type: 'id', id }),
  name: (name: string) => LocatorExpression.from({ type: 'name', name }),
  className: (className: string) => LocatorExpression.from({ type: 'className', className }),
  tagName: (tagName: string) => LocatorExpression.from({ type: 'tagName', tagName }),
  xpath: (xpath: string) => LocatorExpression.from({ type: 'xpath', xpath }),
  cssSelector: (css: string) => LocatorExpression.from({ type: 'css', css }),
  linkText: (text: string) => LocatorExpression.from({ type: 'linkText', text }),
  partialLinkText: (text: string) => LocatorExpression.from({ type: 'partialLinkText', text }),
} as const;
