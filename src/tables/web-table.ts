/**
 * HTML table addressed through XPath fragments.
 *
 * Rows are the `tbody` rows of the table, optionally narrowed by search
 * criteria (header text -> cell substring). Header texts are read once and
 * memoized until `getHeadersMap(true)`.
 */

import { IndexedCollection, type Predicate } from '../collections/indexed-collection';
import type { WaitPolicy } from '../collections/wait-policy';
import { WebList } from '../collections/web-list';
import { InvalidArgumentError } from '../common/errors';
import { WebElement } from '../controls/web-element';
import type { AutomationEngine } from '../engine/automation-engine';
import { createLogger, type Logger } from '../lib/logger';
import { By, LocatorExpression } from '../selectors/locator-expression';
import { escapeXPathLiteral, normalizeSpace } from '../selectors/xpath-escape';
import { WebTableRow, type TableColumns } from './web-table-row';

export type SearchCriteria = Record<string, string>;

export interface WebTableOptions {
  waitPolicy?: Partial<WaitPolicy>;
  tHeadXpath?: string;
  headerRowXpath?: string;
  headerCellXpath?: string;
  tBodyXpath?: string;
  rowXpath?: string;
  cellXpath?: string;
}

export abstract class WebTable<R extends WebTableRow = WebTableRow>
  extends IndexedCollection<R>
  implements TableColumns
{
  readonly tHeadXpath: string;
  readonly headerRowXpath: string;
  readonly headerCellXpath: string;
  readonly tBodyXpath: string;
  readonly rowXpath: string;
  readonly cellXpath: string;

  protected readonly log: Logger;

  private headers?: Promise<Map<number, string>>;
  private searchCriteria: SearchCriteria = {};
  private searchXpath = '';

  constructor(
    name: string,
    protected readonly engine: AutomationEngine,
    readonly baseXpath: string,
    options: WebTableOptions = {},
  ) {
    super(name, options.waitPolicy);
    if (baseXpath.trim() === '') {
      throw new InvalidArgumentError(`${name}: table XPath must not be blank`);
    }
    this.tHeadXpath = options.tHeadXpath ?? '/thead';
    this.headerRowXpath = options.headerRowXpath ?? '/tr';
    this.headerCellXpath = options.headerCellXpath ?? '/th';
    this.tBodyXpath = options.tBodyXpath ?? '/tbody';
    this.rowXpath = options.rowXpath ?? '/tr';
    this.cellXpath = options.cellXpath ?? '/td';
    this.log = createLogger({ module: 'web-table', table: name });
  }

  protected abstract createRow(index: number, locator: LocatorExpression): R;

  getRecord(index: number): R {
    return this.createRow(index, this.getRowLocator(index));
  }

  /**
   * `(<table>/tbody/tr<criteria>)[index + 1]`
   */
  getRowLocator(index: number): LocatorExpression {
    return By.xpath(this.baseXpath + this.tBodyXpath + this.rowXpath + this.searchXpath).nth(index);
  }

  /**
   * Header texts keyed by 1-based column index
   */
  getHeadersMap(reset: boolean = false): Promise<Map<number, string>> {
    if (!reset && this.headers) {
      return this.headers;
    }

    const headers = this.readHeaders();
    this.headers = headers;
    // a failed read is not memoized
    void headers.catch(() => {
      if (this.headers === headers) {
        this.headers = undefined;
      }
    });
    return headers;
  }

  async getHeaderIndex(header: string): Promise<number | undefined> {
    const wanted = normalizeSpace(header);
    for (const [index, text] of await this.getHeadersMap()) {
      if (text === wanted) {
        return index;
      }
    }
    return undefined;
  }

  /**
   * Header cell by text or by 1-based column index
   */
  async getHeader(column: string | number): Promise<WebElement> {
    const index = typeof column === 'number' ? column : await this.getHeaderIndex(column);
    if (index === undefined || !Number.isInteger(index) || index < 1) {
      throw new InvalidArgumentError(`${this.name} has no header ${String(column)}`);
    }
    return new WebElement(`Header ${index}`, this.engine, this.headerCellsLocator().nth(index - 1));
  }

  getSearchCriteria(): Readonly<SearchCriteria> {
    return { ...this.searchCriteria };
  }

  /**
   * Narrows the rows to those whose cells contain the given values. Replaces
   * any previous criteria.
   */
  async setSearchCriteria(criteria: SearchCriteria): Promise<this> {
    let searchXpath = '';
    for (const [header, value] of Object.entries(criteria)) {
      const index = await this.getHeaderIndex(header);
      if (index === undefined) {
        throw new InvalidArgumentError(`${this.name} has no column "${header}" to search on`);
      }
      searchXpath += `${this.cellXpath}[${index}][contains(.,${escapeXPathLiteral(value)})]/ancestor::tr[1]`;
    }

    this.log.debug({ criteria }, 'Set search criteria');
    this.searchCriteria = { ...criteria };
    this.searchXpath = searchXpath;
    return this;
  }

  clearSearchCriteria(): this {
    this.log.debug('Clear search criteria');
    this.searchCriteria = {};
    this.searchXpath = '';
    return this;
  }

  /**
   * Runs `fn` with `criteria` applied, then restores the previous criteria
   */
  async withSearchCriteria<T>(criteria: SearchCriteria, fn: () => Promise<T>): Promise<T> {
    const previousCriteria = this.searchCriteria;
    const previousXpath = this.searchXpath;
    await this.setSearchCriteria(criteria);
    try {
      return await fn();
    } finally {
      this.searchCriteria = previousCriteria;
      this.searchXpath = previousXpath;
    }
  }

  /**
   * Rows matching `criteria` that also satisfy `predicate`
   */
  getAllMatching(criteria: SearchCriteria, predicate: Predicate<R> = () => true): Promise<R[]> {
    return this.withSearchCriteria(criteria, async () => {
      const rows: R[] = [];
      await this.onMatch(predicate, (row) => {
        rows.push(row);
      });
      return rows;
    });
  }

  getFirstMatching(
    criteria: SearchCriteria,
    predicate: Predicate<R> = () => true,
  ): Promise<R | undefined> {
    return this.withSearchCriteria(criteria, () => this.getFirst(predicate));
  }

  /**
   * Row built as a plain WebTableRow bound to this table's columns
   */
  protected buildRow(index: number, locator: LocatorExpression): WebTableRow {
    return new WebTableRow(`${this.name} row ${index}`, this.engine, locator, index, this);
  }

  private headerCellsLocator(): LocatorExpression {
    return By.xpath(this.baseXpath + this.tHeadXpath + this.headerRowXpath + this.headerCellXpath);
  }

  private async readHeaders(): Promise<Map<number, string>> {
    const headers = new Map<number, string>();
    const cells = WebList.of('Headers', this.engine, this.headerCellsLocator(), this.waitPolicy);
    await cells.forEach(async (cell) => {
      headers.set(headers.size + 1, normalizeSpace(await cell.getText()));
    });
    return headers;
  }
}
