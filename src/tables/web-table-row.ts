import { InvalidArgumentError } from '../common/errors';
import { WebElement } from '../controls/web-element';
import type { AutomationEngine } from '../engine/automation-engine';
import { By, LocatorExpression } from '../selectors/locator-expression';

/**
 * What a row needs from its table to address cells by header name
 */
export interface TableColumns {
  readonly cellXpath: string;
  getHeaderIndex(header: string): Promise<number | undefined>;
}

export class WebTableRow extends WebElement {
  constructor(
    name: string,
    engine: AutomationEngine,
    locator: LocatorExpression,
    readonly index: number,
    protected readonly columns: TableColumns,
  ) {
    super(name, engine, locator);
  }

  /**
   * Cell by header text or by 1-based column index
   */
  async getCell(column: string | number): Promise<WebElement> {
    const columnIndex =
      typeof column === 'number' ? column : await this.columns.getHeaderIndex(column);
    if (columnIndex === undefined || !Number.isInteger(columnIndex) || columnIndex < 1) {
      throw new InvalidArgumentError(`${this.name} has no column ${String(column)}`);
    }

    const cells = LocatorExpression.chain(this.locator, By.xpath(this.columns.cellXpath));
    return new WebElement(`${this.name} ${column}`, this.engine, cells.nth(columnIndex - 1));
  }

  async getCellText(column: string | number): Promise<string> {
    return (await this.getCell(column)).getText();
  }
}
