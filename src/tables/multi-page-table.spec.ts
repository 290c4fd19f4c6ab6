import { InvalidArgumentError } from '../common/errors';
import type { AutomationEngine } from '../engine/automation-engine';
import { By, LocatorExpression } from '../selectors/locator-expression';
import { InMemoryEngine } from '../testing/in-memory-engine';
import {
  MultiPageTable,
  type MultiPageTableOptions,
  type PaginationControls,
} from './multi-page-table';
import type { WebTableRow } from './web-table-row';

const base = "//table[@id='orders']";
const rows = By.xpath(`${base}/tbody/tr`);
const first = By.linkText('First');
const previous = By.linkText('Previous');
const next = By.linkText('Next');
const last = By.linkText('Last');

class OrdersTable extends MultiPageTable {
  constructor(
    engine: AutomationEngine,
    controls: PaginationControls,
    private readonly readToken: () => string,
    options: MultiPageTableOptions = {},
  ) {
    super('Orders', engine, base, controls, {
      waitPolicy: { firstTimeoutSeconds: 1, otherTimeoutSeconds: 1, pollIntervalMs: 10 },
      pageChangeTimeoutMs: 200,
      ...options,
    });
  }

  async getCurrentPageToken(): Promise<string> {
    return this.readToken();
  }

  protected createRow(index: number, locator: LocatorExpression): WebTableRow {
    return this.buildRow(index, locator);
  }
}

describe('MultiPageTable', () => {
  const pages = [
    ['order 1', 'order 2'],
    ['order 3', 'order 4'],
    ['order 5', 'order 6'],
  ];
  let engine: InMemoryEngine;
  let page: number;

  const pageToken = () => String(page);

  beforeEach(() => {
    engine = new InMemoryEngine();
    page = 1;
    engine.defineList(rows, () => (pages[page - 1] ?? []).map((text) => ({ text })));
    engine.define(previous, () => ({
      enabled: page > 1,
      onClick: () => {
        page--;
      },
    }));
    engine.define(next, () => ({
      enabled: page < pages.length,
      onClick: () => {
        page++;
      },
    }));
  });

  it('should reject a page budget below one', () => {
    expect(
      () => new OrdersTable(engine, { next }, pageToken, { maxPageIterations: 0 }),
    ).toThrow(InvalidArgumentError);
  });

  describe('traversal', () => {
    it('should visit the rows of every page in order', async () => {
      const table = new OrdersTable(engine, { previous, next }, pageToken);
      const visited: Array<[number, string]> = [];

      await table.forEach(async (row, index) => {
        visited.push([index, await row.getText()]);
      }, 0, 0);

      expect(visited).toEqual([
        [0, 'order 1'],
        [1, 'order 2'],
        [2, 'order 3'],
        [3, 'order 4'],
        [4, 'order 5'],
        [5, 'order 6'],
      ]);
      expect(engine.clickCount(next)).toBe(2);
    });

    it('should start from the first page', async () => {
      page = 2;
      const table = new OrdersTable(engine, { previous, next }, pageToken);

      await expect(table.count(0, 0)).resolves.toBe(6);
      expect(engine.clickCount(previous)).toBe(1);
    });

    it('should stop after maxPageIterations pages', async () => {
      const table = new OrdersTable(engine, { previous, next }, pageToken, {
        maxPageIterations: 2,
      });

      await expect(table.count(0, 0)).resolves.toBe(4);
    });

    it('should stop paging once the visitor stops', async () => {
      const table = new OrdersTable(engine, { previous, next }, pageToken);

      const found = await table.getFirst(async (row) => (await row.getText()) === 'order 3', 0, 0);

      expect(found?.name).toBe('Orders row 0');
      expect(page).toBe(2);
      expect(engine.clickCount(next)).toBe(1);
    });

    it('should log and rethrow engine faults', async () => {
      const table = new OrdersTable(engine, { previous, next }, pageToken);
      jest.spyOn(engine, 'isPresent').mockRejectedValue(new Error('browser closed'));

      await expect(table.count(0, 0)).rejects.toThrow('browser closed');
      await expect(table.iterator().hasNext()).rejects.toThrow('browser closed');
    });
  });

  describe('iterator', () => {
    it('should iterate across pages', async () => {
      const table = new OrdersTable(engine, { previous, next }, pageToken);
      const records = table.iterator();
      const texts: string[] = [];

      while (await records.hasNext()) {
        texts.push(await (await records.next()).getText());
      }

      expect(texts).toEqual(['order 1', 'order 2', 'order 3', 'order 4', 'order 5', 'order 6']);
      expect(engine.clickCount(next)).toBe(2);
    });

    it('should move to the first page on the first hasNext()', async () => {
      page = 2;
      const table = new OrdersTable(engine, { previous, next }, pageToken);
      const records = table.iterator();

      expect(engine.clicks).toEqual([]);
      await expect(records.hasNext()).resolves.toBe(true);
      expect(page).toBe(1);
      expect(engine.clickCount(previous)).toBe(1);
      await expect((await records.next()).getText()).resolves.toBe('order 1');
    });

    it('should stop after maxPageIterations pages', async () => {
      const table = new OrdersTable(engine, { previous, next }, pageToken, {
        maxPageIterations: 2,
      });
      const records = table.iterator();
      const texts: string[] = [];

      while (await records.hasNext()) {
        texts.push(await (await records.next()).getText());
      }

      expect(texts).toEqual(['order 1', 'order 2', 'order 3', 'order 4']);
      expect(engine.clickCount(next)).toBe(2);
    });

    it('should return the same record for repeated hasNext() calls', async () => {
      const table = new OrdersTable(engine, { previous, next }, pageToken);
      const records = table.iterator();

      await expect(records.hasNext()).resolves.toBe(true);
      await expect(records.hasNext()).resolves.toBe(true);
      const firstRecord = await records.next();
      await expect(records.hasNext()).resolves.toBe(true);
      const secondRecord = await records.next();

      expect(firstRecord.locator.selector).toBe(`xpath=(${base}/tbody/tr)[1]`);
      expect(secondRecord.locator.selector).toBe(`xpath=(${base}/tbody/tr)[2]`);
      expect(engine.clicks).toEqual([]);
    });

    it('should stay on the current page in single-page mode', async () => {
      page = 2;
      const table = new OrdersTable(engine, { previous, next }, pageToken);
      const records = table.iterator({ singlePage: true });
      const texts: string[] = [];

      while (await records.hasNext()) {
        texts.push(await (await records.next()).getText());
      }

      expect(texts).toEqual(['order 3', 'order 4']);
      expect(engine.clicks).toEqual([]);
    });

    it('should reject next() before hasNext()', async () => {
      const table = new OrdersTable(engine, { previous, next }, pageToken);

      await expect(table.iterator().next()).rejects.toThrow(
        'Orders has no record ready; call hasNext() first',
      );
    });
  });

  describe('current page', () => {
    it('should count only the page on display', async () => {
      page = 3;
      const table = new OrdersTable(engine, { previous, next }, pageToken);

      await expect(table.getCurrentPageRecordCount()).resolves.toBe(2);
      await expect(table.currentPage().getTexts(0, 0)).resolves.toEqual(['order 5', 'order 6']);
      expect(engine.clicks).toEqual([]);
    });

    it('should run a callback against the current page', async () => {
      page = 2;
      const table = new OrdersTable(engine, { previous, next }, pageToken);

      const texts = await table.performOnCurrentPage((current) => current.getTexts(0, 0));

      expect(texts).toEqual(['order 3', 'order 4']);
      expect(table.currentPage().name).toBe('Orders (current page)');
    });
  });

  describe('navigation', () => {
    it('should report no previous page once on the first page', async () => {
      page = 3;
      const table = new OrdersTable(engine, { previous, next }, pageToken);

      await expect(table.gotoFirstPage()).resolves.toBe(true);
      expect(page).toBe(1);
      await expect(table.gotoPreviousPage()).resolves.toBe(false);
    });

    it('should use the first control when it is clickable', async () => {
      page = 3;
      engine.define(first, {
        onClick: () => {
          page = 1;
        },
      });
      const table = new OrdersTable(engine, { first, previous, next }, pageToken);

      await expect(table.gotoFirstPage()).resolves.toBe(true);
      expect(engine.clicks).toEqual([first.selector]);
    });

    it('should step forward when the last control is absent', async () => {
      const table = new OrdersTable(engine, { previous, next, last }, pageToken);

      await expect(table.gotoLastPage()).resolves.toBe(true);
      expect(page).toBe(3);
      expect(engine.clickCount(next)).toBe(2);
    });

    it('should give up after maxPageIterations moves on an endless next control', async () => {
      engine.define(next, {
        onClick: () => {
          page++;
        },
      });
      const table = new OrdersTable(engine, { previous, next, last }, pageToken, {
        maxPageIterations: 3,
      });

      await expect(table.gotoLastPage()).resolves.toBe(false);
      expect(engine.clickCount(next)).toBe(3);
    });

    it('should report failure when the page token does not change', async () => {
      engine.define(next, {});
      const table = new OrdersTable(engine, { previous, next }, pageToken, {
        pageChangeTimeoutMs: 50,
      });

      await expect(table.gotoNextPage()).resolves.toBe(false);
      expect(engine.clickCount(next)).toBe(1);
    });

    it('should trust the click when no page token is available', async () => {
      engine.define(next, {});
      const table = new OrdersTable(engine, { previous, next }, () => '');

      await expect(table.gotoNextPage()).resolves.toBe(true);
    });

    it('should not click a disabled or missing control', async () => {
      const table = new OrdersTable(engine, { next }, pageToken);

      await expect(table.gotoPreviousPage()).resolves.toBe(false);
      page = 3;
      await expect(table.gotoNextPage()).resolves.toBe(false);
      expect(engine.clicks).toEqual([]);
    });

    it('should not click a hidden control', async () => {
      engine.define(next, { displayed: false });
      const table = new OrdersTable(engine, { previous, next }, pageToken);

      await expect(table.gotoNextPage()).resolves.toBe(false);
      expect(engine.clicks).toEqual([]);
    });

    it('should end a traversal when the next control is hidden on the last page', async () => {
      engine.define(next, () => ({
        displayed: page < pages.length,
        onClick: () => {
          page++;
        },
      }));
      const table = new OrdersTable(engine, { previous, next }, pageToken);

      await expect(table.count(0, 0)).resolves.toBe(6);
      expect(engine.clickCount(next)).toBe(2);
    });
  });
});
