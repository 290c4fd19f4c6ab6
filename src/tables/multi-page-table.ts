/**
 * Table spread over pages behind first/previous/next/last controls.
 *
 * Iteration and every aggregate helper span all pages: the table goes to the
 * first page, reads rows until the current page runs out, then moves to the
 * next page. `maxPageIterations` bounds the number of page changes, so a
 * control that never disables itself cannot keep a traversal alive forever.
 *
 * Page changes are verified with the page token the concrete table reads
 * from its page-number UI. When the token is blank the click is trusted.
 *
 * A table must be driven by one caller at a time; concurrent navigation on
 * the same browser session is not coordinated.
 */

import {
  IndexedCollection,
  type PageScanResult,
  type Readiness,
  type RecordIterator,
  type Visitor,
} from '../collections/indexed-collection';
import { InvalidArgumentError, NoSuchElementError, UnsupportedOperationError } from '../common/errors';
import { ErrorHandler } from '../common/utils/error-handler';
import { pollUntil } from '../common/utils/poll.util';
import { getWebConfig } from '../config/web.config';
import { WebElement } from '../controls/web-element';
import type { AutomationEngine } from '../engine/automation-engine';
import type { LocatorExpression } from '../selectors/locator-expression';
import { WebTable, type WebTableOptions } from './web-table';
import type { WebTableRow } from './web-table-row';

export interface PaginationControls {
  first?: LocatorExpression;
  previous?: LocatorExpression;
  next?: LocatorExpression;
  last?: LocatorExpression;
}

export interface MultiPageTableOptions extends WebTableOptions {
  /** Upper bound on page changes per traversal (default: WEB_MAX_PAGE_ITERATIONS) */
  maxPageIterations?: number;
  /** Wait for the page token to change after a click (default: WEB_PAGE_CHANGE_TIMEOUT_MS) */
  pageChangeTimeoutMs?: number;
}

export interface IterateOptions {
  /** Restrict the iterator to the page currently displayed */
  singlePage?: boolean;
}

/**
 * The rows of the page currently displayed, without any navigation
 */
class CurrentPageView<R extends WebTableRow> extends IndexedCollection<R> {
  constructor(private readonly table: MultiPageTable<R>) {
    super(`${table.name} (current page)`, table.waitPolicy);
  }

  getRecord(index: number): R {
    return this.table.getRecord(index);
  }
}

export abstract class MultiPageTable<R extends WebTableRow = WebTableRow> extends WebTable<R> {
  readonly firstLink?: WebElement;
  readonly previousLink?: WebElement;
  readonly nextLink?: WebElement;
  readonly lastLink?: WebElement;
  readonly maxPageIterations: number;
  readonly pageChangeTimeoutMs: number;

  constructor(
    name: string,
    engine: AutomationEngine,
    baseXpath: string,
    controls: PaginationControls,
    options: MultiPageTableOptions = {},
  ) {
    super(name, engine, baseXpath, options);

    const config = getWebConfig();
    this.maxPageIterations = options.maxPageIterations ?? config.maxPageIterations;
    this.pageChangeTimeoutMs = options.pageChangeTimeoutMs ?? config.pageChangeTimeoutMs;
    if (!Number.isInteger(this.maxPageIterations) || this.maxPageIterations < 1) {
      throw new InvalidArgumentError(
        `${name}: maxPageIterations must be a positive integer, got ${this.maxPageIterations}`,
      );
    }
    if (!Number.isFinite(this.pageChangeTimeoutMs) || this.pageChangeTimeoutMs < 0) {
      throw new InvalidArgumentError(
        `${name}: pageChangeTimeoutMs must be zero or more, got ${this.pageChangeTimeoutMs}`,
      );
    }

    this.firstLink = controls.first && new WebElement('First', engine, controls.first);
    this.previousLink = controls.previous && new WebElement('Previous', engine, controls.previous);
    this.nextLink = controls.next && new WebElement('Next', engine, controls.next);
    this.lastLink = controls.last && new WebElement('Last', engine, controls.last);
  }

  /**
   * Identifies the page on display, read from the table's page-number UI.
   * A blank string means no token is available.
   */
  abstract getCurrentPageToken(): Promise<string>;

  /**
   * Clicks "first" when it is clickable, otherwise steps back one page at a
   * time. True when the first page was reached within `maxPageIterations`.
   */
  async gotoFirstPage(): Promise<boolean> {
    this.log.trace('Go to first page');
    if (this.firstLink && (await this.firstLink.clickable.get())) {
      await this.firstLink.click();
      return true;
    }
    return this.repeatUntilStable(() => this.gotoPreviousPage());
  }

  gotoPreviousPage(): Promise<boolean> {
    return this.changePage(this.previousLink, 'previous');
  }

  gotoNextPage(): Promise<boolean> {
    return this.changePage(this.nextLink, 'next');
  }

  /**
   * Clicks "last" when it is clickable, otherwise steps forward one page at a
   * time. True when the last page was reached within `maxPageIterations`.
   */
  async gotoLastPage(): Promise<boolean> {
    this.log.trace('Go to last page');
    if (this.lastLink && (await this.lastLink.clickable.get())) {
      await this.lastLink.click();
      return true;
    }
    return this.repeatUntilStable(() => this.gotoNextPage());
  }

  iterator(options: IterateOptions = {}): RecordIterator<R> {
    return options.singlePage ? super.iterator() : this.iterateWithPagination();
  }

  /**
   * Iterator over the rows of every page. The first hasNext() moves the table
   * to its first page.
   */
  iterateWithPagination(): RecordIterator<R> {
    let started = false;
    let remainingPages = this.maxPageIterations;
    let cursor = 0;
    let record: R | undefined;

    const findNext = async (): Promise<boolean> => {
      if (!started) {
        started = true;
        await this.gotoFirstPage();
      }

      record = undefined;
      while (remainingPages > 0) {
        if (await this.hasRecord(cursor)) {
          record = this.getRecord(cursor);
          break;
        }
        if (!(await this.gotoNextPage())) {
          break;
        }
        remainingPages--;
        cursor = 0;
      }
      return record !== undefined;
    };

    return {
      hasNext: () => this.logFaults('iterate', findNext),
      next: async () => {
        if (record === undefined) {
          throw new NoSuchElementError(`${this.name} has no record ready; call hasNext() first`);
        }
        const current = record;
        record = undefined;
        cursor++;
        return current;
      },
      remove: () => {
        throw new UnsupportedOperationError(`${this.name} is a read-only collection`);
      },
    };
  }

  /**
   * Single-page view of this table; its helpers never navigate
   */
  currentPage(): IndexedCollection<R> {
    return new CurrentPageView(this);
  }

  async performOnCurrentPage<T>(fn: (page: IndexedCollection<R>) => T | Promise<T>): Promise<T> {
    return fn(this.currentPage());
  }

  getTotalRecordCount(): Promise<number> {
    return this.count();
  }

  getCurrentPageRecordCount(): Promise<number> {
    return this.currentPage().count();
  }

  protected async scan(
    firstWaitSecs: number,
    waitSecs: number,
    visit: Visitor<R>,
    readiness: Readiness = 'present',
  ): Promise<void> {
    await this.logFaults('scan', async () => {
      await this.gotoFirstPage();

      let offset = 0;
      for (let remainingPages = this.maxPageIterations; remainingPages > 0; remainingPages--) {
        const page: PageScanResult = await this.scanPage(
          offset,
          firstWaitSecs,
          waitSecs,
          visit,
          readiness,
        );
        if (page.stopped || !(await this.gotoNextPage())) {
          return;
        }
        offset += page.visited;
      }
    });
  }

  private async changePage(
    control: WebElement | undefined,
    direction: 'previous' | 'next',
  ): Promise<boolean> {
    if (!control || !(await control.clickable.get())) {
      return false;
    }

    const pageToken = await this.getCurrentPageToken();
    if (pageToken.trim() === '') {
      this.log.trace(`Go to ${direction} page from current page`);
    } else {
      this.log.trace({ page: pageToken }, `Go to ${direction} page from page ${pageToken}`);
    }

    await control.click();
    if (pageToken.trim() === '') {
      return true;
    }

    return pollUntil(async () => (await this.getCurrentPageToken()) !== pageToken, {
      timeoutMs: this.pageChangeTimeoutMs,
      intervalMs: this.waitPolicy.pollIntervalMs,
    });
  }

  /**
   * Repeats a page change until it reports no further page. False when the
   * budget runs out first.
   */
  private async repeatUntilStable(step: () => Promise<boolean>): Promise<boolean> {
    for (let moves = 0; moves < this.maxPageIterations; moves++) {
      if (!(await step())) {
        return true;
      }
    }
    this.log.warn(
      { maxPageIterations: this.maxPageIterations },
      'Page limit reached before pagination settled',
    );
    return false;
  }

  private async logFaults<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.log.error(ErrorHandler.toLogContext(error, { operation }), 'Traversal aborted');
      throw error;
    }
  }
}
