/**
 * Index-addressable, wait-aware view over a family of elements.
 *
 * Records are built on demand by `getRecord(index)` and never cached, so every
 * read reflects the live page. The end of the collection is the first index
 * whose element does not show up within its wait.
 */

import { NoSuchElementError, UnsupportedOperationError } from '../common/errors';
import { pollUntil, secondsToMs } from '../common/utils/poll.util';
import type { WebElement } from '../controls/web-element';
import { createWaitPolicy, type WaitPolicy } from './wait-policy';

export type Predicate<E> = (element: E, index: number) => boolean | Promise<boolean>;
export type Action<E> = (element: E, index: number) => void | Promise<void>;

/**
 * Pull-style iterator over live records
 */
export interface RecordIterator<E> {
  hasNext(): Promise<boolean>;
  /** Rejects with NoSuchElementError when there is no record to return */
  next(): Promise<E>;
  /** Always throws: the collection is a read-only view */
  remove(): never;
}

/**
 * Which state makes an element count as part of the collection during a scan
 */
export type Readiness = 'present' | 'enabledOrPresent';

/**
 * Visitor used by scans; resolving to false stops the scan
 */
export type Visitor<E> = (element: E, index: number) => Promise<boolean>;

export interface PageScanResult {
  visited: number;
  stopped: boolean;
}

export abstract class IndexedCollection<E extends WebElement> implements AsyncIterable<E> {
  readonly waitPolicy: WaitPolicy;

  constructor(
    readonly name: string,
    waitPolicy: Partial<WaitPolicy> = {},
  ) {
    this.waitPolicy = createWaitPolicy(waitPolicy);
  }

  /**
   * Builds the element at `index` without waiting or checking that it exists.
   */
  abstract getRecord(index: number): E;

  /**
   * True when the element at `index` is present within the policy wait:
   * `firstTimeoutSeconds` for index 0, `otherTimeoutSeconds` after that.
   */
  hasRecord(index: number): Promise<boolean> {
    const timeout =
      index === 0 ? this.waitPolicy.firstTimeoutSeconds : this.waitPolicy.otherTimeoutSeconds;
    return this.getRecord(index).present.waitIsTrue(timeout, this.waitPolicy.pollIntervalMs);
  }

  iterator(): RecordIterator<E> {
    let cursor = 0;
    let confirmed = -1;

    return {
      hasNext: async () => {
        if (await this.hasRecord(cursor)) {
          confirmed = cursor;
          return true;
        }
        return false;
      },
      next: async () => {
        if (confirmed !== cursor && !(await this.hasRecord(cursor))) {
          throw new NoSuchElementError(`${this.name} has no record at index ${cursor}`);
        }
        return this.getRecord(cursor++);
      },
      remove: () => {
        throw new UnsupportedOperationError(`${this.name} is a read-only collection`);
      },
    };
  }

  async *[Symbol.asyncIterator](): AsyncIterator<E> {
    const records = this.iterator();
    while (await records.hasNext()) {
      yield await records.next();
    }
  }

  async forEach(
    action: Action<E>,
    firstWaitSecs: number = this.waitPolicy.firstTimeoutSeconds,
    waitSecs: number = this.waitPolicy.otherTimeoutSeconds,
  ): Promise<void> {
    await this.scan(firstWaitSecs, waitSecs, async (element, index) => {
      await action(element, index);
      return true;
    });
  }

  /**
   * Runs `action` on the elements satisfying `predicate`. An element is tested
   * when it is enabled or present within its wait; the scan ends at the first
   * element that is neither.
   */
  async onMatch(
    predicate: Predicate<E>,
    action: Action<E>,
    stopAfterFirstMatch: boolean = false,
    firstWaitSecs: number = this.waitPolicy.firstTimeoutSeconds,
    waitSecs: number = this.waitPolicy.otherTimeoutSeconds,
  ): Promise<void> {
    await this.scan(
      firstWaitSecs,
      waitSecs,
      async (element, index) => {
        if (await predicate(element, index)) {
          await action(element, index);
          return !stopAfterFirstMatch;
        }
        return true;
      },
      'enabledOrPresent',
    );
  }

  onFirstMatch(
    predicate: Predicate<E>,
    action: Action<E>,
    firstWaitSecs?: number,
    waitSecs?: number,
  ): Promise<void> {
    return this.onMatch(predicate, action, true, firstWaitSecs, waitSecs);
  }

  /**
   * True when every element satisfies `predicate`; true for an empty
   * collection. Stops at the first failing element.
   */
  async testAll(
    predicate: Predicate<E>,
    firstWaitSecs: number = this.waitPolicy.firstTimeoutSeconds,
    waitSecs: number = this.waitPolicy.otherTimeoutSeconds,
  ): Promise<boolean> {
    let result = true;
    await this.scan(firstWaitSecs, waitSecs, async (element, index) => {
      result = await predicate(element, index);
      return result;
    });
    return result;
  }

  /**
   * True when at least one element satisfies `predicate`. Stops at the first
   * match.
   */
  async testAny(
    predicate: Predicate<E>,
    firstWaitSecs?: number,
    waitSecs?: number,
  ): Promise<boolean> {
    let found = false;
    await this.onFirstMatch(
      predicate,
      () => {
        found = true;
      },
      firstWaitSecs,
      waitSecs,
    );
    return found;
  }

  /**
   * True when exactly one element satisfies `predicate`. Scans the whole
   * collection.
   */
  async testExactlyOne(
    predicate: Predicate<E>,
    firstWaitSecs?: number,
    waitSecs?: number,
  ): Promise<boolean> {
    let matches = 0;
    await this.onMatch(
      predicate,
      () => {
        matches++;
      },
      false,
      firstWaitSecs,
      waitSecs,
    );
    return matches === 1;
  }

  async getFirst(
    predicate: Predicate<E>,
    firstWaitSecs?: number,
    waitSecs?: number,
  ): Promise<E | undefined> {
    let first: E | undefined;
    await this.onFirstMatch(
      predicate,
      (element) => {
        first = element;
      },
      firstWaitSecs,
      waitSecs,
    );
    return first;
  }

  async getElements(firstWaitSecs?: number, waitSecs?: number): Promise<E[]> {
    const elements: E[] = [];
    await this.forEach((element) => {
      elements.push(element);
    }, firstWaitSecs, waitSecs);
    return elements;
  }

  async getTexts(firstWaitSecs?: number, waitSecs?: number): Promise<string[]> {
    const texts: string[] = [];
    await this.forEach(async (element) => {
      texts.push(await element.getText());
    }, firstWaitSecs, waitSecs);
    return texts;
  }

  async count(firstWaitSecs?: number, waitSecs?: number): Promise<number> {
    return (await this.getElements(firstWaitSecs, waitSecs)).length;
  }

  /**
   * Drives `visit` over the collection. Overridden by collections that span
   * more than one page.
   */
  protected async scan(
    firstWaitSecs: number,
    waitSecs: number,
    visit: Visitor<E>,
    readiness: Readiness = 'present',
  ): Promise<void> {
    await this.scanPage(0, firstWaitSecs, waitSecs, visit, readiness);
  }

  /**
   * Visits the records currently addressable from index 0, numbering them
   * from `offset` for the visitor.
   */
  protected async scanPage(
    offset: number,
    firstWaitSecs: number,
    waitSecs: number,
    visit: Visitor<E>,
    readiness: Readiness,
  ): Promise<PageScanResult> {
    for (let cursor = 0; ; cursor++) {
      const element = this.getRecord(cursor);
      const ready = await this.isReady(element, cursor === 0 ? firstWaitSecs : waitSecs, readiness);
      if (!ready) {
        return { visited: cursor, stopped: false };
      }
      if (!(await visit(element, offset + cursor))) {
        return { visited: cursor + 1, stopped: true };
      }
    }
  }

  protected isReady(element: E, timeoutSeconds: number, readiness: Readiness): Promise<boolean> {
    if (readiness === 'present') {
      return element.present.waitIsTrue(timeoutSeconds, this.waitPolicy.pollIntervalMs);
    }
    return pollUntil(
      async () => (await element.enabled.get()) || (await element.present.get()),
      { timeoutMs: secondsToMs(timeoutSeconds), intervalMs: this.waitPolicy.pollIntervalMs },
    );
  }
}
