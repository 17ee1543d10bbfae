import { IPageSession } from '../interfaces/IPageSession.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { errorMessage } from '../errors.js';
import { sleep } from '../../utils/timing.js';
import {
  ITEM_LINK_SELECTORS,
  ITEM_ROW_SELECTORS,
  SHOW_MORE_SELECTORS,
  SORT_BY_YEAR_SELECTORS,
  SORT_CONTROL_SELECTORS,
  SUBJECT_NAME_SELECTORS,
} from './selectors.js';

export interface DiscoveryOptions {
  clickDelayMs: number;
  maxShowMoreClicks: number;
}

/**
 * Reads a profile page: who it belongs to and which item pages it links to.
 * Sorting and expanding the list are best effort; only the caller decides what
 * counts as a discovery failure.
 */
export class ProfileDiscovery {
  constructor(
    private options: DiscoveryOptions,
    private logger: Logger = silentLogger
  ) {}

  async resolveSubjectName(page: IPageSession): Promise<string | null> {
    for (const selector of SUBJECT_NAME_SELECTORS) {
      const element = await page.findFirst([selector]);
      if (element?.text) {
        this.logger.debug(`Subject name found via ${selector}`);
        return element.text;
      }
    }

    const title = (await page.title()).trim();
    if (title.includes(' - ')) {
      const name = title.split(' - ')[0].trim();
      if (name) {
        return name;
      }
    }

    return null;
  }

  async sortByYear(page: IPageSession): Promise<boolean> {
    try {
      const control = await page.findFirst(SORT_CONTROL_SELECTORS);
      if (!control) {
        return false;
      }
      await page.click(control);
      await sleep(this.options.clickDelayMs);

      const option = await page.findFirst(SORT_BY_YEAR_SELECTORS);
      if (!option) {
        return false;
      }
      const sorted = await page.click(option);
      await sleep(this.options.clickDelayMs);
      return sorted;
    } catch (error) {
      this.logger.warn(`Sorting by year failed, keeping default order: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Clicks "show more" until it is gone, disabled or inert. Returns the click count.
   */
  async loadAllItems(page: IPageSession): Promise<number> {
    let clicks = 0;

    try {
      while (clicks < this.options.maxShowMoreClicks) {
        const button = await page.findFirst(SHOW_MORE_SELECTORS);
        if (!button || (await page.attribute(button, 'disabled')) !== null) {
          break;
        }
        if (!(await page.click(button))) {
          break;
        }
        clicks++;
        await sleep(this.options.clickDelayMs);
      }
    } catch (error) {
      this.logger.warn(`Loading more items failed after ${clicks} clicks: ${errorMessage(error)}`);
    }

    this.logger.debug(`Show-more clicked ${clicks} times`);
    return clicks;
  }

  /**
   * Absolute item URLs in page order, without duplicates
   */
  async collectItemUrls(page: IPageSession): Promise<string[]> {
    const urls: string[] = [];
    const rows = await page.findAll(ITEM_ROW_SELECTORS);

    for (const row of rows) {
      for (const selector of ITEM_LINK_SELECTORS) {
        const link = await page.findFirst([selector], row);
        const href = link ? await page.attribute(link, 'href') : null;
        if (href && href.startsWith('http')) {
          if (!urls.includes(href)) {
            urls.push(href);
          }
          break;
        }
      }
    }

    return urls;
  }
}
