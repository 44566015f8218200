import { getParser } from '../adapters/index.js';
import type { RawPage } from '../types/fetch.js';
import type { PartialRecord } from '../types/record.js';
import { logger } from '../utils/logger.js';

/**
 * Runs the ruleset registered for the page's type and URL. ParseError from
 * the ruleset propagates to the caller.
 */
export function parsePage(page: RawPage): PartialRecord[] {
  const parser = getParser(page.pageType, page.url);
  const records = parser.parse(page.html, page.url);

  logger.debug({ url: page.url, pageType: page.pageType, count: records.length }, 'Parsed page');
  return records;
}
