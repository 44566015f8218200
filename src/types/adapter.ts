import type { PageType, ReadinessCondition } from './fetch.js';
import type { PartialRecord } from './record.js';

/** Extraction ruleset for one kind of page on the upstream site. */
export interface PageParser {
  readonly pageType: PageType;

  /** Whether this ruleset reads the page at `url`; the first match in registration order wins. */
  handles(url: string): boolean;

  /** What a rendered page must show before its HTML is captured. */
  readonly readiness: ReadinessCondition;

  /**
   * Parse raw HTML into partial records.
   * Throws ParseError when the page lacks its required structural anchor.
   */
  parse(html: string, sourceUrl: string): PartialRecord[];
}
