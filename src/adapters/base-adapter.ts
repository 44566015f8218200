import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { PageParser } from '../types/adapter.js';
import type { PageType, ReadinessCondition } from '../types/fetch.js';
import type { PartialRecord } from '../types/record.js';

export type Selection = cheerio.Cheerio<Element>;

export abstract class BaseParser implements PageParser {
  abstract readonly pageType: PageType;
  abstract readonly readiness: ReadinessCondition;
  abstract handles(url: string): boolean;
  abstract parse(html: string, sourceUrl: string): PartialRecord[];

  protected load(html: string) {
    return cheerio.load(html);
  }

  /** Collapses whitespace; empty strings become null. */
  protected clean(text: string | undefined | null): string | null {
    if (!text) return null;
    const cleaned = text.replace(/\s+/g, ' ').trim();
    return cleaned || null;
  }

  /** Text of the first selector (in order) that matches something non-empty under root. */
  protected firstText(root: Selection, selectors: readonly string[]): string | null {
    for (const selector of selectors) {
      const text = this.clean(root.find(selector).first().text());
      if (text) return text;
    }
    return null;
  }

  /** Own text of an element, ignoring the text of its child elements. */
  protected ownText(el: Selection): string | null {
    return this.clean(
      el
        .contents()
        .filter((_i, node) => node.type === 'text')
        .text(),
    );
  }

  /** Absolute form of an href; null when it does not resolve against `base`. */
  protected resolveUrl(href: string | null | undefined, base: string): string | null {
    if (!href) return null;
    try {
      return new URL(href, base).href;
    } catch {
      return null;
    }
  }

  /** First selector that matches at least one element in the document. */
  protected selectAll($: cheerio.CheerioAPI, selectors: readonly string[]): Selection {
    for (const selector of selectors) {
      const found = $.root().find(selector);
      if (found.length > 0) return found;
    }
    return $.root().children().slice(0, 0);
  }
}
