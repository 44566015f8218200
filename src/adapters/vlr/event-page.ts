import type { CheerioAPI } from 'cheerio';
import { BaseParser, type Selection } from '../base-adapter.js';
import type { PageType } from '../../types/fetch.js';
import type { PartialEventRecord, RawEventFields } from '../../types/record.js';
import { extractEventId } from './urls.js';

type SectionFields = Pick<RawEventFields, 'players' | 'mapStats' | 'agentUsage'>;

/**
 * Shared ground of the event sub-pages (matches, stats, agents). Every one
 * of them repeats the event header:
 *
 *   <div class="event-header">
 *     <h1 class="wf-title">…</h1> <h2 class="event-desc-subtitle">…</h2>
 *     <div class="event-desc-item">
 *       <div class="event-desc-item-label">Dates</div>
 *       <div class="event-desc-item-value">Aug 1, 2024 - Aug 25, 2024</div>
 *     </div>
 *     …
 */
export abstract class EventPageParser extends BaseParser {
  readonly pageType: PageType = 'listing';

  /** Event record for the page header; null when the page shows no titled header. */
  protected parseEventHeader($: CheerioAPI, sourceUrl: string): PartialEventRecord | null {
    const header = $.root().find('.event-header').first();
    if (!header.length) return null;

    const title = this.firstText(header, ['.wf-title', 'h1']);
    if (!title) return null;

    let dates: string | null = null;
    let location: string | null = null;
    let prizePool: string | null = null;

    header.find('.event-desc-item').each((_i, el) => {
      const item = $(el);
      const label = this.clean(item.find('.event-desc-item-label').text())?.toLowerCase();
      const value = this.clean(item.find('.event-desc-item-value').text());
      if (!label || !value) return;

      if (label.includes('date')) dates = value;
      else if (label.includes('location')) location = value;
      else if (label.includes('prize')) prizePool = value;
    });

    return this.eventPartial(sourceUrl, {
      title,
      subtitle: this.firstText(header, ['.event-desc-subtitle']),
      dates,
      location,
      prizePool,
      players: null,
      mapStats: null,
      agentUsage: null,
    });
  }

  /** Header record with one section's data attached; keyed by the URL's event id when the header is missing. */
  protected sectionRecord($: CheerioAPI, sourceUrl: string, section: Partial<SectionFields>): PartialEventRecord {
    const base =
      this.parseEventHeader($, sourceUrl) ??
      this.eventPartial(sourceUrl, {
        title: null,
        subtitle: null,
        dates: null,
        location: null,
        prizePool: null,
        players: null,
        mapStats: null,
        agentUsage: null,
      });
    return { ...base, fields: { ...base.fields, ...section } };
  }

  /** Agent shown by an icon: its title, its alt text, else the icon file name ("/agents/jett.png"). */
  protected agentName(img: Selection): string | null {
    const named = this.clean(img.attr('title') ?? img.attr('alt'));
    if (named) return named;
    return img.attr('src')?.match(/([^/]+)\.(?:png|svg|webp)$/i)?.[1] ?? null;
  }

  private eventPartial(sourceUrl: string, fields: RawEventFields): PartialEventRecord {
    const nativeId = extractEventId(sourceUrl);
    return {
      kind: 'event',
      recordId: nativeId ? `event:${nativeId}` : null,
      pageType: this.pageType,
      sourceUrl,
      detailUrl: null,
      fields,
    };
  }
}
