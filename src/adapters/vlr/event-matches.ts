import type { CheerioAPI } from 'cheerio';
import type { Selection } from '../base-adapter.js';
import { ParseError } from '../../errors.js';
import type { ReadinessCondition } from '../../types/fetch.js';
import type { PartialMatchRecord, PartialRecord } from '../../types/record.js';
import { EventPageParser } from './event-page.js';
import { eventSectionOf, extractMatchId } from './urls.js';

/** Entry anchors, newest markup first. */
const ENTRY_SELECTORS = ['a.match-item', 'a.wf-module-item[href]', '.match-item'] as const;
const DATE_LABEL_SELECTOR = '.wf-label.mod-large';

/**
 * VLR.gg match listings: `/event/matches/{id}/...` and the global `/matches`
 * pages.
 *
 * Entries are grouped in `.wf-card` blocks under date labels:
 *
 *   <div class="wf-label mod-large">Thu, August 1, 2024 <span>Today</span></div>
 *   <div class="wf-card">
 *     <a href="/378660/..." class="wf-module-item match-item">
 *       .match-item-time, .match-item-vs-team (x2) > name + score,
 *       .match-item-eta .ml-status, .match-item-event (+ -series)
 *     </a>
 *   </div>
 *
 * Event pages also carry the event header (title, dates, prize pool,
 * location), which becomes an event record.
 */
export class EventMatchesParser extends EventPageParser {
  readonly readiness: ReadinessCondition = { selector: '.match-item', settleMs: 1000 };

  /** Every listing except the event stats and agents pages. */
  handles(url: string): boolean {
    const section = eventSectionOf(url);
    return section !== 'stats' && section !== 'agents';
  }

  parse(html: string, sourceUrl: string): PartialRecord[] {
    const $ = this.load(html);
    const anchors = this.selectAll($, ENTRY_SELECTORS);

    if (anchors.length === 0) {
      throw new ParseError(sourceUrl, this.pageType, 'No match entries found on listing page');
    }

    const records: PartialRecord[] = [];

    const event = this.parseEventHeader($, sourceUrl);
    if (event) records.push(event);

    // Labels and entries in document order, so each entry picks up the label above it
    const entrySelector = ENTRY_SELECTORS.find((s) => $.root().find(s).length > 0) ?? ENTRY_SELECTORS[0];
    let currentDate: string | null = null;

    $.root()
      .find(`${DATE_LABEL_SELECTOR}, ${entrySelector}`)
      .each((_i, el) => {
        const $el = $(el);

        if ($el.is(DATE_LABEL_SELECTOR)) {
          currentDate = this.ownText($el);
          return;
        }

        records.push(this.parseEntry($, $el, currentDate, sourceUrl));
      });

    return records;
  }

  private parseEntry(
    $: CheerioAPI,
    $el: Selection,
    date: string | null,
    sourceUrl: string,
  ): PartialMatchRecord {
    const href = $el.attr('href') ?? $el.find('a[href]').first().attr('href');
    const detailUrl = this.resolveUrl(href, sourceUrl);
    const nativeId = detailUrl ? extractMatchId(detailUrl) : null;

    const teams = $el.find('.match-item-vs-team');
    const team = (idx: number) => {
      const block = teams.eq(idx);
      const textOf = block.find('.match-item-vs-team-name .text-of').first();
      return (textOf.length ? this.ownText(textOf) : null) ?? this.firstText(block, ['.match-item-vs-team-name']);
    };
    const score = (idx: number) => this.firstText(teams.eq(idx), ['.match-item-vs-team-score']);

    const eventBlock = $el.find('.match-item-event').first();

    return {
      kind: 'match',
      recordId: nativeId ? `match:${nativeId}` : null,
      pageType: this.pageType,
      sourceUrl,
      detailUrl,
      fields: {
        team1: team(0),
        team2: team(1),
        score1: score(0),
        score2: score(1),
        date,
        time: this.firstText($el, ['.match-item-time']),
        status: this.firstText($el, ['.ml-status', '.ml-eta']) ?? this.statusFromClass($el),
        eventName: eventBlock.length ? this.ownText(eventBlock) : null,
        stage: this.firstText($el, ['.match-item-event-series']),
        format: null,
        patch: null,
        maps: null,
        players: null,
      },
    };
  }

  private statusFromClass($el: Selection): string | null {
    const ml = $el.find('.ml').first();
    if (ml.hasClass('mod-completed')) return 'completed';
    if (ml.hasClass('mod-live')) return 'live';
    if (ml.hasClass('mod-upcoming')) return 'upcoming';
    return null;
  }
}
