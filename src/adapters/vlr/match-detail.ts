import type { CheerioAPI } from 'cheerio';
import { BaseParser, type Selection } from '../base-adapter.js';
import { ParseError } from '../../errors.js';
import type { PageType, ReadinessCondition } from '../../types/fetch.js';
import type { PartialRecord, RawMapResult, RawPlayerLine } from '../../types/record.js';
import { extractMatchId } from './urls.js';

const HEADER_SELECTORS = ['.match-header', '.match-header-vs'] as const;

/**
 * VLR.gg match page (`/{matchId}/{slug}`).
 *
 * The header holds the event link, the UTC timestamp
 * (`.moment-tz-convert[data-utc-ts]`), the patch, both teams, the series
 * score inside `.js-spoiler` and the status/format notes. Below it,
 * `.vm-stats-game` blocks hold one header per map plus the player tables;
 * the block with `data-game-id="all"` aggregates every map.
 *
 * Player tables are rendered client side on some matches, which is why this
 * page type is usually fetched in browser mode.
 */
export class MatchDetailParser extends BaseParser {
  readonly pageType: PageType = 'detail';
  readonly readiness: ReadinessCondition = { selector: '.match-header', settleMs: 2000 };

  handles(_url: string): boolean {
    return true;
  }

  parse(html: string, sourceUrl: string): PartialRecord[] {
    const $ = this.load(html);
    const header = this.selectAll($, HEADER_SELECTORS).first();

    if (header.length === 0) {
      throw new ParseError(sourceUrl, this.pageType, 'No match header found on match page');
    }

    const nativeId = extractMatchId(sourceUrl);
    const [score1, score2] = this.parseSeriesScore(header);
    const notes = header
      .find('.match-header-vs-note')
      .map((_i, el) => this.clean($(el).text()))
      .get()
      .filter((n): n is string => n !== null);

    return [
      {
        kind: 'match',
        recordId: nativeId ? `match:${nativeId}` : null,
        pageType: this.pageType,
        sourceUrl,
        detailUrl: sourceUrl,
        fields: {
          team1: this.teamName(header, 0),
          team2: this.teamName(header, 1),
          score1,
          score2,
          date: this.parseTimestamp($, header),
          time: null,
          status: notes.find((n) => !/^bo\d/i.test(n)) ?? null,
          eventName: this.parseEventName(header),
          stage: this.firstText(header, ['.match-header-event-series']),
          format: notes.find((n) => /^bo\d/i.test(n)) ?? null,
          patch: this.parsePatch(header),
          maps: this.parseMaps($),
          players: this.parsePlayers($),
        },
      },
    ];
  }

  private teamName(header: Selection, idx: number): string | null {
    const nameBlock = header.find('.match-header-link-name').eq(idx);
    if (nameBlock.length) {
      return this.firstText(nameBlock, ['.wf-title-med']) ?? this.ownText(nameBlock);
    }
    return this.clean(header.find('.team-name').eq(idx).text());
  }

  /** "2 : 0" inside the spoiler; placeholders are passed through as found. */
  private parseSeriesScore(header: Selection): [string | null, string | null] {
    const text = this.firstText(header, ['.match-header-vs-score .js-spoiler', '.match-header-vs-score']);
    if (!text || !text.includes(':')) return [null, null];

    const [left, right] = text.split(':');
    return [this.clean(left), this.clean(right)];
  }

  private parseTimestamp($: CheerioAPI, header: Selection): string | null {
    const stamp = header.find('.moment-tz-convert[data-utc-ts]').first().attr('data-utc-ts');
    if (stamp) return this.clean(stamp);

    // Fall back to the displayed date and time ("Sunday, August 4th" + "9:00 AM EDT")
    const shown = header
      .find('.match-header-date .moment-tz-convert')
      .map((_i, el) => this.clean($(el).text()))
      .get();
    return shown.length ? shown.join(' ') : null;
  }

  private parseEventName(header: Selection): string | null {
    const link = header.find('.match-header-event').first().clone();
    if (!link.length) return null;
    link.find('.match-header-event-series').remove();
    return this.clean(link.text());
  }

  private parsePatch(header: Selection): string | null {
    const text = this.clean(header.find('.match-header-date').text());
    return text?.match(/patch\s*([\d.]+)/i)?.[1] ?? null;
  }

  private parseMaps($: CheerioAPI): RawMapResult[] | null {
    const maps: RawMapResult[] = [];

    $.root()
      .find('.vm-stats-game')
      .each((_i, el) => {
        const game = $(el);
        if (game.attr('data-game-id') === 'all') return;

        const mapHeader = game.find('.vm-stats-game-header').first();
        if (!mapHeader.length) return;

        const scores = mapHeader.find('.team .score');
        maps.push({
          name: this.mapName(mapHeader),
          score1: this.clean(scores.eq(0).text()),
          score2: this.clean(scores.eq(1).text()),
        });
      });

    return maps.length ? maps : null;
  }

  private mapName(mapHeader: Selection): string | null {
    const label = mapHeader.find('.map span').first();
    const own = label.length ? this.ownText(label) : null;
    if (own) return own;

    const text = this.clean(mapHeader.find('.map').first().text());
    return this.clean(text?.split(/PICK|\d{1,2}:\d{2}/)[0]);
  }

  private parsePlayers($: CheerioAPI): RawPlayerLine[] | null {
    const allGame = $.root().find('.vm-stats-game[data-game-id="all"]').first();
    const scope = allGame.length ? allGame : $.root().find('.vm-stats-game').first();
    const tables = scope.find('table.mod-overview').length
      ? scope.find('table.mod-overview')
      : scope.find('table');

    const players: RawPlayerLine[] = [];

    tables.slice(0, 2).each((_i, tableEl) => {
      const table = $(tableEl);
      const labels = table
        .find('thead th')
        .map((_j, th) => this.clean($(th).text()) ?? '')
        .get();

      table.find('tbody tr').each((_j, rowEl) => {
        const cells = $(rowEl).children('td');
        const playerCell = cells.filter('.mod-player').first();
        const player = this.firstText(playerCell, ['.text-of']) ?? this.clean(cells.first().text());
        if (!player) return;

        const stats: Record<string, string> = {};
        cells.each((k, cellEl) => {
          const label = labels[k];
          const cell = $(cellEl);
          if (!label || !cell.hasClass('mod-stat') || label in stats) return;

          const value = this.firstText(cell, ['.mod-both']) ?? this.clean(cell.text());
          if (value) stats[label] = value;
        });

        players.push({
          player,
          team: this.firstText(playerCell, ['.ge-text-light']),
          agents: cells
            .filter('.mod-agents')
            .find('img')
            .map((_k, img) => this.clean($(img).attr('title') ?? $(img).attr('alt')))
            .get()
            .filter((a): a is string => a !== null),
          stats,
        });
      });
    });

    return players.length ? players : null;
  }
}
