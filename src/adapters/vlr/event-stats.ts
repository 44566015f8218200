import { ParseError } from '../../errors.js';
import type { ReadinessCondition } from '../../types/fetch.js';
import type { PartialRecord, RawPlayerLine } from '../../types/record.js';
import { EventPageParser } from './event-page.js';
import { eventSectionOf } from './urls.js';

const TABLE_SELECTORS = ['table.wf-table.mod-stats', 'table.mod-stats'] as const;

/**
 * VLR.gg event player stats (`/event/stats/{id}/...`).
 *
 * One row per player in `table.mod-stats`: the player cell carries the name
 * (`.text-of`) and team tag (`.stats-player-country`), the agents cell one
 * icon per agent played, then one column per stat (Rnd, R2.0, ACS, K:D,
 * KAST, ADR, KPR, APR, FKPR, FDPR, HS%, CL%, CL, KMax, K, D, A, FK, FD).
 *
 * Produces the event record with its `players` section filled.
 */
export class EventStatsParser extends EventPageParser {
  readonly readiness: ReadinessCondition = { selector: 'table.mod-stats', settleMs: 1000 };

  handles(url: string): boolean {
    return eventSectionOf(url) === 'stats';
  }

  parse(html: string, sourceUrl: string): PartialRecord[] {
    const $ = this.load(html);
    const table = this.selectAll($, TABLE_SELECTORS).first();

    if (table.length === 0) {
      throw new ParseError(sourceUrl, this.pageType, 'No player stats table found on event stats page');
    }

    const labels = table
      .find('thead th')
      .map((_i, th) => this.clean($(th).text()) ?? '')
      .get();

    const players: RawPlayerLine[] = [];

    table.find('tbody tr').each((_i, rowEl) => {
      const cells = $(rowEl).children('td');
      const playerCell = cells.filter('.mod-player').first();
      const player = this.firstText(playerCell, ['.text-of']) ?? this.clean(cells.first().text());
      if (!player) return;

      const stats: Record<string, string> = {};
      cells.each((k, cellEl) => {
        const label = labels[k];
        const cell = $(cellEl);
        if (!label || cell.hasClass('mod-player') || cell.hasClass('mod-agents') || label in stats) return;

        const value = this.clean(cell.text());
        if (value) stats[label] = value;
      });

      players.push({
        player,
        team: this.firstText(playerCell, ['.stats-player-country']),
        agents: cells
          .filter('.mod-agents')
          .find('img')
          .map((_k, img) => this.agentName($(img)))
          .get()
          .filter((a): a is string => a !== null),
        stats,
      });
    });

    return [this.sectionRecord($, sourceUrl, { players: players.length ? players : null })];
  }
}
