import { ParseError } from '../../errors.js';
import type { ReadinessCondition } from '../../types/fetch.js';
import type { PartialRecord, RawAgentUsage, RawEventMapStat } from '../../types/record.js';
import { EventPageParser } from './event-page.js';
import { eventSectionOf } from './urls.js';

const TABLE_SELECTORS = ['table.wf-table.mod-pr-global', 'table.mod-pr-global'] as const;
const ALL_MAPS = /^all\s*maps?$/i;

/**
 * VLR.gg event maps & agents (`/event/agents/{id}/...`).
 *
 *   <table class="wf-table mod-pr-global">
 *     <thead><tr><th>Map</th><th>#</th><th>ATK WIN</th><th>DEF WIN</th>
 *       <th><img title="jett" src="/img/vlr/game/agents/jett.png"></th> …
 *     <tbody>
 *       <tr><td><div class="pr-global-map">All Maps</div></td><td>62</td> … <td>48%</td> …
 *       <tr><td><div class="pr-global-map">Lotus</div></td><td>14</td><td>51%</td><td>49%</td> …
 *
 * The "All Maps" row gives each agent's event-wide pick rate; every other row
 * is one map with its play count, side win rates and per-agent pick rates.
 */
export class EventAgentsParser extends EventPageParser {
  readonly readiness: ReadinessCondition = { selector: 'table.mod-pr-global', settleMs: 1000 };

  handles(url: string): boolean {
    return eventSectionOf(url) === 'agents';
  }

  parse(html: string, sourceUrl: string): PartialRecord[] {
    const $ = this.load(html);
    const table = this.selectAll($, TABLE_SELECTORS).first();

    if (table.length === 0) {
      throw new ParseError(sourceUrl, this.pageType, 'No agent utilization table found on event agents page');
    }

    let mapCol = 0;
    let playedCol = -1;
    let attackCol = -1;
    let defenseCol = -1;
    const agentCols: Array<{ idx: number; agent: string }> = [];

    table.find('thead th').each((idx, th) => {
      const cell = $(th);
      const img = cell.find('img').first();
      if (img.length) {
        const agent = this.agentName(img);
        if (agent) agentCols.push({ idx, agent });
        return;
      }

      const label = this.clean(cell.text())?.toLowerCase() ?? '';
      if (label === 'map') mapCol = idx;
      else if (label === '#' || label === 'played') playedCol = idx;
      else if (label.startsWith('atk') || label.startsWith('attack')) attackCol = idx;
      else if (label.startsWith('def')) defenseCol = idx;
    });

    const mapStats: RawEventMapStat[] = [];
    const totals = new Map<number, string | null>();
    const byMap = new Map<number, RawAgentUsage['byMap']>(agentCols.map((c) => [c.idx, []]));

    table.find('tbody tr').each((_i, rowEl) => {
      const cells = $(rowEl).children('td');
      const cellText = (idx: number) => (idx < 0 ? null : this.clean(cells.eq(idx).text()));

      const mapCell = cells.eq(mapCol);
      const name = this.firstText(mapCell, ['.pr-global-map']) ?? this.clean(mapCell.text());
      if (!name) return;

      if (ALL_MAPS.test(name)) {
        for (const { idx } of agentCols) totals.set(idx, cellText(idx));
        return;
      }

      mapStats.push({
        name,
        played: cellText(playedCol),
        attackWin: cellText(attackCol),
        defenseWin: cellText(defenseCol),
      });
      for (const { idx } of agentCols) byMap.get(idx)?.push({ map: name, value: cellText(idx) });
    });

    const agentUsage: RawAgentUsage[] = agentCols.map(({ idx, agent }) => ({
      agent,
      total: totals.get(idx) ?? null,
      byMap: byMap.get(idx) ?? [],
    }));

    return [
      this.sectionRecord($, sourceUrl, {
        mapStats: mapStats.length ? mapStats : null,
        agentUsage: agentUsage.length ? agentUsage : null,
      }),
    ];
  }
}
