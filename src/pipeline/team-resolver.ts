import fs from 'node:fs';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

/** Canonical team name → known alternate spellings */
export type TeamAliases = Record<string, string[]>;

const aliasFileSchema = z.record(z.string(), z.array(z.string()));

const DEFAULT_ALIAS_FILE = new URL('../../data/team-aliases.json', import.meta.url);

let defaultAliases: TeamAliases | null = null;

export function loadDefaultAliases(): TeamAliases {
  if (!defaultAliases) {
    const raw: unknown = JSON.parse(fs.readFileSync(DEFAULT_ALIAS_FILE, 'utf-8'));
    defaultAliases = aliasFileSchema.parse(raw);
    logger.debug({ teams: Object.keys(defaultAliases).length }, 'Team aliases loaded');
  }
  return defaultAliases;
}

/** Collapses whitespace, applies NFKC and drops a trailing "[1888]" rating tag. Never truncates. */
export function cleanTeamName(raw: string | null): string | null {
  if (!raw) return null;
  const cleaned = raw
    .normalize('NFKC')
    .replace(/\s*\[[^\]]*\]\s*$/, '')
    .replace(/\s+/g, ' ')
    .trim();
  return cleaned || null;
}

export function teamKey(name: string): string {
  return name.toLowerCase();
}

/**
 * Case-insensitive lookup from any known spelling to the canonical name.
 * A name missing from the tables keeps the first spelling this resolver saw
 * for it, so "TEAM SECRET" and "Team Secret" resolve alike.
 */
export class TeamResolver {
  // lowercase alias -> canonical name
  private readonly aliasMap = new Map<string, string>();
  // lowercase unknown name -> first spelling seen
  private readonly unknown = new Map<string, string>();

  constructor(...tables: TeamAliases[]) {
    for (const table of tables) {
      for (const [canonical, aliases] of Object.entries(table)) {
        const name = cleanTeamName(canonical);
        if (!name) continue;
        this.aliasMap.set(teamKey(name), name);
        for (const alias of aliases) {
          const cleaned = cleanTeamName(alias);
          if (cleaned) this.aliasMap.set(teamKey(cleaned), name);
        }
      }
    }
  }

  get size(): number {
    return this.aliasMap.size;
  }

  resolve(raw: string | null): string | null {
    const cleaned = cleanTeamName(raw);
    if (!cleaned) return null;
    const key = teamKey(cleaned);
    const known = this.aliasMap.get(key);
    if (known) return known;

    const seen = this.unknown.get(key);
    if (seen) return seen;
    this.unknown.set(key, cleaned);
    return cleaned;
  }
}

/** Resolver over the bundled alias table plus any run-specific additions. */
export function createTeamResolver(extra: TeamAliases = {}): TeamResolver {
  return new TeamResolver(loadDefaultAliases(), extra);
}
