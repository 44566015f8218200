import type { HttpResult } from '../workers/http-client.js';
import { logger } from '../utils/logger.js';

const CACHE_TTL_MS = 60 * 60 * 1000; // 1 hour

export type RobotsFetch = (url: string) => Promise<HttpResult>;

/**
 * robots.txt check for the `User-agent: *` block. Rules are cached per base
 * URL; a robots.txt that cannot be fetched allows everything.
 *
 * `beforeFetch` runs only when robots.txt is actually requested, so callers
 * can pace that request with the rest of their traffic.
 */
export class RobotsChecker {
  private readonly cache = new Map<string, { lines: string[]; fetchedAt: number }>();

  constructor(private readonly fetchText: RobotsFetch) {}

  async isAllowed(baseUrl: string, path: string, beforeFetch?: () => Promise<void>): Promise<boolean> {
    const lines = await this.load(baseUrl, beforeFetch);
    if (!lines) return true;

    let inWildcardBlock = false;
    for (const line of lines) {
      const trimmed = line.trim();
      if (trimmed.toLowerCase().startsWith('user-agent:')) {
        const agent = trimmed.split(':')[1]?.trim();
        inWildcardBlock = agent === '*';
      }
      if (inWildcardBlock && trimmed.toLowerCase().startsWith('disallow:')) {
        const disallowed = trimmed
          .split(':')
          .slice(1)
          .join(':')
          .trim()
          .split('#')[0]
          ?.trim();
        if (disallowed && path.startsWith(disallowed)) {
          logger.info({ baseUrl, path, disallowed }, 'Path blocked by robots.txt');
          return false;
        }
      }
    }

    return true;
  }

  private async load(baseUrl: string, beforeFetch?: () => Promise<void>): Promise<string[] | null> {
    const cached = this.cache.get(baseUrl);
    const now = Date.now();
    if (cached && now - cached.fetchedAt < CACHE_TTL_MS) return cached.lines;

    await beforeFetch?.();
    try {
      const res = await this.fetchText(`${baseUrl}/robots.txt`);
      // A missing robots.txt means no restrictions
      const lines = res.status >= 400 ? [] : res.body.split('\n');
      this.cache.set(baseUrl, { lines, fetchedAt: now });
      return lines;
    } catch (err) {
      logger.warn({ baseUrl, err }, 'Failed to fetch robots.txt, allowing by default');
      return null;
    }
  }
}
