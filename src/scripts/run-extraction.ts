/**
 * Run one extraction and print the result as JSON.
 * Usage: npx tsx src/scripts/run-extraction.ts [--no-details] [--table] [--sections=matches,stats,agents]
 *          <event URL | listing path> ...
 * Default: the global /matches listing
 */
import { EVENT_SECTIONS, type EventSection } from '../adapters/vlr/urls.js';
import { runExtraction } from '../pipeline/orchestrator.js';
import { summarizeRecords } from '../output/summary.js';
import { logger } from '../utils/logger.js';

const args = process.argv.slice(2);
const flags = new Set(args.filter((a) => a.startsWith('--')));
const entryPoints = args.filter((a) => !a.startsWith('--'));
const sectionsArg = args.find((a) => a.startsWith('--sections='))?.slice('--sections='.length);

function parseSections(value: string): EventSection[] {
  return value.split(',').map((part) => {
    const section = EVENT_SECTIONS.find((s) => s === part.trim());
    if (!section) {
      logger.fatal({ section: part, allowed: EVENT_SECTIONS }, 'Unknown event section');
      process.exit(1);
    }
    return section;
  });
}

const controller = new AbortController();
process.once('SIGINT', () => {
  logger.warn('Received SIGINT, finishing in-flight fetches...');
  controller.abort();
});

try {
  const result = await runExtraction(
    {
      entryPoints: entryPoints.length ? entryPoints : ['/matches'],
      fetchDetails: !flags.has('--no-details'),
      ...(sectionsArg ? { eventSections: parseSections(sectionsArg) } : {}),
      ...(flags.has('--table') ? { outputFormat: 'table' as const } : {}),
    },
    { signal: controller.signal },
  );

  console.log(
    JSON.stringify(
      {
        summary: summarizeRecords(result.records),
        report: result.report,
        ...(result.table ? { table: result.table } : { records: result.records }),
      },
      null,
      2,
    ),
  );

  if (result.report.fatal) process.exit(1);
} catch (err) {
  logger.fatal(err, 'Extraction run failed');
  process.exit(1);
}
