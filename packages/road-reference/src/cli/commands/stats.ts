/**
 * Stats Command
 *
 * Print the statistics cached in a published store.
 *
 * Usage:
 *   road-reference stats <storePath> [--json]
 */

import type { Command } from 'commander';
import { RoadNetworkStore } from '../../serving/road-network-store.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, formatTable } from '../lib/output.js';

interface StatsOptions {
  readonly json?: boolean;
}

export function registerStatsCommand(program: Command): void {
  program
    .command('stats <storePath>')
    .description('Print the statistics of a published store')
    .option('--json', 'Output as JSON')
    .action((storePath: string, options: StatsOptions) => {
      process.exitCode = executeStats(storePath, options);
    });
}

export function executeStats(storePath: string, options: StatsOptions): ExitCode {
  let store: RoadNetworkStore;
  try {
    store = new RoadNetworkStore(storePath);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_CODES.ERRORS;
  }

  try {
    const metadata = store.getMetadata();
    const statistics = store.getStatistics();

    if (options.json) {
      console.log(formatJson({ metadata, statistics }));
      return EXIT_CODES.SUCCESS;
    }

    const { totals } = statistics;
    console.log(`Store: ${storePath}`);
    console.log(`Built: ${metadata.builtAt} (source CRS ${metadata.sourceCrs})`);
    console.log('');
    console.log(`Roads:         ${totals.roads}`);
    console.log(`Segments:      ${totals.segments}`);
    console.log(`Points:        ${totals.points}`);
    console.log(`Intersections: ${totals.intersections}`);
    if (statistics.outOfEnvelope > 0) {
      console.log(`Out of envelope: ${statistics.outOfEnvelope}`);
    }
    if (statistics.bbox !== null) {
      const { west, south, east, north } = statistics.bbox;
      console.log(
        `Bounds: [${west.toFixed(4)}, ${south.toFixed(4)}] to [${east.toFixed(4)}, ${north.toFixed(4)}]`
      );
    }

    console.log('\nRoad classifications:');
    console.log(
      formatTable(
        Object.entries(statistics.roadClassifications).map(([classification, count]) => ({
          classification,
          count,
        })),
        [
          { key: 'classification', header: 'Classification' },
          { key: 'count', header: 'Roads', align: 'right' },
        ]
      )
    );

    console.log('\nPoint types:');
    console.log(
      formatTable(statistics.pointTypes, [
        { key: 'code', header: 'Type' },
        { key: 'description', header: 'Description' },
        { key: 'count', header: 'Points', align: 'right' },
      ])
    );

    return EXIT_CODES.SUCCESS;
  } finally {
    store.close();
  }
}
