#!/usr/bin/env node
/**
 * Command-line entry
 *   linkmap tree [url] [--depth N] [--out DIR]   write link_tree.json and unique_links.csv
 *   linkmap scan <file> [--out DIR]              write broken_links_output.csv
 */

import { env } from './config/env';
import { LinkmapService } from './modules/linkmap/linkmap.service';
import { writeBrokenLinksReport, writeTreeArtifacts } from './modules/linkmap/linkmap.export';
import { readSeedList } from './modules/linkmap/seed-list.reader';
import { checkSeedUrl, parseMaxDepth } from './modules/linkmap/linkmap.validation';

const USAGE = [
  'Usage:',
  '  linkmap tree [url] [--depth N] [--out DIR]',
  '  linkmap scan <file> [--out DIR]',
].join('\n');

interface CliArgs {
  command: string | undefined;
  positional: string[];
  depth?: string;
  out: string;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const [command, ...rest] = argv;
  const args: CliArgs = { command, positional: [], out: env.OUTPUT_DIR };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === '--depth' && i + 1 < rest.length) {
      args.depth = rest[++i];
    } else if (arg === '--out' && i + 1 < rest.length) {
      args.out = rest[++i];
    } else {
      args.positional.push(arg);
    }
  }

  return args;
}

async function runTree(service: LinkmapService, args: CliArgs): Promise<number> {
  const seed = checkSeedUrl(args.positional[0] || env.DEFAULT_SEED_URL, true);
  if (!seed.ok) {
    console.error(seed.reason);
    return 1;
  }

  const maxDepth = parseMaxDepth(args.depth, env.DEFAULT_MAX_DEPTH);
  const { tree } = await service.crawlTree(seed.url, maxDepth);
  const [jsonPath, csvPath] = await writeTreeArtifacts(tree, args.out);

  console.log(`\nLink tree has been saved to ${jsonPath}`);
  console.log(`Unique links have been saved to ${csvPath}`);
  return 0;
}

async function runScan(service: LinkmapService, args: CliArgs): Promise<number> {
  const filename = args.positional[0]?.trim();
  if (!filename) {
    console.error('No input file provided. Exiting.');
    return 1;
  }

  const urls = await readSeedList(filename);
  const records = await service.scanBrokenLinks(urls);
  const csvPath = await writeBrokenLinksReport(records, args.out);

  console.log(`\nBroken link report written to ${csvPath}.`);
  return 0;
}

export async function runCli(
  argv: readonly string[],
  service: LinkmapService = new LinkmapService({ allowLocalFiles: true })
): Promise<number> {
  const args = parseArgs(argv);

  switch (args.command) {
    case 'tree':
      return runTree(service, args);
    case 'scan':
      return runScan(service, args);
    default:
      console.error(USAGE);
      return 2;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error('Error:', err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    });
}
