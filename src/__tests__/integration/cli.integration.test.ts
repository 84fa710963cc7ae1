/**
 * CLI Integration Tests
 */

import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { parseArgs, runCli } from '../../cli';
import { parseTree } from '../../modules/linkmap/linkmap.export';
import { createTempMirror, mirrorFiles, TempMirror } from '../helpers/fixtures';
import { silenceConsole } from '../helpers/mocks';

describe('CLI Integration Tests', () => {
  let mirror: TempMirror;
  let outDir: string;

  silenceConsole();

  beforeAll(async () => {
    mirror = await createTempMirror(mirrorFiles);
  });

  afterAll(async () => {
    await mirror.cleanup();
  });

  beforeEach(async () => {
    outDir = await mkdtemp(path.join(tmpdir(), 'linkmap-cli-'));
  });

  afterEach(async () => {
    await rm(outDir, { recursive: true, force: true });
  });

  describe('parseArgs', () => {
    it('should split options from positional arguments', () => {
      expect(parseArgs(['tree', '--depth', '3', 'https://example.com/', '--out', 'reports'])).toEqual({
        command: 'tree',
        positional: ['https://example.com/'],
        depth: '3',
        out: 'reports',
      });
    });

    it('should default the output directory', () => {
      expect(parseArgs(['scan', 'urls.txt'])).toEqual({ command: 'scan', positional: ['urls.txt'], out: '.' });
    });
  });

  describe('tree', () => {
    it('should fall back to the default depth and write both artifacts', async () => {
      const code = await runCli(['tree', mirror.url('index.html'), '--depth', 'abc', '--out', outDir]);

      expect(code).toBe(0);
      const tree = parseTree(await readFile(path.join(outDir, 'link_tree.json'), 'utf-8'));
      expect(tree?.children.map((child) => child.title)).toEqual(['About Us', 'First Post']);
      expect(tree?.children.every((child) => child.children.length === 0)).toBe(true);

      const csv = await readFile(path.join(outDir, 'unique_links.csv'), 'utf-8');
      expect(csv.split('\r\n')).toEqual([
        'URL,Title',
        `${mirror.url('index.html')},Mirror Home`,
        `${mirror.url('about.html')},About Us`,
        `${mirror.url('blog/post.html')},First Post`,
      ]);
    });

    it('should fail on an invalid seed URL', async () => {
      await expect(runCli(['tree', 'not a url', '--out', outDir])).resolves.toBe(1);
    });
  });

  describe('scan', () => {
    it('should write the broken-link report for a seed file', async () => {
      const seeds = path.join(outDir, 'seeds.txt');
      await writeFile(seeds, `${mirror.url('index.html')}\n`, 'utf-8');

      const code = await runCli(['scan', seeds, '--out', outDir]);

      expect(code).toBe(0);
      expect(await readFile(path.join(outDir, 'broken_links_output.csv'), 'utf-8')).toBe(
        `parent_url,broken_link,status,error\r\n${mirror.url('index.html')},${mirror.url('missing.html')},404,Status 404`
      );
    });

    it('should exit with an error when no file is given', async () => {
      await expect(runCli(['scan'])).resolves.toBe(1);
      expect(console.error).toHaveBeenCalledWith('No input file provided. Exiting.');
    });
  });

  it('should print usage for an unknown command', async () => {
    await expect(runCli(['crawl'])).resolves.toBe(2);
  });
});
