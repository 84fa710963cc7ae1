/**
 * Test Fixtures
 * Reusable test data and temporary file:// mirrors
 */

import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';

export const homePageHtml = `<html><head><title>  Home Page </title></head><body><h1>Welcome</h1><script>var x = 1;</script><p>Hello <b>world</b></p><img src="/logo.png" alt=" Logo "><img src="pic.jpg"><a href="/about">About</a></body></html>`;

/**
 * A three-page site with one dead link and one missing image
 */
export const mirrorFiles: Record<string, string> = {
  'index.html':
    '<html><head><title>Mirror Home</title></head><body>' +
    '<a href="about.html">About</a><a href="blog/post.html">Post</a><a href="missing.html">Missing</a>' +
    '</body></html>',
  'about.html': '<html><head><title>About Us</title></head><body><a href="index.html">Home</a></body></html>',
  'blog/post.html':
    '<html><head><title>First Post</title></head><body>' +
    '<a href="../about.html">About</a><img src="../img/cover.png" alt="Cover">' +
    '</body></html>',
};

export interface TempMirror {
  dir: string;
  url(relativePath: string): string;
  cleanup(): Promise<void>;
}

/**
 * Write files into a fresh temporary directory and expose their file:// URLs
 */
export async function createTempMirror(files: Record<string, string>): Promise<TempMirror> {
  const dir = await mkdtemp(path.join(tmpdir(), 'linkmap-'));

  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(dir, relativePath);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content, 'utf-8');
  }

  return {
    dir,
    url: (relativePath) => pathToFileURL(path.join(dir, relativePath)).href,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
