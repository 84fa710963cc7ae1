/**
 * Linkmap Export
 * JSON and CSV serialization of link trees and broken-link reports
 */

import * as Papa from 'papaparse';
import { writeFile } from 'fs/promises';
import * as path from 'path';
import { flattenTree } from './tree-builder';
import type { BrokenLinkRecord, TreeNode } from './linkmap.types';

export const LINK_TREE_FILE = 'link_tree.json';
export const UNIQUE_LINKS_FILE = 'unique_links.csv';
export const BROKEN_LINKS_FILE = 'broken_links_output.csv';

export const UNIQUE_LINKS_FIELDS = ['URL', 'Title'];
export const BROKEN_LINKS_FIELDS = ['parent_url', 'broken_link', 'status', 'error'];

export function serializeTree(tree: TreeNode | null): string {
  return JSON.stringify(tree, null, 2);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isTreeNode(value: unknown): value is TreeNode {
  return (
    typeof value === 'object' &&
    value !== null &&
    'url' in value &&
    typeof value.url === 'string' &&
    'title' in value &&
    typeof value.title === 'string' &&
    'links' in value &&
    isStringArray(value.links) &&
    'children' in value &&
    Array.isArray(value.children) &&
    value.children.every(isTreeNode)
  );
}

/**
 * Parse a serialized link tree; throws when the document is not a tree
 */
export function parseTree(json: string): TreeNode | null {
  const value: unknown = JSON.parse(json);
  if (value === null) return null;
  if (!isTreeNode(value)) {
    throw new Error('Document is not a link tree');
  }
  return value;
}

/**
 * `URL,Title` CSV of every unique page in the tree
 */
export function toUniqueLinksCsv(tree: TreeNode | null): string {
  const rows = Array.from(flattenTree(tree), ([url, title]) => [url, title]);
  return Papa.unparse({ fields: UNIQUE_LINKS_FIELDS, data: rows });
}

/**
 * `parent_url,broken_link,status,error` CSV, one row per record
 */
export function toBrokenLinksCsv(records: readonly BrokenLinkRecord[]): string {
  const rows = records.map((record) => [
    record.parentUrl,
    record.brokenLink,
    record.status === null ? '' : String(record.status),
    record.error,
  ]);
  return Papa.unparse({ fields: BROKEN_LINKS_FIELDS, data: rows });
}

/**
 * Write link_tree.json and unique_links.csv; returns the written paths
 */
export async function writeTreeArtifacts(tree: TreeNode | null, outDir: string): Promise<string[]> {
  const jsonPath = path.join(outDir, LINK_TREE_FILE);
  const csvPath = path.join(outDir, UNIQUE_LINKS_FILE);

  await writeFile(jsonPath, serializeTree(tree), 'utf-8');
  await writeFile(csvPath, toUniqueLinksCsv(tree), 'utf-8');

  return [jsonPath, csvPath];
}

export async function writeBrokenLinksReport(records: readonly BrokenLinkRecord[], outDir: string): Promise<string> {
  const csvPath = path.join(outDir, BROKEN_LINKS_FILE);
  await writeFile(csvPath, toBrokenLinksCsv(records), 'utf-8');
  return csvPath;
}
