/**
 * Crawling System
 * Main export file for link discovery and traversal utilities
 */

export * from './crawling.types';
export * from './url-classifier';
export * from './visited-set';
export * from './crawl-stack';
export * from './link-extractor';
export * from './crawling-statistics';
