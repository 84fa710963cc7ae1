/**
 * Linkmap Router
 * Route definitions for link-tree and broken-link endpoints
 */

import { Router } from 'express';
import { linkmapController } from './linkmap.controller';

const router = Router();

/**
 * @route   POST /api/linkmap/tree
 * @desc    Crawl a site into a link tree (?format=csv for the unique URL list)
 * @access  Public
 */
router.post('/tree', linkmapController.createTree);

/**
 * @route   POST /api/linkmap/broken-links
 * @desc    Check seed pages and their links for error statuses (?format=csv for the report)
 * @access  Public
 */
router.post('/broken-links', linkmapController.scanBrokenLinks);

export default router;
