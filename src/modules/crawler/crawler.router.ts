/**
 * Crawler Router
 * Route definitions for crawl endpoints
 */

import { Router } from 'express';
import { crawlerController } from './crawler.controller';

const router = Router();

/**
 * @route   POST /api/crawl
 * @desc    Crawl domains for product URLs
 * @access  Public (can add authentication middleware)
 */
router.post('/', crawlerController.crawl);

export default router;
