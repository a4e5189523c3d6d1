/**
 * Categorization Routes
 *
 * Bulk runs and accuracy analytics.
 */

import { Router } from 'express';
import * as categorizationController from '../controllers/categorization.controller';
import { asyncHandler } from '../middleware';

const router = Router();

// GET /categorization/status - Classifier, worker and scheduler state
router.get('/status', asyncHandler(categorizationController.status));

// POST /categorization/uncategorized - Categorize everything still open
router.post('/uncategorized', asyncHandler(categorizationController.categorizeUncategorized));

// POST /categorization/reprocess-defaults - Retry default-categorized transactions
router.post('/reprocess-defaults', asyncHandler(categorizationController.reprocessDefaults));

// POST /categorization/recompute - Rebuild rule and category accuracy
router.post('/recompute', asyncHandler(categorizationController.recompute));

// GET /categorization/accuracy - Accuracy metrics for a period
router.get('/accuracy', asyncHandler(categorizationController.accuracy));

export default router;
