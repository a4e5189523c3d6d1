/**
 * Transactions Routes
 *
 * Routes for synchronized transactions and their categorization.
 */

import { Router } from 'express';
import * as transactionsController from '../controllers/transactions.controller';
import { asyncHandler } from '../middleware';

const router = Router();

// GET /transactions - List by company or connection
router.get('/', asyncHandler(transactionsController.list));

// GET /transactions/:id - Detail with decisions
router.get('/:id', asyncHandler(transactionsController.getById));

// POST /transactions/:id/categorize - Run the pipeline again
router.post('/:id/categorize', asyncHandler(transactionsController.categorize));

// POST /transactions/:id/correction - Record the correct category
router.post('/:id/correction', asyncHandler(transactionsController.correct));

export default router;
