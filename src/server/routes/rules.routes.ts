/**
 * Rules Routes
 *
 * Routes for categorization rules management.
 */

import { Router } from 'express';
import * as rulesController from '../controllers/rules.controller';
import { asyncHandler } from '../middleware';

const router = Router();

// GET /rules?companyId - Get a company's rules
router.get('/', asyncHandler(rulesController.getAll));

// POST /rules - Create a new rule
router.post('/', asyncHandler(rulesController.create));

// PUT /rules/:id - Update a rule
router.put('/:id', asyncHandler(rulesController.update));

// DELETE /rules/:id - Delete a rule
router.delete('/:id', asyncHandler(rulesController.remove));

// POST /rules/:id/apply - Apply a rule to existing transactions
router.post('/:id/apply', asyncHandler(rulesController.apply));

export default router;
