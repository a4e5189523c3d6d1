/**
 * Categories Routes
 */

import { Router } from 'express';
import * as categoriesController from '../controllers/categories.controller';
import { asyncHandler } from '../middleware';

const router = Router();

// GET /categories?companyId
router.get('/', asyncHandler(categoriesController.getAll));

// POST /categories - Company-specific category
router.post('/', asyncHandler(categoriesController.create));

export default router;
