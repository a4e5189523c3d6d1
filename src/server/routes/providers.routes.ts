/**
 * Providers Routes
 */

import { Router } from 'express';
import * as providersController from '../controllers/providers.controller';
import { asyncHandler } from '../middleware';

const router = Router();

// GET /providers - Active bank providers
router.get('/', asyncHandler(providersController.list));

export default router;
