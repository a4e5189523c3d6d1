/**
 * Sandbox Routes
 */

import { Router } from 'express';
import * as sandboxController from '../controllers/sandbox.controller';
import { asyncHandler } from '../middleware';

const router = Router();

// GET /banking/sandbox/:provider/oauth/authorize - Simulated bank consent page
router.get('/:provider/oauth/authorize', asyncHandler(sandboxController.authorize));

export default router;
