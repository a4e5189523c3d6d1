/**
 * Connections Routes
 *
 * Consent flow and per-connection sync operations.
 */

import { Router } from 'express';
import * as connectionsController from '../controllers/connections.controller';
import { asyncHandler } from '../middleware';

const router = Router();

// POST /connections/consents - Start the authorization flow
router.post('/consents', asyncHandler(connectionsController.createConsent));

// GET /connections/callback - Bank redirect target (must be before /:id)
router.get('/callback', asyncHandler(connectionsController.callback));

// GET /connections?companyId - List a company's connections
router.get('/', asyncHandler(connectionsController.list));

// GET /connections/:id - Connection detail
router.get('/:id', asyncHandler(connectionsController.getById));

// PATCH /connections/:id - Change the sync frequency
router.patch('/:id', asyncHandler(connectionsController.update));

// POST /connections/:id/sync - Sync now
router.post('/:id/sync', asyncHandler(connectionsController.sync));

// POST /connections/:id/refresh - Refresh tokens
router.post('/:id/refresh', asyncHandler(connectionsController.refresh));

// GET /connections/:id/sync-runs - Recent sync runs
router.get('/:id/sync-runs', asyncHandler(connectionsController.syncRuns));

// DELETE /connections/:id - Disable
router.delete('/:id', asyncHandler(connectionsController.remove));

export default router;
