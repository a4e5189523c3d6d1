/**
 * Routes Index
 *
 * Aggregates all route modules and exports a configured router.
 */

import { Router } from 'express';

import providersRoutes from './providers.routes';
import connectionsRoutes from './connections.routes';
import transactionsRoutes from './transactions.routes';
import rulesRoutes from './rules.routes';
import categoriesRoutes from './categories.routes';
import categorizationRoutes from './categorization.routes';
import sandboxRoutes from './sandbox.routes';

/**
 * Create and configure the main API router.
 */
export function createApiRouter(): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  router.use('/providers', providersRoutes);
  router.use('/connections', connectionsRoutes);
  router.use('/transactions', transactionsRoutes);
  router.use('/rules', rulesRoutes);
  router.use('/categories', categoriesRoutes);
  router.use('/categorization', categorizationRoutes);
  router.use('/banking/sandbox', sandboxRoutes);

  return router;
}

export {
  providersRoutes,
  connectionsRoutes,
  transactionsRoutes,
  rulesRoutes,
  categoriesRoutes,
  categorizationRoutes,
  sandboxRoutes
};
