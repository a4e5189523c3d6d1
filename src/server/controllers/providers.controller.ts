/**
 * Providers Controller
 */

import { Request, Response } from 'express';
import * as db from '../database/database';

/**
 * GET /providers
 */
export async function list(_req: Request, res: Response): Promise<void> {
  const providers = db.getActiveProviders().map(({ authCodePrefix: _prefix, ...provider }) => provider);
  res.json({ providers });
}
