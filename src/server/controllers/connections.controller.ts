/**
 * Connections Controller
 *
 * Consent flow, connection listing and manual sync/refresh triggers.
 * Responses carry BankConnectionView only; token ciphertexts never leave the server.
 */

import { Request, Response } from 'express';
import { z } from 'zod';
import { ACCOUNT_PERMISSIONS } from '../../shared/types';
import * as db from '../database/database';
import { AppError, parseBody, parseQuery, requireParam } from '../middleware';
import { getServices } from '../services';

const ConsentRequestSchema = z.object({
  providerCode: z.string().min(1),
  companyId: z.string().min(1),
  permissions: z.array(z.enum(ACCOUNT_PERMISSIONS)).nonempty().optional()
});

const CallbackQuerySchema = z.object({
  state: z.string().min(1),
  code: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional()
});

const ListQuerySchema = z.object({
  companyId: z.string().min(1)
});

const SyncRequestSchema = z.object({
  daysBack: z.number().int().min(1).max(365).optional()
}).default({});

const UpdateConnectionSchema = z.object({
  syncFrequencyHours: z.number().int().min(1).max(168)
});

function requireConnection(req: Request): db.BankConnection {
  const id = requireParam(req.params['id'], 'id');
  const connection = db.getConnectionById(id);
  if (!connection) {
    throw AppError.notFound(`Connection ${id} not found`);
  }
  return connection;
}

/**
 * POST /connections/consents
 * Start the OAuth2 consent flow; returns the bank's authorization URL.
 */
export async function createConsent(req: Request, res: Response): Promise<void> {
  const { providerCode, companyId, permissions } = parseBody(ConsentRequestSchema, req.body);
  const initiation = getServices().consents.initiateConsent(providerCode, companyId, permissions);
  res.status(201).json(initiation);
}

/**
 * GET /connections/callback?code&state
 * Redirect target after the user authorises at the bank.
 */
export async function callback(req: Request, res: Response): Promise<void> {
  const query = parseQuery(CallbackQuerySchema, req.query);

  if (query.error) {
    const consent = db.getConsentByState(query.state);
    if (consent && consent.status === 'awaiting_authorisation') {
      db.updateConsentStatus(consent.id, 'rejected');
    }
    throw AppError.badRequest(`Authorisation was not granted: ${query.error_description ?? query.error}`);
  }
  if (!query.code) {
    throw AppError.badRequest('Missing authorization code');
  }

  const connection = await getServices().consents.completeConsent(query.state, query.code);
  res.status(201).json(connection);
}

/**
 * GET /connections?companyId
 */
export async function list(req: Request, res: Response): Promise<void> {
  const { companyId } = parseQuery(ListQuerySchema, req.query);
  const connections = db.getConnectionsByCompany(companyId).map(db.toConnectionView);
  res.json({ connections });
}

/**
 * GET /connections/:id
 */
export async function getById(req: Request, res: Response): Promise<void> {
  const connection = requireConnection(req);
  res.json({
    connection: db.toConnectionView(connection),
    transactionCount: db.countTransactionsByConnection(connection.id),
    lastRun: db.getSyncRunsByConnection(connection.id, 1)[0] ?? null
  });
}

/**
 * PATCH /connections/:id
 */
export async function update(req: Request, res: Response): Promise<void> {
  const connection = requireConnection(req);
  const { syncFrequencyHours } = parseBody(UpdateConnectionSchema, req.body);
  db.updateSyncFrequency(connection.id, syncFrequencyHours);

  const updated = db.getConnectionById(connection.id);
  if (!updated) {
    throw AppError.notFound(`Connection ${connection.id} not found`);
  }
  res.json(db.toConnectionView(updated));
}

/**
 * POST /connections/:id/sync
 * Runs a sync now and returns the finished run.
 */
export async function sync(req: Request, res: Response): Promise<void> {
  const connection = requireConnection(req);
  const { daysBack } = parseBody(SyncRequestSchema, req.body ?? {});
  const run = await getServices().orchestrator.syncConnection(connection.id, { daysBack });
  res.json(run);
}

/**
 * POST /connections/:id/refresh
 */
export async function refresh(req: Request, res: Response): Promise<void> {
  const connection = requireConnection(req);
  const tokens = await getServices().tokens.refresh(connection.id);

  const updated = db.getConnectionById(connection.id);
  res.json({
    refreshed: true,
    expiresIn: tokens.expiresIn,
    tokenExpiresAt: updated?.tokenExpiresAt ?? null
  });
}

/**
 * GET /connections/:id/sync-runs
 */
export async function syncRuns(req: Request, res: Response): Promise<void> {
  const connection = requireConnection(req);
  const limit = Number(req.query['limit'] ?? 20);
  const runs = db.getSyncRunsByConnection(connection.id, Number.isInteger(limit) && limit > 0 ? limit : 20);
  res.json({ runs });
}

/**
 * DELETE /connections/:id
 * Soft-disables the connection; its transactions are kept.
 */
export async function remove(req: Request, res: Response): Promise<void> {
  const connection = requireConnection(req);
  db.deactivateConnection(connection.id);
  console.log(`[Connections] Connection ${connection.id} disabled`);
  res.json({ success: true });
}
