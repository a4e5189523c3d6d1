/**
 * Sandbox Controller
 *
 * Stands in for the bank's authorization page in sandbox mode: approves the
 * consent at once and redirects back with a single-use code.
 */

import { Request, Response } from 'express';
import { z } from 'zod';
import { config } from '../config/env';
import * as db from '../database/database';
import { AppError, parseQuery, requireParam } from '../middleware';
import { SandboxConnector } from '../connectors/sandbox/sandbox-connector';
import { getServices } from '../services';

const AuthorizeQuerySchema = z.object({
  response_type: z.literal('code'),
  client_id: z.string().min(1),
  redirect_uri: z.string().url(),
  state: z.string().min(1),
  consent_id: z.string().min(1),
  scope: z.string().optional(),
  nonce: z.string().optional()
});

/**
 * GET /banking/sandbox/:provider/oauth/authorize
 */
export async function authorize(req: Request, res: Response): Promise<void> {
  const { connector } = getServices();
  if (!(connector instanceof SandboxConnector)) {
    throw AppError.notFound('Sandbox is disabled');
  }

  const slug = requireParam(req.params['provider'], 'provider');
  const query = parseQuery(AuthorizeQuerySchema, req.query);

  if (query.redirect_uri !== config.banking.redirectUri) {
    throw AppError.badRequest('redirect_uri does not match the registered callback');
  }

  const consent = db.getConsentById(query.consent_id);
  if (!consent || consent.state !== query.state) {
    throw AppError.badRequest('Unknown consent');
  }
  const provider = db.getProviderByCode(consent.providerCode);
  if (!provider || provider.slug !== slug) {
    throw AppError.badRequest(`Consent ${consent.id} was not issued for ${slug}`);
  }

  const code = connector.bank.issueAuthorizationCode(slug);
  const target = new URL(query.redirect_uri);
  target.searchParams.set('code', code);
  target.searchParams.set('state', query.state);

  console.log(`[Sandbox] Consent ${consent.id} approved at ${slug}`);
  res.redirect(302, target.toString());
}
