/**
 * Open Banking Payload Parser
 *
 * Validates provider payloads (token, account and transaction responses)
 * and maps them to canonical values. Transaction items that fail validation
 * are reported as skipped instead of aborting the page.
 */

import { z } from 'zod';
import type { TransactionType } from '../../../shared/types';
import type { TransactionInput } from '../../database/repositories';
import type { AccountInfo, RawTransactionPage, TokenSet } from '../base-connector';
import { parseMinorUnits } from '../../utils/money';
import { ProviderUnavailableError } from '../../utils/errors';

export const DESCRIPTION_MAX = 500;
export const COUNTERPART_MAX = 200;
export const REFERENCE_MAX = 100;

const amountValue = z.union([z.string(), z.number()]);
const amountField = z.union([
  amountValue,
  z.object({ amount: amountValue, currency: z.string().optional() }),
  z.object({ value: amountValue, currency: z.string().optional() })
]);

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.coerce.number().int().positive(),
  token_type: z.string().default('Bearer'),
  scope: z.string().optional()
});

const AccountSchema = z.object({
  accountId: z.string().min(1),
  agency: z.string().optional(),
  branchCode: z.string().optional(),
  accountNumber: z.string().optional(),
  number: z.string().optional(),
  checkDigit: z.string().optional(),
  balance: amountField,
  availableBalance: amountField.optional(),
  currency: z.string().length(3).default('BRL'),
  status: z.string().optional()
});

const AccountResponseSchema = z.object({
  data: z.union([AccountSchema, z.array(AccountSchema).min(1)])
});

const TransactionPageSchema = z.object({
  data: z.union([z.array(z.unknown()), z.object({ transactions: z.array(z.unknown()) })]),
  links: z.object({ self: z.string().optional(), next: z.string().optional() }).optional(),
  meta: z.object({
    totalRecords: z.number().int().nonnegative().optional(),
    totalPages: z.number().int().nonnegative().optional()
  }).optional()
});

const RawTransactionSchema = z.object({
  transactionId: z.string().min(1).optional(),
  external_id: z.string().min(1).optional(),
  type: z.string().optional(),
  transactionType: z.string().optional(),
  creditDebitType: z.enum(['CREDITO', 'DEBITO', 'CREDIT', 'DEBIT']).optional(),
  amount: amountField,
  bookingDateTime: z.string().optional(),
  transactionDate: z.string().optional(),
  transactionName: z.string().optional(),
  description: z.string().optional(),
  creditorName: z.string().optional(),
  debtorName: z.string().optional(),
  counterpartDocument: z.string().optional(),
  remittanceInformation: z.string().optional(),
  referenceNumber: z.string().optional(),
  endToEndId: z.string().optional(),
  balanceAfterTransaction: amountField.optional(),
  status: z.enum(['BOOKED', 'PENDING', 'COMPLETED']).optional()
});

export type RawTransaction = z.infer<typeof RawTransactionSchema>;

type Direction = 'in' | 'out';

/**
 * Provider type codes. A pair is resolved by the transaction's direction.
 */
const TYPE_CODES: Record<string, TransactionType | Record<Direction, TransactionType>> = {
  PIX_RECEBIDO: 'pix_in',
  PIX_CREDITO: 'pix_in',
  PIX_ENVIADO: 'pix_out',
  PIX_DEBITO: 'pix_out',
  PIX: { in: 'pix_in', out: 'pix_out' },
  TED_RECEBIDO: 'transfer_in',
  DOC_RECEBIDO: 'transfer_in',
  TRANSFERENCIA_RECEBIDA: 'transfer_in',
  TED_ENVIADO: 'transfer_out',
  DOC_ENVIADO: 'transfer_out',
  TRANSFERENCIA_ENVIADA: 'transfer_out',
  TED: { in: 'transfer_in', out: 'transfer_out' },
  DOC: { in: 'transfer_in', out: 'transfer_out' },
  TRANSFERENCIA: { in: 'transfer_in', out: 'transfer_out' },
  COMPRA_CARTAO: 'debit',
  CARTAO: 'debit',
  SAQUE: 'debit',
  BOLETO: 'debit',
  PAGAMENTO: 'debit',
  DEPOSITO: 'credit',
  TARIFA: 'fee',
  TAXA: 'fee',
  RENDIMENTO: 'interest',
  JUROS: 'interest',
  ESTORNO: 'adjustment',
  AJUSTE: 'adjustment'
};

export function mapTransactionType(code: string | undefined, direction: Direction): TransactionType {
  const mapped = code ? TYPE_CODES[code.trim().toUpperCase()] : undefined;
  if (mapped === undefined) {
    return direction === 'in' ? 'credit' : 'debit';
  }
  return typeof mapped === 'string' ? mapped : mapped[direction];
}

function amountToMinor(field: z.infer<typeof amountField>): number | null {
  if (typeof field !== 'object') return parseMinorUnits(field);
  return parseMinorUnits('amount' in field ? field.amount : field.value);
}

function amountCurrency(field: z.infer<typeof amountField>): string | undefined {
  return typeof field === 'object' ? field.currency : undefined;
}

function truncate(value: string | undefined, max: number): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;
  return trimmed.length > max ? trimmed.slice(0, max) : trimmed;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
}

export function parseTokenResponse(body: unknown): TokenSet {
  const parsed = TokenResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ProviderUnavailableError(`Malformed token response: ${formatIssues(parsed.error)}`);
  }
  const token = parsed.data;
  return {
    accessToken: token.access_token,
    refreshToken: token.refresh_token,
    expiresIn: token.expires_in,
    tokenType: token.token_type,
    scope: token.scope
  };
}

export function parseAccountResponse(body: unknown): AccountInfo {
  const parsed = AccountResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ProviderUnavailableError(`Malformed account response: ${formatIssues(parsed.error)}`);
  }

  const account = Array.isArray(parsed.data.data) ? parsed.data.data[0] : parsed.data.data;
  const balanceMinor = amountToMinor(account.balance);
  const availableMinor = account.availableBalance === undefined ? balanceMinor : amountToMinor(account.availableBalance);
  const agency = account.agency ?? account.branchCode;
  const accountNumber = account.accountNumber ?? account.number;

  if (balanceMinor === null || availableMinor === null || !agency || !accountNumber) {
    throw new ProviderUnavailableError('Account response is missing agency, number or a valid balance');
  }

  return {
    accountId: account.accountId,
    agency,
    accountNumber,
    checkDigit: account.checkDigit,
    balanceMinor,
    availableBalanceMinor: availableMinor,
    currency: amountCurrency(account.balance) ?? account.currency,
    status: account.status
  };
}

export function parseTransactionPage(body: unknown, page: number): RawTransactionPage {
  const parsed = TransactionPageSchema.safeParse(body);
  if (!parsed.success) {
    throw new ProviderUnavailableError(`Malformed transactions response: ${formatIssues(parsed.error)}`);
  }

  const { data, links, meta } = parsed.data;
  const items = Array.isArray(data) ? data : data.transactions;
  const totalPages = meta?.totalPages;
  const hasNext = Boolean(links?.next) || (totalPages !== undefined && page < totalPages);

  return { items, page, totalPages, hasNext };
}

function rawExternalId(item: unknown): string | undefined {
  if (typeof item !== 'object' || item === null) return undefined;
  if ('transactionId' in item && typeof item.transactionId === 'string') return item.transactionId;
  if ('external_id' in item && typeof item.external_id === 'string') return item.external_id;
  return undefined;
}

export type ParsedItem =
  | { ok: true; transaction: TransactionInput }
  | { ok: false; externalId?: string; reason: string };

/**
 * Maps one provider item to canonical form. The id may come as transactionId
 * or external_id, and amounts as {amount} or {value}. The sign comes from
 * creditDebitType when present, otherwise from the amount itself.
 */
export function toTransactionInput(item: unknown, defaultCurrency = 'BRL'): ParsedItem {
  const parsed = RawTransactionSchema.safeParse(item);
  if (!parsed.success) {
    return { ok: false, externalId: rawExternalId(item), reason: formatIssues(parsed.error) };
  }

  const raw = parsed.data;
  const externalId = raw.transactionId ?? raw.external_id;
  if (!externalId) {
    return { ok: false, reason: 'transactionId: Required' };
  }
  const minor = amountToMinor(raw.amount);
  if (minor === null) {
    return { ok: false, externalId, reason: 'amount is not a decimal number' };
  }

  const bookedAt = raw.bookingDateTime ?? raw.transactionDate;
  const timestamp = bookedAt ? Date.parse(bookedAt) : Number.NaN;
  if (Number.isNaN(timestamp)) {
    return { ok: false, externalId, reason: 'booking date is missing or invalid' };
  }

  let direction: Direction;
  if (raw.creditDebitType) {
    direction = raw.creditDebitType === 'CREDITO' || raw.creditDebitType === 'CREDIT' ? 'in' : 'out';
  } else {
    direction = minor >= 0 ? 'in' : 'out';
  }
  const amountMinor = direction === 'in' ? Math.abs(minor) : -Math.abs(minor);
  const typeCode = raw.type ?? raw.transactionType;

  const description = truncate(raw.transactionName ?? raw.description ?? raw.remittanceInformation ?? typeCode, DESCRIPTION_MAX)
    ?? 'Transação';
  const counterpart = direction === 'in'
    ? raw.debtorName ?? raw.creditorName
    : raw.creditorName ?? raw.debtorName;

  let balanceAfterMinor: number | undefined;
  if (raw.balanceAfterTransaction !== undefined) {
    balanceAfterMinor = amountToMinor(raw.balanceAfterTransaction) ?? undefined;
  }

  return {
    ok: true,
    transaction: {
      externalId,
      amountMinor,
      currency: amountCurrency(raw.amount) ?? defaultCurrency,
      transactionType: mapTransactionType(typeCode, direction),
      description,
      occurredAt: new Date(timestamp).toISOString(),
      counterpartName: truncate(counterpart, COUNTERPART_MAX),
      counterpartDocument: truncate(raw.counterpartDocument, COUNTERPART_MAX),
      referenceNumber: truncate(raw.referenceNumber ?? raw.endToEndId, REFERENCE_MAX),
      balanceAfterMinor,
      status: raw.status === 'PENDING' ? 'pending' : 'completed'
    }
  };
}
