import { z } from 'zod';
import { CUSTOMER_STATUSES } from '../../shared/customers';
import { NotFoundError, ValidationError, errorMessage } from '../../shared/errors';
import type { User } from '../../shared/users';
import type { CatalogRepository } from '../catalog/catalog-repository';
import type { CustomerLedger } from '../customers/customer-ledger';
import { buildInvoiceTicket } from '../invoices/invoice-ticket';
import type { InvoiceProjector } from '../invoices/invoice-projector';
import type { Logger } from '../logging/logger';
import type { SalesService } from '../orders/sales-service';
import { parseReportPeriod } from '../reports/report-filter';
import type { ReportsRepository } from '../reports/reports-repository';
import { salesScopeFor, type UsersRepository } from '../users/users-repository';

export interface SyncRouteDeps {
  catalogRepository: CatalogRepository;
  customerLedger: CustomerLedger;
  usersRepository: UsersRepository;
  salesService: SalesService;
  reportsRepository: ReportsRepository;
  invoiceProjector: InvoiceProjector;
  storeName: string;
  logger: Logger;
}

export interface SyncRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  body: unknown;
  authorization?: string;
}

export interface SyncResponse {
  status: number;
  payload: unknown;
}

const productBody = z.object({
  id: z.number().int().positive().nullish(),
  code: z.string(),
  description: z.string().nullish(),
  uom: z.string().optional(),
  buyPrice: z.number().optional(),
  sellPrice: z.number().optional(),
  defaultNumber: z.number().optional(),
  stock: z.number().optional(),
  reorderLevel: z.number().optional(),
});

const customerBody = z.object({
  phone: z.string(),
  name: z.string(),
  address: z.string().nullish(),
  dob: z.string().nullish(),
  email: z.string().nullish(),
  status: z.enum(CUSTOMER_STATUSES).optional(),
  creditLimit: z.number().optional(),
});

const salePaymentFields = {
  customerPhone: z.string().nullish(),
  paid: z.number(),
  method: z.string().optional(),
};

const saleBody = z.object({
  ...salePaymentFields,
  lines: z.array(z.object({ productId: z.number(), quantity: z.number(), price: z.number() })),
});

const saleByCodeBody = z.object({
  ...salePaymentFields,
  lines: z.array(z.object({ code: z.string(), quantity: z.number() })),
});

const INVOICE_PATH = /^\/invoice\/([^/]+)(\/ticket)?$/;

export function routeSyncRequest(deps: SyncRouteDeps, request: SyncRequest): SyncResponse {
  try {
    return dispatch(deps, request);
  } catch (error) {
    return toErrorResponse(deps.logger, request, error);
  }
}

function dispatch(deps: SyncRouteDeps, request: SyncRequest): SyncResponse {
  const { method, path, query } = request;

  if (method === 'GET' && path === '/health') {
    return ok({ ok: true });
  }

  const user = authenticate(deps, request.authorization);
  if (!user) return { status: 401, payload: { ok: false, error: 'Unauthorized' } };
  const scope = salesScopeFor(user);

  if (method === 'GET' && path === '/products') return ok(deps.catalogRepository.list());
  if (method === 'POST' && path === '/products') {
    return ok(deps.catalogRepository.saveByCode(parseBody(productBody, request.body)));
  }

  if (method === 'GET' && path === '/customers') return ok(deps.customerLedger.list());
  if (method === 'POST' && path === '/customers') {
    return ok(deps.customerLedger.upsert(parseBody(customerBody, request.body)));
  }

  if (method === 'POST' && path === '/sales') {
    const body = parseBody(saleBody, request.body);
    const id = deps.salesService.createSale({
      customerPhone: body.customerPhone,
      lines: body.lines,
      paidAmount: body.paid,
      paymentMethod: body.method,
      createdBy: user.username,
    });
    return ok({ id });
  }

  if (method === 'POST' && path === '/salesByCode') {
    const body = parseBody(saleByCodeBody, request.body);
    const id = deps.salesService.createSaleByCode({
      customerPhone: body.customerPhone,
      lines: body.lines,
      paidAmount: body.paid,
      paymentMethod: body.method,
      createdBy: user.username,
    });
    return ok({ id });
  }

  if (method === 'GET' && path === '/sales/today') return ok(deps.reportsRepository.dailySales(scope));
  if (method === 'GET' && path === '/sales/month') return ok(deps.reportsRepository.monthlySales(scope));
  if (method === 'GET' && path === '/sales/all') {
    const limit = Number.parseInt(query.get('limit') || '', 10);
    return ok(deps.reportsRepository.allSales(Number.isFinite(limit) ? limit : undefined, scope));
  }

  const period = parseReportPeriod(query.get('filter'));
  if (method === 'GET' && path === '/reports/stats') {
    return ok(deps.reportsRepository.getStatsForPeriod(period, scope));
  }
  if (method === 'GET' && path === '/reports/cash') {
    return ok({ amount: deps.reportsRepository.cashTotalForUser(period, user.username) });
  }

  if (method === 'GET' && path.startsWith('/reports/') && scope !== null) {
    return { status: 403, payload: { ok: false, error: 'Forbidden' } };
  }
  if (method === 'GET' && path === '/reports/users') {
    return ok(deps.reportsRepository.userSalesSummaries(period));
  }
  if (method === 'GET' && path === '/reports/monthly') return ok(deps.reportsRepository.monthlyStats());
  if (method === 'GET' && path === '/reports/payment-methods') {
    return ok(deps.reportsRepository.paymentMethodSummary());
  }

  const invoiceMatch = method === 'GET' ? INVOICE_PATH.exec(path) : null;
  if (invoiceMatch) {
    const saleId = Number(invoiceMatch[1]);
    if (!Number.isInteger(saleId) || saleId <= 0) {
      throw new ValidationError('Invalid invoice id');
    }
    const invoice = deps.invoiceProjector.buildInvoiceData(saleId);
    if (!invoiceMatch[2]) return ok(invoice);
    return ok({ rawBase64: buildInvoiceTicket(invoice, { storeName: deps.storeName }) });
  }

  return { status: 404, payload: { ok: false, error: 'Not found' } };
}

function authenticate(deps: SyncRouteDeps, header: string | undefined): User | null {
  const match = /^Basic\s+(.+)$/i.exec(header || '');
  if (!match) return null;

  const decoded = Buffer.from(match[1], 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator <= 0) return null;

  return deps.usersRepository.authenticate(decoded.slice(0, separator), decoded.slice(separator + 1));
}

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.') || 'body').join(', ');
    throw new ValidationError(`Invalid request body: ${fields}`);
  }
  return result.data;
}

function ok(payload: unknown): SyncResponse {
  return { status: 200, payload };
}

function toErrorResponse(logger: Logger, request: SyncRequest, error: unknown): SyncResponse {
  if (error instanceof ValidationError) {
    return { status: 400, payload: { ok: false, error: error.message } };
  }
  if (error instanceof NotFoundError) {
    return { status: 404, payload: { ok: false, error: error.message } };
  }
  logger.error('request failed', { method: request.method, path: request.path, error: errorMessage(error) });
  return { status: 500, payload: { ok: false, error: 'Internal server error' } };
}
