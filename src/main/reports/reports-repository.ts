import type { StorageGateway } from '../../../lib/local-db/storage-gateway';
import { isIsoDate } from '../../shared/dates';
import { ValidationError } from '../../shared/errors';
import { roundMoney } from '../../shared/money';
import { PAYMENT_METHODS, type SaleSummary } from '../../shared/orders';
import { normalizeUsername } from '../../shared/users';
import type {
  MonthlyStats,
  PaymentBreakdown,
  PaymentMethodTotal,
  ReportPeriod,
  ReportStats,
  UserSalesSummary,
} from '../../shared/reports';
import {
  actorFilter,
  andFilters,
  dateRangeFilter,
  periodFilter,
  whereClause,
  type SqlFilter,
  type SqlParam,
} from './report-filter';

interface SaleSummaryRow {
  id: number;
  customer_name: string | null;
  total: number;
  paid: number;
  balance: number;
  created_at: string;
  created_by: string;
}

interface TotalsRow {
  total_sales: number;
  total_paid: number;
  invoice_count: number;
}

interface MethodRow {
  method: string;
  amount: number;
  count: number;
}

interface UserTotalsRow extends TotalsRow {
  username: string;
  display_name: string;
}

interface UserMethodRow extends MethodRow {
  username: string;
}

const DEFAULT_LIST_LIMIT = 100;

export class ReportsRepository {
  constructor(private readonly storage: StorageGateway) {}

  dailySales(createdBy?: string | null): SaleSummary[] {
    return this.listSales(this.salesFilter('Today', createdBy));
  }

  monthlySales(createdBy?: string | null): SaleSummary[] {
    return this.listSales(this.salesFilter('This Month', createdBy));
  }

  allSales(limit = DEFAULT_LIST_LIMIT, createdBy?: string | null): SaleSummary[] {
    const safeLimit = Number.isInteger(limit) && limit > 0 ? limit : DEFAULT_LIST_LIMIT;
    return this.listSales(this.salesFilter('All', createdBy), safeLimit);
  }

  /** Inclusive on both ends; dates are local yyyy-MM-dd. */
  salesByDateRange(start: string, end: string): SaleSummary[] {
    if (!isIsoDate(start) || !isIsoDate(end)) {
      throw new ValidationError(`Invalid date range: ${start} .. ${end}`);
    }
    return this.listSales(dateRangeFilter(start, end, 's.created_at'));
  }

  getStatsForPeriod(period: ReportPeriod, createdBy?: string | null): ReportStats {
    const filter = this.salesFilter(period, createdBy);
    const totals = this.storage.db
      .prepare<SqlParam[], TotalsRow>(`
        SELECT
          COALESCE(SUM(s.total), 0) AS total_sales,
          COALESCE(SUM(s.paid), 0) AS total_paid,
          COUNT(s.id) AS invoice_count
        FROM sales s
        ${whereClause(filter)}
      `)
      .get(...filter.params);

    const methods = this.storage.db
      .prepare<SqlParam[], MethodRow>(`
        SELECT p.method AS method, COALESCE(SUM(p.amount), 0) AS amount, COUNT(p.id) AS count
        FROM payments p
        JOIN sales s ON s.id = p.sale_id
        ${whereClause(filter)}
        GROUP BY p.method
      `)
      .all(...filter.params);

    return buildStats(totals, methods);
  }

  cashTotalForUser(period: ReportPeriod, username: string | null | undefined): number {
    const actor = normalizeUsername(username);
    if (!actor) return 0;

    const filter = andFilters(
      { clause: 'p.method = ?', params: [PAYMENT_METHODS.CASH] },
      this.salesFilter(period, actor),
    );
    const row = this.storage.db
      .prepare<SqlParam[], { amount: number }>(`
        SELECT COALESCE(SUM(p.amount), 0) AS amount
        FROM payments p
        JOIN sales s ON s.id = p.sale_id
        ${whereClause(filter)}
      `)
      .get(...filter.params);
    return roundMoney(Number(row?.amount) || 0);
  }

  /**
   * `cash` counts the full total of sales that are paid in full and carry at
   * least one cash payment; `credit` is whatever remains of the month's total.
   */
  monthlyStats(): MonthlyStats {
    const filter = periodFilter('This Month', 's.created_at');
    const row = this.storage.db
      .prepare<SqlParam[], { total: number; cash: number }>(`
        SELECT
          COALESCE(SUM(s.total), 0) AS total,
          COALESCE(SUM(
            CASE
              WHEN s.paid >= s.total AND EXISTS (
                SELECT 1 FROM payments p WHERE p.sale_id = s.id AND p.method = ?
              ) THEN s.total
              ELSE 0
            END
          ), 0) AS cash
        FROM sales s
        ${whereClause(filter)}
      `)
      .get(PAYMENT_METHODS.CASH, ...filter.params);

    const total = roundMoney(Number(row?.total) || 0);
    const cash = roundMoney(Number(row?.cash) || 0);
    return { total, cash, credit: roundMoney(total - cash) };
  }

  paymentMethodSummary(): PaymentMethodTotal[] {
    const filter = periodFilter('This Month', 's.created_at');
    return this.storage.db
      .prepare<SqlParam[], MethodRow>(`
        SELECT p.method AS method, COALESCE(SUM(p.amount), 0) AS amount, COUNT(p.id) AS count
        FROM payments p
        JOIN sales s ON s.id = p.sale_id
        ${whereClause(filter)}
        GROUP BY p.method
        ORDER BY amount DESC, p.method ASC
      `)
      .all(...filter.params)
      .map((row) => ({
        method: row.method,
        amount: roundMoney(Number(row.amount) || 0),
        count: Number(row.count) || 0,
      }));
  }

  userSalesSummaries(period: ReportPeriod): UserSalesSummary[] {
    const filter = periodFilter(period, 's.created_at');

    const totals = this.storage.db
      .prepare<SqlParam[], UserTotalsRow>(`
        SELECT
          s.created_by AS username,
          COALESCE(MAX(u.display_name), s.created_by) AS display_name,
          COALESCE(SUM(s.total), 0) AS total_sales,
          COALESCE(SUM(s.paid), 0) AS total_paid,
          COUNT(s.id) AS invoice_count
        FROM sales s
        LEFT JOIN users u ON u.username = lower(s.created_by)
        ${whereClause(filter)}
        GROUP BY s.created_by
        ORDER BY total_sales DESC, s.created_by ASC
      `)
      .all(...filter.params);

    const methods = this.storage.db
      .prepare<SqlParam[], UserMethodRow>(`
        SELECT
          s.created_by AS username,
          p.method AS method,
          COALESCE(SUM(p.amount), 0) AS amount,
          COUNT(p.id) AS count
        FROM payments p
        JOIN sales s ON s.id = p.sale_id
        ${whereClause(filter)}
        GROUP BY s.created_by, p.method
      `)
      .all(...filter.params);

    const methodsByUser = new Map<string, MethodRow[]>();
    methods.forEach((row) => {
      const bucket = methodsByUser.get(row.username) ?? [];
      bucket.push(row);
      methodsByUser.set(row.username, bucket);
    });

    return totals.map((row) => ({
      username: row.username,
      displayName: row.display_name,
      ...buildStats(row, methodsByUser.get(row.username) ?? []),
    }));
  }

  private salesFilter(period: ReportPeriod, createdBy: string | null | undefined): SqlFilter {
    const actor = createdBy === null || createdBy === undefined ? createdBy : normalizeUsername(createdBy);
    return andFilters(periodFilter(period, 's.created_at'), actorFilter(actor, 's.created_by'));
  }

  private listSales(filter: SqlFilter, limit?: number): SaleSummary[] {
    const params: SqlParam[] = limit === undefined ? filter.params : [...filter.params, limit];
    return this.storage.db
      .prepare<SqlParam[], SaleSummaryRow>(`
        SELECT
          s.id,
          c.name AS customer_name,
          s.total,
          s.paid,
          (s.total - s.paid) AS balance,
          s.created_at,
          s.created_by
        FROM sales s
        LEFT JOIN customers c ON c.phone = s.customer_phone
        ${whereClause(filter)}
        ORDER BY s.created_at DESC, s.id DESC
        ${limit === undefined ? '' : 'LIMIT ?'}
      `)
      .all(...params)
      .map((row) => ({
        id: row.id,
        customerName: row.customer_name,
        total: row.total,
        paid: row.paid,
        balance: roundMoney(row.balance),
        createdAt: row.created_at,
        createdBy: row.created_by,
      }));
  }
}

function buildStats(totals: TotalsRow | undefined, methods: MethodRow[]): ReportStats {
  const totalSales = roundMoney(Number(totals?.total_sales) || 0);
  const totalPaid = roundMoney(Number(totals?.total_paid) || 0);
  return {
    totalSales,
    totalPaid,
    totalBalance: roundMoney(totalSales - totalPaid),
    invoiceCount: Number(totals?.invoice_count) || 0,
    ...paymentBreakdown(methods),
  };
}

function paymentBreakdown(methods: MethodRow[]): PaymentBreakdown {
  const amountFor = (method: string): number =>
    roundMoney(Number(methods.find((row) => row.method === method)?.amount) || 0);

  return {
    cashSales: amountFor(PAYMENT_METHODS.CASH),
    creditSales: amountFor(PAYMENT_METHODS.CREDIT),
    mobileBankingSales: amountFor(PAYMENT_METHODS.MOBILE_BANKING),
    cardSales: amountFor(PAYMENT_METHODS.CARD),
  };
}
