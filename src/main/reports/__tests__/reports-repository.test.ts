import { ValidationError } from '../../../shared/errors';
import { createTestContext, type TestContext } from '../../../test-support/create-test-context';

const LONG_AGO = '2000-01-15T12:00:00.000Z';

describe('ReportsRepository', () => {
  let ctx: TestContext;
  let productId: number;

  const sell = (total: number, paid: number, method = 'CASH', createdBy?: string): number =>
    ctx.salesService.createSale({
      lines: [{ productId, quantity: 1, price: total }],
      paidAmount: paid,
      paymentMethod: method,
      createdBy,
    });

  beforeEach(() => {
    ctx = createTestContext();
    productId = ctx.seedProduct({ code: 'P001', sellPrice: 10, stock: 100 }).id;
  });

  afterEach(() => {
    ctx.storage.close();
  });

  it('returns zeroed stats for an empty store', () => {
    expect(ctx.reportsRepository.getStatsForPeriod('Today', null)).toEqual({
      totalSales: 0,
      totalPaid: 0,
      totalBalance: 0,
      invoiceCount: 0,
      cashSales: 0,
      creditSales: 0,
      mobileBankingSales: 0,
      cardSales: 0,
    });
    expect(ctx.reportsRepository.monthlyStats()).toEqual({ total: 0, cash: 0, credit: 0 });
    expect(ctx.reportsRepository.paymentMethodSummary()).toEqual([]);
    expect(ctx.reportsRepository.userSalesSummaries('All')).toEqual([]);
  });

  it('breaks stats down by payment method and actor', () => {
    sell(20, 20, 'CASH', 'cashier1');
    sell(10, 4, 'MOBILE_BANKING', 'cashier1');
    sell(8, 8, 'CARD', 'cashier2');

    expect(ctx.reportsRepository.getStatsForPeriod('Today')).toEqual({
      totalSales: 38,
      totalPaid: 32,
      totalBalance: 6,
      invoiceCount: 3,
      cashSales: 20,
      creditSales: 0,
      mobileBankingSales: 4,
      cardSales: 8,
    });
    expect(ctx.reportsRepository.getStatsForPeriod('Today', 'cashier2')).toMatchObject({
      totalSales: 8,
      invoiceCount: 1,
      cardSales: 8,
      cashSales: 0,
    });
  });

  it('keeps old sales out of Today and This Month', () => {
    sell(20, 20);
    const old = sell(50, 50);
    ctx.backdateSale(old, LONG_AGO);

    expect(ctx.reportsRepository.dailySales().map((sale) => sale.total)).toEqual([20]);
    expect(ctx.reportsRepository.monthlySales().map((sale) => sale.total)).toEqual([20]);
    expect(ctx.reportsRepository.allSales().map((sale) => sale.id)).toEqual([expect.any(Number), old]);
    expect(ctx.reportsRepository.getStatsForPeriod('This Month').totalSales).toBe(20);
    expect(ctx.reportsRepository.getStatsForPeriod('All').totalSales).toBe(70);
  });

  it('lists newest first and honours the limit', () => {
    const first = sell(1, 1);
    const second = sell(2, 2);
    const third = sell(3, 3);

    expect(ctx.reportsRepository.allSales(2).map((sale) => sale.id)).toEqual([third, second]);
    expect(ctx.reportsRepository.allSales(0).map((sale) => sale.id)).toEqual([third, second, first]);
  });

  it('scopes sale lists to one actor', () => {
    sell(5, 5, 'CASH', 'cashier1');
    sell(6, 6, 'CASH', 'cashier2');

    expect(ctx.reportsRepository.dailySales('cashier1').map((sale) => sale.createdBy)).toEqual(['cashier1']);
    expect(ctx.reportsRepository.allSales(10, 'cashier2').map((sale) => sale.total)).toEqual([6]);
  });

  it('filters by an inclusive local date range', () => {
    const inside = sell(5, 5);
    const outside = sell(6, 6);
    ctx.backdateSale(inside, LONG_AGO);
    ctx.backdateSale(outside, '2000-03-15T12:00:00.000Z');

    expect(ctx.reportsRepository.salesByDateRange('2000-01-14', '2000-01-16').map((sale) => sale.id)).toEqual([
      inside,
    ]);
    expect(() => ctx.reportsRepository.salesByDateRange('14-01-2000', '2000-01-16')).toThrow(ValidationError);
    expect(() => ctx.reportsRepository.salesByDateRange('2026-02-01', '2026-02-30')).toThrow(
      new ValidationError('Invalid date range: 2026-02-01 .. 2026-02-30'),
    );
  });

  it('totals cash taken by one user', () => {
    sell(20, 20, 'CASH', 'cashier1');
    sell(10, 10, 'CARD', 'cashier1');
    sell(7, 7, 'CASH', 'cashier2');

    expect(ctx.reportsRepository.cashTotalForUser('Today', 'cashier1')).toBe(20);
    expect(ctx.reportsRepository.cashTotalForUser('Today', ' ')).toBe(0);
  });

  it('counts fully paid sales with a cash payment as monthly cash', () => {
    sell(20, 20, 'CASH');
    sell(20, 5, 'CASH');
    sell(10, 10, 'CARD');
    ctx.backdateSale(sell(99, 99, 'CASH'), LONG_AGO);

    expect(ctx.reportsRepository.monthlyStats()).toEqual({ total: 50, cash: 20, credit: 30 });
  });

  it('summarizes this month by payment method, largest first', () => {
    sell(20, 20, 'CASH');
    sell(20, 5, 'CASH');
    sell(10, 10, 'CARD');
    sell(4, 4, 'CREDIT');

    expect(ctx.reportsRepository.paymentMethodSummary()).toEqual([
      { method: 'CASH', amount: 25, count: 2 },
      { method: 'CARD', amount: 10, count: 1 },
      { method: 'CREDIT', amount: 4, count: 1 },
    ]);
  });

  it('summarizes each actor, sorted by total sales descending', () => {
    ctx.seedUser('cashier1', 'CASHIER', 'Front Desk');
    sell(10, 10, 'CASH', 'cashier1');
    sell(30, 25, 'CARD', 'cashier2');
    sell(5, 5, 'CASH', 'cashier1');

    const summaries = ctx.reportsRepository.userSalesSummaries('Today');

    expect(summaries).toEqual([
      {
        username: 'cashier2',
        displayName: 'cashier2',
        totalSales: 30,
        totalPaid: 25,
        totalBalance: 5,
        invoiceCount: 1,
        cashSales: 0,
        creditSales: 0,
        mobileBankingSales: 0,
        cardSales: 25,
      },
      {
        username: 'cashier1',
        displayName: 'Front Desk',
        totalSales: 15,
        totalPaid: 15,
        totalBalance: 0,
        invoiceCount: 2,
        cashSales: 15,
        creditSales: 0,
        mobileBankingSales: 0,
        cardSales: 0,
      },
    ]);
  });

  it('matches mixed-case actors to the same user everywhere', () => {
    ctx.seedUser('bob', 'CASHIER', 'Bob B');
    sell(12, 12, 'CASH', 'Bob');

    expect(ctx.reportsRepository.getStatsForPeriod('Today', 'bob')).toMatchObject({ totalSales: 12, invoiceCount: 1 });
    expect(ctx.reportsRepository.getStatsForPeriod('Today', 'BOB').invoiceCount).toBe(1);
    expect(ctx.reportsRepository.cashTotalForUser('Today', 'Bob')).toBe(12);
    expect(ctx.reportsRepository.userSalesSummaries('Today')).toEqual([
      expect.objectContaining({ username: 'bob', displayName: 'Bob B', totalSales: 12 }),
    ]);
  });
});
