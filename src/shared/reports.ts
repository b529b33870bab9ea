export const REPORT_PERIODS = ['Today', 'This Month', 'All'] as const;

export type ReportPeriod = (typeof REPORT_PERIODS)[number];

export interface PaymentBreakdown {
  cashSales: number;
  creditSales: number;
  mobileBankingSales: number;
  cardSales: number;
}

export interface ReportStats extends PaymentBreakdown {
  totalSales: number;
  totalPaid: number;
  totalBalance: number;
  invoiceCount: number;
}

export interface MonthlyStats {
  total: number;
  /** Totals of fully paid sales carrying at least one cash payment. */
  cash: number;
  credit: number;
}

export interface PaymentMethodTotal {
  method: string;
  amount: number;
  count: number;
}

export interface UserSalesSummary extends ReportStats {
  username: string;
  displayName: string;
}
