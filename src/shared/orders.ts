export const PAYMENT_METHODS = {
  CASH: 'CASH',
  CREDIT: 'CREDIT',
  MOBILE_BANKING: 'MOBILE_BANKING',
  CARD: 'CARD',
} as const;

/** Open string at the storage layer; the well-known values are in PAYMENT_METHODS. */
export type PaymentMethod = string;

export const SYSTEM_ACTOR = 'SYSTEM';

export interface SaleLineInput {
  productId: number;
  quantity: number;
  /** Unit price captured at sale time. */
  price: number;
}

export interface SaleLineByCodeInput {
  code: string;
  quantity: number;
}

interface SalePaymentInput {
  customerPhone?: string | null;
  paidAmount: number;
  paymentMethod?: PaymentMethod | null;
  createdBy?: string | null;
}

export interface CreateSaleInput extends SalePaymentInput {
  lines: SaleLineInput[];
}

export interface CreateSaleByCodeInput extends SalePaymentInput {
  lines: SaleLineByCodeInput[];
}

export interface SaleRecord {
  id: number;
  customerPhone: string | null;
  total: number;
  paid: number;
  createdAt: string;
  createdBy: string;
}

export interface SaleSummary {
  id: number;
  customerName: string | null;
  total: number;
  paid: number;
  balance: number;
  createdAt: string;
  createdBy: string;
}
