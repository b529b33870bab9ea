export const WALK_IN_CUSTOMER = 'Walk-in Customer';

export interface InvoiceItem {
  code: string;
  description: string;
  qty: number;
  price: number;
  total: number;
}

export interface InvoiceData {
  invoiceNo: number;
  customerName: string;
  customerPhone: string | null;
  date: string;
  items: InvoiceItem[];
  /** Recomputed from the lines. */
  subtotal: number;
  tax: number;
  /** As stored on the sale header. */
  total: number;
  paidAmount: number;
  paymentMethod: string;
}
