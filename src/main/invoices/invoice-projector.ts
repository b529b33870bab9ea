import type { StorageGateway } from '../../../lib/local-db/storage-gateway';
import type { CustomerLedger } from '../customers/customer-ledger';
import { InvoiceNotFoundError } from '../../shared/errors';
import { WALK_IN_CUSTOMER, type InvoiceData, type InvoiceItem } from '../../shared/invoices';
import { lineTotal, sumMoney } from '../../shared/money';
import { PAYMENT_METHODS } from '../../shared/orders';
import type { SalesRepository } from '../orders/sales-repository';

interface InvoiceLineRow {
  code: string | null;
  description: string | null;
  quantity: number;
  price: number;
}

export interface InvoiceProjectorDeps {
  storage: StorageGateway;
  salesRepository: SalesRepository;
  customerLedger: CustomerLedger;
}

export class InvoiceProjector {
  constructor(private readonly deps: InvoiceProjectorDeps) {}

  buildInvoiceData(saleId: number): InvoiceData {
    if (!Number.isInteger(saleId) || saleId <= 0) throw new InvoiceNotFoundError(saleId);

    const sale = this.deps.salesRepository.getSale(saleId);
    if (!sale) throw new InvoiceNotFoundError(saleId);

    const customer = sale.customerPhone ? this.deps.customerLedger.findByPhone(sale.customerPhone) : null;
    const items = this.listItems(saleId);

    return {
      invoiceNo: sale.id,
      customerName: customer?.name ?? WALK_IN_CUSTOMER,
      customerPhone: sale.customerPhone,
      date: sale.createdAt,
      items,
      subtotal: sumMoney(items.map((item) => item.total)),
      tax: 0,
      total: sale.total,
      paidAmount: sale.paid,
      paymentMethod: this.latestPaymentMethod(saleId),
    };
  }

  private latestPaymentMethod(saleId: number): string {
    const row = this.deps.storage.db
      .prepare<[number], { method: string }>(`
        SELECT method
        FROM payments
        WHERE sale_id = ?
        ORDER BY created_at DESC, id DESC
        LIMIT 1
      `)
      .get(saleId);
    return row?.method || PAYMENT_METHODS.CASH;
  }

  private listItems(saleId: number): InvoiceItem[] {
    return this.deps.storage.db
      .prepare<[number], InvoiceLineRow>(`
        SELECT p.code, p.description, l.quantity, l.price
        FROM sale_lines l
        LEFT JOIN products p ON p.id = l.item_id
        WHERE l.sale_id = ?
        ORDER BY l.id ASC
      `)
      .all(saleId)
      .map((row) => ({
        code: row.code ?? '',
        description: row.description ?? '',
        qty: row.quantity,
        price: row.price,
        total: lineTotal(row.quantity, row.price),
      }));
  }
}
