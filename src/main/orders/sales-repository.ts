import type { StorageGateway } from '../../../lib/local-db/storage-gateway';
import { StateError } from '../../shared/errors';
import type { SaleLineInput, SaleRecord } from '../../shared/orders';

interface SaleRow {
  id: number;
  customer_phone: string | null;
  total: number;
  paid: number;
  created_at: string;
  created_by: string;
}

export interface SaleLineRow {
  id: number;
  sale_id: number;
  item_id: number;
  quantity: number;
  price: number;
}

export interface PaymentRow {
  id: number;
  sale_id: number;
  method: string;
  amount: number;
  reference: string | null;
  created_at: string;
  created_by: string;
}

export interface SaleWriteInput {
  customerPhone: string | null;
  lines: SaleLineInput[];
  total: number;
  paid: number;
  paymentMethod: string;
  createdBy: string;
  createdAt: string;
}

export class SalesRepository {
  constructor(private readonly storage: StorageGateway) {}

  /**
   * Writes header, lines, stock decrements and the opening payment as one
   * transaction and returns the new sale id.
   */
  createSaleRecord(input: SaleWriteInput): number {
    const db = this.storage.db;

    const insertSale = db.prepare<{
      customer_phone: string | null;
      total: number;
      paid: number;
      created_at: string;
      created_by: string;
    }>(`
      INSERT INTO sales (customer_phone, total, paid, created_at, created_by)
      VALUES (@customer_phone, @total, @paid, @created_at, @created_by)
    `);

    const insertLine = db.prepare<{ sale_id: number; item_id: number; quantity: number; price: number }>(`
      INSERT INTO sale_lines (sale_id, item_id, quantity, price)
      VALUES (@sale_id, @item_id, @quantity, @price)
    `);

    const decrementStock = db.prepare<{ quantity: number; id: number }>(`
      UPDATE products SET stock = stock - @quantity WHERE id = @id
    `);

    const insertPayment = db.prepare<{
      sale_id: number;
      method: string;
      amount: number;
      created_at: string;
      created_by: string;
    }>(`
      INSERT INTO payments (sale_id, method, amount, reference, created_at, created_by)
      VALUES (@sale_id, @method, @amount, NULL, @created_at, @created_by)
    `);

    return this.storage.transaction(() => {
      const saleId = Number(
        insertSale.run({
          customer_phone: input.customerPhone,
          total: input.total,
          paid: input.paid,
          created_at: input.createdAt,
          created_by: input.createdBy,
        }).lastInsertRowid,
      );
      if (!saleId) throw new StateError('Failed to create sale');

      input.lines.forEach((line) => {
        insertLine.run({ sale_id: saleId, item_id: line.productId, quantity: line.quantity, price: line.price });
      });

      input.lines.forEach((line) => {
        const updated = decrementStock.run({ quantity: line.quantity, id: line.productId });
        if (updated.changes === 0) throw new StateError(`Product disappeared during sale: ${line.productId}`);
      });

      insertPayment.run({
        sale_id: saleId,
        method: input.paymentMethod,
        amount: input.paid,
        created_at: input.createdAt,
        created_by: input.createdBy,
      });

      return saleId;
    });
  }

  getSale(saleId: number): SaleRecord | null {
    const row = this.storage.db
      .prepare<[number], SaleRow>(`
        SELECT id, customer_phone, total, paid, created_at, created_by
        FROM sales
        WHERE id = ?
        LIMIT 1
      `)
      .get(saleId);
    if (!row) return null;
    return {
      id: row.id,
      customerPhone: row.customer_phone,
      total: row.total,
      paid: row.paid,
      createdAt: row.created_at,
      createdBy: row.created_by,
    };
  }

  listLines(saleId: number): SaleLineRow[] {
    return this.storage.db
      .prepare<[number], SaleLineRow>(`
        SELECT id, sale_id, item_id, quantity, price
        FROM sale_lines
        WHERE sale_id = ?
        ORDER BY id ASC
      `)
      .all(saleId);
  }

  listPayments(saleId: number): PaymentRow[] {
    return this.storage.db
      .prepare<[number], PaymentRow>(`
        SELECT id, sale_id, method, amount, reference, created_at, created_by
        FROM payments
        WHERE sale_id = ?
        ORDER BY created_at ASC, id ASC
      `)
      .all(saleId);
  }
}
