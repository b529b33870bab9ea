import type { InvoiceData } from '../../shared/invoices';
import { formatMoney } from '../../shared/money';

const ESC = 0x1b;
const GS = 0x1d;
const RULE = '------------------------------';

export interface InvoiceTicketOptions {
  storeName?: string;
}

/** ESC/POS receipt for an invoice projection, base64 encoded for the printer queue. */
export function buildInvoiceTicket(invoice: InvoiceData, options: InvoiceTicketOptions = {}): string {
  const encoder = new TextEncoder();
  const rows: number[] = [ESC, 0x40, ESC, 0x61, 0x01];
  const text = (value: string): void => {
    rows.push(...Array.from(encoder.encode(`${value}\n`)));
  };

  text(options.storeName || 'POS');
  text(`Invoice #${invoice.invoiceNo}`);
  rows.push(ESC, 0x61, 0x00);
  text(`Date: ${invoice.date}`);
  text(`Customer: ${invoice.customerName}`);
  if (invoice.customerPhone) {
    text(`Phone: ${invoice.customerPhone}`);
  }
  text(RULE);

  invoice.items.forEach((item) => {
    const label = [item.code, item.description].filter(Boolean).join(' ');
    text(`${item.qty}x ${label} @ ${formatMoney(item.price)} = ${formatMoney(item.total)}`);
  });

  text(RULE);
  text(`SUBTOTAL: ${formatMoney(invoice.subtotal)}`);
  text(`TAX: ${formatMoney(invoice.tax)}`);
  text(`TOTAL: ${formatMoney(invoice.total)}`);
  text(`PAID: ${formatMoney(invoice.paidAmount)}`);
  text(`BALANCE: ${formatMoney(invoice.total - invoice.paidAmount)}`);
  text(`PAYMENT: ${invoice.paymentMethod}`);
  text('\n\n');
  rows.push(GS, 0x56, 0x00);

  return Buffer.from(rows).toString('base64');
}
