import type { InvoiceData } from '../../../shared/invoices';
import { buildInvoiceTicket } from '../invoice-ticket';

const invoice: InvoiceData = {
  invoiceNo: 12,
  customerName: 'Nimal',
  customerPhone: '0711000111',
  date: '2024-06-01T08:30:00.000Z',
  items: [{ code: 'P001', description: 'Pencil', qty: 2, price: 10, total: 20 }],
  subtotal: 20,
  tax: 0,
  total: 20,
  paidAmount: 5,
  paymentMethod: 'CREDIT',
};

function decode(base64: string): Buffer {
  return Buffer.from(base64, 'base64');
}

describe('buildInvoiceTicket', () => {
  it('prints the invoice lines between reset and cut commands', () => {
    const bytes = decode(buildInvoiceTicket(invoice, { storeName: 'Corner Shop' }));

    expect(Array.from(bytes.subarray(0, 5))).toEqual([0x1b, 0x40, 0x1b, 0x61, 0x01]);
    expect(Array.from(bytes.subarray(bytes.length - 3))).toEqual([0x1d, 0x56, 0x00]);

    const text = bytes
      .subarray(5, bytes.length - 3)
      .toString('utf8')
      .replace('\x1b\x61\x00', '');
    expect(text.split('\n')).toEqual([
      'Corner Shop',
      'Invoice #12',
      'Date: 2024-06-01T08:30:00.000Z',
      'Customer: Nimal',
      'Phone: 0711000111',
      '------------------------------',
      '2x P001 Pencil @ 10.00 = 20.00',
      '------------------------------',
      'SUBTOTAL: 20.00',
      'TAX: 0.00',
      'TOTAL: 20.00',
      'PAID: 5.00',
      'BALANCE: 15.00',
      'PAYMENT: CREDIT',
      '',
      '',
      '',
      '',
    ]);
  });

  it('omits the phone line for walk-in sales and defaults the header', () => {
    const text = decode(buildInvoiceTicket({ ...invoice, customerPhone: null })).toString('utf8');

    expect(text).toContain('POS\nInvoice #12\n');
    expect(text).not.toContain('Phone:');
  });
});
