import { CustomerNotFoundError, ValidationError } from '../../../shared/errors';
import { createTestContext, type TestContext } from '../../../test-support/create-test-context';
import { formatDobForDisplay, normalizeDob } from '../customer-ledger';

describe('CustomerLedger', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    ctx.storage.close();
  });

  it('creates a customer keyed by phone', () => {
    const customer = ctx.customerLedger.upsert({
      phone: ' 0711000111 ',
      name: 'Nimal',
      dob: '05-03-1990',
      creditLimit: 500,
    });

    expect(customer).toEqual({
      phone: '0711000111',
      name: 'Nimal',
      address: null,
      dob: '1990-03-05',
      email: null,
      status: 'Active',
      creditLimit: 500,
    });
    expect(ctx.customerLedger.findByPhone('0711000111')).toEqual(customer);
  });

  it('updates in place when the phone already exists', () => {
    ctx.customerLedger.upsert({ phone: '0711000111', name: 'Nimal' });
    ctx.customerLedger.upsert({ phone: '0711000111', name: 'Nimal Perera', email: 'nimal@example.test' });

    expect(ctx.count('customers')).toBe(1);
    expect(ctx.customerLedger.findByPhone('0711000111')).toMatchObject({
      name: 'Nimal Perera',
      email: 'nimal@example.test',
    });
  });

  it('is idempotent for identical input', () => {
    const input = { phone: '0711000111', name: 'Nimal', address: 'Main St' };
    const first = ctx.customerLedger.upsert(input);
    const second = ctx.customerLedger.upsert(input);

    expect(second).toEqual(first);
    expect(ctx.customerLedger.list()).toEqual([first]);
  });

  it('lists customers by name', () => {
    ctx.seedCustomer('2', 'Zara');
    ctx.seedCustomer('1', 'Amal');

    expect(ctx.customerLedger.list().map((customer) => customer.name)).toEqual(['Amal', 'Zara']);
  });

  it('requires phone and name', () => {
    expect(() => ctx.customerLedger.upsert({ phone: ' ', name: 'X' })).toThrow('Customer phone is required.');
    expect(() => ctx.customerLedger.upsert({ phone: '1', name: '' })).toThrow('Customer name is required.');
  });

  it('disables a customer without deleting it', () => {
    ctx.seedCustomer('0711000111', 'Nimal');

    const disabled = ctx.customerLedger.setStatus('0711000111', 'Disactive');

    expect(disabled.status).toBe('Disactive');
    expect(ctx.count('customers')).toBe(1);
  });

  it('throws CustomerNotFoundError when setting status of an unknown phone', () => {
    expect(() => ctx.customerLedger.setStatus('000', 'Active')).toThrow(CustomerNotFoundError);
  });
});

describe('normalizeDob', () => {
  it('accepts both storage and display formats', () => {
    expect(normalizeDob('1990-03-05')).toBe('1990-03-05');
    expect(normalizeDob('05-03-1990')).toBe('1990-03-05');
  });

  it('maps blank input to null', () => {
    expect(normalizeDob('  ')).toBeNull();
    expect(normalizeDob(null)).toBeNull();
  });

  it('rejects impossible dates and other formats', () => {
    expect(() => normalizeDob('1990-02-30')).toThrow(new ValidationError('Invalid date of birth: 1990-02-30'));
    expect(() => normalizeDob('03/05/1990')).toThrow(ValidationError);
  });
});

describe('formatDobForDisplay', () => {
  it('formats stored dates as dd-MM-yyyy', () => {
    expect(formatDobForDisplay('1990-03-05')).toBe('05-03-1990');
  });

  it('falls back to a dash or the raw value', () => {
    expect(formatDobForDisplay(null)).toBe('-');
    expect(formatDobForDisplay('sometime')).toBe('sometime');
  });
});
