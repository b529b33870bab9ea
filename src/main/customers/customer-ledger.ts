import type { StorageGateway } from '../../../lib/local-db/storage-gateway';
import {
  CUSTOMER_STATUSES,
  type Customer,
  type CustomerInput,
  type CustomerStatus,
} from '../../shared/customers';
import { isCalendarDate } from '../../shared/dates';
import { CustomerNotFoundError, ValidationError } from '../../shared/errors';

interface CustomerRow {
  phone: string;
  name: string;
  address: string | null;
  dob: string | null;
  email: string | null;
  status: string;
  credit_limit: number;
}

const CUSTOMER_COLUMNS = 'phone, name, address, dob, email, status, credit_limit';

const STORAGE_DOB = /^(\d{4})-(\d{2})-(\d{2})$/;
const DISPLAY_DOB = /^(\d{2})-(\d{2})-(\d{4})$/;

/** Customers keyed by phone number. Rows are never deleted, only disabled. */
export class CustomerLedger {
  constructor(private readonly storage: StorageGateway) {}

  list(): Customer[] {
    return this.storage.db
      .prepare<[], CustomerRow>(`SELECT ${CUSTOMER_COLUMNS} FROM customers ORDER BY name ASC`)
      .all()
      .map(mapCustomerRow);
  }

  findByPhone(phone: string): Customer | null {
    const row = this.storage.db
      .prepare<[string], CustomerRow>(`SELECT ${CUSTOMER_COLUMNS} FROM customers WHERE phone = ? LIMIT 1`)
      .get(phone.trim());
    return row ? mapCustomerRow(row) : null;
  }

  upsert(input: CustomerInput): Customer {
    const customer = normalizeCustomer(input);
    const params = {
      phone: customer.phone,
      name: customer.name,
      address: customer.address,
      dob: customer.dob,
      email: customer.email,
      status: customer.status,
      credit_limit: customer.creditLimit,
    };

    const updated = this.storage.db
      .prepare<typeof params>(`
        UPDATE customers
        SET name = @name, address = @address, dob = @dob, email = @email,
            status = @status, credit_limit = @credit_limit
        WHERE phone = @phone
      `)
      .run(params);
    if (updated.changes > 0) return customer;

    this.storage.db
      .prepare<typeof params>(`
        INSERT INTO customers (phone, name, address, dob, email, status, credit_limit)
        VALUES (@phone, @name, @address, @dob, @email, @status, @credit_limit)
      `)
      .run(params);
    return customer;
  }

  setStatus(phone: string, status: CustomerStatus): Customer {
    const key = phone.trim();
    const result = this.storage.db
      .prepare<[string, string]>('UPDATE customers SET status = ? WHERE phone = ?')
      .run(status, key);
    if (result.changes === 0) throw new CustomerNotFoundError(key);

    const customer = this.findByPhone(key);
    if (!customer) throw new CustomerNotFoundError(key);
    return customer;
  }
}

/** Accepts yyyy-MM-dd or dd-MM-yyyy and returns yyyy-MM-dd; blank becomes null. */
export function normalizeDob(value: string | null | undefined): string | null {
  const trimmed = (value || '').trim();
  if (!trimmed) return null;

  const parsed = parseDob(trimmed);
  if (!parsed) throw new ValidationError(`Invalid date of birth: ${trimmed}`);
  return parsed;
}

export function formatDobForDisplay(dob: string | null | undefined): string {
  const trimmed = (dob || '').trim();
  if (!trimmed) return '-';
  const parsed = parseDob(trimmed);
  if (!parsed) return trimmed;
  const [year, month, day] = parsed.split('-');
  return `${day}-${month}-${year}`;
}

function parseDob(value: string): string | null {
  const storage = STORAGE_DOB.exec(value);
  const display = storage ? null : DISPLAY_DOB.exec(value);
  const year = storage ? storage[1] : display?.[3];
  const month = storage ? storage[2] : display?.[2];
  const day = storage ? storage[3] : display?.[1];
  if (!year || !month || !day) return null;

  if (!isCalendarDate(Number(year), Number(month), Number(day))) return null;
  return `${year}-${month}-${day}`;
}

function normalizeCustomer(input: CustomerInput): Customer {
  const phone = String(input.phone || '').trim();
  const name = String(input.name || '').trim();
  if (!phone) throw new ValidationError('Customer phone is required.');
  if (!name) throw new ValidationError('Customer name is required.');

  const creditLimit = input.creditLimit ?? 0;
  if (!Number.isFinite(creditLimit)) throw new ValidationError('creditLimit must be a finite number.');

  return {
    phone,
    name,
    address: input.address?.trim() || null,
    dob: normalizeDob(input.dob),
    email: input.email?.trim() || null,
    status: input.status ?? 'Active',
    creditLimit,
  };
}

function toCustomerStatus(value: string): CustomerStatus {
  return CUSTOMER_STATUSES.find((status) => status === value) ?? 'Active';
}

function mapCustomerRow(row: CustomerRow): Customer {
  return {
    phone: row.phone,
    name: row.name,
    address: row.address,
    dob: row.dob,
    email: row.email,
    status: toCustomerStatus(row.status),
    creditLimit: row.credit_limit,
  };
}
