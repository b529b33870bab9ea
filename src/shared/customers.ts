export const CUSTOMER_STATUSES = ['Active', 'Disactive'] as const;

export type CustomerStatus = (typeof CUSTOMER_STATUSES)[number];

export interface Customer {
  phone: string;
  name: string;
  address: string | null;
  /** Stored as yyyy-MM-dd. */
  dob: string | null;
  email: string | null;
  status: CustomerStatus;
  creditLimit: number;
}

export interface CustomerInput {
  phone: string;
  name: string;
  address?: string | null;
  dob?: string | null;
  email?: string | null;
  status?: CustomerStatus;
  creditLimit?: number;
}
