export class PosError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PosError';
    this.code = code;
  }
}

export class ValidationError extends PosError {
  constructor(message: string, code = 'VALIDATION_ERROR') {
    super(code, message);
    this.name = 'ValidationError';
  }
}

export class InvalidSaleError extends ValidationError {
  constructor(message: string) {
    super(message, 'INVALID_SALE');
    this.name = 'InvalidSaleError';
  }
}

export class InvalidLineError extends ValidationError {
  readonly lineCode: string;
  readonly quantity: number;

  constructor(lineCode: string, quantity: number) {
    super(`Invalid line: code='${lineCode}', qty='${quantity}'`, 'INVALID_LINE');
    this.name = 'InvalidLineError';
    this.lineCode = lineCode;
    this.quantity = quantity;
  }
}

export class NotFoundError extends PosError {
  readonly entity: string;
  readonly key: string;

  constructor(entity: string, key: string | number) {
    super('NOT_FOUND', `${entity} not found: ${key}`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.key = String(key);
  }
}

export class ProductNotFoundError extends NotFoundError {
  constructor(codeOrId: string | number) {
    super('Product', codeOrId);
    this.name = 'ProductNotFoundError';
  }
}

export class CustomerNotFoundError extends NotFoundError {
  constructor(phone: string) {
    super('Customer', phone);
    this.name = 'CustomerNotFoundError';
  }
}

export class InvoiceNotFoundError extends NotFoundError {
  constructor(saleId: number | string) {
    super('Invoice', saleId);
    this.name = 'InvoiceNotFoundError';
  }
}

export class StateError extends PosError {
  constructor(message: string) {
    super('INVALID_STATE', message);
    this.name = 'StateError';
  }
}

export class StorageError extends PosError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE_ERROR', message, { cause });
    this.name = 'StorageError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}
