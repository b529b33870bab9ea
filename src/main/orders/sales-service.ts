import {
  CustomerNotFoundError,
  InvalidLineError,
  InvalidSaleError,
  ProductNotFoundError,
  StateError,
} from '../../shared/errors';
import { roundMoney, sumLineTotals } from '../../shared/money';
import {
  PAYMENT_METHODS,
  SYSTEM_ACTOR,
  type CreateSaleByCodeInput,
  type CreateSaleInput,
  type SaleLineInput,
} from '../../shared/orders';
import type { CatalogRepository } from '../catalog/catalog-repository';
import type { CustomerLedger } from '../customers/customer-ledger';
import { createConsoleLogger, type Logger } from '../logging/logger';
import { normalizeUsername } from '../../shared/users';
import type { SalesRepository } from './sales-repository';

export interface SalesServiceDeps {
  salesRepository: SalesRepository;
  catalogRepository: CatalogRepository;
  customerLedger: CustomerLedger;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Turns a cart into a committed sale. Every check runs before the first write;
 * the writes themselves are a single transaction in the repository.
 */
export class SalesService {
  private readonly salesRepository: SalesRepository;
  private readonly catalogRepository: CatalogRepository;
  private readonly customerLedger: CustomerLedger;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: SalesServiceDeps) {
    this.salesRepository = deps.salesRepository;
    this.catalogRepository = deps.catalogRepository;
    this.customerLedger = deps.customerLedger;
    this.logger = deps.logger ?? createConsoleLogger('sales');
    this.now = deps.now ?? (() => new Date());
  }

  createSale(input: CreateSaleInput): number {
    try {
      return this.commit(input, this.validateResolvedLines(input.lines));
    } catch (error) {
      this.logRejection(error);
      throw error;
    }
  }

  /** Resolves codes against the catalog, snapshotting the current sell price. */
  createSaleByCode(input: CreateSaleByCodeInput): number {
    try {
      return this.commit(input, this.resolveLinesByCode(input.lines));
    } catch (error) {
      this.logRejection(error);
      throw error;
    }
  }

  private commit(input: Omit<CreateSaleInput, 'lines'>, lines: SaleLineInput[]): number {
    const amount = Number(input.paidAmount);
    if (!Number.isFinite(amount) || amount < 0) {
      throw new InvalidSaleError(`Invalid paid amount: ${input.paidAmount}`);
    }
    const paid = roundMoney(amount);

    const customerPhone = this.resolveCustomerPhone(input.customerPhone);
    const total = sumLineTotals(lines);
    const createdBy = normalizeUsername(input.createdBy) || SYSTEM_ACTOR;

    const saleId = this.salesRepository.createSaleRecord({
      customerPhone,
      lines,
      total,
      paid,
      paymentMethod: (input.paymentMethod || '').trim() || PAYMENT_METHODS.CASH,
      createdBy,
      createdAt: this.now().toISOString(),
    });

    this.logger.info('sale committed', { saleId, lines: lines.length, total, paid, createdBy });
    return saleId;
  }

  private validateResolvedLines(lines: SaleLineInput[] | null | undefined): SaleLineInput[] {
    if (!lines || lines.length === 0) {
      throw new InvalidSaleError('Sale must have at least one line');
    }

    return lines.map((line) => {
      const productId = Number(line.productId);
      const quantity = Number(line.quantity);
      const price = Number(line.price);
      if (!Number.isFinite(quantity) || quantity <= 0 || !Number.isFinite(price) || price < 0) {
        throw new InvalidLineError(String(line.productId), quantity);
      }
      if (!Number.isInteger(productId) || productId <= 0 || !this.catalogRepository.getById(productId)) {
        throw new ProductNotFoundError(String(line.productId));
      }
      return { productId, quantity, price };
    });
  }

  private resolveLinesByCode(lines: CreateSaleByCodeInput['lines'] | null | undefined): SaleLineInput[] {
    if (!lines || lines.length === 0) {
      throw new InvalidSaleError('Sale must have at least one line');
    }

    return lines.map((line) => {
      const code = String(line.code || '').trim();
      const quantity = Number(line.quantity);
      if (!code || !Number.isFinite(quantity) || quantity <= 0) {
        throw new InvalidLineError(code, quantity);
      }

      const product = this.catalogRepository.findByCode(code);
      if (!product) throw new ProductNotFoundError(code);
      if (!Number.isInteger(product.id) || product.id <= 0) {
        throw new StateError(`Product has no id: ${code}`);
      }

      return { productId: product.id, quantity, price: product.sellPrice };
    });
  }

  private resolveCustomerPhone(phone: string | null | undefined): string | null {
    const trimmed = (phone || '').trim();
    if (!trimmed) return null;
    if (!this.customerLedger.findByPhone(trimmed)) throw new CustomerNotFoundError(trimmed);
    return trimmed;
  }

  private logRejection(error: unknown): void {
    if (error instanceof Error) {
      this.logger.warn('sale rejected', { reason: error.message, error: error.name });
    }
  }
}
