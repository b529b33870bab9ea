import type { StorageGateway } from '../../lib/local-db/storage-gateway';
import { CatalogRepository } from './catalog/catalog-repository';
import { CustomerLedger } from './customers/customer-ledger';
import { InvoiceProjector } from './invoices/invoice-projector';
import { createConsoleLogger, type Logger, type LogLevel } from './logging/logger';
import { SalesRepository } from './orders/sales-repository';
import { SalesService } from './orders/sales-service';
import { ReportsRepository } from './reports/reports-repository';
import { UsersRepository } from './users/users-repository';

export interface PosContextOptions {
  bcryptRounds?: number;
  logLevel?: LogLevel;
  /** Overrides the per-component console loggers. */
  logger?: Logger;
  now?: () => Date;
}

export interface PosContext {
  storage: StorageGateway;
  catalogRepository: CatalogRepository;
  customerLedger: CustomerLedger;
  usersRepository: UsersRepository;
  salesRepository: SalesRepository;
  salesService: SalesService;
  reportsRepository: ReportsRepository;
  invoiceProjector: InvoiceProjector;
}

/** Wires every component onto one shared store handle. */
export function createPosContext(storage: StorageGateway, options: PosContextOptions = {}): PosContext {
  const catalogRepository = new CatalogRepository(storage);
  const customerLedger = new CustomerLedger(storage);
  const salesRepository = new SalesRepository(storage);

  return {
    storage,
    catalogRepository,
    customerLedger,
    usersRepository: new UsersRepository(storage, { bcryptRounds: options.bcryptRounds }),
    salesRepository,
    salesService: new SalesService({
      salesRepository,
      catalogRepository,
      customerLedger,
      logger: options.logger ?? createConsoleLogger('sales', options.logLevel),
      now: options.now,
    }),
    reportsRepository: new ReportsRepository(storage),
    invoiceProjector: new InvoiceProjector({ storage, salesRepository, customerLedger }),
  };
}
