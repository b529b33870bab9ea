import { IN_MEMORY, openStorage } from '../../lib/local-db/storage-gateway';
import type { Product, ProductInput } from '../shared/catalog';
import type { Customer } from '../shared/customers';
import type { User, UserRole } from '../shared/users';
import { silentLogger } from '../main/logging/logger';
import { createPosContext, type PosContext } from '../main/pos-context';

export interface TestContext extends PosContext {
  seedProduct(input: ProductInput): Product;
  seedCustomer(phone: string, name: string): Customer;
  seedUser(username: string, role?: UserRole, displayName?: string): User;
  /** Moves a sale and its payments to another timestamp. */
  backdateSale(saleId: number, createdAt: string): void;
  count(table: 'products' | 'customers' | 'sales' | 'sale_lines' | 'payments' | 'users'): number;
}

export const TEST_PASSWORD = 'test-secret';

export function createTestContext(): TestContext {
  const storage = openStorage({ filePath: IN_MEMORY, logger: silentLogger });
  const context = createPosContext(storage, { bcryptRounds: 4, logger: silentLogger });

  return {
    ...context,
    seedProduct: (input) => context.catalogRepository.upsert(input),
    seedCustomer: (phone, name) => context.customerLedger.upsert({ phone, name }),
    seedUser: (username, role = 'CASHIER', displayName = '') =>
      context.usersRepository.saveUser({ username, displayName, role, password: TEST_PASSWORD }),
    backdateSale(saleId, createdAt) {
      storage.db.prepare<[string, number]>('UPDATE sales SET created_at = ? WHERE id = ?').run(createdAt, saleId);
      storage.db
        .prepare<[string, number]>('UPDATE payments SET created_at = ? WHERE sale_id = ?')
        .run(createdAt, saleId);
    },
    count(table) {
      const row = storage.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get();
      return row ? row.n : 0;
    },
  };
}
