import type { StorageGateway } from '../../../lib/local-db/storage-gateway';
import type { Product, ProductInput } from '../../shared/catalog';
import { NotFoundError, ValidationError } from '../../shared/errors';

interface ProductRow {
  id: number;
  code: string;
  description: string | null;
  uom: string;
  buy_price: number;
  sell_price: number;
  default_number: number;
  stock: number;
  reorder_level: number;
}

interface ProductParams {
  id?: number;
  code: string;
  description: string | null;
  uom: string;
  buy_price: number;
  sell_price: number;
  default_number: number;
  stock: number;
  reorder_level: number;
}

const PRODUCT_COLUMNS = `
  id, code, description, uom, buy_price, sell_price, default_number, stock, reorder_level
`;

export class CatalogRepository {
  constructor(private readonly storage: StorageGateway) {}

  list(): Product[] {
    return this.storage.db
      .prepare<[], ProductRow>(`SELECT ${PRODUCT_COLUMNS} FROM products ORDER BY code ASC`)
      .all()
      .map(mapProductRow);
  }

  findByCode(code: string): Product | null {
    const row = this.storage.db
      .prepare<[string], ProductRow>(`SELECT ${PRODUCT_COLUMNS} FROM products WHERE code = ? LIMIT 1`)
      .get(code);
    return row ? mapProductRow(row) : null;
  }

  getById(id: number): Product | null {
    const row = this.storage.db
      .prepare<[number], ProductRow>(`SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = ? LIMIT 1`)
      .get(id);
    return row ? mapProductRow(row) : null;
  }

  /** Inserts when `id` is absent, otherwise updates every mutable field by id. */
  upsert(input: ProductInput): Product {
    const params = toProductParams(input);
    const sameCode = this.findByCode(params.code);

    if (input.id === undefined || input.id === null) {
      if (sameCode) {
        throw new ValidationError(`Product code already in use: ${params.code}`);
      }
      const result = this.storage.db
        .prepare<ProductParams>(`
          INSERT INTO products (
            code, description, uom, buy_price, sell_price, default_number, stock, reorder_level
          ) VALUES (
            @code, @description, @uom, @buy_price, @sell_price, @default_number, @stock, @reorder_level
          )
        `)
        .run(params);
      return mapProductRow({ ...params, id: Number(result.lastInsertRowid) });
    }

    const id = input.id;
    if (sameCode && sameCode.id !== id) {
      throw new ValidationError(`Product code already in use: ${params.code}`);
    }

    const result = this.storage.db
      .prepare<ProductParams>(`
        UPDATE products
        SET
          code = @code,
          description = @description,
          uom = @uom,
          buy_price = @buy_price,
          sell_price = @sell_price,
          default_number = @default_number,
          stock = @stock,
          reorder_level = @reorder_level
        WHERE id = @id
      `)
      .run({ ...params, id });
    if (result.changes === 0) throw new NotFoundError('Product', id);
    return mapProductRow({ ...params, id });
  }

  /** Updates the product sharing the input's code when the input carries no id. */
  saveByCode(input: ProductInput): Product {
    if (input.id !== undefined && input.id !== null) return this.upsert(input);
    const existing = this.findByCode(input.code.trim());
    return this.upsert(existing ? { ...input, id: existing.id } : input);
  }

  listBelowReorderLevel(): Product[] {
    return this.storage.db
      .prepare<[], ProductRow>(`
        SELECT ${PRODUCT_COLUMNS}
        FROM products
        WHERE stock <= reorder_level
        ORDER BY code ASC
      `)
      .all()
      .map(mapProductRow);
  }
}

function toProductParams(input: ProductInput): ProductParams {
  const code = String(input.code || '').trim();
  if (!code) throw new ValidationError('Product code is required.');

  return {
    code,
    description: input.description?.trim() || null,
    uom: input.uom?.trim() || 'pcs',
    buy_price: finiteOrZero(input.buyPrice, 'buyPrice'),
    sell_price: finiteOrZero(input.sellPrice, 'sellPrice'),
    default_number: finiteOrZero(input.defaultNumber, 'defaultNumber'),
    stock: finiteOrZero(input.stock, 'stock'),
    reorder_level: finiteOrZero(input.reorderLevel, 'reorderLevel'),
  };
}

function finiteOrZero(value: number | undefined, field: string): number {
  if (value === undefined) return 0;
  if (!Number.isFinite(value)) throw new ValidationError(`${field} must be a finite number.`);
  return value;
}

function mapProductRow(row: ProductRow): Product {
  return {
    id: row.id,
    code: row.code,
    description: row.description,
    uom: row.uom,
    buyPrice: row.buy_price,
    sellPrice: row.sell_price,
    defaultNumber: row.default_number,
    stock: row.stock,
    reorderLevel: row.reorder_level,
  };
}
