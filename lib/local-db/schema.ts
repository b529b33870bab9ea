export interface ColumnUpgrade {
  table: string;
  column: string;
  definition: string;
}

export const POS_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS products (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    code TEXT NOT NULL UNIQUE,
    description TEXT,
    uom TEXT NOT NULL DEFAULT 'pcs',
    buy_price REAL NOT NULL DEFAULT 0,
    sell_price REAL NOT NULL DEFAULT 0,
    default_number REAL NOT NULL DEFAULT 0,
    stock REAL NOT NULL DEFAULT 0,
    reorder_level REAL NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS customers (
    phone TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    address TEXT,
    dob TEXT,
    email TEXT,
    status TEXT NOT NULL DEFAULT 'Active',
    credit_limit REAL NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS sales (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    customer_phone TEXT,
    total REAL NOT NULL DEFAULT 0,
    paid REAL NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    FOREIGN KEY(customer_phone) REFERENCES customers(phone)
  );

  CREATE INDEX IF NOT EXISTS idx_sales_created_at
  ON sales(created_at);

  CREATE TABLE IF NOT EXISTS sale_lines (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    sale_id INTEGER NOT NULL,
    item_id INTEGER NOT NULL,
    quantity REAL NOT NULL CHECK(quantity > 0),
    price REAL NOT NULL,
    FOREIGN KEY(sale_id) REFERENCES sales(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_sale_lines_sale
  ON sale_lines(sale_id);

  CREATE TABLE IF NOT EXISTS payments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    sale_id INTEGER NOT NULL,
    method TEXT NOT NULL,
    amount REAL NOT NULL,
    reference TEXT,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    FOREIGN KEY(sale_id) REFERENCES sales(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_payments_sale
  ON payments(sale_id, created_at);

  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    password_hash TEXT NOT NULL,
    display_name TEXT NOT NULL,
    role TEXT NOT NULL DEFAULT 'CASHIER',
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  );
`;

// Columns that older store files may lack.
export const POS_COLUMN_UPGRADES: ColumnUpgrade[] = [
  { table: 'sales', column: 'created_by', definition: "TEXT NOT NULL DEFAULT 'SYSTEM'" },
  { table: 'payments', column: 'created_by', definition: "TEXT NOT NULL DEFAULT 'SYSTEM'" },
];
