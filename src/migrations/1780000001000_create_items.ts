import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('items', {
    id: { type: 'uuid', primaryKey: true },
    name: { type: 'text', notNull: true },
    unit: { type: 'text' },
    category: { type: 'text', notNull: true },
    price: { type: 'numeric(12,2)', notNull: true, default: 0 },
    stock_quantity: { type: 'integer', notNull: true, default: 0 },
    reorder_level: { type: 'integer', notNull: true, default: 0 },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('items', 'chk_items_price_nonnegative', {
    check: 'price >= 0'
  });
  pgm.addConstraint('items', 'chk_items_stock_nonnegative', {
    check: 'stock_quantity >= 0'
  });

  pgm.createIndex('items', 'category', { name: 'idx_items_category' });
  pgm.createIndex('items', 'name', { name: 'idx_items_name' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('items');
}
