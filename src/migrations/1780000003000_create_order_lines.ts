import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('order_lines', {
    id: { type: 'uuid', primaryKey: true },
    order_id: { type: 'uuid', notNull: true, references: 'orders', onDelete: 'CASCADE' },
    line_number: { type: 'integer', notNull: true },
    item_id: { type: 'uuid', notNull: true, references: 'items' },
    quantity: { type: 'integer', notNull: true },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('order_lines', 'chk_order_lines_quantity_positive', {
    check: 'quantity > 0'
  });
  pgm.addConstraint('order_lines', 'uq_order_lines_order_line_number', {
    unique: ['order_id', 'line_number']
  });

  pgm.createIndex('order_lines', 'item_id', { name: 'idx_order_lines_item_id' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('order_lines');
}
