import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('orders', {
    id: { type: 'uuid', primaryKey: true },
    user_id: { type: 'uuid', notNull: true, references: 'users' },
    payer_name: { type: 'text', notNull: true },
    payer_reference: { type: 'text' },
    payer_program: { type: 'text' },
    total_price: { type: 'numeric(12,2)', notNull: true },
    receipt_number: { type: 'text' },
    status: { type: 'text', notNull: true, default: 'draft' },
    completed_at: { type: 'timestamptz' },
    stock_deduction: { type: 'text', notNull: true, default: 'none' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true }
  });

  pgm.addConstraint('orders', 'chk_orders_status', {
    check: "status IN ('draft','finalized')"
  });
  pgm.addConstraint('orders', 'chk_orders_stock_deduction', {
    check: "stock_deduction IN ('none','all_lines','deferred_lines')"
  });
  // Finalized <=> completion timestamp present; only finalized orders carry a deduction.
  pgm.addConstraint('orders', 'chk_orders_completion_matches_status', {
    check: "(status = 'finalized') = (completed_at IS NOT NULL)"
  });
  pgm.addConstraint('orders', 'chk_orders_deduction_requires_finalized', {
    check: "stock_deduction = 'none' OR status = 'finalized'"
  });
  pgm.addConstraint('orders', 'chk_orders_total_nonnegative', {
    check: 'total_price >= 0'
  });

  pgm.createIndex('orders', 'receipt_number', {
    name: 'idx_orders_receipt_number_unique',
    unique: true,
    where: 'receipt_number IS NOT NULL'
  });
  pgm.createIndex('orders', 'completed_at', { name: 'idx_orders_completed_at' });
  pgm.createIndex('orders', 'user_id', { name: 'idx_orders_user_id' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('orders');
}
