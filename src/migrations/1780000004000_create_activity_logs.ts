import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('activity_logs', {
    id: { type: 'uuid', primaryKey: true },
    user_id: { type: 'uuid' },
    action: { type: 'text', notNull: true },
    entity_type: { type: 'text', notNull: true },
    entity_id: { type: 'uuid', notNull: true },
    description: { type: 'text', notNull: true },
    metadata: { type: 'jsonb' },
    occurred_at: { type: 'timestamptz', notNull: true },
    request_id: { type: 'text' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('activity_logs', 'chk_activity_logs_action', {
    check: "action IN ('create','finalize','delete')"
  });

  pgm.createIndex('activity_logs', ['entity_type', 'entity_id'], { name: 'idx_activity_logs_entity' });
  pgm.createIndex('activity_logs', 'occurred_at', { name: 'idx_activity_logs_occurred_at' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('activity_logs');
}
