import { v4 as uuidv4 } from 'uuid';
import type { ActivityEntry } from '../domains/sales/types';
import { getRequestContext } from './requestContext';
import type { SqlExecutor } from './sql';

export async function recordActivityLog(client: SqlExecutor, input: ActivityEntry) {
  const { userId, action, entityType, entityId, description, metadata, occurredAt } = input;

  await client.query(
    `INSERT INTO activity_logs (
        id, user_id, action, entity_type, entity_id, description, metadata, occurred_at, request_id
     ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
    [
      uuidv4(),
      userId,
      action,
      entityType,
      entityId,
      description,
      metadata ?? null,
      occurredAt,
      getRequestContext()?.requestId ?? null
    ]
  );
}
