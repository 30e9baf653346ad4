import { writeFields } from "./fields.js";
import { type EntityKind, type EntityRecord, entitySchemas } from "./schemas.js";

/**
 * Wire-shaped payload for a mapped record: declared fields only, under their API keys,
 * dates back in `YYYY-MM-DD` form. Mapping the result again yields an equal record.
 */
export function toPayload<K extends EntityKind>(kind: K, record: EntityRecord<K>): Record<string, unknown> {
  return writeFields(entitySchemas[kind], record);
}
