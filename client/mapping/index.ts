export * from "./errors.js";
export * from "./temporal.js";
export * from "./diagnostics.js";
export { type CoerceContext, type Rule, t } from "./coerce.js";
export { type EntitySchema, type FieldSpec, type Presence, type RecordOf, defineSchema, field } from "./fields.js";
export * from "./widgets.js";
export * from "./schemas.js";
export * from "./mapper.js";
export { toPayload } from "./serialize.js";
