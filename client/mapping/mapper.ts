import type { CoerceContext } from "./coerce.js";
import type { CallShape, DiagnosticSink } from "./diagnostics.js";
import { MalformedFieldError, MappingError } from "./errors.js";
import { mapObject, readFields } from "./fields.js";
import { type Auth, type EntityKind, type EntityRecord, authSchema, entitySchemas, userSchema } from "./schemas.js";

export type MapOptions = {
  /** Which call produced the payload. Single mapping defaults to `detail`, collections to `list`. */
  shape?: CallShape;
  /** IANA zone of the school, attached to every mapped date-time. */
  timeZone?: string;
  onDiagnostic?: DiagnosticSink;
};

export type MapPolicy = "best-effort" | "fail-fast";

export type MapManyOptions = MapOptions & { policy?: MapPolicy };

export type MapResult<T> = { ok: true; record: T } | { ok: false; error: MappingError };

export type MapOutcome<T> =
  | { ok: true; index: number; record: T }
  | { ok: false; index: number; error: MappingError };

function contextFor(entity: string, options: MapOptions, shape: CallShape): CoerceContext {
  return {
    entity,
    path: "",
    shape: options.shape ?? shape,
    ...(options.timeZone ? { timeZone: options.timeZone } : {}),
    ...(options.onDiagnostic ? { report: options.onDiagnostic } : {}),
  };
}

export function mapEntity<K extends EntityKind>(kind: K, raw: unknown, options: MapOptions = {}): EntityRecord<K> {
  return mapObject(entitySchemas[kind], raw, contextFor(kind, options, "detail"));
}

/** Like `mapEntity`, but a mapping failure comes back as a value. Other errors still throw. */
export function tryMapEntity<K extends EntityKind>(
  kind: K,
  raw: unknown,
  options: MapOptions = {},
): MapResult<EntityRecord<K>> {
  try {
    return { ok: true, record: mapEntity(kind, raw, options) };
  } catch (error) {
    if (error instanceof MappingError) return { ok: false, error };
    throw error;
  }
}

/**
 * Maps a collection payload element by element, in order. Under `best-effort` a bad
 * element becomes a failed outcome and the rest still map; under `fail-fast` the first
 * failure is thrown with its `index` set.
 */
export function mapMany<K extends EntityKind>(
  kind: K,
  raw: unknown,
  options: MapManyOptions = {},
): MapOutcome<EntityRecord<K>>[] {
  if (!Array.isArray(raw)) {
    throw new MalformedFieldError({ entity: kind, value: raw, expected: "array" });
  }
  const items: unknown[] = raw;
  const elementOptions: MapOptions = { ...options, shape: options.shape ?? "list" };

  return items.map((item, index): MapOutcome<EntityRecord<K>> => {
    const result = tryMapEntity(kind, item, elementOptions);
    if (result.ok) return { ok: true, index, record: result.record };
    result.error.index = index;
    if (options.policy === "fail-fast") throw result.error;
    return { ok: false, index, error: result.error };
  });
}

export function successes<T>(outcomes: readonly MapOutcome<T>[]): T[] {
  return outcomes.flatMap((o) => (o.ok ? [o.record] : []));
}

export function failures<T>(outcomes: readonly MapOutcome<T>[]): { index: number; error: MappingError }[] {
  return outcomes.flatMap((o) => (o.ok ? [] : [{ index: o.index, error: o.error }]));
}

/** The authenticate response is the token fields and the signed-in user, flattened together. */
export function mapAuth(raw: unknown, options: MapOptions = {}): Auth {
  const { record, extras } = readFields(authSchema, raw, contextFor("Auth", options, "detail"));
  const user = mapObject(userSchema, extras, contextFor("User", options, "detail"));
  return Object.freeze({ ...record, user });
}
