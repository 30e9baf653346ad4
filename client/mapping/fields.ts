import { type CoerceContext, type Rule, isJsonObject, joinPath, malformed } from "./coerce.js";
import { MissingRequiredFieldError } from "./errors.js";

/**
 * When a field may be missing from a payload.
 * - `always`: every call shape sends it; absence is an upstream contract break.
 * - `detail-only`: single-object fetches send it, list fetches may leave it out.
 * - `optional`: may be missing from any call shape.
 */
export type Presence = "always" | "detail-only" | "optional";

export type FieldSpec<T> = {
  readonly rule: Rule<T>;
  readonly presence: Presence;
  /** Wire key, when it differs from the record field name. */
  readonly key?: string;
};

export type Fields = Record<string, FieldSpec<unknown>>;

export type EntitySchema<F extends Fields = Fields> = {
  readonly kind: string;
  readonly fields: F;
};

export function field<T>(rule: Rule<T>, presence: Presence, key?: string): FieldSpec<T> {
  return key === undefined ? { rule, presence } : { rule, presence, key };
}

export function defineSchema<F extends Fields>(kind: string, fields: F): EntitySchema<F> {
  return { kind, fields };
}

export type Simplify<T> = { [K in keyof T]: T[K] } & {};

type ValueOf<S> = S extends FieldSpec<infer T> ? T : never;

type ListKeys<F extends Fields> = {
  [K in keyof F]: ValueOf<F[K]> extends readonly unknown[] ? K : never;
}[keyof F];

/**
 * Record type a schema produces. List fields are always there (absent ones become
 * empty); everything else is optional, and null when the API sent null.
 */
export type RecordOf<F extends Fields> = Simplify<
  { readonly [K in ListKeys<F>]: ValueOf<F[K]> } & {
    readonly [K in Exclude<keyof F, ListKeys<F>>]?: ValueOf<F[K]> | null;
  }
>;

/**
 * Applies a schema to one raw object. Returns the record plus every raw key the
 * schema does not declare, so callers decide whether those are drift or residue.
 */
export function readFields<F extends Fields>(
  schema: EntitySchema<F>,
  raw: unknown,
  ctx: CoerceContext,
): { record: RecordOf<F>; extras: Record<string, unknown> } {
  if (!isJsonObject(raw)) throw malformed(ctx, raw, "object");

  const specs: Fields = schema.fields;
  const values: Record<string, unknown> = {};
  const consumed = new Set<string>();

  for (const [name, spec] of Object.entries(specs)) {
    const key = spec.key ?? name;
    const path = joinPath(ctx.path, name);
    consumed.add(key);

    if (!Object.hasOwn(raw, key)) {
      if (spec.presence === "always") throw new MissingRequiredFieldError({ entity: ctx.entity, field: path });
      if (spec.presence === "detail-only" && ctx.shape === "detail") {
        ctx.report?.({ type: "missing-detail-field", entity: ctx.entity, path });
      }
      if (spec.rule.empty) values[name] = spec.rule.empty();
      continue;
    }

    const value = raw[key];
    if (value === null || (value === "" && spec.rule.blankIsNull)) {
      values[name] = spec.rule.empty ? spec.rule.empty() : null;
    } else {
      values[name] = spec.rule.coerce(value, { ...ctx, path });
    }
  }

  // fromEntries defines keys, so a raw "__proto__" stays an ordinary entry
  const extras = Object.fromEntries(Object.entries(raw).filter(([key]) => !consumed.has(key)));

  // every declared field went through its rule above
  return { record: Object.freeze(values) as RecordOf<F>, extras };
}

/** Maps one object against a schema, reporting undeclared keys as drift. */
export function mapObject<F extends Fields>(schema: EntitySchema<F>, raw: unknown, ctx: CoerceContext): RecordOf<F> {
  const { record, extras } = readFields(schema, raw, ctx);
  if (ctx.report) {
    for (const [key, value] of Object.entries(extras)) {
      ctx.report({ type: "unknown-key", entity: ctx.entity, path: joinPath(ctx.path, key), value });
    }
  }
  return record;
}

/** Inverse of `readFields`: the wire payload for a mapped record. */
export function writeFields(schema: EntitySchema, record: {}): Record<string, unknown> {
  const values = new Map<string, unknown>(Object.entries(record));
  const specs: Fields = schema.fields;
  const out: Record<string, unknown> = {};

  for (const [name, spec] of Object.entries(specs)) {
    const value = values.get(name);
    if (value === undefined) continue;
    out[spec.key ?? name] = value === null ? null : spec.rule.encode(value);
  }
  return out;
}

/** Rule for an object embedded in another entity, e.g. a lesson-set node. */
export function nested<F extends Fields>(schema: EntitySchema<F>): Rule<RecordOf<F>> {
  return {
    name: schema.kind,
    coerce: (value, ctx) => mapObject(schema, value, ctx),
    encode: (value) => writeFields(schema, value),
  };
}
