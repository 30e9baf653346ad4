import { z } from "zod";
import type { CallShape, DiagnosticSink } from "./diagnostics.js";
import { MalformedFieldError } from "./errors.js";
import {
  type CalendarDate,
  type SchoolDateTime,
  formatCalendarDate,
  formatSchoolDateTime,
  parseCalendarDate,
  parseSchoolDateTime,
  startOfDay,
} from "./temporal.js";

export type CoerceContext = {
  /** Entity kind being mapped; nested values keep their parent's kind. */
  readonly entity: string;
  /** Path of the value inside the entity, empty at the root. */
  readonly path: string;
  readonly shape: CallShape;
  readonly timeZone?: string;
  readonly report?: DiagnosticSink;
};

/**
 * Converts one raw JSON value into its semantic type, and back.
 * `coerce` never sees absence or null: the field reader handles both.
 */
export interface Rule<T> {
  readonly name: string;
  coerce(value: unknown, ctx: CoerceContext): T;
  encode(value: T): unknown;
  /** Present on collection rules: what an absent collection field becomes. */
  empty?(): T;
  /** An empty string reads as null rather than as a malformed value. */
  readonly blankIsNull?: boolean;
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Copy of a raw JSON object with every nested array and object frozen. */
export function freezeRecord(value: Record<string, unknown>): Readonly<Record<string, unknown>> {
  return Object.freeze(Object.fromEntries(Object.entries(value).map(([key, v]): [string, unknown] => [key, freezeJson(v)])));
}

export function freezeJson(value: unknown): unknown {
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return Object.freeze(items.map(freezeJson));
  }
  return isJsonObject(value) ? freezeRecord(value) : value;
}

export function joinPath(base: string, key: string): string {
  return base ? `${base}.${key}` : key;
}

export function malformed(ctx: CoerceContext, value: unknown, expected: string): MalformedFieldError {
  return new MalformedFieldError({ entity: ctx.entity, field: ctx.path || undefined, value, expected });
}

function scalar<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Rule<T> {
  return {
    name,
    coerce(value, ctx) {
      const parsed = schema.safeParse(value);
      if (!parsed.success) throw malformed(ctx, value, name);
      return parsed.data;
    },
    encode: (value) => value,
  };
}

const integer = scalar("integer", z.number().int().safe());
const string = scalar("string", z.string());
const boolean = scalar("boolean", z.boolean());

// Object ids are integers; a canonical digit string is the only other form accepted.
const id = scalar(
  "id",
  z.union([
    z.number().int().nonnegative().safe(),
    z.string().regex(/^(0|[1-9]\d*)$/).transform(Number).pipe(z.number().safe()),
  ]),
);

const date: Rule<CalendarDate> = {
  name: "date",
  blankIsNull: true,
  coerce(value, ctx) {
    const parsed = typeof value === "string" ? parseCalendarDate(value) : undefined;
    if (!parsed) throw malformed(ctx, value, "date (YYYY-MM-DD)");
    return parsed;
  },
  encode: formatCalendarDate,
};

const datetime: Rule<SchoolDateTime> = {
  name: "datetime",
  blankIsNull: true,
  coerce(value, ctx) {
    if (typeof value === "string") {
      const parsed = parseSchoolDateTime(value, ctx.timeZone);
      if (parsed) return parsed;
      // some endpoints still send a bare date here
      const day = parseCalendarDate(value);
      if (day) return startOfDay(day, ctx.timeZone);
    }
    throw malformed(ctx, value, "ISO-8601 date-time");
  },
  encode: formatSchoolDateTime,
};

const json: Rule<unknown> = {
  name: "json",
  coerce: (value) => freezeJson(value),
  encode: (value) => value,
};

function list<T>(element: Rule<T>): Rule<readonly T[]> {
  const name = `list<${element.name}>`;
  return {
    name,
    coerce(value, ctx) {
      if (!Array.isArray(value)) throw malformed(ctx, value, name);
      const items: unknown[] = value;
      return Object.freeze(items.map((item, i) => element.coerce(item, { ...ctx, path: `${ctx.path}[${i}]` })));
    },
    encode: (value) => value.map((item) => element.encode(item)),
    empty: () => Object.freeze([]),
  };
}

function dictionary<T>(entry: Rule<T>): Rule<Readonly<Record<string, T>>> {
  const name = `dictionary<${entry.name}>`;
  return {
    name,
    coerce(value, ctx) {
      if (!isJsonObject(value)) throw malformed(ctx, value, name);
      const entries = Object.entries(value).map(([key, v]) => [key, entry.coerce(v, { ...ctx, path: joinPath(ctx.path, key) })] as const);
      return Object.freeze(Object.fromEntries(entries));
    },
    encode: (value) => Object.fromEntries(Object.entries(value).map(([key, v]) => [key, entry.encode(v)])),
  };
}

/** Defers rule lookup, for self-referencing structures. */
function lazy<T>(name: string, resolve: () => Rule<T>): Rule<T> {
  return {
    name,
    coerce: (value, ctx) => resolve().coerce(value, ctx),
    encode: (value) => resolve().encode(value),
  };
}

export const t = {
  id,
  integer,
  string,
  boolean,
  date,
  datetime,
  json,
  list,
  dictionary,
  lazy,
};
