import { z } from "zod";
import { ParameterError } from "../errors.js";
import { type MapManyOptions, type MapOptions, type MapOutcome, mapEntity, mapMany } from "../mapping/mapper.js";
import type { EntityKind, EntityRecord } from "../mapping/schemas.js";
import { parseCalendarDate, parseSchoolDateTime } from "../mapping/temporal.js";
import { type ApiSession, fetchResource } from "../session.js";
import type { Query } from "../utils/http.js";

export const idParam = z.number().int().positive();
export const dayParam = z.string().refine((s) => parseCalendarDate(s) !== undefined, "expected YYYY-MM-DD");
export const timestampParam = z
  .string()
  .refine((s) => parseSchoolDateTime(s) !== undefined || parseCalendarDate(s) !== undefined, "expected an ISO-8601 date-time");

export const paging = {
  page: z.number().int().positive().optional(),
  per_page: z.number().int().positive().optional(),
};

export const noParams = z.object({}).strict();

/** Mapper options a caller may set; the time zone always comes from the session. */
export type ListOptions = Pick<MapManyOptions, "policy" | "onDiagnostic">;
export type ShowOptions = Pick<MapOptions, "onDiagnostic">;

export type Endpoint<K extends EntityKind, S extends z.ZodTypeAny> = {
  readonly kind: K;
  /** Path under `api/v1`, e.g. `levels/by_date`. Single-object calls append the id. */
  readonly path: string;
  readonly params: S;
};

export function endpoint<K extends EntityKind, S extends z.ZodTypeAny>(kind: K, path: string, params: S): Endpoint<K, S> {
  return { kind, path, params };
}

export function parseParams<S extends z.ZodTypeAny>(resource: string, schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw new ParameterError(resource, parsed.error.issues);
  return parsed.data;
}

export function toQuery(params: unknown): Query {
  const query: Query = {};
  if (typeof params !== "object" || params === null) return query;
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) continue;
    query[key] = Array.isArray(value) ? value.map(String) : String(value);
  }
  return query;
}

export async function fetchList<K extends EntityKind, S extends z.ZodTypeAny>(
  session: ApiSession,
  endpoint: Endpoint<K, S>,
  input: unknown,
  options: ListOptions = {},
): Promise<MapOutcome<EntityRecord<K>>[]> {
  const params: unknown = parseParams(endpoint.path, endpoint.params, input);
  const body = await fetchResource(session, endpoint.path, toQuery(params));
  return mapMany(endpoint.kind, body, { ...options, timeZone: session.timeZone });
}

export async function fetchOne<K extends EntityKind, S extends z.ZodTypeAny>(
  session: ApiSession,
  endpoint: Endpoint<K, S>,
  id: unknown,
  input: unknown,
  options: ShowOptions = {},
): Promise<EntityRecord<K>> {
  const objectId = parseParams(endpoint.path, idParam, id);
  const params: unknown = parseParams(endpoint.path, endpoint.params, input);
  const path = `${endpoint.path}/${objectId}`;
  const body = await fetchResource(session, path, toQuery(params));
  return mapEntity(endpoint.kind, body, { ...options, timeZone: session.timeZone });
}
