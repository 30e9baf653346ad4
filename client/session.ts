import type { ClientConfig } from "./config.js";
import { mapAuth } from "./mapping/mapper.js";
import type { Auth } from "./mapping/schemas.js";
import { type GetJsonOptions, type Query, getJson } from "./utils/http.js";

export type HttpSettings = Pick<GetJsonOptions, "retries" | "pauseMs" | "backoffMs">;

/** An authenticated connection. Every endpoint accessor takes one. */
export type ApiSession = {
  readonly host: string;
  readonly token: string;
  readonly schoolId?: number;
  readonly masqueradeId?: number;
  /** Attached to every date-time the mapper produces for this session. */
  readonly timeZone?: string;
  readonly http: HttpSettings;
  readonly auth?: Auth;
};

export function apiUrl(host: string, path: string): string {
  return `${host.replace(/\/+$/, "")}/api/v1/${path}.json`;
}

export function sessionHeaders(session: ApiSession): Record<string, string> {
  const headers: Record<string, string> = { "X-TransparentClassroomToken": session.token };
  if (session.masqueradeId !== undefined) headers["X-TransparentClassroomMasqueradeId"] = String(session.masqueradeId);
  if (session.schoolId !== undefined) headers["X-TransparentClassroomSchoolId"] = String(session.schoolId);
  return headers;
}

function httpSettings(config: ClientConfig): HttpSettings {
  return { retries: config.retries, pauseMs: config.rateMs };
}

/**
 * Exchanges the configured credentials for an API token. Scoping (school, masquerade)
 * and the time zone come from the config; the school falls back to the user's own.
 */
export async function authenticate(config: ClientConfig): Promise<ApiSession> {
  const basic = Buffer.from(`${config.email}:${config.password}`).toString("base64");
  const body = await getJson(apiUrl(config.host, "authenticate"), {
    ...httpSettings(config),
    headers: { Authorization: `Basic ${basic}` },
  });
  const auth = mapAuth(body, { timeZone: config.timeZone });
  if (!auth.api_token) throw new Error("authenticate: response carried an empty api_token");
  return {
    host: config.host,
    token: auth.api_token,
    schoolId: config.schoolId ?? auth.school_id ?? undefined,
    masqueradeId: config.masqueradeId,
    timeZone: config.timeZone,
    http: httpSettings(config),
    auth,
  };
}

/** Session from a token obtained elsewhere; no request is made. */
export function sessionFromToken(config: ClientConfig, token: string): ApiSession {
  return {
    host: config.host,
    token,
    schoolId: config.schoolId,
    masqueradeId: config.masqueradeId,
    timeZone: config.timeZone,
    http: httpSettings(config),
  };
}

export function fetchResource(session: ApiSession, path: string, query?: Query): Promise<unknown> {
  return getJson(apiUrl(session.host, path), { ...session.http, query, headers: sessionHeaders(session) });
}
