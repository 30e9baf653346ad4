import type { ApiSession } from "../session.js";
import { type ListOptions, endpoint, fetchList, noParams } from "./request.js";

export const sessionsList = endpoint("Session", "sessions", noParams);

/** Enrollment sessions (terms) of the current school. */
export function listSessions(session: ApiSession, options?: ListOptions) {
  return fetchList(session, sessionsList, {}, options);
}
