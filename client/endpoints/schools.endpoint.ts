import type { ApiSession } from "../session.js";
import { type ListOptions, endpoint, fetchList, noParams } from "./request.js";

export const schoolsList = endpoint("School", "schools", noParams);

/** Schools the signed-in user can reach; more than one for network admins. */
export function listSchools(session: ApiSession, options?: ListOptions) {
  return fetchList(session, schoolsList, {}, options);
}
