import { z } from "zod";
import type { ApiSession } from "../session.js";
import { type ListOptions, type ShowOptions, dayParam, endpoint, fetchList, fetchOne, idParam } from "./request.js";

export const childrenList = endpoint(
  "Child",
  "children",
  z
    .object({
      // required for teachers, optional for admins
      classroom_id: idParam.optional(),
      session_id: idParam.optional(),
      only_current: z.boolean().optional(),
    })
    .strict(),
);

export const childShow = endpoint("Child", "children", z.object({ as_of: dayParam.optional() }).strict());

export type ChildrenParams = z.input<typeof childrenList.params>;
export type ChildParams = z.input<typeof childShow.params>;

/** The roster. List calls leave out detail-only fields such as `birth_date`. */
export function listChildren(session: ApiSession, params: ChildrenParams = {}, options?: ListOptions) {
  return fetchList(session, childrenList, params, options);
}

/** One child, with field values as of `as_of` when given. */
export function getChild(session: ApiSession, childId: number, params: ChildParams = {}, options?: ShowOptions) {
  return fetchOne(session, childShow, childId, params, options);
}
