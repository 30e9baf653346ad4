import { z } from "zod";
import type { ApiSession } from "../session.js";
import { type ListOptions, dayParam, endpoint, fetchList, idParam, paging } from "./request.js";

export const eventsList = endpoint(
  "Event",
  "events",
  z
    .object({
      child_id: idParam,
      date_start: dayParam,
      date_end: dayParam,
      ...paging,
    })
    .strict(),
);

export type EventParams = z.input<typeof eventsList.params>;

/** Sign-in/sign-out and other timeline events of one child over a date range. */
export function listEvents(session: ApiSession, params: EventParams, options?: ListOptions) {
  return fetchList(session, eventsList, params, options);
}
