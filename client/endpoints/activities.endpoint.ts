import { z } from "zod";
import type { ApiSession } from "../session.js";
import { type ListOptions, dayParam, endpoint, fetchList, idParam, paging } from "./request.js";

export const activitiesList = endpoint(
  "Activity",
  "activity",
  z
    .object({
      child_id: idParam.optional(),
      classroom_id: idParam.optional(),
      only_photos: z.boolean().optional(),
      only_portfolio: z.boolean().optional(),
      date_start: dayParam.optional(),
      date_end: dayParam.optional(),
      ...paging,
    })
    .strict()
    .refine((p) => p.child_id !== undefined || p.classroom_id !== undefined, {
      message: "either child_id or classroom_id is required",
    }),
);

export type ActivityParams = z.input<typeof activitiesList.params>;

/** Observations, presentations and photos for one child or one classroom. */
export function listActivities(session: ApiSession, params: ActivityParams, options?: ListOptions) {
  return fetchList(session, activitiesList, params, options);
}
