import { z } from "zod";
import type { ApiSession } from "../session.js";
import { type ListOptions, dayParam, endpoint, fetchList, idParam, paging } from "./request.js";

export const levelsList = endpoint(
  "Level",
  "levels",
  z
    .object({
      child_id: idParam,
      lesson_set_id: idParam.optional(),
      ...paging,
    })
    .strict(),
);

export const levelsByDate = endpoint(
  "Level",
  "levels/by_date",
  z
    .object({
      child_id: idParam,
      date_start: dayParam,
      date_end: dayParam,
      ...paging,
    })
    .strict(),
);

export type LevelParams = z.input<typeof levelsList.params>;
export type LevelsByDateParams = z.input<typeof levelsByDate.params>;

/** A child's current proficiency on every lesson. */
export function listLevels(session: ApiSession, params: LevelParams, options?: ListOptions) {
  return fetchList(session, levelsList, params, options);
}

/** Proficiency changes recorded within a date range. */
export function listLevelsByDate(session: ApiSession, params: LevelsByDateParams, options?: ListOptions) {
  return fetchList(session, levelsByDate, params, options);
}
