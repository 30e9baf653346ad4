import { z } from "zod";
import type { ApiSession } from "../session.js";
import { type ShowOptions, endpoint, fetchOne } from "./request.js";

export const lessonSetShow = endpoint(
  "LessonSet",
  "lesson_sets",
  z.object({ format: z.enum(["short", "long"]).optional() }).strict(),
);

export type LessonSetParams = z.input<typeof lessonSetShow.params>;

/** A lesson set with its area/group/lesson hierarchy under `children`. */
export function getLessonSet(session: ApiSession, lessonSetId: number, params: LessonSetParams = {}, options?: ShowOptions) {
  return fetchOne(session, lessonSetShow, lessonSetId, params, options);
}
