import { z } from "zod";
import type { ApiSession } from "../session.js";
import { type ListOptions, endpoint, fetchList } from "./request.js";

export const classroomsList = endpoint(
  "Classroom",
  "classrooms",
  z.object({ show_inactive: z.boolean().optional() }).strict(),
);

export type ClassroomParams = z.input<typeof classroomsList.params>;

export function listClassrooms(session: ApiSession, params: ClassroomParams = {}, options?: ListOptions) {
  return fetchList(session, classroomsList, params, options);
}
