import { z } from "zod";
import type { ApiSession } from "../session.js";
import { type ListOptions, dayParam, endpoint, fetchList, idParam, paging } from "./request.js";

export const conferenceReportsList = endpoint(
  "ConferenceReport",
  "conference_reports",
  z
    .object({
      child_id: idParam.optional(),
      created_after: dayParam.optional(),
      created_before: dayParam.optional(),
      ...paging,
    })
    .strict(),
);

export type ConferenceReportParams = z.input<typeof conferenceReportsList.params>;

export function listConferenceReports(session: ApiSession, params: ConferenceReportParams = {}, options?: ListOptions) {
  return fetchList(session, conferenceReportsList, params, options);
}
