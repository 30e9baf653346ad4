import { z } from "zod";
import type { ApiSession } from "../session.js";
import { type ListOptions, type ShowOptions, endpoint, fetchList, fetchOne, noParams, timestampParam } from "./request.js";

export const onlineApplicationsList = endpoint(
  "OnlineApplication",
  "online_applications",
  z.object({ created_at: timestampParam.optional() }).strict(),
);

export const onlineApplicationShow = endpoint("OnlineApplication", "online_applications", noParams);

export type OnlineApplicationParams = z.input<typeof onlineApplicationsList.params>;

export function listOnlineApplications(session: ApiSession, params: OnlineApplicationParams = {}, options?: ListOptions) {
  return fetchList(session, onlineApplicationsList, params, options);
}

export function getOnlineApplication(session: ApiSession, applicationId: number, options?: ShowOptions) {
  return fetchOne(session, onlineApplicationShow, applicationId, {}, options);
}
