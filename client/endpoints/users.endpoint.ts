import { z } from "zod";
import type { ApiSession } from "../session.js";
import { type ListOptions, type ShowOptions, endpoint, fetchList, fetchOne, idParam, noParams } from "./request.js";

export const USER_ROLES = ["teacher", "parent", "admin", "billing_manager", "family_member"] as const;

const role = z.enum(USER_ROLES);

export const usersList = endpoint(
  "User",
  "users",
  z
    .object({
      classroom_id: idParam.optional(),
      roles: z.union([z.array(role).nonempty(), role.transform((r) => [r])]).optional(),
    })
    .strict()
    // the API reads the role filter as a repeated `roles[]` key
    .transform(({ roles, ...rest }) => ({ ...rest, "roles[]": roles })),
);

export const userShow = endpoint("User", "users", noParams);

export type UserParams = z.input<typeof usersList.params>;

export function listUsers(session: ApiSession, params: UserParams = {}, options?: ListOptions) {
  return fetchList(session, usersList, params, options);
}

export function getUser(session: ApiSession, userId: number, options?: ShowOptions) {
  return fetchOne(session, userShow, userId, {}, options);
}
