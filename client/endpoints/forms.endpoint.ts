import { z } from "zod";
import type { ApiSession } from "../session.js";
import { type ListOptions, type ShowOptions, dayParam, endpoint, fetchList, fetchOne, idParam, noParams } from "./request.js";

export const formsList = endpoint(
  "Form",
  "forms",
  z
    .object({
      form_template_id: idParam.optional(),
      child_id: idParam.optional(),
      created_before: dayParam.optional(),
      created_after: dayParam.optional(),
    })
    .strict(),
);

export const formShow = endpoint("Form", "forms", noParams);

export const formTemplatesList = endpoint("FormTemplate", "form_templates", noParams);

export type FormParams = z.input<typeof formsList.params>;

/** Submitted form responses. */
export function listForms(session: ApiSession, params: FormParams = {}, options?: ListOptions) {
  return fetchList(session, formsList, params, options);
}

export function getForm(session: ApiSession, formId: number, options?: ShowOptions) {
  return fetchOne(session, formShow, formId, {}, options);
}

export function listFormTemplates(session: ApiSession, options?: ListOptions) {
  return fetchList(session, formTemplatesList, {}, options);
}
