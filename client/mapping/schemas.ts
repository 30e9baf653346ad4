import { type Rule, t } from "./coerce.js";
import { type EntitySchema, type RecordOf, defineSchema, field, nested } from "./fields.js";
import { answers, widgets } from "./widgets.js";

// Field tables follow the published API. List endpoints send a reduced projection,
// which is what `detail-only` records.

export const activitySchema = defineSchema("Activity", {
  id: field(t.id, "always"),
  author_id: field(t.id, "optional"),
  classroom_id: field(t.id, "optional"),
  child_ids: field(t.list(t.id), "optional"),
  text: field(t.string, "optional"),
  html: field(t.string, "optional"),
  date: field(t.date, "optional"),
  created_at: field(t.datetime, "always"),
});

export const childSchema = defineSchema("Child", {
  id: field(t.id, "always"),
  first_name: field(t.string, "always"),
  last_name: field(t.string, "always"),
  birth_date: field(t.date, "detail-only"),
  gender: field(t.string, "detail-only"),
  profile_photo: field(t.string, "optional"),
  program: field(t.string, "detail-only"),
  ethnicity: field(t.list(t.string), "detail-only"),
  household_income: field(t.string, "detail-only"),
  dominant_language: field(t.string, "detail-only"),
  grade: field(t.string, "optional"),
  // the school's own student number, free-form
  student_id: field(t.string, "optional"),
  hours_string: field(t.string, "detail-only"),
  allergies: field(t.string, "detail-only"),
  notes: field(t.string, "detail-only"),
  approved_adults_string: field(t.string, "detail-only"),
  emergency_contacts_string: field(t.string, "detail-only"),
  first_day: field(t.date, "optional"),
  last_day: field(t.date, "optional"),
  exit_notes: field(t.string, "optional"),
  exit_reason: field(t.string, "optional"),
  exit_survey_id: field(t.id, "optional"),
  parent_ids: field(t.list(t.id), "detail-only"),
  classroom_ids: field(t.list(t.id), "detail-only"),
});

export const classroomSchema = defineSchema("Classroom", {
  id: field(t.id, "always"),
  name: field(t.string, "always"),
  lesson_set_id: field(t.id, "optional"),
  level: field(t.string, "optional"),
  active: field(t.boolean, "optional"),
});

export const conferenceReportSchema = defineSchema("ConferenceReport", {
  id: field(t.id, "always"),
  name: field(t.string, "always"),
  child_id: field(t.id, "optional"),
  widgets: field(widgets, "detail-only", "data"),
});

export const eventSchema = defineSchema("Event", {
  id: field(t.id, "always"),
  classroom_id: field(t.id, "optional"),
  child_id: field(t.id, "optional"),
  event_type: field(t.string, "always"),
  value: field(t.string, "optional"),
  value2: field(t.string, "optional"),
  created_by_id: field(t.id, "optional"),
  created_by_name: field(t.string, "optional"),
  time: field(t.datetime, "always"),
});

export const formSchema = defineSchema("Form", {
  id: field(t.id, "always"),
  form_template_id: field(t.id, "always"),
  state: field(t.string, "optional"),
  child_id: field(t.id, "optional"),
  student_first_name: field(t.string, "optional"),
  student_last_name: field(t.string, "optional"),
  parent_name: field(t.string, "optional"),
  classroom: field(t.string, "optional"),
  release: field(t.string, "optional"),
  signature: field(t.string, "optional"),
  created_at: field(t.datetime, "optional"),
  fields: field(answers, "detail-only"),
});

export const formTemplateSchema = defineSchema("FormTemplate", {
  id: field(t.id, "always"),
  name: field(t.string, "always"),
  widgets: field(widgets, "detail-only"),
});

/** One node of a lesson set: an area, a group, or a lesson. */
export type LessonNode = {
  readonly id?: number | null;
  readonly name?: string | null;
  readonly type?: string | null;
  readonly archetype_id?: number | null;
  readonly description?: string | null;
  readonly profile_photo?: string | null;
  readonly material_name?: string | null;
  readonly children: readonly LessonNode[];
  /** Lessons filed directly under a group. */
  readonly lessons: readonly LessonNode[];
};

const lessonNodeRef: Rule<LessonNode> = t.lazy("LessonNode", () => lessonNode);

export const lessonNodeSchema = defineSchema("LessonNode", {
  id: field(t.id, "always"),
  name: field(t.string, "always"),
  type: field(t.string, "optional"),
  archetype_id: field(t.id, "optional"),
  description: field(t.string, "optional"),
  profile_photo: field(t.string, "optional"),
  material_name: field(t.string, "optional"),
  children: field(t.list(lessonNodeRef), "optional"),
  lessons: field(t.list(lessonNodeRef), "optional"),
});

const lessonNode: Rule<LessonNode> = nested(lessonNodeSchema);

export const lessonSetSchema = defineSchema("LessonSet", {
  id: field(t.id, "always"),
  name: field(t.string, "always"),
  // proficiency scale name -> its ordered levels
  scales: field(t.dictionary(t.list(t.string)), "optional"),
  children: field(t.list(lessonNode), "detail-only"),
});

export const levelSchema = defineSchema("Level", {
  id: field(t.id, "always"),
  child_id: field(t.id, "always"),
  lesson_id: field(t.id, "always"),
  proficiency: field(t.integer, "optional"),
  date: field(t.date, "optional"),
  planned: field(t.boolean, "optional"),
});

export const onlineApplicationSchema = defineSchema("OnlineApplication", {
  id: field(t.id, "always"),
  school_id: field(t.id, "optional"),
  session_id: field(t.id, "optional"),
  state: field(t.string, "optional"),
  program: field(t.string, "optional"),
  child_first_name: field(t.string, "optional"),
  child_last_name: field(t.string, "optional"),
  child_birth_date: field(t.date, "optional"),
  child_gender: field(t.string, "optional"),
  mother_email: field(t.string, "optional"),
  created_at: field(t.datetime, "optional"),
  fields: field(answers, "detail-only"),
});

export const schoolSchema = defineSchema("School", {
  id: field(t.id, "always"),
  name: field(t.string, "always"),
  phone: field(t.string, "optional"),
  address: field(t.string, "optional"),
  type: field(t.string, "optional"),
  timezone: field(t.string, "optional"),
});

export const sessionSchema = defineSchema("Session", {
  id: field(t.id, "always"),
  name: field(t.string, "always"),
  start_date: field(t.date, "optional"),
  stop_date: field(t.date, "optional"),
  children: field(t.integer, "optional"),
  current: field(t.boolean, "optional"),
  inactive: field(t.boolean, "optional"),
});

export const userSchema = defineSchema("User", {
  id: field(t.id, "always"),
  first_name: field(t.string, "always"),
  last_name: field(t.string, "always"),
  type: field(t.string, "optional"),
  inactive: field(t.boolean, "optional"),
  email: field(t.string, "detail-only"),
  roles: field(t.list(t.string), "detail-only"),
  accessible_classroom_ids: field(t.list(t.id), "detail-only"),
  default_classroom_id: field(t.id, "optional"),
  address: field(t.string, "detail-only"),
  home_number: field(t.string, "detail-only"),
  mobile_number: field(t.string, "detail-only"),
  work_number: field(t.string, "detail-only"),
});

/** Token half of the authentication response; the remaining keys are the signed-in user. */
export const authSchema = defineSchema("Auth", {
  api_token: field(t.string, "always"),
  school_id: field(t.id, "optional"),
  push_tokens: field(t.list(t.string), "optional"),
  push_enabled: field(t.boolean, "optional"),
});

const registry = {
  Activity: activitySchema,
  Child: childSchema,
  Classroom: classroomSchema,
  ConferenceReport: conferenceReportSchema,
  Event: eventSchema,
  Form: formSchema,
  FormTemplate: formTemplateSchema,
  LessonSet: lessonSetSchema,
  Level: levelSchema,
  OnlineApplication: onlineApplicationSchema,
  School: schoolSchema,
  Session: sessionSchema,
  User: userSchema,
};

type Registry = typeof registry;
export type EntityKind = keyof Registry;
export type EntityFields<K extends EntityKind> = Registry[K]["fields"];
export type EntityRecord<K extends EntityKind> = RecordOf<EntityFields<K>>;

export const entitySchemas: { readonly [K in EntityKind]: EntitySchema<EntityFields<K>> } = registry;
export const entityKinds = Object.freeze(Object.keys(registry).filter(isEntityKind));

export function isEntityKind(name: string): name is EntityKind {
  return Object.hasOwn(registry, name);
}

export type Activity = EntityRecord<"Activity">;
export type Child = EntityRecord<"Child">;
export type Classroom = EntityRecord<"Classroom">;
export type ConferenceReport = EntityRecord<"ConferenceReport">;
export type Event = EntityRecord<"Event">;
export type Form = EntityRecord<"Form">;
export type FormTemplate = EntityRecord<"FormTemplate">;
export type LessonSet = EntityRecord<"LessonSet">;
export type Level = EntityRecord<"Level">;
export type OnlineApplication = EntityRecord<"OnlineApplication">;
export type School = EntityRecord<"School">;
export type Session = EntityRecord<"Session">;
export type User = EntityRecord<"User">;
export type Auth = RecordOf<typeof authSchema.fields> & { readonly user: User };
