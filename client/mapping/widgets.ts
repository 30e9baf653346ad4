import { type CoerceContext, type Rule, freezeRecord, isJsonObject, joinPath, malformed, t } from "./coerce.js";
import { MissingRequiredFieldError } from "./errors.js";
import { type EntitySchema, type Fields, type RecordOf, type Simplify, defineSchema, field, readFields, writeFields } from "./fields.js";

const common = {
  id: field(t.id, "optional"),
  name: field(t.string, "optional"),
  required: field(t.boolean, "optional"),
};

const input = {
  ...common,
  label: field(t.string, "always"),
  value: field(t.string, "optional"),
  placeholder: field(t.string, "optional"),
};

const variants = {
  text: defineSchema("text", input),
  text_area: defineSchema("text_area", input),
  select: defineSchema("select", {
    ...common,
    label: field(t.string, "always"),
    options: field(t.list(t.string), "optional"),
    value: field(t.string, "optional"),
  }),
  checkboxes: defineSchema("checkboxes", {
    ...common,
    label: field(t.string, "always"),
    options: field(t.list(t.string), "optional"),
    value: field(t.list(t.string), "optional"),
  }),
  date: defineSchema("date", {
    ...common,
    label: field(t.string, "always"),
    value: field(t.date, "optional"),
  }),
  header: defineSchema("header", {
    ...common,
    text: field(t.string, "always"),
  }),
  // one submitted answer, from the `{ name: value }` map forms and applications return
  answer: defineSchema("answer", {
    ...common,
    name: field(t.string, "always"),
    value: field(t.json, "optional"),
  }),
};

type Variants = typeof variants;
export type WidgetType = keyof Variants;

/** Attributes a known widget carried that its variant does not declare. */
export type WidgetExtras = Readonly<Record<string, unknown>>;

type VariantOf<K extends WidgetType> = Simplify<
  { readonly type: K } & RecordOf<Variants[K]["fields"]> & { readonly extra: WidgetExtras }
>;

export type TextWidget = VariantOf<"text">;
export type TextAreaWidget = VariantOf<"text_area">;
export type SelectWidget = VariantOf<"select">;
export type CheckboxesWidget = VariantOf<"checkboxes">;
export type DateWidget = VariantOf<"date">;
export type HeaderWidget = VariantOf<"header">;
export type AnswerWidget = VariantOf<"answer">;

export type KnownWidget =
  | TextWidget
  | TextAreaWidget
  | SelectWidget
  | CheckboxesWidget
  | DateWidget
  | HeaderWidget
  | AnswerWidget;

/** A widget kind this client does not know yet, kept verbatim. */
export type UnknownWidgetVariant = {
  readonly type: "unknown";
  readonly raw: Readonly<Record<string, unknown>>;
};

export type Widget = KnownWidget | UnknownWidgetVariant;

function attributes<F extends Fields>(schema: EntitySchema<F>, raw: Record<string, unknown>, ctx: CoerceContext) {
  const { record, extras } = readFields(schema, raw, ctx);
  const extra = Object.fromEntries(Object.entries(extras).filter(([key]) => key !== "type"));
  return { ...record, extra: freezeRecord(extra) };
}

type Reader = (raw: Record<string, unknown>, ctx: CoerceContext) => KnownWidget;

const readers: { readonly [K in WidgetType]: Reader } = {
  text: (raw, ctx): TextWidget => ({ type: "text", ...attributes(variants.text, raw, ctx) }),
  text_area: (raw, ctx): TextAreaWidget => ({ type: "text_area", ...attributes(variants.text_area, raw, ctx) }),
  select: (raw, ctx): SelectWidget => ({ type: "select", ...attributes(variants.select, raw, ctx) }),
  checkboxes: (raw, ctx): CheckboxesWidget => ({ type: "checkboxes", ...attributes(variants.checkboxes, raw, ctx) }),
  date: (raw, ctx): DateWidget => ({ type: "date", ...attributes(variants.date, raw, ctx) }),
  header: (raw, ctx): HeaderWidget => ({ type: "header", ...attributes(variants.header, raw, ctx) }),
  answer: (raw, ctx): AnswerWidget => ({ type: "answer", ...attributes(variants.answer, raw, ctx) }),
};

function isWidgetType(type: string): type is WidgetType {
  return Object.hasOwn(readers, type);
}

/**
 * Maps one widget payload. Unknown `type` values never fail: they come back as an
 * `UnknownWidgetVariant` so the rest of the parent record still maps.
 */
export function mapWidget(raw: unknown, ctx: CoerceContext): Widget {
  if (!isJsonObject(raw)) throw malformed(ctx, raw, "widget object");
  if (!Object.hasOwn(raw, "type")) {
    throw new MissingRequiredFieldError({ entity: ctx.entity, field: joinPath(ctx.path, "type") });
  }
  const type = raw.type;
  if (typeof type !== "string") {
    throw malformed({ ...ctx, path: joinPath(ctx.path, "type") }, type, "string");
  }
  if (!isWidgetType(type)) {
    const passthrough: UnknownWidgetVariant = { type: "unknown", raw: freezeRecord(raw) };
    return Object.freeze(passthrough);
  }
  return Object.freeze(readers[type](raw, ctx));
}

export function encodeWidget(widget: Widget): Record<string, unknown> {
  if (widget.type === "unknown") return { ...widget.raw };
  const { type, extra, ...values } = widget;
  return { type, ...writeFields(variants[type], values), ...extra };
}

export const widget: Rule<Widget> = {
  name: "widget",
  coerce: mapWidget,
  encode: encodeWidget,
};

const widgetList = t.list(widget);

/**
 * Form and application `fields`: either a widget array, or the `{ name: value }`
 * answer map the live API returns, read as `answer` widgets in key order.
 */
export const answers: Rule<readonly Widget[]> = {
  name: "widgets",
  coerce(value, ctx) {
    const items = isJsonObject(value)
      ? Object.entries(value).map(([name, answer]) => ({ type: "answer", name, value: answer }))
      : value;
    return widgetList.coerce(items, ctx);
  },
  encode: (value) => widgetList.encode(value),
  empty: () => Object.freeze([]),
};

export const widgets = widgetList;
