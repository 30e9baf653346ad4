import "dotenv/config";
import type { z } from "zod";
import { loadConfig } from "./config.js";
import { activitiesList } from "./endpoints/activities.endpoint.js";
import { childShow, childrenList } from "./endpoints/children.endpoint.js";
import { classroomsList } from "./endpoints/classrooms.endpoint.js";
import { conferenceReportsList } from "./endpoints/conferenceReports.endpoint.js";
import { eventsList } from "./endpoints/events.endpoint.js";
import { formShow, formTemplatesList, formsList } from "./endpoints/forms.endpoint.js";
import { lessonSetShow } from "./endpoints/lessonSets.endpoint.js";
import { levelsByDate, levelsList } from "./endpoints/levels.endpoint.js";
import { onlineApplicationShow, onlineApplicationsList } from "./endpoints/onlineApplications.endpoint.js";
import { type Endpoint, fetchList, fetchOne } from "./endpoints/request.js";
import { schoolsList } from "./endpoints/schools.endpoint.js";
import { sessionsList } from "./endpoints/sessions.endpoint.js";
import { userShow, usersList } from "./endpoints/users.endpoint.js";
import { consoleDiagnostics } from "./mapping/diagnostics.js";
import { failures, successes } from "./mapping/mapper.js";
import type { EntityKind } from "./mapping/schemas.js";
import { toPayload } from "./mapping/serialize.js";
import { type ApiSession, authenticate } from "./session.js";
import { type Invocation, parseInvocation } from "./utils/cli.js";
import { emitNDJSON } from "./utils/emitter.js";

type Rows = Record<string, unknown>[];

type Resource = {
  list?: (session: ApiSession, params: unknown) => Promise<Rows>;
  show?: (session: ApiSession, id: number, params: unknown) => Promise<Rows>;
};

function listing<K extends EntityKind, S extends z.ZodTypeAny>(ep: Endpoint<K, S>) {
  return async (session: ApiSession, params: unknown): Promise<Rows> => {
    const outcomes = await fetchList(session, ep, params, { onDiagnostic: consoleDiagnostics });
    for (const { index, error } of failures(outcomes)) {
      console.error(`[skip] ${ep.path}[${index}] ${error.message}`);
    }
    return successes(outcomes).map((record) => toPayload(ep.kind, record));
  };
}

function single<K extends EntityKind, S extends z.ZodTypeAny>(ep: Endpoint<K, S>) {
  return async (session: ApiSession, id: number, params: unknown): Promise<Rows> => {
    const record = await fetchOne(session, ep, id, params, { onDiagnostic: consoleDiagnostics });
    return [toPayload(ep.kind, record)];
  };
}

const resources: Record<string, Resource> = {
  activity: { list: listing(activitiesList) },
  children: { list: listing(childrenList), show: single(childShow) },
  classrooms: { list: listing(classroomsList) },
  conference_reports: { list: listing(conferenceReportsList) },
  events: { list: listing(eventsList) },
  forms: { list: listing(formsList), show: single(formShow) },
  form_templates: { list: listing(formTemplatesList) },
  lesson_sets: { show: single(lessonSetShow) },
  levels: { list: listing(levelsList) },
  "levels/by_date": { list: listing(levelsByDate) },
  online_applications: { list: listing(onlineApplicationsList), show: single(onlineApplicationShow) },
  schools: { list: listing(schoolsList) },
  sessions: { list: listing(sessionsList) },
  users: { list: listing(usersList), show: single(userShow) },
};

function usage(message?: string): never {
  if (message) console.error(message);
  console.error(`Usage: npm run fetch -- <${Object.keys(resources).join("|")}> [id] [key=value...]`);
  process.exit(1);
}

async function main() {
  let invocation: Invocation | undefined;
  try {
    invocation = parseInvocation(process.argv.slice(2));
  } catch (err) {
    usage(err instanceof Error ? err.message : String(err));
  }
  if (!invocation) usage();

  const { resource, id, params } = invocation;
  const target = resources[resource];
  if (!target) usage(`unknown resource: ${resource}`);

  const config = loadConfig();
  const session = await authenticate(config);

  let rows: Rows;
  if (id !== undefined) {
    if (!target.show) usage(`${resource} has no single-object endpoint`);
    rows = await target.show(session, id, params);
  } else {
    if (!target.list) usage(`${resource} needs an id`);
    rows = await target.list(session, params);
  }

  const path = emitNDJSON(config.outdir, resource, rows);
  console.log(`${resource}: wrote ${rows.length} records to ${path}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
