import fetch, { Response } from "node-fetch";
import { afterEach, describe, expect, it, vi } from "vitest";
import { listActivities } from "../endpoints/activities.endpoint.js";
import { getChild, listChildren } from "../endpoints/children.endpoint.js";
import { classroomsList, listClassrooms } from "../endpoints/classrooms.endpoint.js";
import { listEvents } from "../endpoints/events.endpoint.js";
import { getForm, listFormTemplates } from "../endpoints/forms.endpoint.js";
import { getLessonSet } from "../endpoints/lessonSets.endpoint.js";
import { listLevelsByDate } from "../endpoints/levels.endpoint.js";
import { listOnlineApplications } from "../endpoints/onlineApplications.endpoint.js";
import { fetchList, toQuery } from "../endpoints/request.js";
import { listUsers } from "../endpoints/users.endpoint.js";
import { ParameterError } from "../errors.js";
import { collectDiagnostics } from "../mapping/diagnostics.js";
import { MissingRequiredFieldError } from "../mapping/errors.js";
import { failures, successes } from "../mapping/mapper.js";
import type { ApiSession } from "../session.js";

vi.mock("node-fetch", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node-fetch")>();
  return { ...actual, default: vi.fn() };
});

const fetchMock = vi.mocked(fetch);

const session: ApiSession = {
  host: "https://api.test",
  token: "test-token",
  timeZone: "America/Chicago",
  http: { retries: 0, pauseMs: 0 },
};

function respond(body: unknown) {
  fetchMock.mockResolvedValueOnce(new Response(JSON.stringify(body)));
}

function requestedUrl(call = 0): string {
  const url = fetchMock.mock.calls[call]?.[0];
  return typeof url === "string" ? url : "";
}

afterEach(() => {
  fetchMock.mockReset();
});

describe("toQuery", () => {
  it("stringifies scalars and lists and drops empty values", () => {
    expect(toQuery({ child_id: 11, only_current: false, "roles[]": ["teacher"], page: undefined, as_of: null })).toEqual({
      child_id: "11",
      only_current: "false",
      "roles[]": ["teacher"],
    });
  });
});

describe("list endpoints", () => {
  it("map the roster in list shape", async () => {
    respond([
      { id: 11, first_name: "Ada", last_name: "Byron" },
      { id: 12, first_name: "Alan", last_name: "Mathison" },
    ]);
    const { sink, diagnostics } = collectDiagnostics();
    const outcomes = await listChildren(session, { classroom_id: 3, only_current: true }, { onDiagnostic: sink });

    expect(requestedUrl()).toBe("https://api.test/api/v1/children.json?classroom_id=3&only_current=true");
    expect(successes(outcomes).map((c) => c.first_name)).toEqual(["Ada", "Alan"]);
    expect(diagnostics).toEqual([]);
  });

  it("report bad elements by index and keep the rest", async () => {
    respond([{ id: 3, name: "Oak" }, { id: 4 }]);
    const outcomes = await listClassrooms(session);
    expect(successes(outcomes)).toEqual([{ id: 3, name: "Oak" }]);
    expect(failures(outcomes).map((f) => [f.index, f.error instanceof MissingRequiredFieldError])).toEqual([[1, true]]);
  });

  it("throw on the first bad element under fail-fast", async () => {
    respond([{ id: 3, name: "Oak" }, { id: 4 }]);
    await expect(listClassrooms(session, {}, { policy: "fail-fast" })).rejects.toThrow(
      "Classroom.name is required but missing",
    );
  });

  it("attach the session's time zone", async () => {
    respond([{ id: 51, event_type: "sign_in", time: "2024-03-04 08:02:11" }]);
    const [event] = successes(
      await listEvents(session, { child_id: 11, date_start: "2024-03-01", date_end: "2024-03-31" }),
    );
    expect(requestedUrl()).toBe(
      "https://api.test/api/v1/events.json?child_id=11&date_start=2024-03-01&date_end=2024-03-31",
    );
    expect(event?.time?.timeZone).toBe("America/Chicago");
  });

  it("send the role filter as repeated roles[] keys", async () => {
    respond([]);
    await listUsers(session, { classroom_id: 3, roles: ["teacher", "admin"] });
    expect(requestedUrl()).toBe(
      "https://api.test/api/v1/users.json?classroom_id=3&roles%5B%5D=teacher&roles%5B%5D=admin",
    );
  });

  it("accept a single role", async () => {
    respond([]);
    await listUsers(session, { roles: "parent" });
    expect(requestedUrl()).toBe("https://api.test/api/v1/users.json?roles%5B%5D=parent");
  });

  it("reach nested paths", async () => {
    respond([{ id: 71, child_id: 11, lesson_id: 501, proficiency: 3 }]);
    const outcomes = await listLevelsByDate(session, { child_id: 11, date_start: "2024-01-01", date_end: "2024-06-30" });
    expect(requestedUrl()).toBe(
      "https://api.test/api/v1/levels/by_date.json?child_id=11&date_start=2024-01-01&date_end=2024-06-30",
    );
    expect(successes(outcomes)[0]?.proficiency).toBe(3);
  });

  it("list form templates with their widgets", async () => {
    respond([{ id: 9, name: "Enrollment", widgets: [{ type: "header", text: "Family" }] }]);
    const [template] = successes(await listFormTemplates(session));
    expect(template?.widgets).toEqual([{ type: "header", text: "Family", extra: {} }]);
  });
});

describe("single-object endpoints", () => {
  it("map detail payloads", async () => {
    respond({ id: 11, first_name: "Ada", last_name: "Byron", birth_date: "2019-04-01" });
    const child = await getChild(session, 11, { as_of: "2024-01-01" });
    expect(requestedUrl()).toBe("https://api.test/api/v1/children/11.json?as_of=2024-01-01");
    expect(child.birth_date).toEqual({ year: 2019, month: 4, day: 1 });
  });

  it("map form answer maps", async () => {
    respond({ id: 61, form_template_id: 9, fields: { allergies: "none" } });
    const form = await getForm(session, 61);
    expect(requestedUrl()).toBe("https://api.test/api/v1/forms/61.json");
    expect(form.fields).toEqual([{ type: "answer", name: "allergies", value: "none", extra: {} }]);
  });

  it("pass the lesson-set format", async () => {
    respond({ id: 5, name: "Primary", children: [] });
    await getLessonSet(session, 5, { format: "long" });
    expect(requestedUrl()).toBe("https://api.test/api/v1/lesson_sets/5.json?format=long");
  });
});

describe("parameter validation", () => {
  it("needs a child or a classroom for activities", async () => {
    await expect(listActivities(session, {})).rejects.toThrow("activity: either child_id or classroom_id is required");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("needs the full date range for events", async () => {
    const error = await listEvents(session, { child_id: 11, date_start: "2024-03-01", date_end: "March 31" }).catch(
      (e: unknown) => e,
    );
    expect(error).toBeInstanceOf(ParameterError);
    if (error instanceof ParameterError) expect(error.issues.map((i) => i.path.join("."))).toEqual(["date_end"]);
  });

  it("rejects ids that are not positive integers", async () => {
    await expect(getChild(session, -1)).rejects.toBeInstanceOf(ParameterError);
    await expect(getChild(session, 1.5)).rejects.toBeInstanceOf(ParameterError);
  });

  it("rejects unknown parameters", async () => {
    await expect(fetchList(session, classroomsList, { show_inactive: true, colour: "red" })).rejects.toBeInstanceOf(
      ParameterError,
    );
  });

  it("rejects mistyped values", async () => {
    await expect(fetchList(session, classroomsList, { show_inactive: "yes" })).rejects.toBeInstanceOf(ParameterError);
    await expect(listOnlineApplications(session, { created_at: "last week" })).rejects.toThrow(
      "online_applications: created_at: expected an ISO-8601 date-time",
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects paging values below one", async () => {
    await expect(listActivities(session, { child_id: 11, page: 0 })).rejects.toBeInstanceOf(ParameterError);
  });
});
