export * from "./mapping/index.js";
export * from "./errors.js";
export { type ClientConfig, DEFAULT_HOST, loadConfig } from "./config.js";
export { type ApiSession, apiUrl, authenticate, fetchResource, sessionFromToken, sessionHeaders } from "./session.js";
export { type Endpoint, type ListOptions, type ShowOptions, fetchList, fetchOne } from "./endpoints/request.js";
export * from "./endpoints/activities.endpoint.js";
export * from "./endpoints/children.endpoint.js";
export * from "./endpoints/classrooms.endpoint.js";
export * from "./endpoints/conferenceReports.endpoint.js";
export * from "./endpoints/events.endpoint.js";
export * from "./endpoints/forms.endpoint.js";
export * from "./endpoints/lessonSets.endpoint.js";
export * from "./endpoints/levels.endpoint.js";
export * from "./endpoints/onlineApplications.endpoint.js";
export * from "./endpoints/schools.endpoint.js";
export * from "./endpoints/sessions.endpoint.js";
export * from "./endpoints/users.endpoint.js";
