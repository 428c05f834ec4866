export { TaskStore, type TaskStoreOptions } from './store/taskStore.js';
export { compareByDue, compareSubtasks, inDueRange, matchesListFilter, matchesText } from './store/filters.js';
export { SimulatedEventIdIssuer, type EventIdIssuer, type EventRequest } from './providers/calendar.js';
export { MockEventIdIssuer } from './providers/mock.js';
export * from './model.js';
export * from './schemas.js';
export { TaskApiError, type ErrorBody, type ErrorKind, type ValidationIssue } from './errors.js';
export { REFERENCE_TIME_ZONE, calendarDay, isValidTimeZone } from './time.js';
export { API_PREFIX, dispatch, type ApiRequest, type ApiResponse } from './server/router.js';
export { createTaskServer, startServer, type RunningServer, type TaskServerOptions } from './server/server.js';
export { TaskApiClient, type TaskApiClientOptions } from './client.js';
export { HttpError, requestJson } from './http.js';
export { createLogger, type Logger, type LogLevel } from './log.js';
export { readEnv, serverConfig, type EnvConfig, type ServerConfig } from './config.js';
