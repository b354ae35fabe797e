export {
	type ContentSource,
	type CreatePostOptions,
	type FetchTimelineOptions,
	MastodonClient,
	type MastodonClientOptions,
	normalizeServer,
	type Timeline,
	type Visibility,
} from "./client.js";
export { CredentialStore } from "./credentials.js";
export { ApiError, BadLoginError, InvalidClientError } from "./errors.js";
export { expectShape, type FetchFn, fetchJson } from "./http.js";
export {
	type Account,
	AccountSchema,
	type AppCredentials,
	type Context,
	ContextSchema,
	type MediaAttachment,
	type Preferences,
	PreferencesSchema,
	type Status,
	type StatusCore,
	StatusSchema,
	validators,
} from "./schemas.js";
export { buildThread, flattenThread, type Thread, type ThreadEntry, type ThreadInfo, type ThreadNode } from "./thread.js";
