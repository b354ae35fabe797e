import type { Account, FetchFn, Status } from "../src/index.js";

export function makeAccount(overrides: Partial<Account> = {}): Account {
	return {
		id: "100",
		username: "alice",
		acct: "alice",
		display_name: "Alice",
		...overrides,
	};
}

/** A plain status with no interactions, replying to nothing */
export function makeStatus(id: string, overrides: Partial<Status> = {}): Status {
	return {
		id,
		in_reply_to_id: null,
		uri: `https://social.example/users/alice/statuses/${id}`,
		created_at: "2024-10-05T15:04:05.000Z",
		account: makeAccount(),
		content: `<p>Post ${id}</p>`,
		spoiler_text: "",
		media_attachments: [],
		replies_count: 0,
		reblogs_count: 0,
		favourites_count: 0,
		favourited: false,
		reblogged: false,
		bookmarked: false,
		reblog: null,
		...overrides,
	};
}

export interface RecordedRequest {
	method: string;
	url: string;
	headers: Record<string, string>;
	body?: unknown;
}

export interface FakeReply {
	status?: number;
	statusText?: string;
	body: unknown;
}

/**
 * In-process stand-in for the server. Routes are matched on "METHOD /path" without the query.
 * Unrouted requests answer 404.
 */
export function fakeServer(routes: Record<string, FakeReply | (() => FakeReply)>): {
	fetch: FetchFn;
	requests: RecordedRequest[];
} {
	const requests: RecordedRequest[] = [];
	const fetch: FetchFn = async (input, init) => {
		const url = input instanceof Request ? input.url : input.toString();
		const method = init?.method ?? "GET";
		const headers: Record<string, string> = {};
		new Headers(init?.headers).forEach((value, key) => {
			headers[key] = value;
		});
		const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
		requests.push({ method, url, headers, body });

		const route = routes[`${method} ${new URL(url).pathname}`];
		if (!route) {
			return new Response("not found", { status: 404, statusText: "Not Found" });
		}
		const reply = typeof route === "function" ? route() : route;
		const text = typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body);
		return new Response(text, { status: reply.status ?? 200, statusText: reply.statusText });
	};
	return { fetch, requests };
}
