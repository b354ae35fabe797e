import {
	type Account,
	buildThread,
	type ContentSource,
	type CreatePostOptions,
	type FetchTimelineOptions,
	type Preferences,
	type Status,
	type Thread,
	type Timeline,
	type Visibility,
} from "@slowterm/client";
import { makeAccount, makeStatus } from "../../client/test/fixtures.js";

type Method = "login" | "fetchTimeline" | "fetchPostAndRelated" | "createPost" | "favourite";

/**
 * Scripted content source. Every call is logged in `calls`; a method listed in
 * `failures` throws the given error instead of answering.
 */
export class FakeSource implements ContentSource {
	readonly server = "https://social.example";
	readonly calls: string[] = [];
	readonly failures = new Map<Method, Error>();
	preferences: Preferences = {};
	/** First page of every timeline */
	firstPage: Status[] = [makeStatus("1"), makeStatus("2")];
	/** Older pages keyed by the id of the oldest post shown */
	olderPages = new Map<string, Status[]>();
	private readonly statuses = new Map<string, Status>();

	private fail(method: Method): void {
		const error = this.failures.get(method);
		if (error) throw error;
	}

	private find(id: string): Status {
		return this.statuses.get(id) ?? this.firstPage.find((status) => status.id === id) ?? makeStatus(id);
	}

	private update(id: string, changes: Partial<Status>): Status {
		const updated = { ...this.find(id), ...changes };
		this.statuses.set(id, updated);
		return updated;
	}

	async login(username: string, password: string): Promise<void> {
		this.calls.push(`login ${username} ${password}`);
		this.fail("login");
	}

	logout(): void {
		this.calls.push("logout");
	}

	async getAccountInfo(): Promise<Account> {
		this.calls.push("getAccountInfo");
		return makeAccount();
	}

	async getPreferences(): Promise<Preferences> {
		this.calls.push("getPreferences");
		return this.preferences;
	}

	async fetchTimeline(timeline: Timeline, options: FetchTimelineOptions = {}): Promise<Status[]> {
		const since = options.since ? ` since ${options.since.id}` : "";
		this.calls.push(`fetchTimeline ${timeline} ${options.limit}${since}`);
		this.fail("fetchTimeline");
		if (options.since) {
			return this.olderPages.get(options.since.id) ?? [];
		}
		return this.firstPage;
	}

	async fetchPost(id: string): Promise<Status> {
		this.calls.push(`fetchPost ${id}`);
		return this.find(id);
	}

	async fetchPostAndRelated(id: string): Promise<Thread> {
		this.calls.push(`fetchPostAndRelated ${id}`);
		this.fail("fetchPostAndRelated");
		return buildThread(this.find(id), {
			ancestors: [],
			descendants: [makeStatus(`${id}-reply`, { in_reply_to_id: id })],
		});
	}

	async createPost(status: string, visibility: Visibility, options: CreatePostOptions = {}): Promise<Status> {
		const extras = [options.cw && `cw=${options.cw}`, options.inReplyTo && `reply=${options.inReplyTo}`].filter(Boolean);
		this.calls.push(["createPost", status, visibility, ...extras].join(" "));
		this.fail("createPost");
		return makeStatus("new", { content: `<p>${status}</p>`, visibility });
	}

	async deletePost(id: string): Promise<Status> {
		this.calls.push(`deletePost ${id}`);
		return this.find(id);
	}

	async boost(id: string): Promise<Status> {
		this.calls.push(`boost ${id}`);
		const original = this.update(id, { reblogged: true });
		return makeStatus(`${id}-boost`, { reblog: original, reblogged: true });
	}

	async unboost(id: string): Promise<Status> {
		this.calls.push(`unboost ${id}`);
		return this.update(id, { reblogged: false });
	}

	async favourite(id: string): Promise<Status> {
		this.calls.push(`favourite ${id}`);
		this.fail("favourite");
		return this.update(id, { favourited: true, favourites_count: 1 });
	}

	async unfavourite(id: string): Promise<Status> {
		this.calls.push(`unfavourite ${id}`);
		return this.update(id, { favourited: false, favourites_count: 0 });
	}

	async bookmark(id: string): Promise<Status> {
		this.calls.push(`bookmark ${id}`);
		return this.update(id, { bookmarked: true });
	}

	async unbookmark(id: string): Promise<Status> {
		this.calls.push(`unbookmark ${id}`);
		return this.update(id, { bookmarked: false });
	}
}
