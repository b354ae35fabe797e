/**
 * @file 上游内容源
 *
 * ContentSource 是屏幕访问上游的唯一接口，MastodonClient 通过 REST API 实现它。
 * 所有调用都是一次性的：失败时抛出异常，不重试。
 */

import type { CredentialStore } from "./credentials.js";
import { ApiError, BadLoginError, InvalidClientError } from "./errors.js";
import { expectShape, type FetchFn, fetchJson } from "./http.js";
import {
	type Account,
	type AppCredentials,
	type Preferences,
	type Status,
	validators,
} from "./schemas.js";
import { buildThread, type Thread } from "./thread.js";

/** 可浏览的时间线 */
export type Timeline = "home" | "local" | "public";

/** 帖子可见范围 */
export type Visibility = "public" | "unlisted" | "private" | "direct";

export interface FetchTimelineOptions {
	/** 每次拉取的帖子数（默认 20） */
	limit?: number;
	/** 只拉取比这个帖子更早的帖子 */
	since?: Status;
}

export interface CreatePostOptions {
	/** 内容警告 */
	cw?: string;
	/** 回复的帖子 ID */
	inReplyTo?: string;
}

/**
 * 上游内容源接口
 */
export interface ContentSource {
	readonly server: string;

	login(username: string, password: string): Promise<void>;
	/** 丢弃访问令牌 */
	logout(): void;
	getAccountInfo(): Promise<Account>;
	getPreferences(): Promise<Preferences>;

	fetchTimeline(timeline: Timeline, options?: FetchTimelineOptions): Promise<Status[]>;
	fetchPost(id: string): Promise<Status>;
	/** 拉取帖子和它的上下文，组装成讨论串 */
	fetchPostAndRelated(id: string): Promise<Thread>;

	createPost(status: string, visibility: Visibility, options?: CreatePostOptions): Promise<Status>;
	deletePost(id: string): Promise<Status>;
	boost(id: string): Promise<Status>;
	unboost(id: string): Promise<Status>;
	favourite(id: string): Promise<Status>;
	unfavourite(id: string): Promise<Status>;
	bookmark(id: string): Promise<Status>;
	unbookmark(id: string): Promise<Status>;
}

export interface MastodonClientOptions {
	/** 应用注册凭据存储 */
	credentials: CredentialStore;
	/** 注册应用时使用的名称 */
	clientName?: string;
	/** 替换全局 fetch（测试用） */
	fetch?: FetchFn;
}

const SCOPES = "read write";
const REDIRECT_URI = "urn:ietf:wg:oauth:2.0:oob";

/** 补全服务器地址：没有写协议时默认 https */
export function normalizeServer(server: string): string {
	const trimmed = server.trim().replace(/\/+$/, "");
	if (!trimmed.startsWith("https://") && !trimmed.includes("//")) {
		return `https://${trimmed}`;
	}
	return trimmed;
}

/** 时间线对应的 API 路径和查询参数 */
function timelinePath(timeline: Timeline): { path: string; params: Record<string, string> } {
	switch (timeline) {
		case "home":
			return { path: "/api/v1/timelines/home", params: {} };
		case "local":
			return { path: "/api/v1/timelines/public", params: { local: "true" } };
		case "public":
			return { path: "/api/v1/timelines/public", params: {} };
	}
}

/**
 * Mastodon REST API 客户端
 */
export class MastodonClient implements ContentSource {
	readonly server: string;
	readonly host: string;
	private readonly store: CredentialStore;
	private readonly clientName: string;
	private readonly fetchImpl: FetchFn;
	private app?: AppCredentials;
	private accessToken?: string;

	constructor(server: string, options: MastodonClientOptions) {
		this.server = normalizeServer(server);
		this.host = new URL(this.server).hostname;
		this.store = options.credentials;
		this.clientName = options.clientName ?? "slowterm";
		this.fetchImpl = options.fetch ?? fetch;
	}

	/** 应用是否已注册 */
	get valid(): boolean {
		return this.app !== undefined;
	}

	get loggedIn(): boolean {
		return this.accessToken !== undefined;
	}

	/**
	 * 读取保存的应用凭据，没有时在服务器上注册一次并保存。
	 * 网络失败时抛出异常，客户端保持不可用。
	 */
	async register(): Promise<void> {
		const saved = this.store.load(this.host);
		if (saved) {
			this.app = saved;
			return;
		}

		const data = await fetchJson(this.fetchImpl, `${this.server}/api/v1/apps`, {
			method: "POST",
			headers: { Accept: "application/json", "Content-Type": "application/json" },
			body: JSON.stringify({ client_name: this.clientName, redirect_uris: REDIRECT_URI, scopes: SCOPES }),
		});
		const app = expectShape(validators.appCredentials, data, "app registration");
		this.store.save(this.host, app);
		this.app = app;
	}

	private requireApp(): AppCredentials {
		if (!this.app) {
			throw new InvalidClientError(this.server);
		}
		return this.app;
	}

	private url(path: string, params: Record<string, string> = {}): string {
		const url = new URL(path, this.server);
		for (const [key, value] of Object.entries(params)) {
			url.searchParams.set(key, value);
		}
		return url.toString();
	}

	private async request(method: string, path: string, params?: Record<string, string>, body?: unknown): Promise<unknown> {
		this.requireApp();
		const headers: Record<string, string> = { Accept: "application/json" };
		if (this.accessToken) {
			headers.Authorization = `Bearer ${this.accessToken}`;
		}
		const init: RequestInit = { method, headers };
		if (body !== undefined) {
			headers["Content-Type"] = "application/json";
			init.body = JSON.stringify(body);
		}
		return fetchJson(this.fetchImpl, this.url(path, params), init);
	}

	async login(username: string, password: string): Promise<void> {
		const app = this.requireApp();
		let data: unknown;
		try {
			data = await fetchJson(this.fetchImpl, this.url("/oauth/token"), {
				method: "POST",
				headers: { Accept: "application/json", "Content-Type": "application/json" },
				body: JSON.stringify({
					grant_type: "password",
					client_id: app.client_id,
					client_secret: app.client_secret,
					username,
					password,
					scope: SCOPES,
				}),
			});
		} catch (error) {
			if (error instanceof ApiError && (error.status === 400 || error.status === 401)) {
				throw new BadLoginError();
			}
			throw error;
		}
		this.accessToken = expectShape(validators.token, data, "token").access_token;
	}

	logout(): void {
		this.accessToken = undefined;
	}

	async getAccountInfo(): Promise<Account> {
		const data = await this.request("GET", "/api/v1/accounts/verify_credentials");
		return expectShape(validators.account, data, "account");
	}

	async getPreferences(): Promise<Preferences> {
		const data = await this.request("GET", "/api/v1/preferences");
		return expectShape(validators.preferences, data, "preferences");
	}

	async fetchTimeline(timeline: Timeline, options: FetchTimelineOptions = {}): Promise<Status[]> {
		const { path, params } = timelinePath(timeline);
		const query: Record<string, string> = { ...params, limit: String(options.limit ?? 20) };
		if (options.since) {
			query.max_id = options.since.id;
		}
		const data = await this.request("GET", path, query);
		return expectShape(validators.statusList, data, "timeline");
	}

	async fetchPost(id: string): Promise<Status> {
		const data = await this.request("GET", `/api/v1/statuses/${encodeURIComponent(id)}`);
		return expectShape(validators.status, data, "status");
	}

	async fetchPostAndRelated(id: string): Promise<Thread> {
		const post = await this.fetchPost(id);
		const data = await this.request("GET", `/api/v1/statuses/${encodeURIComponent(id)}/context`);
		return buildThread(post, expectShape(validators.context, data, "context"));
	}

	async createPost(status: string, visibility: Visibility, options: CreatePostOptions = {}): Promise<Status> {
		const body: Record<string, string> = { status, visibility };
		if (options.cw) body.spoiler_text = options.cw;
		if (options.inReplyTo) body.in_reply_to_id = options.inReplyTo;
		const data = await this.request("POST", "/api/v1/statuses", undefined, body);
		return expectShape(validators.status, data, "status");
	}

	async deletePost(id: string): Promise<Status> {
		const data = await this.request("DELETE", `/api/v1/statuses/${encodeURIComponent(id)}`);
		return expectShape(validators.status, data, "status");
	}

	private async statusAction(id: string, action: string): Promise<Status> {
		const data = await this.request("POST", `/api/v1/statuses/${encodeURIComponent(id)}/${action}`);
		return expectShape(validators.status, data, "status");
	}

	boost(id: string): Promise<Status> {
		return this.statusAction(id, "reblog");
	}

	unboost(id: string): Promise<Status> {
		return this.statusAction(id, "unreblog");
	}

	favourite(id: string): Promise<Status> {
		return this.statusAction(id, "favourite");
	}

	unfavourite(id: string): Promise<Status> {
		return this.statusAction(id, "unfavourite");
	}

	bookmark(id: string): Promise<Status> {
		return this.statusAction(id, "bookmark");
	}

	unbookmark(id: string): Promise<Status> {
		return this.statusAction(id, "unbookmark");
	}
}
