import assert from "node:assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it } from "node:test";
import {
	ApiError,
	BadLoginError,
	CredentialStore,
	InvalidClientError,
	MastodonClient,
	normalizeServer,
} from "../src/index.js";
import { type FakeReply, fakeServer, makeAccount, makeStatus } from "./fixtures.js";

const APP = { client_id: "test-client", client_secret: "test-secret" };

describe("normalizeServer", () => {
	it("defaults to https and drops trailing slashes", () => {
		assert.equal(normalizeServer("social.example"), "https://social.example");
		assert.equal(normalizeServer(" https://social.example/ "), "https://social.example");
		assert.equal(normalizeServer("http://localhost:3000//"), "http://localhost:3000");
	});
});

describe("CredentialStore", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "slowterm-client-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("saves and loads credentials per host", () => {
		const store = new CredentialStore(dir);
		assert.equal(store.load("social.example"), undefined);
		store.save("social.example", APP);
		assert.deepEqual(store.load("social.example"), APP);
		assert.equal(store.pathFor("social.example"), join(dir, "social.example.clientcred.json"));
	});

	it("treats unreadable files as missing", () => {
		const store = new CredentialStore(dir);
		writeFileSync(store.pathFor("broken.example"), "{not json");
		writeFileSync(store.pathFor("wrong.example"), JSON.stringify({ client_id: 1 }));
		assert.equal(store.load("broken.example"), undefined);
		assert.equal(store.load("wrong.example"), undefined);
	});
});

describe("MastodonClient", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "slowterm-client-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	function connect(routes: Record<string, FakeReply | (() => FakeReply)>) {
		const server = fakeServer(routes);
		const store = new CredentialStore(dir);
		const client = new MastodonClient("social.example", { credentials: store, fetch: server.fetch });
		return { client, store, requests: server.requests };
	}

	async function registered(routes: Record<string, FakeReply | (() => FakeReply)>) {
		const setup = connect(routes);
		setup.store.save(setup.client.host, APP);
		await setup.client.register();
		return setup;
	}

	it("registers once and saves the credentials", async () => {
		const { client, store, requests } = connect({ "POST /api/v1/apps": { body: APP } });
		await client.register();
		assert.equal(client.valid, true);
		assert.equal(requests.length, 1);
		assert.equal(requests[0].url, "https://social.example/api/v1/apps");
		assert.deepEqual(requests[0].body, {
			client_name: "slowterm",
			redirect_uris: "urn:ietf:wg:oauth:2.0:oob",
			scopes: "read write",
		});
		assert.deepEqual(store.load("social.example"), APP);
	});

	it("reuses saved credentials without asking the server", async () => {
		const { client, requests } = await registered({});
		assert.equal(client.valid, true);
		assert.equal(requests.length, 0);
	});

	it("refuses requests before registering", async () => {
		const { client } = connect({});
		await assert.rejects(client.fetchTimeline("home"), InvalidClientError);
	});

	it("reports network failures as upstream errors", async () => {
		const store = new CredentialStore(dir);
		const client = new MastodonClient("social.example", {
			credentials: store,
			fetch: async () => {
				throw new TypeError("fetch failed");
			},
		});
		await assert.rejects(client.register(), {
			name: "ApiError",
			message: "Request to social.example failed: fetch failed",
		});
		assert.equal(client.valid, false);
	});

	it("logs in with the password grant and sends the token afterwards", async () => {
		const { client, requests } = await registered({
			"POST /oauth/token": { body: { access_token: "test-token", token_type: "Bearer" } },
			"GET /api/v1/accounts/verify_credentials": { body: makeAccount() },
		});
		await client.login("alice", "test-password");
		assert.equal(client.loggedIn, true);
		assert.deepEqual(requests[0].body, {
			grant_type: "password",
			client_id: "test-client",
			client_secret: "test-secret",
			username: "alice",
			password: "test-password",
			scope: "read write",
		});

		const account = await client.getAccountInfo();
		assert.equal(account.acct, "alice");
		assert.equal(requests[1].headers.authorization, "Bearer test-token");

		client.logout();
		assert.equal(client.loggedIn, false);
	});

	it("turns a rejected grant into a bad login", async () => {
		const { client } = await registered({
			"POST /oauth/token": { status: 400, statusText: "Bad Request", body: { error: "invalid_grant" } },
		});
		await assert.rejects(client.login("alice", "wrong"), BadLoginError);
	});

	it("keeps other failures as upstream errors with their status", async () => {
		const { client } = await registered({
			"GET /api/v1/preferences": { status: 500, statusText: "Internal Server Error", body: "boom" },
		});
		await assert.rejects(client.getPreferences(), (error: unknown) => {
			assert.ok(error instanceof ApiError);
			assert.equal(error.status, 500);
			assert.equal(error.message, "500 Internal Server Error: boom");
			return true;
		});
	});

	it("rejects bodies that are not JSON", async () => {
		const { client } = await registered({ "GET /api/v1/preferences": { body: "<html>" } });
		await assert.rejects(client.getPreferences(), { name: "ApiError", message: "Invalid JSON from social.example" });
	});

	it("rejects responses of the wrong shape", async () => {
		const { client } = await registered({ "GET /api/v1/timelines/home": { body: [{ id: 1 }] } });
		await assert.rejects(client.fetchTimeline("home"), (error: unknown) => {
			assert.ok(error instanceof ApiError);
			assert.match(error.message, /^Unexpected timeline response \(/);
			return true;
		});
	});

	it("pages timelines from the oldest post shown", async () => {
		const { client, requests } = await registered({
			"GET /api/v1/timelines/public": { body: [makeStatus("8"), makeStatus("7")] },
		});
		const statuses = await client.fetchTimeline("local", { limit: 5, since: makeStatus("9") });
		assert.deepEqual(
			statuses.map((status) => status.id),
			["8", "7"],
		);
		assert.equal(requests[0].url, "https://social.example/api/v1/timelines/public?local=true&limit=5&max_id=9");
	});

	it("asks the global timeline for twenty posts by default", async () => {
		const { client, requests } = await registered({ "GET /api/v1/timelines/public": { body: [] } });
		await client.fetchTimeline("public");
		assert.equal(requests[0].url, "https://social.example/api/v1/timelines/public?limit=20");
	});

	it("posts replies with a content warning", async () => {
		const { client, requests } = await registered({ "POST /api/v1/statuses": { body: makeStatus("12") } });
		const posted = await client.createPost("hello", "unlisted", { cw: "test", inReplyTo: "5" });
		assert.equal(posted.id, "12");
		assert.equal(requests[0].headers["content-type"], "application/json");
		assert.deepEqual(requests[0].body, {
			status: "hello",
			visibility: "unlisted",
			spoiler_text: "test",
			in_reply_to_id: "5",
		});
	});

	it("sends interactions to the status endpoints", async () => {
		const { client, requests } = await registered({
			"POST /api/v1/statuses/5/reblog": { body: makeStatus("6", { reblog: makeStatus("5", { reblogged: true }) }) },
			"POST /api/v1/statuses/5/unfavourite": { body: makeStatus("5") },
			"POST /api/v1/statuses/5/bookmark": { body: makeStatus("5", { bookmarked: true }) },
			"DELETE /api/v1/statuses/5": { body: makeStatus("5") },
		});
		const boosted = await client.boost("5");
		assert.equal(boosted.reblog?.reblogged, true);
		await client.unfavourite("5");
		assert.equal((await client.bookmark("5")).bookmarked, true);
		await client.deletePost("5");
		assert.deepEqual(
			requests.map((request) => `${request.method} ${request.url}`),
			[
				"POST https://social.example/api/v1/statuses/5/reblog",
				"POST https://social.example/api/v1/statuses/5/unfavourite",
				"POST https://social.example/api/v1/statuses/5/bookmark",
				"DELETE https://social.example/api/v1/statuses/5",
			],
		);
	});

	it("fetches a post with its context as a thread", async () => {
		const { client } = await registered({
			"GET /api/v1/statuses/2": { body: makeStatus("2", { in_reply_to_id: "1" }) },
			"GET /api/v1/statuses/2/context": {
				body: { ancestors: [makeStatus("1")], descendants: [makeStatus("3", { in_reply_to_id: "2" })] },
			},
		});
		const thread = await client.fetchPostAndRelated("2");
		assert.deepEqual(
			thread.nodes.map((node) => node.status.id),
			["1", "2", "3"],
		);
		assert.equal(thread.focus, 1);
	});
});
