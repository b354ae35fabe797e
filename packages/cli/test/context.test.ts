import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { createContext, defaultVisibility, expandSpoilers } from "../src/context.js";
import { FakeSource } from "./fake-source.js";

describe("createContext", () => {
	it("starts with the defaults", () => {
		const ctx = createContext(new FakeSource());
		assert.equal(ctx.timelineLimit, 20);
		assert.equal(ctx.username, undefined);
		assert.equal(ctx.keybindings.actionFor("q"), "quit");
	});

	it("applies keybindings and credentials", () => {
		const ctx = createContext(new FakeSource(), {
			username: "alice",
			password: "test-secret",
			keybindings: { quit: "x" },
			timelineLimit: 5,
		});
		assert.equal(ctx.password, "test-secret");
		assert.equal(ctx.timelineLimit, 5);
		assert.equal(ctx.keybindings.actionFor("x"), "quit");
		assert.equal(ctx.keybindings.actionFor("q"), undefined);
	});
});

describe("preferences", () => {
	it("reads the default visibility and spoiler expansion", () => {
		const ctx = createContext(new FakeSource());
		assert.equal(defaultVisibility(ctx), "public");
		assert.equal(expandSpoilers(ctx), false);

		ctx.prefs = { "posting:default:visibility": "unlisted", "reading:expand:spoilers": true };
		assert.equal(defaultVisibility(ctx), "unlisted");
		assert.equal(expandSpoilers(ctx), true);

		ctx.prefs = { "posting:default:visibility": "everyone" };
		assert.equal(defaultVisibility(ctx), "public");
	});
});
