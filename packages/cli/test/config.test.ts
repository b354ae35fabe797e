import assert from "node:assert/strict";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it } from "node:test";
import { getConfigDir, getSettingsPath, keybindingsFrom, loadSettings } from "../src/config.js";

describe("settings", () => {
	let dir: string;
	let savedEnv: string | undefined;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "slowterm-config-"));
		savedEnv = process.env.SLOWTERM_CONFIG_DIR;
	});

	afterEach(() => {
		if (savedEnv === undefined) {
			delete process.env.SLOWTERM_CONFIG_DIR;
		} else {
			process.env.SLOWTERM_CONFIG_DIR = savedEnv;
		}
		rmSync(dir, { recursive: true, force: true });
	});

	it("creates the configuration directory from the environment", () => {
		const configDir = join(dir, "nested", "config");
		process.env.SLOWTERM_CONFIG_DIR = configDir;
		assert.equal(getConfigDir(), configDir);
		assert.ok(existsSync(configDir));
	});

	it("treats a missing file as empty settings", () => {
		assert.deepEqual(loadSettings(dir), { settings: {}, path: join(dir, "settings.json"), problems: [] });
	});

	it("loads a valid file", () => {
		const settings = { server: "social.example", baud: 9600, keybindings: { quit: ["x"] } };
		writeFileSync(getSettingsPath(dir), JSON.stringify(settings, null, 2));
		assert.deepEqual(loadSettings(dir).settings, settings);
	});

	it("reports a file that is not JSON", () => {
		writeFileSync(getSettingsPath(dir), "{ server");
		const loaded = loadSettings(dir);
		assert.deepEqual(loaded.settings, {});
		assert.equal(loaded.problems.length, 1);
		assert.ok(loaded.problems[0].startsWith(`Cannot parse ${join(dir, "settings.json")}: `));
	});

	it("reports values of the wrong shape by path", () => {
		writeFileSync(getSettingsPath(dir), JSON.stringify({ baud: "fast" }));
		const loaded = loadSettings(dir);
		assert.deepEqual(loaded.settings, {});
		assert.ok(loaded.problems.length > 0);
		assert.ok(loaded.problems.every((problem) => problem.startsWith("/baud: ")));
	});
});

describe("keybindingsFrom", () => {
	it("keeps timeline actions and lists the rest", () => {
		const { config, unknown } = keybindingsFrom({ keybindings: { quit: "x", help: ["?", "h"], dance: "d" } });
		assert.deepEqual(config, { quit: "x", help: ["?", "h"] });
		assert.deepEqual(unknown, ["dance"]);
	});

	it("returns nothing without keybindings", () => {
		assert.deepEqual(keybindingsFrom({}), { config: {}, unknown: [] });
	});
});
