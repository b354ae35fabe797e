import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
	type Action,
	EXIT_ACTION,
	highlight,
	NavigationStack,
	NULL_ACTION,
	Painter,
	plain,
	rectAt,
	type Screen,
} from "../src/index.js";
import { RecordingTerminal } from "./recording-terminal.js";

describe("Painter", () => {
	it("uses a newline to reach the start of the next row", () => {
		const terminal = new RecordingTerminal();
		const painter = new Painter(terminal);
		painter.paint([plain("ab"), plain("cd")], rectAt(1, 1, 2, 2));
		assert.equal(terminal.output, "ab\ncd");
	});

	it("positions the cursor when the target is elsewhere", () => {
		const terminal = new RecordingTerminal();
		const painter = new Painter(terminal);
		painter.paint([plain("ab"), plain("cd")], rectAt(3, 5, 2, 2));
		assert.equal(terminal.output, "\x1b[3;5Hab\x1b[4;5Hcd");
	});

	it("only switches attributes where they change", () => {
		const terminal = new RecordingTerminal();
		const painter = new Painter(terminal);
		painter.paint([highlight("a<b>b</b>c")], rectAt(1, 1, 1, 3));
		assert.deepEqual(terminal.ops, [
			{ type: "text", text: "a" },
			{ type: "command", command: "setBold" },
			{ type: "text", text: "b" },
			{ type: "command", command: "setNormal" },
			{ type: "text", text: "c" },
		]);
	});

	it("clips at the right edge and keeps the cursor in the last column", () => {
		const terminal = new RecordingTerminal();
		const painter = new Painter(terminal);
		painter.paint([plain("abcdef")], rectAt(1, 78, 1, 6));
		assert.equal(terminal.output, "\x1b[1;78Habc");
		assert.equal(painter.cursor.col, 80);
	});

	it("drops rows and columns that lie above or left of the screen", () => {
		const terminal = new RecordingTerminal();
		const painter = new Painter(terminal, { row: 5, col: 5 });
		painter.paint([plain("abc"), plain("def")], rectAt(0, 0, 2, 3));
		assert.equal(terminal.output, "\x1b[Hef");
	});

	it("skips targets entirely off screen", () => {
		const terminal = new RecordingTerminal();
		const painter = new Painter(terminal);
		painter.paint([plain("abc")], rectAt(25, 1, 1, 3));
		painter.paint([plain("abc")], rectAt(1, 81, 1, 3));
		assert.deepEqual(terminal.ops, []);
	});

	it("replaces control characters with spaces", () => {
		const terminal = new RecordingTerminal();
		const painter = new Painter(terminal);
		painter.paint([plain("a\tb")], rectAt(1, 1, 1, 3));
		assert.equal(terminal.text, "a b");
	});

	it("does not move when already at the target", () => {
		const terminal = new RecordingTerminal();
		const painter = new Painter(terminal);
		painter.moveCursor(3, 3);
		painter.moveCursor(3, 3);
		assert.equal(terminal.ops.length, 1);
	});

	it("shifts content up with one index per row", () => {
		const terminal = new RecordingTerminal();
		const painter = new Painter(terminal);
		painter.shiftContentUp(1, 23, 2);
		assert.deepEqual(terminal.ops, [
			{ type: "region", top: 1, bottom: 23 },
			{ type: "move", row: 23, col: 1 },
			{ type: "command", command: "index" },
			{ type: "command", command: "index" },
			{ type: "clearRegion" },
		]);
	});

	it("restores the saved cursor and attributes", () => {
		const terminal = new RecordingTerminal();
		const painter = new Painter(terminal);
		painter.moveCursor(2, 2);
		painter.saveCursor();
		painter.sendCommand("setBold");
		painter.moveCursor(10, 10);
		painter.restoreCursor();
		assert.deepEqual(painter.cursor, { row: 2, col: 2, attrs: { bold: false, underline: false, reverse: false } });
	});
});

class FakeScreen implements Screen {
	draws = 0;
	seen: string[] = [];

	constructor(private readonly reply?: Action) {}

	draw(): void {
		this.draws++;
	}

	handleInput(data: string): Action | undefined {
		this.seen.push(data);
		return this.reply;
	}
}

describe("NavigationStack", () => {
	function setup() {
		const terminal = new RecordingTerminal();
		const nav = new NavigationStack(new Painter(terminal));
		return { terminal, nav };
	}

	it("paints the status bar on the last row", () => {
		const { terminal, nav } = setup();
		nav.status("hello");
		assert.deepEqual(terminal.ops, [
			{ type: "command", command: "saveCursor" },
			{ type: "move", row: 24, col: 1 },
			{ type: "command", command: "setReverse" },
			{ type: "text", text: "hello".padEnd(80) },
			{ type: "command", command: "restoreCursor" },
		]);
	});

	it("sends nothing when the status is unchanged", () => {
		const { terminal, nav } = setup();
		nav.status("hello");
		terminal.clear();
		assert.equal(nav.status("hello"), "hello");
		assert.deepEqual(terminal.ops, []);
		assert.equal(nav.status("bye"), "hello");
		assert.equal(nav.currentStatus, "bye");
	});

	it("reserves the last row for the status bar", () => {
		const { nav } = setup();
		assert.equal(nav.rows, 23);
		assert.equal(nav.columns, 80);
	});

	it("draws screens as they are shown and redraws on pop", () => {
		const { nav } = setup();
		const first = new FakeScreen();
		const second = new FakeScreen();
		nav.replace([first]);
		nav.push([second]);
		assert.equal(nav.depth, 1);
		nav.pop();
		assert.equal(nav.depth, 0);
		assert.equal(first.draws, 2);
		assert.equal(second.draws, 1);
	});

	it("ignores pops past the bottom of the history", () => {
		const { nav } = setup();
		const first = new FakeScreen();
		nav.replace([first]);
		nav.pop(3);
		assert.equal(first.draws, 1);
	});

	it("pops several levels at once", () => {
		const { nav } = setup();
		const first = new FakeScreen();
		nav.replace([first]);
		nav.push([new FakeScreen()]);
		nav.push([new FakeScreen()]);
		nav.pop(2);
		assert.equal(nav.depth, 0);
		assert.equal(first.draws, 2);
	});

	it("offers input to each screen until one handles it", async () => {
		const { nav } = setup();
		const first = new FakeScreen();
		const second = new FakeScreen(NULL_ACTION);
		const third = new FakeScreen();
		nav.replace([first, second, third]);
		assert.equal(await nav.processInput("x"), NULL_ACTION);
		assert.deepEqual(first.seen, ["x"]);
		assert.deepEqual(second.seen, ["x"]);
		assert.deepEqual(third.seen, []);
	});

	it("exits on Ctrl-C when no screen handles it", async () => {
		const { nav } = setup();
		nav.replace([new FakeScreen()]);
		assert.equal(await nav.processInput("\x03"), EXIT_ACTION);
		assert.equal(await nav.processInput("x"), undefined);
	});
});
