import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { BlockViewport, type ContentBlock, ordinalLabel, Painter, plain, type StyledLine } from "../src/index.js";
import { RecordingTerminal } from "./recording-terminal.js";

interface TestBlock extends ContentBlock {
	readonly key: string;
	readonly lines: readonly StyledLine[];
}

/** A block whose top line is a border and whose other lines name their position */
function block(key: string, height: number): TestBlock {
	const lines = [plain("─".repeat(80))];
	for (let i = 1; i < height; i++) {
		lines.push(plain(`${key}${i}`.padEnd(80)));
	}
	return { key, lines };
}

class SpyViewport extends BlockViewport<TestBlock> {
	painted: number[] = [];

	override paintRow(row: number): boolean {
		this.painted.push(row);
		return super.paintRow(row);
	}
}

function setup(blocks: TestBlock[]): { terminal: RecordingTerminal; viewport: SpyViewport } {
	const terminal = new RecordingTerminal();
	const viewport = new SpyViewport(new Painter(terminal), { top: 1, bottom: 23 });
	viewport.setBlocks(blocks);
	viewport.fullRepaint();
	terminal.clear();
	return { terminal, viewport };
}

function scrollDown(viewport: BlockViewport<TestBlock>, times: number): void {
	for (let i = 0; i < times; i++) {
		viewport.scrollDown();
	}
}

function usedScrollRegion(terminal: RecordingTerminal): boolean {
	return terminal.ops.some((op) => op.type === "region");
}

describe("ordinalLabel", () => {
	it("frames the number or falls back to border", () => {
		assert.equal(ordinalLabel(4), "┤4├");
		assert.equal(ordinalLabel(undefined), "───");
	});
});

describe("BlockViewport", () => {
	it("rejects a bottom above the top", () => {
		const painter = new Painter(new RecordingTerminal());
		assert.throws(() => new BlockViewport(painter, { top: 5, bottom: 4 }), {
			message: "Viewport bottom 4 is above its top 5!",
		});
	});

	it("labels the first line of every visible block on a full repaint", () => {
		const terminal = new RecordingTerminal();
		const viewport = new BlockViewport(new Painter(terminal), { top: 1, bottom: 23 });
		viewport.setBlocks([block("A", 12), block("B", 12), block("C", 12)]);
		assert.equal(viewport.fullRepaint(), undefined);
		const texts = terminal.ops.flatMap((op) => (op.type === "text" ? [op.text] : []));
		assert.ok(texts[0].startsWith("───┤1├───"));
		assert.ok(texts.some((text) => text.startsWith("───┤2├───")));
	});

	it("reports the rows left empty by a full repaint", () => {
		const terminal = new RecordingTerminal();
		const viewport = new BlockViewport(new Painter(terminal), { top: 1, bottom: 23 });
		viewport.setBlocks([block("A", 12)]);
		assert.deepEqual(viewport.fullRepaint(), { start: 13, end: 23 });
	});

	it("shifts one row per scroll and only paints the exposed row", () => {
		const { terminal, viewport } = setup([block("A", 12), block("B", 12), block("C", 12)]);

		viewport.scrollDown();
		assert.deepEqual(terminal.ops, [
			{ type: "command", command: "saveCursor" },
			{ type: "region", top: 1, bottom: 23 },
			{ type: "move", row: 23, col: 1 },
			{ type: "command", command: "index" },
			{ type: "clearRegion" },
			{ type: "move", row: 23, col: 1 },
			{ type: "text", text: "B11".padEnd(80) },
			{ type: "command", command: "restoreCursor" },
		]);

		scrollDown(viewport, 10);
		assert.deepEqual(viewport.painted, new Array(11).fill(23));
	});

	it("repaints labelled rows when the first block scrolls away", () => {
		const { viewport } = setup([block("A", 12), block("B", 12), block("C", 12)]);
		scrollDown(viewport, 11);
		viewport.painted = [];

		viewport.scrollDown();
		assert.deepEqual(viewport.painted, [1, 13, 23]);
		assert.deepEqual([...viewport.positions], [
			[1, 1],
			[13, 2],
		]);
		assert.equal(viewport.labelFor(1), 1);
		assert.equal(viewport.labelFor(2), 2);
		assert.equal(viewport.labelFor(0), undefined);
	});

	it("does not scroll above the first block", () => {
		const { terminal, viewport } = setup([block("A", 12)]);
		assert.deepEqual(viewport.scrollUp(), { moved: false, needsData: [] });
		assert.deepEqual(terminal.ops, []);
	});

	it("shifts back to the top when the distance fits in the viewport", () => {
		const { terminal, viewport } = setup([block("A", 12), block("B", 12), block("C", 12)]);
		scrollDown(viewport, 23);
		terminal.clear();
		viewport.jumpToTop();
		assert.equal(viewport.offset, 0);
		assert.ok(usedScrollRegion(terminal));
	});

	it("repaints everything when the top is more than a screen away", () => {
		const { terminal, viewport } = setup([block("A", 12), block("B", 12), block("C", 12)]);
		scrollDown(viewport, 24);
		terminal.clear();
		viewport.jumpToTop();
		assert.equal(viewport.offset, 0);
		assert.ok(!usedScrollRegion(terminal));
	});

	it("shifts to a next block that starts within a screen", () => {
		const { terminal, viewport } = setup([block("A", 23), block("B", 12)]);
		viewport.nextBlock();
		assert.equal(viewport.offset, 23);
		assert.ok(usedScrollRegion(terminal));
	});

	it("repaints everything for a next block more than a screen away", () => {
		const { terminal, viewport } = setup([block("A", 24), block("B", 12)]);
		viewport.nextBlock();
		assert.equal(viewport.offset, 24);
		assert.ok(!usedScrollRegion(terminal));
	});

	it("sends fewer bytes shifting back to the top than repainting", () => {
		const { terminal, viewport } = setup([block("A", 40)]);
		scrollDown(viewport, 5);
		viewport.painted = [];
		terminal.clear();

		viewport.jumpToTop();
		assert.deepEqual(viewport.painted, [1, 2, 3, 4, 5]);
		const shifted = terminal.output.length;

		terminal.clear();
		viewport.fullRepaint();
		assert.ok(shifted < terminal.output.length, `${shifted} >= ${terminal.output.length}`);
	});

	it("shifts back to a previous block that starts within a screen", () => {
		const { terminal, viewport } = setup([block("A", 23), block("B", 12)]);
		viewport.nextBlock();
		terminal.clear();
		assert.equal(viewport.previousBlock().moved, true);
		assert.equal(viewport.offset, 0);
		assert.ok(usedScrollRegion(terminal));
	});

	it("repaints everything for a previous block more than a screen away", () => {
		const { terminal, viewport } = setup([block("A", 24), block("B", 12)]);
		viewport.nextBlock();
		terminal.clear();
		assert.equal(viewport.previousBlock().moved, true);
		assert.equal(viewport.offset, 0);
		assert.ok(!usedScrollRegion(terminal));
	});

	it("returns to the start of the current block, then stops at the first", () => {
		const { viewport } = setup([block("A", 12), block("B", 12), block("C", 12)]);
		scrollDown(viewport, 5);
		assert.equal(viewport.previousBlock().moved, true);
		assert.equal(viewport.offset, 0);
		assert.deepEqual(viewport.previousBlock(), { moved: false, needsData: [] });
	});

	it("finds blocks by ordinal only while they are on screen", () => {
		const { viewport } = setup([block("A", 12), block("B", 12), block("C", 12)]);
		assert.equal(viewport.blockForOrdinal(1), 0);
		assert.equal(viewport.blockForOrdinal(2), 1);
		assert.equal(viewport.blockForOrdinal(3), undefined);
		assert.equal(viewport.blockForOrdinal(0), undefined);
	});

	it("locates rows within blocks", () => {
		const { viewport } = setup([block("A", 12), block("B", 12)]);
		assert.equal(viewport.blockAtRow(1), 0);
		assert.equal(viewport.blockAtRow(16), 1.25);
		viewport.setBlocks([block("A", 2)]);
		assert.equal(viewport.blockAtRow(5), undefined);
	});

	it("repaints down to the bottom when a replaced block changes height", () => {
		const { viewport } = setup([block("A", 12), block("B", 12)]);
		assert.deepEqual(viewport.replaceBlock(0, block("A", 14)), []);
		assert.deepEqual(
			viewport.painted,
			Array.from({ length: 23 }, (_, i) => i + 1),
		);
	});

	it("repaints only the block's rows when its height is unchanged", () => {
		const { viewport } = setup([block("A", 12), block("B", 12), block("C", 12)]);
		viewport.replaceBlock(0, block("X", 12));
		assert.deepEqual(
			viewport.painted,
			Array.from({ length: 12 }, (_, i) => i + 1),
		);
	});

	it("asks for more content at the end and fills it in with one fetch", async () => {
		const { terminal, viewport } = setup([block("A", 12), block("B", 12)]);
		assert.deepEqual(viewport.scrollDown().needsData, []);
		const { needsData } = viewport.scrollDown();
		assert.deepEqual(needsData, [23]);

		let fetches = 0;
		const added = await viewport.fill(needsData, async () => {
			fetches++;
			return [block("C", 12), block("B", 12)];
		});

		assert.equal(added, 1);
		assert.equal(fetches, 1);
		assert.deepEqual(
			viewport.blocks.map((b) => b.key),
			["A", "B", "C"],
		);
		const texts = terminal.ops.flatMap((op) => (op.type === "text" ? [op.text] : []));
		assert.equal(texts[texts.length - 1], `───┤3├${"─".repeat(74)}`);
	});

	it("skips the fetch when nothing is missing", async () => {
		const { viewport } = setup([block("A", 12)]);
		let fetches = 0;
		const added = await viewport.fill([], async () => {
			fetches++;
			return [];
		});
		assert.equal(added, 0);
		assert.equal(fetches, 0);
	});
});
