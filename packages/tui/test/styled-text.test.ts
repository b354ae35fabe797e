import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
	type Attrs,
	applyCommands,
	attrsEqual,
	BoundingRectangle,
	codesFrom,
	joinLines,
	makeAttrs,
	NORMAL,
	padLine,
	plain,
	rectAt,
	replaceAt,
	sliceLine,
	styledLine,
} from "../src/index.js";

const BOLD = makeAttrs({ bold: true });
const REVERSE = makeAttrs({ reverse: true });

function allAttrs(): Attrs[] {
	const result: Attrs[] = [];
	for (const bold of [false, true]) {
		for (const underline of [false, true]) {
			for (const reverse of [false, true]) {
				result.push(makeAttrs({ bold, underline, reverse }));
			}
		}
	}
	return result;
}

describe("codesFrom", () => {
	it("only turns on what is new when nothing turns off", () => {
		assert.deepEqual(codesFrom(makeAttrs({ bold: true, reverse: true }), BOLD), ["setReverse"]);
		assert.deepEqual(codesFrom(BOLD, BOLD), []);
	});

	it("resets first when any attribute turns off", () => {
		assert.deepEqual(codesFrom(REVERSE, BOLD), ["setNormal", "setReverse"]);
		assert.deepEqual(codesFrom(NORMAL, BOLD), ["setNormal"]);
	});

	it("reaches the target from every starting state and resets only to turn something off", () => {
		for (const prev of allAttrs()) {
			for (const next of allAttrs()) {
				const codes = codesFrom(next, prev);
				const label = `${JSON.stringify(prev)} -> ${JSON.stringify(next)}`;
				assert.ok(attrsEqual(applyCommands(prev, codes), next), label);
				const turnsOff =
					(prev.bold && !next.bold) || (prev.underline && !next.underline) || (prev.reverse && !next.reverse);
				assert.equal(codes.includes("setNormal"), turnsOff, label);
			}
		}
	});
});

describe("StyledLine", () => {
	it("rejects attributes of the wrong length", () => {
		assert.throws(() => styledLine("ab", [NORMAL]), { message: "Attribute length 1 does not match text length 2!" });
	});

	it("joins strings and styled parts", () => {
		const line = joinLines("a", plain("b", BOLD), "c");
		assert.equal(line.text, "abc");
		assert.deepEqual(line.attrs, [NORMAL, BOLD, NORMAL]);
	});

	it("pads and truncates to a width", () => {
		assert.equal(padLine(plain("ab"), 4).text, "ab  ");
		assert.equal(padLine(plain("abcdef"), 4).text, "abcd");
		assert.deepEqual(sliceLine(plain("abc", BOLD), 1).attrs, [BOLD, BOLD]);
	});

	it("overwrites in place and keeps the original attributes for plain strings", () => {
		const line = replaceAt(plain("abcdef", BOLD), "XY", 2);
		assert.equal(line.text, "abXYef");
		assert.deepEqual(line.attrs, new Array(6).fill(BOLD));
	});

	it("takes the replacement's attributes for styled replacements", () => {
		const line = replaceAt(plain("abcd"), plain("X", REVERSE), 1);
		assert.equal(line.text, "aXcd");
		assert.deepEqual(line.attrs, [NORMAL, REVERSE, NORMAL, NORMAL]);
	});

	it("counts negative offsets from the right edge", () => {
		assert.equal(replaceAt(plain("abcdef"), "XY", -1).text, "abcXYf");
		assert.equal(replaceAt(plain("abcdef"), "XY", 0).text, "XYcdef");
	});

	it("clips replacements that run past either edge", () => {
		assert.equal(replaceAt(plain("abcd"), "XYZ", 3).text, "abcX");
		assert.equal(replaceAt(plain("abcd"), "XYZ", -3).text, "Zbcd");
		assert.equal(replaceAt(plain("abcd"), "XYZ", 6).text, "abcd");
	});
});

describe("BoundingRectangle", () => {
	it("rejects inverted bounds", () => {
		assert.throws(() => new BoundingRectangle({ top: 5, bottom: 4, left: 1, right: 2 }), /Malformed rectangle/);
	});

	it("has half-open bounds", () => {
		const rect = rectAt(2, 3, 4, 5);
		assert.equal(rect.bottom, 6);
		assert.equal(rect.right, 8);
		assert.ok(rect.contains(2, 3));
		assert.ok(rect.contains(5, 7));
		assert.ok(!rect.contains(6, 7));
		assert.ok(!rect.contains(5, 8));
	});

	it("clips to the intersection", () => {
		const screen = rectAt(1, 1, 24, 80);
		const clipped = rectAt(20, 70, 10, 20).clip(screen);
		assert.ok(clipped.equals(new BoundingRectangle({ top: 20, bottom: 25, left: 70, right: 81 })));
	});

	it("degrades to an empty rectangle when there is no overlap", () => {
		const clipped = rectAt(1, 1, 2, 2).clip(rectAt(5, 5, 5, 5));
		assert.equal(clipped.width, 0);
		assert.equal(clipped.height, 0);
	});

	it("gives the same rectangle when clipped twice", () => {
		const screen = rectAt(1, 1, 24, 80);
		const inputs = [
			rectAt(3, 4, 5, 6),
			rectAt(20, 70, 10, 20),
			rectAt(-3, -5, 10, 10),
			rectAt(30, 90, 4, 4),
			rectAt(-10, 2, 3, 3),
		];
		for (const rect of inputs) {
			const once = rect.clip(screen);
			assert.ok(once.clip(screen).equals(once), rect.toString());
		}
		assert.ok(rectAt(-3, -5, 10, 10).clip(screen).equals(new BoundingRectangle({ top: 1, bottom: 7, left: 1, right: 5 })));
		assert.ok(rectAt(30, 90, 4, 4).clip(screen).equals(new BoundingRectangle({ top: 25, bottom: 25, left: 81, right: 81 })));
	});

	it("moves by an offset", () => {
		assert.equal(rectAt(1, 1, 2, 2).offset(3, 4).toString(), "BoundingRectangle(top=4, bottom=6, left=5, right=7)");
	});
});
