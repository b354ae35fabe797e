import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { account, boost, boxMiddle, highlight, htmlToStyled, makeAttrs, NORMAL, plain, sanitize, unsanitize } from "../src/index.js";

const BOLD = makeAttrs({ bold: true });
const UNDERLINE = makeAttrs({ underline: true });
const REVERSE = makeAttrs({ reverse: true });

describe("highlight", () => {
	it("nests attributes", () => {
		const line = highlight("<b><u>x</u></b>y");
		assert.equal(line.text, "xy");
		assert.deepEqual(line.attrs, [makeAttrs({ bold: true, underline: true }), NORMAL]);
	});

	it("accepts the long tag names", () => {
		assert.deepEqual(highlight("<reverse>a</reverse><underline>b</underline>").attrs, [REVERSE, UNDERLINE]);
	});

	it("hides unknown tags and ignores stray closing tags", () => {
		const line = highlight("</b><x>a");
		assert.equal(line.text, "a");
		assert.deepEqual(line.attrs, [NORMAL]);
	});

	it("restores escaped markup characters", () => {
		assert.equal(highlight(sanitize("<b> & </b>")).text, "<b> & </b>");
		assert.equal(unsanitize("&amp;lt;"), "&lt;");
	});
});

describe("htmlToStyled", () => {
	it("separates paragraphs and trims the end", () => {
		const line = htmlToStyled("<p>Hello <b>world</b></p><p>Bye</p>");
		assert.equal(line.text, "Hello world\n\nBye");
		assert.deepEqual(line.attrs.slice(6, 11), new Array(5).fill(BOLD));
		assert.equal(line.attrs[0], NORMAL);
	});

	it("shortens link previews", () => {
		const html =
			'<p><a href="https://example.test/abcdef"><span class="invisible">https://</span>' +
			'<span class="ellipsis">example.test/abc</span><span class="invisible">def</span></a></p>';
		const line = htmlToStyled(html);
		assert.equal(line.text, "example.test/abc...");
		assert.deepEqual(line.attrs, new Array(line.text.length).fill(UNDERLINE));
	});

	it("breaks lines and decodes entities", () => {
		assert.equal(htmlToStyled("a<br>b &amp; c").text, "a\nb & c");
	});

	it("shows emphasis in reverse", () => {
		assert.deepEqual(htmlToStyled("<em>x</em>").attrs, [REVERSE]);
	});

	it("folds characters the device cannot show", () => {
		assert.equal(htmlToStyled("<p>café</p>").text, "cafe");
	});
});

describe("box helpers", () => {
	it("pads content between the side borders", () => {
		assert.equal(boxMiddle(plain("ab"), 6).text, "│ab  │");
		assert.equal(boxMiddle(plain("abcdef"), 6).text, "│abcd│");
	});

	it("truncates long display names", () => {
		const line = account("A very long display name", "user", 20);
		assert.equal(line.text, "A very long••• @user");
		assert.deepEqual(line.attrs.slice(0, 14), new Array(14).fill(BOLD));
		assert.equal(line.attrs[14], NORMAL);
	});

	it("describes boosts", () => {
		assert.equal(boost("Name", "who@example.test", 80).text, "Name (@who@example.test) boosted");
	});
});
