/**
 * @file 轻量标记与帖子 HTML 转换
 *
 * - highlight()：界面文案使用的小型标记语言，支持 <b>/<bold>、<u>/<underline>、
 *   <r>/<reverse>，可嵌套；文本中的 &lt; &gt; &amp; 会被还原
 * - htmlToStyled()：把服务器返回的帖子 HTML 转换为带属性的文本
 */

import { HTMLElement, type Node, parse, TextNode } from "node-html-parser";
import { type Attrs, makeAttrs } from "./attrs.js";
import { type StyledLine, styledLine } from "./styled-text.js";
import { toDisplayable } from "./utils.js";

/** 转义标记字符，使任意文本可以安全地嵌入 highlight() 的输入 */
export function sanitize(text: string): string {
	return text.replaceAll("&", "&amp;").replaceAll("<", "&lt;").replaceAll(">", "&gt;");
}

export function unsanitize(text: string): string {
	return text.replaceAll("&lt;", "<").replaceAll("&gt;", ">").replaceAll("&amp;", "&");
}

/** 把标记串拆成文本段和 <...> 标签段 */
function splitMarkup(markup: string): string[] {
	const parts: string[] = [];
	let accumulator = "";

	for (const ch of markup) {
		if (ch === "<") {
			if (accumulator) parts.push(accumulator);
			accumulator = ch;
		} else if (ch === ">") {
			accumulator += ch;
			if (accumulator.startsWith("<")) {
				parts.push(accumulator);
				accumulator = "";
			}
		} else {
			accumulator += ch;
		}
	}

	if (accumulator) parts.push(accumulator);
	return parts;
}

type StyleName = "bold" | "underline" | "reverse";

const MARKUP_TAGS: Readonly<Record<string, { style: StyleName; open: boolean }>> = {
	"<b>": { style: "bold", open: true },
	"<bold>": { style: "bold", open: true },
	"</b>": { style: "bold", open: false },
	"</bold>": { style: "bold", open: false },
	"<u>": { style: "underline", open: true },
	"<underline>": { style: "underline", open: true },
	"</u>": { style: "underline", open: false },
	"</underline>": { style: "underline", open: false },
	"<r>": { style: "reverse", open: true },
	"<reverse>": { style: "reverse", open: true },
	"</r>": { style: "reverse", open: false },
	"</reverse>": { style: "reverse", open: false },
};

/** 按嵌套深度累积文本和属性 */
class StyledBuilder {
	private text = "";
	private readonly attrs: Attrs[] = [];
	private readonly depth: Record<StyleName, number> = { bold: 0, underline: 0, reverse: 0 };

	open(style: StyleName): void {
		this.depth[style]++;
	}

	close(style: StyleName): void {
		// Stray closing tags are ignored.
		this.depth[style] = Math.max(0, this.depth[style] - 1);
	}

	private current(): Attrs {
		return makeAttrs({
			bold: this.depth.bold > 0,
			underline: this.depth.underline > 0,
			reverse: this.depth.reverse > 0,
		});
	}

	append(text: string): void {
		if (!text) return;
		const attrs = this.current();
		this.text += text;
		for (let i = 0; i < text.length; i++) {
			this.attrs.push(attrs);
		}
	}

	/** 去掉首尾空白后生成结果 */
	build(trim: boolean): StyledLine {
		let start = 0;
		let end = this.text.length;
		if (trim) {
			while (start < end && /\s/.test(this.text[start])) start++;
			while (end > start && /\s/.test(this.text[end - 1])) end--;
		}
		return styledLine(this.text.slice(start, end), this.attrs.slice(start, end));
	}
}

/**
 * 解析界面文案标记。未知的标签被忽略（不显示）。
 */
export function highlight(markup: string): StyledLine {
	const builder = new StyledBuilder();

	for (const part of splitMarkup(markup)) {
		if (part.startsWith("<") && part.endsWith(">")) {
			const tag = MARKUP_TAGS[part];
			if (tag?.open) builder.open(tag.style);
			else if (tag) builder.close(tag.style);
			continue;
		}
		builder.append(unsanitize(part));
	}

	return builder.build(false);
}

/** 元素标签到属性的映射 */
const HTML_STYLES: Readonly<Record<string, StyleName>> = {
	a: "underline",
	u: "underline",
	b: "bold",
	strong: "bold",
	i: "reverse",
	em: "reverse",
};

function visit(node: Node, builder: StyledBuilder): void {
	if (node instanceof TextNode) {
		builder.append(toDisplayable(node.text));
		return;
	}
	if (!(node instanceof HTMLElement)) {
		return;
	}

	const tag = (node.rawTagName || "").toLowerCase();
	if (tag === "br") {
		builder.append("\n");
		return;
	}
	// Link previews hide the scheme and the tail of long URLs.
	if (tag === "span" && node.classList.contains("invisible")) {
		return;
	}

	const style = HTML_STYLES[tag];
	if (style) builder.open(style);
	for (const child of node.childNodes) {
		visit(child, builder);
	}
	if (style) builder.close(style);

	if (tag === "span" && node.classList.contains("ellipsis")) {
		builder.append("...");
	} else if (tag === "p") {
		builder.append("\n\n");
	}
}

/**
 * 把帖子 HTML 转换为设备可显示的带属性文本。
 *
 * 段落之后空一行，<br> 换行，链接和 <u> 加下划线，<b>/<strong> 加粗，
 * <i>/<em> 反显；其他标签只显示其中的文本。实体会被解码，首尾空白被去掉。
 */
export function htmlToStyled(html: string): StyledLine {
	const builder = new StyledBuilder();
	visit(parse(html), builder);
	return builder.build(true);
}
