/**
 * @file 带属性的文本行
 *
 * StyledLine 由文本和逐字符的属性数组组成，两者长度始终相等。
 * 本文件中的所有构造、切片、填充、拼接、替换操作都保持这一不变式，
 * 一旦检测到长度不一致即抛出异常（这意味着上游违反了约定）。
 *
 * 文本按 UTF-16 码元计长；进入本模型之前的文本应已通过
 * toDisplayable() 转换为设备可显示的单宽字符。
 */

import { type Attrs, NORMAL } from "./attrs.js";

/** 一行带属性的文本 */
export interface StyledLine {
	readonly text: string;
	readonly attrs: readonly Attrs[];
}

/** 构造一行并校验长度不变式 */
export function styledLine(text: string, attrs: readonly Attrs[]): StyledLine {
	if (text.length !== attrs.length) {
		throw new Error(`Attribute length ${attrs.length} does not match text length ${text.length}!`);
	}
	return { text, attrs };
}

/** 整行使用同一属性 */
export function plain(text: string, attrs: Attrs = NORMAL): StyledLine {
	return styledLine(text, new Array<Attrs>(text.length).fill(attrs));
}

export function blankLine(width: number, attrs: Attrs = NORMAL): StyledLine {
	return plain(" ".repeat(Math.max(0, width)), attrs);
}

function toLine(part: StyledLine | string): StyledLine {
	return typeof part === "string" ? plain(part) : part;
}

/** 依次拼接多段，字符串按普通属性处理 */
export function joinLines(...parts: Array<StyledLine | string>): StyledLine {
	let text = "";
	const attrs: Attrs[] = [];
	for (const part of parts) {
		const line = toLine(part);
		text += line.text;
		attrs.push(...line.attrs);
	}
	return styledLine(text, attrs);
}

export function sliceLine(line: StyledLine, start: number, end?: number): StyledLine {
	return styledLine(line.text.slice(start, end), line.attrs.slice(start, end));
}

/** 截断或用空格填充到指定宽度 */
export function padLine(line: StyledLine, width: number, attrs: Attrs = NORMAL): StyledLine {
	if (line.text.length >= width) {
		return sliceLine(line, 0, width);
	}
	return joinLines(line, blankLine(width - line.text.length, attrs));
}

/**
 * 在 offset 处覆盖写入 replacement，行长度不变。
 *
 * 负的 offset 从右边缘算起（-1 表示替换内容的末尾距行尾一个字符）。
 * 超出原行范围的部分会被裁掉。replacement 为纯字符串时保留原属性。
 */
export function replaceAt(original: StyledLine, replacement: StyledLine | string, offset = 0): StyledLine {
	let text = typeof replacement === "string" ? replacement : replacement.text;
	let attrs = typeof replacement === "string" ? undefined : replacement.attrs;
	const length = original.text.length;

	if (offset >= 0) {
		if (offset + text.length > length) {
			const amount = Math.max(0, length - offset);
			text = text.slice(0, amount);
			attrs = attrs?.slice(0, amount);
		}
	} else {
		offset = length - text.length + offset;
		if (offset < 0) {
			text = text.slice(-offset);
			attrs = attrs?.slice(-offset);
			offset = 0;
		}
	}

	const end = offset + text.length;
	const newText = original.text.slice(0, offset) + text + original.text.slice(end);
	if (attrs === undefined) {
		return styledLine(newText, original.attrs.slice());
	}
	return styledLine(newText, [...original.attrs.slice(0, offset), ...attrs, ...original.attrs.slice(end)]);
}
