/**
 * @file 文本处理工具集
 *
 * 提供面向字符终端的文本处理函数：
 * - 携带逐字符元数据的自动换行（wordWrap）
 * - 定宽填充、居中、遮盖
 * - 控制字符清理，以及把任意 Unicode 文本折叠成设备可显示的字符
 */

/** 字位分割器（共享实例，用于正确处理 Unicode 字符） */
const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/** 换行内部使用的结尾换行占位符，输出前会被移除 */
const TRAILING_NEWLINE_SENTINEL = "\x08";

/** 标点之后紧跟字母数字时可以断行的标点集合 */
const BREAK_PUNCTUATION = new Set(["-", "+", ";", "~", "(", ")", "[", "]", "{", "}", "<", ">"]);

const ALPHANUMERIC_REGEX = /^[\p{L}\p{N}]$/u;

/** 检查字符是否为行内空白（空格或制表符） */
export function isWhitespaceChar(char: string): boolean {
	return char === " " || char === "\t";
}

/** 检查字符是否为可断行的标点 */
export function isBreakPunctuation(char: string): boolean {
	return BREAK_PUNCTUATION.has(char);
}

function isAlphanumeric(char: string): boolean {
	return ALPHANUMERIC_REGEX.test(char);
}

/** 换行后的一行文本及其对应的元数据 */
export interface WrappedLine<T> {
	text: string;
	meta: T[];
}

/** wordWrap 选项 */
export interface WrapOptions {
	/** 去掉每行末尾的空格，并吞掉断行处的整段空白（默认 true） */
	stripTrailingSpaces?: boolean;
	/** 去掉结尾的空行（默认 true） */
	stripTrailingNewlines?: boolean;
}

/** 找出所有候选断点：空白处，以及一串标点之后的第一个字母数字处 */
function findBreakPoints(text: string): number[] {
	const points: number[] = [];
	let lastPunctuation = false;

	for (let i = 0; i < text.length; i++) {
		const ch = text[i];
		if (ch === " " || ch === "\t" || ch === "\n") {
			lastPunctuation = false;
			points.push(i);
		} else if (isBreakPunctuation(ch)) {
			lastPunctuation = true;
		} else if (isAlphanumeric(ch)) {
			if (lastPunctuation) {
				points.push(i);
			}
			lastPunctuation = false;
		}
	}

	return points;
}

/**
 * 按宽度对文本自动换行，元数据随字符一起移动。
 *
 * 断行优先级：宽度内最早的显式换行符，其次是宽度内最靠右的候选断点
 * （空白，或标点之后的字母数字），都没有时在 width 处强行断开。
 * 元数据只会被重新分配到各行，不会被修改。
 *
 * @param text - 待换行文本
 * @param meta - 与 text 等长的逐字符元数据
 * @param width - 每行最大宽度
 */
export function wordWrap<T>(text: string, meta: readonly T[], width: number, options: WrapOptions = {}): WrappedLine<T>[] {
	const stripTrailingSpaces = options.stripTrailingSpaces ?? true;
	const stripTrailingNewlines = options.stripTrailingNewlines ?? true;

	if (text.length !== meta.length) {
		throw new Error("Metadata length must match text length!");
	}
	if (!text) {
		return [{ text: "", meta: [] }];
	}
	if (width < 1) {
		throw new Error(`Cannot wrap text to a width of ${width}!`);
	}

	// Normalize line endings, dropping the metadata of the CR in each CRLF pair.
	let rest = "";
	let restMeta: T[] = [];
	for (let i = 0; i < text.length; i++) {
		if (text[i] === "\r") {
			if (text[i + 1] === "\n") continue;
			rest += "\n";
		} else {
			rest += text[i];
		}
		restMeta.push(meta[i]);
	}

	// The sentinel carries no metadata; it only forces the final empty line out.
	if (rest.endsWith("\n")) {
		rest += TRAILING_NEWLINE_SENTINEL;
	}

	let points = findBreakPoints(rest);
	const lines: WrappedLine<T>[] = [];

	const take = (amount: number): void => {
		lines.push({ text: rest.slice(0, amount), meta: restMeta.slice(0, amount) });
	};
	const advance = (amount: number): void => {
		rest = rest.slice(amount);
		restMeta = restMeta.slice(amount);
		points = points.filter((point) => point >= amount).map((point) => point - amount);
	};
	const firstNonSpace = (from: number): number => {
		let spot = from;
		while (spot < rest.length && isWhitespaceChar(rest[spot])) {
			spot++;
		}
		return spot;
	};

	while (rest.length > 0) {
		const relevant = points.filter((point) => point <= width);

		const newline = relevant.find((point) => rest[point] === "\n");
		if (newline !== undefined) {
			take(newline);
			advance(newline + 1);
			continue;
		}

		// A punctuation break at 0 would emit an empty line without consuming anything.
		const candidates = relevant.filter((point) => point > 0 || isWhitespaceChar(rest[point]));
		if (rest.length > width && candidates.length > 0) {
			const pos = candidates[candidates.length - 1];

			if (isWhitespaceChar(rest[pos])) {
				if (stripTrailingSpaces) {
					take(pos);
					advance(firstNonSpace(pos + 1));
				} else if (pos === width && !isWhitespaceChar(rest[pos - 1])) {
					// The single space at the edge is replaced by the line break itself.
					take(pos);
					advance(pos + 1);
					if (rest.length === 0) {
						lines.push({ text: "", meta: [] });
					}
				} else {
					const spot = Math.min(firstNonSpace(pos + 1), width);
					take(spot);
					advance(spot);
				}
			} else {
				// Mid-word break after punctuation keeps both sides.
				take(pos);
				advance(pos);
			}
		} else {
			take(width);
			advance(width);
		}
	}

	const cleaned = lines.map((line): WrappedLine<T> => {
		if (line.text === TRAILING_NEWLINE_SENTINEL) {
			return { text: "", meta: [] };
		}
		let lineText = line.text;
		let lineMeta = line.meta;
		if (stripTrailingSpaces) {
			while (lineText.endsWith(" ")) {
				lineText = lineText.slice(0, -1);
				lineMeta = lineMeta.slice(0, -1);
			}
		}
		return { text: lineText, meta: lineMeta };
	});

	if (stripTrailingNewlines) {
		while (cleaned.length > 0 && cleaned[cleaned.length - 1].text === "") {
			cleaned.pop();
		}
	}
	return cleaned;
}

/** 截断或在右侧补空格到指定长度 */
export function pad(line: string, length: number): string {
	if (line.length >= length) {
		return line.slice(0, length);
	}
	return line + " ".repeat(length - line.length);
}

/** 截断或在左侧补空格到指定长度 */
export function lpad(line: string, length: number): string {
	if (line.length >= length) {
		return line.slice(0, length);
	}
	return " ".repeat(length - line.length) + line;
}

/** 居中到指定长度；过长时两侧均匀裁掉 */
export function center(line: string, length: number): string {
	if (line.length === length) {
		return line;
	}
	if (line.length > length) {
		const leftCut = Math.floor((line.length - length) / 2);
		return line.slice(leftCut, leftCut + length);
	}
	const leftAdd = Math.floor((length - line.length) / 2);
	return pad(" ".repeat(leftAdd) + line, length);
}

/** 用星号遮盖（密码输入） */
export function obfuscate(line: string): string {
	return "*".repeat(line.length);
}

/** 遮盖内容警告下的正文，保留空白以维持换行位置 */
export function spoiler(text: string): string {
	return text.replace(/[^\s]/g, "*");
}

/**
 * 移除 C0 控制字符。
 * @param allowSafe - 为 true 时保留制表符和换行符
 */
export function stripLow(text: string, allowSafe = false): string {
	let out = "";
	for (const ch of text) {
		const code = ch.charCodeAt(0);
		if (code < 0x20 && !(allowSafe && (code === 0x09 || code === 0x0a))) {
			continue;
		}
		out += ch;
	}
	return out;
}

/** 设备能以图形字符集显示的框线符号 */
const DEVICE_GLYPHS = new Set(["─", "│", "┌", "┐", "└", "┘", "├", "┤", "┬", "┴", "┼", "•", "·"]);

/** 常见排版符号到 ASCII 的折叠 */
const TYPOGRAPHIC_FOLDS: Record<string, string> = {
	"\u00a0": " ",
	"‘": "'",
	"’": "'",
	"“": '"',
	"”": '"',
	"–": "-",
	"—": "-",
	"…": "...",
};

function isDeviceChar(ch: string): boolean {
	const code = ch.charCodeAt(0);
	return (code >= 0x20 && code < 0x7f) || ch === "\n" || ch === "\t" || ch === "\r" || DEVICE_GLYPHS.has(ch);
}

/**
 * 把任意文本折叠成设备可显示的单宽字符。
 * 带变音符的字母去掉变音符，常见排版符号换成 ASCII，其余字位换成 replacement。
 */
export function toDisplayable(text: string, replacement = "?"): string {
	let out = "";
	for (const { segment } of segmenter.segment(text)) {
		// CRLF is a single grapheme cluster.
		if ((segment.length === 1 && isDeviceChar(segment)) || segment === "\r\n") {
			out += segment;
			continue;
		}
		const folded = TYPOGRAPHIC_FOLDS[segment];
		if (folded !== undefined) {
			out += folded;
			continue;
		}
		const stripped = segment.normalize("NFD").replace(/\p{M}/gu, "");
		out += stripped.length === 1 && isDeviceChar(stripped) ? stripped : replacement;
	}
	return out;
}
