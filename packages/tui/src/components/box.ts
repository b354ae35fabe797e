/**
 * @file 方框绘制辅助
 *
 * 帖子、对话框和附件说明都画在单线方框里。这里的函数只生成行，不负责绘制。
 */

import { NORMAL } from "../attrs.js";
import { highlight, sanitize } from "../markup.js";
import { joinLines, padLine, plain, type StyledLine, sliceLine } from "../styled-text.js";
import { toDisplayable } from "../utils.js";

/** 截断名字时使用的省略号 */
const ELLIPSIS = "•••";

export function boxTop(width: number): StyledLine {
	return plain(`┌${"─".repeat(Math.max(0, width - 2))}┐`);
}

export function boxBottom(width: number): StyledLine {
	return plain(`└${"─".repeat(Math.max(0, width - 2))}┘`);
}

/** 方框中间一行：内容被截断或补齐到 width - 2 */
export function boxMiddle(line: StyledLine, width: number): StyledLine {
	const inner = Math.max(0, width - 2);
	return joinLines("│", padLine(sliceLine(line, 0, inner), inner, NORMAL), "│");
}

function truncateName(name: string, rest: string, width: number): string {
	const leftover = width - rest.length;
	if (name.length > leftover) {
		return name.slice(0, Math.max(0, leftover - ELLIPSIS.length)) + ELLIPSIS;
	}
	return name;
}

/** 作者行：加粗的显示名和 @账号，显示名过长时截断 */
export function account(name: string, username: string, width: number): StyledLine {
	const rest = ` @${toDisplayable(username)}`;
	const display = truncateName(toDisplayable(name), rest, width);
	return highlight(`<b>${sanitize(display)}</b>${sanitize(rest)}`);
}

/** 转发说明行 */
export function boost(name: string, username: string, width: number): StyledLine {
	const rest = ` (@${toDisplayable(username)}) boosted`;
	const display = truncateName(toDisplayable(name), rest, width);
	return highlight(sanitize(display + rest));
}
