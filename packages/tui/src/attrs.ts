/**
 * @file 字符属性模型
 *
 * VT-100 只有三种可叠加的字符属性：粗体、下划线、反显。
 * 设备没有"单独关闭某个属性"的指令，只能整体复位（SGR 0）后重新开启，
 * 因此属性切换需要计算出最少的指令序列。
 */

import type { TerminalCommand } from "./terminal.js";

/** 单个字符的显示属性 */
export interface Attrs {
	readonly bold: boolean;
	readonly underline: boolean;
	readonly reverse: boolean;
}

/** 无任何属性的普通状态 */
export const NORMAL: Attrs = Object.freeze({ bold: false, underline: false, reverse: false });

export function makeAttrs(attrs: Partial<Attrs> = {}): Attrs {
	return Object.freeze({
		bold: attrs.bold ?? false,
		underline: attrs.underline ?? false,
		reverse: attrs.reverse ?? false,
	});
}

export function attrsEqual(a: Attrs, b: Attrs): boolean {
	return a.bold === b.bold && a.underline === b.underline && a.reverse === b.reverse;
}

/**
 * 计算把设备属性从 prev 切换到 next 所需的指令。
 *
 * 只要 next 关闭了 prev 中开启的任何属性，就必须先发送 setNormal，
 * 再逐个开启 next 需要的属性；否则只开启新增的属性。
 */
export function codesFrom(next: Attrs, prev: Attrs): TerminalCommand[] {
	const turnsOff =
		(prev.bold && !next.bold) || (prev.underline && !next.underline) || (prev.reverse && !next.reverse);

	if (turnsOff) {
		const commands: TerminalCommand[] = ["setNormal"];
		if (next.bold) commands.push("setBold");
		if (next.underline) commands.push("setUnderline");
		if (next.reverse) commands.push("setReverse");
		return commands;
	}

	const commands: TerminalCommand[] = [];
	if (next.bold && !prev.bold) commands.push("setBold");
	if (next.underline && !prev.underline) commands.push("setUnderline");
	if (next.reverse && !prev.reverse) commands.push("setReverse");
	return commands;
}

/** 模拟设备执行指令后的属性状态（非属性类指令不影响结果） */
export function applyCommands(state: Attrs, commands: readonly TerminalCommand[]): Attrs {
	let { bold, underline, reverse } = state;
	for (const command of commands) {
		switch (command) {
			case "setNormal":
				bold = false;
				underline = false;
				reverse = false;
				break;
			case "setBold":
				bold = true;
				break;
			case "setUnderline":
				underline = true;
				break;
			case "setReverse":
				reverse = true;
				break;
			default:
				break;
		}
	}
	return makeAttrs({ bold, underline, reverse });
}
