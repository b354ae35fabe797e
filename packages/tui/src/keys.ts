/**
 * @file 按键识别
 *
 * VT-100 键盘只发送 ASCII 字节和少量转义序列（光标键在普通模式下为 CSI，
 * 在应用模式下为 SS3）。本文件把这些序列映射成可读的按键标识。
 */

/** 有名字的按键 */
export type NamedKey =
	| "up"
	| "down"
	| "left"
	| "right"
	| "enter"
	| "return"
	| "tab"
	| "backspace"
	| "delete"
	| "escape"
	| "ctrl+c";

/** 按键标识：有名字的按键，或单个可打印字符 */
export type KeyId = NamedKey | (string & {});

/** 每个有名字的按键可能对应的输入序列 */
const KEY_SEQUENCES: Readonly<Record<NamedKey, readonly string[]>> = {
	up: ["\x1b[A", "\x1bOA"],
	down: ["\x1b[B", "\x1bOB"],
	right: ["\x1b[C", "\x1bOC"],
	left: ["\x1b[D", "\x1bOD"],
	// In newline mode Return arrives as CR LF.
	enter: ["\r", "\n", "\r\n"],
	return: ["\r", "\n", "\r\n"],
	tab: ["\t"],
	backspace: ["\x08"],
	delete: ["\x7f"],
	escape: ["\x1b"],
	"ctrl+c": ["\x03"],
};

function isNamedKey(key: string): key is NamedKey {
	return Object.hasOwn(KEY_SEQUENCES, key);
}

/** 检查输入序列是否为指定按键 */
export function matchesKey(data: string, key: KeyId): boolean {
	if (isNamedKey(key)) {
		return KEY_SEQUENCES[key].includes(data);
	}
	return data === key;
}

/** 返回输入序列对应的按键名，不认识时返回 undefined */
export function parseKey(data: string): NamedKey | undefined {
	// "enter" and "return" share sequences; report the first.
	for (const key of Object.keys(KEY_SEQUENCES)) {
		if (isNamedKey(key) && KEY_SEQUENCES[key].includes(data)) {
			return key;
		}
	}
	return undefined;
}

/** 检查输入是否为单个可打印 ASCII 字符 */
export function isPrintable(data: string): boolean {
	if (data.length !== 1) return false;
	const code = data.charCodeAt(0);
	return code >= 0x20 && code < 0x7f;
}
