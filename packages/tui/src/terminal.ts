/**
 * @file 终端接口和实现
 *
 * 本文件定义了渲染层所需的终端抽象接口（Terminal），
 * 以及基于一对字节流的 VT-100 实现（Vt100Terminal）。
 *
 * Vt100Terminal 负责：
 * - 把抽象指令编码成 VT-100 转义序列，每次调用立即写出，不做缓冲
 * - 关闭自动换行、开启换行模式（LF 同时回到第 1 列）
 * - 把框线字符映射到 DEC 特殊图形字符集
 * - 通过 InputBuffer 将批量输入拆分为独立按键序列
 * - 链路断开时抛出 TerminalDisconnectedError
 */

import { appendFileSync } from "node:fs";
import type { Readable, Writable } from "node:stream";
import { ReadStream } from "node:tty";
import { InputBuffer } from "./input-buffer.js";

/** 设备指令 */
export type TerminalCommand =
	| "setNormal"
	| "setBold"
	| "setUnderline"
	| "setReverse"
	| "clearLine"
	| "clearScreen"
	| "saveCursor"
	| "restoreCursor"
	| "index"
	| "reverseIndex"
	| "doubleHeightTop"
	| "doubleHeightBottom"
	| "normalSize";

/** 指令对应的 VT-100 转义序列 */
export const COMMAND_CODES: Readonly<Record<TerminalCommand, string>> = {
	setNormal: "\x1b[m",
	setBold: "\x1b[1m",
	setUnderline: "\x1b[4m",
	setReverse: "\x1b[7m",
	clearLine: "\x1b[2K",
	clearScreen: "\x1b[2J",
	saveCursor: "\x1b7",
	restoreCursor: "\x1b8",
	index: "\x1bD",
	reverseIndex: "\x1bM",
	doubleHeightTop: "\x1b#3",
	doubleHeightBottom: "\x1b#4",
	normalSize: "\x1b#5",
};

/** 编码光标定位，省略默认参数以节省字节 */
export function encodeMove(row: number, col: number): string {
	if (row === 1 && col === 1) return "\x1b[H";
	if (col === 1) return `\x1b[${row}H`;
	return `\x1b[${row};${col}H`;
}

export function encodeScrollRegion(top: number, bottom: number): string {
	return `\x1b[${top};${bottom}r`;
}

/** 清除滚动区域（恢复为整屏） */
export const CLEAR_SCROLL_REGION = "\x1b[r";

/** 框线字符到 DEC 特殊图形字符集的映射 */
const DEC_GRAPHICS: Readonly<Record<string, string>> = {
	"─": "q",
	"│": "x",
	"┌": "l",
	"┐": "k",
	"└": "m",
	"┘": "j",
	"├": "t",
	"┤": "u",
	"┬": "w",
	"┴": "v",
	"┼": "n",
	"•": "~",
	"·": "~",
};

/** SO：切换到 G1（已指定为图形字符集） */
const SHIFT_OUT = "\x0e";
/** SI：切回 G0（ASCII） */
const SHIFT_IN = "\x0f";

/** 与设备的链路中断（写失败、流结束或无应答） */
export class TerminalDisconnectedError extends Error {
	constructor(message = "Terminal disconnected") {
		super(message);
		this.name = "TerminalDisconnectedError";
	}
}

/**
 * 渲染层的最小终端接口
 *
 * 每个调用都直接按顺序写到设备，可以用不同的实现替换（如测试用的录制终端）。
 */
export interface Terminal {
	/** 终端行数 */
	readonly rows: number;
	/** 终端列数 */
	readonly columns: number;

	/** 绝对定位光标（1 起始） */
	moveCursor(row: number, col: number): void;
	/** 输出文本 */
	sendText(text: string): void;
	/** 发送单条指令 */
	sendCommand(command: TerminalCommand): void;
	/** 设置滚动区域（设备会把光标移到左上角） */
	setScrollRegion(top: number, bottom: number): void;
	/** 清除滚动区域（设备会把光标移到左上角） */
	clearScrollRegion(): void;

	/** 查询光标位置，只在会话开始时调用一次 */
	fetchCursor(): Promise<{ row: number; col: number }>;
	/** 等待下一个完整按键序列 */
	recvInput(): Promise<string>;
	/** 查看下一个已到达的按键序列但不取出 */
	peekInput(): string | undefined;

	/** 恢复设备到默认状态 */
	reset(): void;
	/** 断开并释放资源 */
	close(): void;
}

/** Vt100Terminal 配置 */
export interface Vt100TerminalOptions {
	input: Readable;
	output: Writable;
	/** 行数（默认 24） */
	rows?: number;
	/** 列数（默认 80，wide 时为 132） */
	columns?: number;
	/** 设置后切换 80/132 列模式（会清屏）；不设置则不切换 */
	wide?: boolean;
	/** 等待光标位置应答的最长时间（毫秒） */
	cursorTimeoutMs?: number;
	/** 写入日志路径（调试用） */
	writeLogPath?: string;
}

/**
 * 基于字节流的 VT-100 终端实现
 *
 * 启动时会：
 * 1. 若输入是 TTY，启用原始模式
 * 2. 关闭自动换行，开启换行模式
 * 3. 将 G1 指定为 DEC 特殊图形字符集
 * 4. 清屏并回到左上角
 */
export class Vt100Terminal implements Terminal {
	readonly rows: number;
	readonly columns: number;

	private readonly input: Readable;
	private readonly output: Writable;
	private readonly wide?: boolean;
	private readonly cursorTimeoutMs: number;
	private readonly writeLogPath: string;

	private readonly inputBuffer = new InputBuffer();
	/** 已到达但未被取走的按键序列 */
	private readonly queue: string[] = [];
	/** 等待输入的 recvInput 调用 */
	private waiter?: { resolve: (data: string) => void; reject: (error: Error) => void };
	/** 等待光标位置应答的 fetchCursor 调用 */
	private cursorWaiter?: (row: number, col: number) => void;

	/** 当前是否处于图形字符集（SO） */
	private shiftedOut = false;
	/** saveCursor 时保存的字符集状态 */
	private savedShiftedOut = false;
	/** 启动前是否已处于原始模式 */
	private wasRaw = false;
	private disconnected?: TerminalDisconnectedError;

	private readonly onData = (data: string | Buffer): void => this.inputBuffer.process(data);
	private readonly onEnd = (): void => this.disconnect("Terminal input closed");
	private readonly onError = (error: Error): void => this.disconnect(`Terminal link failed: ${error.message}`);

	constructor(options: Vt100TerminalOptions) {
		this.input = options.input;
		this.output = options.output;
		this.wide = options.wide;
		this.rows = options.rows ?? 24;
		this.columns = options.columns ?? (options.wide ? 132 : 80);
		this.cursorTimeoutMs = options.cursorTimeoutMs ?? 2000;
		this.writeLogPath = options.writeLogPath ?? "";
	}

	/** 挂接流事件并初始化设备模式 */
	start(): void {
		this.inputBuffer.on("data", (sequence) => this.enqueue(sequence));
		this.inputBuffer.on("cursor", (row, col) => {
			const waiter = this.cursorWaiter;
			this.cursorWaiter = undefined;
			waiter?.(row, col);
		});

		if (this.input instanceof ReadStream && this.input.isTTY) {
			this.wasRaw = this.input.isRaw;
			this.input.setRawMode(true);
		}
		this.input.on("data", this.onData);
		this.input.on("end", this.onEnd);
		this.input.on("close", this.onEnd);
		this.input.on("error", this.onError);
		this.output.on("error", this.onError);
		this.output.on("close", this.onEnd);
		this.input.resume();

		let init = "";
		if (this.wide !== undefined) {
			init += this.wide ? "\x1b[?3h" : "\x1b[?3l";
		}
		// Autowrap off, newline mode on, G1 = DEC special graphics, G0 selected.
		init += `\x1b[?7l\x1b[20h\x1b)0${SHIFT_IN}`;
		init += `${COMMAND_CODES.setNormal}${CLEAR_SCROLL_REGION}${COMMAND_CODES.clearScreen}${encodeMove(1, 1)}`;
		this.write(init);
	}

	private enqueue(sequence: string): void {
		const waiter = this.waiter;
		if (waiter) {
			this.waiter = undefined;
			waiter.resolve(sequence);
			return;
		}
		this.queue.push(sequence);
	}

	private disconnect(message: string): void {
		if (this.disconnected) return;
		this.disconnected = new TerminalDisconnectedError(message);
		const waiter = this.waiter;
		this.waiter = undefined;
		waiter?.reject(this.disconnected);
	}

	private write(data: string): void {
		if (this.disconnected) {
			throw this.disconnected;
		}
		this.output.write(data, "latin1");
		if (this.writeLogPath) {
			appendFileSync(this.writeLogPath, data, { encoding: "latin1" });
		}
	}

	moveCursor(row: number, col: number): void {
		this.write(encodeMove(row, col));
	}

	sendText(text: string): void {
		let out = "";
		for (const ch of text) {
			const graphic = DEC_GRAPHICS[ch];
			if (graphic !== undefined) {
				if (!this.shiftedOut) {
					out += SHIFT_OUT;
					this.shiftedOut = true;
				}
				out += graphic;
				continue;
			}
			if (this.shiftedOut) {
				out += SHIFT_IN;
				this.shiftedOut = false;
			}
			const code = ch.charCodeAt(0);
			out += code < 0x7f && ch.length === 1 ? ch : "?";
		}
		this.write(out);
	}

	sendCommand(command: TerminalCommand): void {
		// DECSC/DECRC also save and restore the selected character set.
		if (command === "saveCursor") {
			this.savedShiftedOut = this.shiftedOut;
		} else if (command === "restoreCursor") {
			this.shiftedOut = this.savedShiftedOut;
		}
		this.write(COMMAND_CODES[command]);
	}

	setScrollRegion(top: number, bottom: number): void {
		this.write(encodeScrollRegion(top, bottom));
	}

	clearScrollRegion(): void {
		this.write(CLEAR_SCROLL_REGION);
	}

	fetchCursor(): Promise<{ row: number; col: number }> {
		return new Promise((resolve, reject) => {
			const timer = setTimeout(() => {
				this.cursorWaiter = undefined;
				reject(new TerminalDisconnectedError("Terminal did not answer the cursor position request"));
			}, this.cursorTimeoutMs);
			this.cursorWaiter = (row, col) => {
				clearTimeout(timer);
				resolve({ row, col });
			};
			try {
				this.write("\x1b[6n");
			} catch (error) {
				clearTimeout(timer);
				this.cursorWaiter = undefined;
				reject(error);
			}
		});
	}

	recvInput(): Promise<string> {
		const next = this.queue.shift();
		if (next !== undefined) {
			return Promise.resolve(next);
		}
		if (this.disconnected) {
			return Promise.reject(this.disconnected);
		}
		return new Promise((resolve, reject) => {
			this.waiter = { resolve, reject };
		});
	}

	peekInput(): string | undefined {
		return this.queue[0];
	}

	reset(): void {
		if (this.disconnected) return;
		this.write(
			`${SHIFT_IN}${COMMAND_CODES.setNormal}${CLEAR_SCROLL_REGION}${COMMAND_CODES.clearScreen}${encodeMove(1, 1)}\x1b[20l\x1b[?7h`,
		);
		this.shiftedOut = false;
	}

	close(): void {
		this.input.off("data", this.onData);
		this.input.off("end", this.onEnd);
		this.input.off("close", this.onEnd);
		this.input.off("error", this.onError);
		this.output.off("error", this.onError);
		this.output.off("close", this.onEnd);
		this.inputBuffer.destroy();
		if (this.input instanceof ReadStream && this.input.isTTY) {
			this.input.setRawMode(this.wasRaw);
		}
		this.input.pause();
		this.disconnect("Terminal closed");
	}
}
