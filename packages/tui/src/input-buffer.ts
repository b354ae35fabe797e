/**
 * @file 输入缓冲区
 *
 * InputBuffer 缓冲来自设备的原始字节并发出完整的按键序列。
 *
 * 串口上的数据可能以任意切分的块到达，例如光标键 `\x1b[A`
 * 可能被拆成 `\x1b` 和 `[A` 两次到达。没有缓冲的话，
 * 部分序列会被误解为普通按键。
 *
 * 设备对光标位置查询（DSR 6）的应答 `\x1b[row;colR` 不属于按键，
 * 以单独的 cursor 事件发出。
 */

import { EventEmitter } from "node:events";

/** ESC 转义字符 */
const ESC = "\x1b";

/** 光标位置报告 */
const CURSOR_REPORT_REGEX = /^\x1b\[(\d+);(\d+)R$/;

/** 检查字符串是否为完整的转义序列，还是需要更多数据 */
function isCompleteSequence(data: string): "complete" | "incomplete" | "not-escape" {
	if (!data.startsWith(ESC)) {
		return "not-escape";
	}

	if (data.length === 1) {
		return "incomplete";
	}

	const afterEsc = data.slice(1);

	// CSI sequences: ESC [ ... final byte in 0x40-0x7E
	if (afterEsc.startsWith("[")) {
		if (data.length < 3) {
			return "incomplete";
		}
		const lastCharCode = data.charCodeAt(data.length - 1);
		return lastCharCode >= 0x40 && lastCharCode <= 0x7e ? "complete" : "incomplete";
	}

	// SS3 sequences: ESC O followed by a single character (keypad application mode)
	if (afterEsc.startsWith("O")) {
		return afterEsc.length >= 2 ? "complete" : "incomplete";
	}

	// ESC followed by a single character, or something unknown
	return "complete";
}

/** 将累积的缓冲区拆分为完整的序列 */
function extractCompleteSequences(buffer: string): { sequences: string[]; remainder: string } {
	const sequences: string[] = [];
	let pos = 0;

	while (pos < buffer.length) {
		const remaining = buffer.slice(pos);

		if (remaining.startsWith(ESC)) {
			let seqEnd = 1;
			while (seqEnd <= remaining.length) {
				const candidate = remaining.slice(0, seqEnd);
				if (isCompleteSequence(candidate) === "incomplete") {
					seqEnd++;
					continue;
				}
				sequences.push(candidate);
				pos += seqEnd;
				break;
			}

			if (seqEnd > remaining.length) {
				return { sequences, remainder: remaining };
			}
		} else if (remaining[0] === "\r") {
			// In newline mode the Return key sends CR LF; keep the pair together.
			if (remaining.length === 1) {
				return { sequences, remainder: remaining };
			}
			if (remaining[1] === "\n") {
				sequences.push("\r\n");
				pos += 2;
			} else {
				sequences.push("\r");
				pos++;
			}
		} else {
			sequences.push(remaining[0]);
			pos++;
		}
	}

	return { sequences, remainder: "" };
}

/** InputBuffer 配置选项 */
export type InputBufferOptions = {
	/**
	 * 等待序列完成的最大时间（默认 10ms）。
	 * 超时后即使序列不完整也会刷新缓冲区。
	 */
	timeout?: number;
};

/** InputBuffer 事件映射类型 */
export type InputBufferEventMap = {
	/** 完整的按键序列 */
	data: [string];
	/** 光标位置报告（1 起始） */
	cursor: [number, number];
};

/**
 * 输入缓冲区。
 * 缓冲设备输入并通过 'data' 事件发出完整的序列。
 */
export class InputBuffer extends EventEmitter<InputBufferEventMap> {
	/** 输入缓冲区 */
	private buffer = "";
	/** 超时定时器句柄 */
	private timeout: ReturnType<typeof setTimeout> | null = null;
	/** 超时时间（毫秒） */
	private readonly timeoutMs: number;

	constructor(options: InputBufferOptions = {}) {
		super();
		this.timeoutMs = options.timeout ?? 10;
	}

	/** 处理输入数据，提取完整序列并发出事件 */
	process(data: string | Buffer): void {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}

		// The device speaks 7-bit ASCII; decode bytes one to one.
		this.buffer += Buffer.isBuffer(data) ? data.toString("latin1") : data;

		const result = extractCompleteSequences(this.buffer);
		this.buffer = result.remainder;

		for (const sequence of result.sequences) {
			this.dispatch(sequence);
		}

		if (this.buffer.length > 0) {
			this.timeout = setTimeout(() => {
				for (const sequence of this.flush()) {
					this.dispatch(sequence);
				}
			}, this.timeoutMs);
		}
	}

	private dispatch(sequence: string): void {
		const report = CURSOR_REPORT_REGEX.exec(sequence);
		if (report) {
			this.emit("cursor", Number(report[1]), Number(report[2]));
			return;
		}
		this.emit("data", sequence);
	}

	/** 刷新缓冲区，返回所有待处理的序列 */
	flush(): string[] {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}

		if (this.buffer.length === 0) {
			return [];
		}

		const sequences = [this.buffer];
		this.buffer = "";
		return sequences;
	}

	/** 获取当前缓冲区内容 */
	getBuffer(): string {
		return this.buffer;
	}

	/** 销毁缓冲区，清除所有状态和监听器 */
	destroy(): void {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}
		this.buffer = "";
		this.removeAllListeners();
	}
}
