/**
 * @file 增量绘制原语
 *
 * Painter 是屏幕代码访问设备的唯一通道。它持有设备的影子状态
 * （光标位置、当前属性、滚动区域），每次发出指令时同步更新，
 * 从而在不回读设备的情况下省去冗余的定位和属性切换字节。
 *
 * 影子状态只在一次连接会话内有效：重连后丢弃并重新创建 Painter。
 * 设备启动时已关闭自动换行，因此写到最后一列后光标停在最后一列。
 */

import { type Attrs, applyCommands, codesFrom, NORMAL } from "./attrs.js";
import { BoundingRectangle } from "./rect.js";
import { type StyledLine, sliceLine } from "./styled-text.js";
import type { Terminal, TerminalCommand } from "./terminal.js";

/** 设备影子状态 */
export interface DeviceState {
	row: number;
	col: number;
	attrs: Attrs;
}

/**
 * 设备影子状态的持有者和绘制入口。
 */
export class Painter {
	readonly terminal: Terminal;
	private state: DeviceState;
	/** saveCursor 保存的状态（DECSC 同时保存位置和属性） */
	private saved?: DeviceState;
	/** 当前滚动区域 */
	private region: { top: number; bottom: number };

	constructor(terminal: Terminal, cursor: { row: number; col: number } = { row: 1, col: 1 }) {
		this.terminal = terminal;
		this.state = { row: cursor.row, col: cursor.col, attrs: NORMAL };
		this.region = { top: 1, bottom: terminal.rows };
	}

	get rows(): number {
		return this.terminal.rows;
	}

	get columns(): number {
		return this.terminal.columns;
	}

	/** 当前影子状态的快照 */
	get cursor(): Readonly<DeviceState> {
		return { ...this.state };
	}

	/** 定位光标，已在目标位置时不发送任何字节 */
	moveCursor(row: number, col: number): void {
		if (this.state.row === row && this.state.col === col) {
			return;
		}
		this.terminal.moveCursor(row, col);
		this.state.row = row;
		this.state.col = col;
	}

	/** 移动到目标位置，下一行第 1 列时用单个换行代替定位序列 */
	private advanceTo(row: number, col: number): void {
		const { state } = this;
		if (state.row === row && state.col === col) {
			return;
		}
		if (col === 1 && state.row === row - 1 && state.row !== this.region.bottom) {
			this.sendText("\n");
			return;
		}
		this.moveCursor(row, col);
	}

	sendText(text: string): void {
		if (!text) return;
		this.terminal.sendText(text);
		for (const ch of text) {
			if (ch === "\n") {
				// Newline mode: LF returns to column 1; at the region bottom it scrolls instead.
				if (this.state.row !== this.region.bottom && this.state.row < this.rows) {
					this.state.row++;
				}
				this.state.col = 1;
			} else if (ch === "\r") {
				this.state.col = 1;
			} else if (this.state.col < this.columns) {
				this.state.col++;
			}
		}
	}

	sendCommand(command: TerminalCommand): void {
		this.terminal.sendCommand(command);
		const { state } = this;
		switch (command) {
			case "saveCursor":
				this.saved = { ...state };
				break;
			case "restoreCursor":
				this.state = this.saved ? { ...this.saved } : { row: 1, col: 1, attrs: NORMAL };
				break;
			case "index":
				if (state.row !== this.region.bottom && state.row < this.rows) state.row++;
				break;
			case "reverseIndex":
				if (state.row !== this.region.top && state.row > 1) state.row--;
				break;
			default:
				state.attrs = applyCommands(state.attrs, [command]);
				break;
		}
	}

	setScrollRegion(top: number, bottom: number): void {
		this.terminal.setScrollRegion(top, bottom);
		this.region = { top, bottom };
		this.state.row = 1;
		this.state.col = 1;
	}

	clearScrollRegion(): void {
		this.terminal.clearScrollRegion();
		this.region = { top: 1, bottom: this.rows };
		this.state.row = 1;
		this.state.col = 1;
	}

	saveCursor(): void {
		this.sendCommand("saveCursor");
	}

	restoreCursor(): void {
		this.sendCommand("restoreCursor");
	}

	/** 清除整行 */
	clearLine(row: number): void {
		this.moveCursor(row, 1);
		this.sendCommand("clearLine");
	}

	/** 清除 from 到 to（含）的所有行 */
	clearRows(from: number, to: number): void {
		for (let row = from; row <= to; row++) {
			this.clearLine(row);
		}
	}

	/**
	 * 把 [top, bottom] 区域内的内容上移 amount 行，底部露出空行。
	 * 无论内容多少，每行只需一个 IND 指令。
	 */
	shiftContentUp(top: number, bottom: number, amount: number): void {
		this.setScrollRegion(top, bottom);
		this.moveCursor(bottom, 1);
		for (let i = 0; i < amount; i++) {
			this.sendCommand("index");
		}
		this.clearScrollRegion();
	}

	/** 把 [top, bottom] 区域内的内容下移 amount 行，顶部露出空行 */
	shiftContentDown(top: number, bottom: number, amount: number): void {
		this.setScrollRegion(top, bottom);
		this.moveCursor(top, 1);
		for (let i = 0; i < amount; i++) {
			this.sendCommand("reverseIndex");
		}
		this.clearScrollRegion();
	}

	/**
	 * 把若干行带属性文本绘制到目标矩形中。
	 *
	 * 目标矩形可以越出设备范围：越过第 1 行/第 1 列的部分从内容中丢弃，
	 * 使剩余内容与第一个可见的行/列对齐；再按设备范围裁剪。
	 * 每个字符之前只发送必要的属性切换指令。
	 */
	paint(lines: readonly StyledLine[], target: BoundingRectangle): void {
		const { rows, columns } = this;
		if (target.bottom <= 1 || target.top > rows || target.right <= 1 || target.left > columns) {
			return;
		}

		let visible = lines;
		if (target.top < 1) {
			visible = visible.slice(1 - target.top);
		}
		if (target.left < 1) {
			const amount = 1 - target.left;
			visible = visible.map((line) => sliceLine(line, amount));
		}

		const bounds = target.clip(new BoundingRectangle({ top: 1, bottom: rows + 1, left: 1, right: columns + 1 }));
		if (bounds.width === 0 || bounds.height === 0) {
			return;
		}
		visible = visible.slice(0, bounds.height);

		for (let i = 0; i < visible.length; i++) {
			this.advanceTo(bounds.top + i, bounds.left);

			const { text, attrs } = visible[i];
			const length = Math.min(text.length, bounds.width);
			let run = "";
			for (let pos = 0; pos < length; pos++) {
				const codes = codesFrom(attrs[pos], this.state.attrs);
				if (codes.length > 0) {
					this.sendText(run);
					run = "";
					for (const code of codes) {
						this.sendCommand(code);
					}
				}
				// Control characters would move the device cursor behind our back.
				const ch = text[pos];
				run += ch < " " ? " " : ch;
			}
			this.sendText(run);
		}
	}
}
