/**
 * @file 多行输入控件
 *
 * 固定大小的反显文本区。文本按 width - 1 自动换行（最后一列留给光标），
 * 换行时保留空白和结尾换行，以便光标能停在任何位置。
 *
 * 光标以源文本下标（0 到 text.length）表示。换行时把每个字符的下标作为元数据，
 * 屏幕位置由元数据反查得到：
 * - 下标对应的字符显示在某行：就是那一格
 * - 否则（行尾、被换行吞掉的空格或换行符）：找到之前最后一个显示出来的字符 p，
 *   若 p 紧挨着光标则在 p 的右边一格，否则每个被吞掉的换行符下移一行
 *
 * 编辑后只重绘每行发生变化的列区间。
 */

import { type Action, FOCUS_INPUT, NULL_ACTION, UNFOCUS_INPUT } from "../actions.js";
import { makeAttrs } from "../attrs.js";
import { isPrintable, matchesKey } from "../keys.js";
import type { Painter } from "../painter.js";
import { rectAt } from "../rect.js";
import { blankLine, padLine, plain, type StyledLine, sliceLine } from "../styled-text.js";
import { type WrappedLine, wordWrap } from "../utils.js";

const INPUT_ATTRS = makeAttrs({ reverse: true });

/** 文本区内的相对位置（0 起始） */
interface Cell {
	line: number;
	col: number;
}

export class MultiLineInput {
	readonly kind = "multiline";
	readonly row: number;
	readonly column: number;
	readonly width: number;
	readonly height: number;
	private value: string;
	private cursor: number;
	private readonly painter: Painter;

	constructor(painter: Painter, text: string, row: number, column: number, width: number, height: number) {
		if (width < 2) {
			throw new Error(`Cannot create a text area ${width} columns wide!`);
		}
		this.painter = painter;
		this.value = text;
		this.cursor = text.length;
		this.row = row;
		this.column = column;
		this.width = width;
		this.height = height;
	}

	get text(): string {
		return this.value;
	}

	get cursorPosition(): number {
		return this.cursor;
	}

	private wrap(): WrappedLine<number>[] {
		const indices = Array.from({ length: this.value.length }, (_, i) => i);
		return wordWrap(this.value, indices, this.width - 1, {
			stripTrailingSpaces: false,
			stripTrailingNewlines: false,
		});
	}

	/** 显示用的行，始终为 height 行、每行 width 宽 */
	get lines(): StyledLine[] {
		return this.displayLines(this.wrap());
	}

	private displayLines(wrapped: readonly WrappedLine<number>[]): StyledLine[] {
		const lines = wrapped.slice(0, this.height).map((line) => padLine(plain(line.text, INPUT_ATTRS), this.width, INPUT_ATTRS));
		while (lines.length < this.height) {
			lines.push(blankLine(this.width, INPUT_ATTRS));
		}
		return lines;
	}

	/** 计算每个光标位置（0 到 text.length）对应的格子 */
	private cells(wrapped: readonly WrappedLine<number>[]): Cell[] {
		const shown = new Map<number, Cell>();
		wrapped.forEach((line, lineIndex) => {
			line.meta.forEach((index, col) => shown.set(index, { line: lineIndex, col }));
		});

		const cells: Cell[] = [];
		let last: { index: number; cell: Cell } | undefined;
		for (let c = 0; c <= this.value.length; c++) {
			const cell = shown.get(c);
			if (cell) {
				cells.push(cell);
				last = { index: c, cell };
				continue;
			}
			if (!last) {
				// Only hidden newlines precede this position.
				cells.push({ line: c, col: 0 });
			} else if (last.index === c - 1) {
				cells.push({ line: last.cell.line, col: last.cell.col + 1 });
			} else {
				cells.push({ line: last.cell.line + (c - 1 - last.index), col: 0 });
			}
		}
		return cells;
	}

	private placeCursor(wrapped = this.wrap()): void {
		const cell = this.cells(wrapped)[this.cursor];
		const line = Math.min(cell.line, this.height - 1);
		const col = Math.min(cell.col, this.width - 1);
		this.painter.moveCursor(this.row + line, this.column + col);
	}

	draw(): void {
		this.painter.paint(this.lines, rectAt(this.row, this.column, this.height, this.width));
		this.placeCursor();
	}

	/** 在相邻行上选择列不超过当前列的最右位置 */
	private verticalTarget(delta: number): number | undefined {
		const cells = this.cells(this.wrap());
		const current = cells[this.cursor];
		let best: number | undefined;
		let bestCol = -1;
		for (let index = 0; index < cells.length; index++) {
			const cell = cells[index];
			if (cell.line !== current.line + delta || cell.col > current.col) continue;
			if (cell.col > bestCol) {
				best = index;
				bestCol = cell.col;
			}
		}
		return best;
	}

	handleInput(data: string): Action | undefined {
		if (matchesKey(data, "left")) {
			if (this.cursor > 0) {
				this.cursor--;
				this.placeCursor();
			}
			return NULL_ACTION;
		}
		if (matchesKey(data, "right")) {
			if (this.cursor < this.value.length) {
				this.cursor++;
				this.placeCursor();
			}
			return NULL_ACTION;
		}
		if (matchesKey(data, "up") || matchesKey(data, "down")) {
			const target = this.verticalTarget(matchesKey(data, "up") ? -1 : 1);
			if (target !== undefined) {
				this.cursor = target;
				this.placeCursor();
			}
			return NULL_ACTION;
		}
		if (data === FOCUS_INPUT) {
			this.placeCursor();
			return NULL_ACTION;
		}
		if (data === UNFOCUS_INPUT) {
			return NULL_ACTION;
		}

		const before = this.wrap();
		if (matchesKey(data, "backspace") || matchesKey(data, "delete")) {
			if (this.cursor === 0) return NULL_ACTION;
			const spot = this.cursor - 1;
			this.value = this.value.slice(0, spot) + this.value.slice(spot + 1);
			this.cursor--;
		} else if (matchesKey(data, "enter")) {
			this.insert("\n");
		} else if (isPrintable(data)) {
			this.insert(data);
		} else {
			return undefined;
		}

		this.redrawChanges(before);
		return NULL_ACTION;
	}

	private insert(text: string): void {
		this.value = this.value.slice(0, this.cursor) + text + this.value.slice(this.cursor);
		this.cursor += text.length;
	}

	/** 对比编辑前后的换行结果，只重绘变化的列区间 */
	private redrawChanges(before: readonly WrappedLine<number>[]): void {
		const after = this.wrap();
		const drawable = this.displayLines(after);
		const common = Math.min(before.length, after.length, this.height);

		for (let i = 0; i < common; i++) {
			const oldText = before[i].text;
			const newText = after[i].text;
			if (oldText === newText) continue;

			let firstDiff = -1;
			let lastDiff = -1;
			for (let j = 0; j < Math.min(oldText.length, newText.length); j++) {
				if (oldText[j] !== newText[j]) {
					if (firstDiff === -1) firstDiff = j;
					lastDiff = j + 1;
				}
			}
			if (oldText.length !== newText.length) {
				lastDiff = Math.max(oldText.length, newText.length);
			}
			if (firstDiff === -1) {
				firstDiff = Math.min(oldText.length, newText.length);
			}

			this.painter.paint(
				[sliceLine(drawable[i], firstDiff)],
				rectAt(this.row + i, this.column + firstDiff, 1, lastDiff - firstDiff),
			);
		}

		// Lines that appeared or disappeared are drawn in full.
		const end = Math.min(Math.max(before.length, after.length), this.height);
		for (let i = common; i < end; i++) {
			this.painter.paint([drawable[i]], rectAt(this.row + i, this.column, 1, this.width));
		}

		this.placeCursor(after);
	}
}
