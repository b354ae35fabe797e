/**
 * @file 单行输入控件
 *
 * 反显的定长输入框，可选遮盖（密码）。编辑时只重绘从修改点到行尾的部分。
 */

import { type Action, FOCUS_INPUT, NULL_ACTION, UNFOCUS_INPUT } from "../actions.js";
import { makeAttrs } from "../attrs.js";
import { isPrintable, matchesKey } from "../keys.js";
import type { Painter } from "../painter.js";
import { rectAt } from "../rect.js";
import { plain, type StyledLine, sliceLine } from "../styled-text.js";
import { obfuscate, pad } from "../utils.js";

const INPUT_ATTRS = makeAttrs({ reverse: true });

export interface OneLineInputOptions {
	/** 以星号显示内容 */
	obfuscate?: boolean;
}

export class OneLineInput {
	readonly kind = "input";
	readonly row: number;
	readonly column: number;
	/** 输入框宽度；最多可输入 length - 1 个字符，最后一格留给光标 */
	readonly length: number;
	private value: string;
	private cursor: number;
	private readonly obfuscated: boolean;
	private readonly painter: Painter;

	constructor(painter: Painter, text: string, row: number, column: number, length: number, options: OneLineInputOptions = {}) {
		this.painter = painter;
		this.value = text.slice(0, length);
		this.cursor = this.value.length;
		this.row = row;
		this.column = column;
		this.length = length;
		this.obfuscated = options.obfuscate ?? false;
	}

	get text(): string {
		return this.value;
	}

	get cursorPosition(): number {
		return this.cursor;
	}

	get lines(): StyledLine[] {
		const shown = this.obfuscated ? obfuscate(this.value) : this.value;
		return [plain(pad(shown, this.length), INPUT_ATTRS)];
	}

	private placeCursor(): void {
		this.painter.moveCursor(this.row, this.column + this.cursor);
	}

	/** 从 from 列起重绘到行尾 */
	private drawFrom(from: number): void {
		this.painter.paint(
			[sliceLine(this.lines[0], from)],
			rectAt(this.row, this.column + from, 1, this.length - from),
		);
	}

	draw(): void {
		this.drawFrom(0);
		this.placeCursor();
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
		if (data === FOCUS_INPUT) {
			this.placeCursor();
			return NULL_ACTION;
		}
		if (data === UNFOCUS_INPUT) {
			return NULL_ACTION;
		}
		if (matchesKey(data, "backspace") || matchesKey(data, "delete")) {
			// Both keys erase the character before the cursor.
			if (this.cursor > 0) {
				const spot = this.cursor - 1;
				this.value = this.value.slice(0, spot) + this.value.slice(spot + 1);
				this.cursor--;
				this.drawFrom(spot);
				this.placeCursor();
			}
			return NULL_ACTION;
		}
		if (isPrintable(data)) {
			if (this.value.length < this.length - 1) {
				const spot = this.cursor;
				this.value = this.value.slice(0, spot) + data + this.value.slice(spot);
				this.cursor++;
				this.drawFrom(spot);
				this.placeCursor();
			}
			return NULL_ACTION;
		}
		// Control keys are left to the owning screen.
		return undefined;
	}
}
