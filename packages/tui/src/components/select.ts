/**
 * @file 水平选择控件
 *
 * 在 "< 选项 >" 之间用左右键切换，选中项居中显示。
 */

import { type Action, FOCUS_INPUT, NULL_ACTION, UNFOCUS_INPUT } from "../actions.js";
import { matchesKey } from "../keys.js";
import { highlight, sanitize } from "../markup.js";
import type { Painter } from "../painter.js";
import { rectAt } from "../rect.js";
import type { StyledLine } from "../styled-text.js";
import { center } from "../utils.js";
import { boxBottom, boxMiddle, boxTop } from "./box.js";

export interface HorizontalSelectOptions {
	selected?: string;
	focused?: boolean;
}

export class HorizontalSelect {
	readonly kind = "select";
	readonly choices: readonly string[];
	readonly row: number;
	readonly column: number;
	readonly width: number;
	focused: boolean;
	private index = 0;
	private readonly painter: Painter;

	constructor(
		painter: Painter,
		choices: readonly string[],
		row: number,
		column: number,
		width: number,
		options: HorizontalSelectOptions = {},
	) {
		if (choices.length === 0) {
			throw new Error("HorizontalSelect needs at least one choice!");
		}
		this.painter = painter;
		this.choices = choices;
		this.row = row;
		this.column = column;
		this.width = width;
		this.focused = options.focused ?? false;
		if (options.selected !== undefined) {
			this.index = Math.max(0, choices.indexOf(options.selected));
		}
	}

	get selected(): string {
		return this.choices[this.index];
	}

	private get choiceText(): string {
		return center(this.selected, this.width - 6);
	}

	get lines(): StyledLine[] {
		const left = this.focused ? "<r>&lt;</r> " : "&lt; ";
		const right = this.focused ? " <r>&gt;</r>" : " &gt;";
		return [
			boxTop(this.width),
			boxMiddle(highlight(`${left}${sanitize(this.choiceText)}${right}`), this.width),
			boxBottom(this.width),
		];
	}

	/** 光标停在选中项的首字符上 */
	private placeCursor(): void {
		if (!this.focused) return;
		const text = this.choiceText;
		const leading = text.length - text.trimStart().length;
		this.painter.moveCursor(this.row + 1, this.column + 3 + leading);
	}

	private drawChoice(): void {
		this.painter.paint(this.lines.slice(1, 2), rectAt(this.row + 1, this.column, 1, this.width));
	}

	draw(): void {
		this.painter.paint(this.lines, rectAt(this.row, this.column, 3, this.width));
		this.placeCursor();
	}

	handleInput(data: string): Action | undefined {
		const wasFocused = this.focused;
		if (data === FOCUS_INPUT) {
			this.focused = true;
			if (!wasFocused) this.drawChoice();
			this.placeCursor();
			return NULL_ACTION;
		}
		if (data === UNFOCUS_INPUT) {
			this.focused = false;
			if (wasFocused) this.drawChoice();
			return NULL_ACTION;
		}
		if (matchesKey(data, "left")) {
			if (this.index > 0) {
				this.index--;
				this.drawChoice();
				this.placeCursor();
			}
			return NULL_ACTION;
		}
		if (matchesKey(data, "right")) {
			if (this.index < this.choices.length - 1) {
				this.index++;
				this.drawChoice();
				this.placeCursor();
			}
			return NULL_ACTION;
		}
		return undefined;
	}
}
