/**
 * @file 按钮控件
 *
 * 三行高的带框按钮。获得焦点时标题加粗，光标停在标题首字符上；
 * 按下（回车）由所在屏幕处理。
 */

import { type Action, FOCUS_INPUT, NULL_ACTION, UNFOCUS_INPUT } from "../actions.js";
import { highlight, sanitize } from "../markup.js";
import type { Painter } from "../painter.js";
import { rectAt } from "../rect.js";
import type { StyledLine } from "../styled-text.js";
import { boxBottom, boxMiddle, boxTop } from "./box.js";

export interface ButtonOptions {
	focused?: boolean;
}

export class Button {
	readonly kind = "button";
	readonly caption: string;
	readonly row: number;
	readonly column: number;
	focused: boolean;
	private readonly painter: Painter;

	constructor(painter: Painter, caption: string, row: number, column: number, options: ButtonOptions = {}) {
		this.painter = painter;
		this.caption = caption;
		this.row = row;
		this.column = column;
		this.focused = options.focused ?? false;
	}

	get width(): number {
		return this.caption.length + 2;
	}

	get lines(): StyledLine[] {
		const caption = sanitize(this.caption);
		return [
			boxTop(this.width),
			boxMiddle(highlight(this.focused ? `<b>${caption}</b>` : caption), this.width),
			boxBottom(this.width),
		];
	}

	draw(): void {
		this.painter.paint(this.lines, rectAt(this.row, this.column, 3, this.width));
		if (this.focused) {
			this.painter.moveCursor(this.row + 1, this.column + 1);
		}
	}

	private drawCaption(): void {
		this.painter.paint(this.lines.slice(1, 2), rectAt(this.row + 1, this.column, 1, this.width));
	}

	handleInput(data: string): Action | undefined {
		const wasFocused = this.focused;
		if (data === FOCUS_INPUT) {
			this.focused = true;
			if (!wasFocused) this.drawCaption();
			this.painter.moveCursor(this.row + 1, this.column + 1);
			return NULL_ACTION;
		}
		if (data === UNFOCUS_INPUT) {
			this.focused = false;
			if (wasFocused) this.drawCaption();
			return NULL_ACTION;
		}
		return undefined;
	}
}
