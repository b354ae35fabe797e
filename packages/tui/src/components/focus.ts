/**
 * @file 焦点环
 *
 * 表单中的控件是一个封闭的集合，通过 kind 字段区分。
 * FocusRing 在它们之间移动焦点，并把输入交给当前控件。
 */

import { type Action, FOCUS_INPUT, UNFOCUS_INPUT } from "../actions.js";
import type { Button } from "./button.js";
import type { OneLineInput } from "./input.js";
import type { MultiLineInput } from "./multiline-input.js";
import type { HorizontalSelect } from "./select.js";

/** 可获得焦点的控件 */
export type Control = Button | HorizontalSelect | OneLineInput | MultiLineInput;

export class FocusRing {
	readonly controls: readonly Control[];
	private index: number;

	constructor(controls: readonly Control[], index = 0) {
		if (index < 0 || index >= controls.length) {
			throw new Error(`Focus index ${index} is out of range for ${controls.length} controls!`);
		}
		this.controls = controls;
		this.index = index;
	}

	/** 当前获得焦点的控件序号 */
	get position(): number {
		return this.index;
	}

	get current(): Control {
		return this.controls[this.index];
	}

	/** 让当前控件（重新）获得焦点，并放置光标 */
	focus(): void {
		this.current.handleInput(FOCUS_INPUT);
	}

	handleInput(data: string): Action | undefined {
		return this.current.handleInput(data);
	}

	private moveTo(index: number): void {
		this.current.handleInput(UNFOCUS_INPUT);
		this.index = index;
		this.current.handleInput(FOCUS_INPUT);
	}

	previous(wrap = false): void {
		if (this.index > 0) {
			this.moveTo(this.index - 1);
		} else if (wrap) {
			this.moveTo(this.controls.length - 1);
		}
	}

	next(wrap = false): void {
		if (this.index < this.controls.length - 1) {
			this.moveTo(this.index + 1);
		} else if (wrap) {
			this.moveTo(0);
		}
	}
}
