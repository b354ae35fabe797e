/**
 * @file 导航栈
 *
 * NavigationStack 持有当前显示的一组屏幕，以及被压入栈中的历史屏幕组。
 * 输入按顺序交给当前组的每个屏幕，第一个返回动作的屏幕获胜。
 * 设备的最后一行留作状态栏。
 */

import { type Action, EXIT_ACTION } from "./actions.js";
import { makeAttrs } from "./attrs.js";
import { matchesKey } from "./keys.js";
import type { Painter } from "./painter.js";
import { BoundingRectangle } from "./rect.js";
import { plain } from "./styled-text.js";
import { pad } from "./utils.js";

/**
 * 屏幕：占据设备上若干行，负责绘制自己并处理输入。
 */
export interface Screen {
	/** 完整绘制自身 */
	draw(): void;
	/**
	 * 处理一次输入。返回 undefined 表示不处理，交给下一个屏幕。
	 * 需要访问上游时返回 Promise，会话循环会等待它完成后再读取下一个输入。
	 */
	handleInput(data: string): Action | undefined | Promise<Action | undefined>;
}

const STATUS_ATTRS = makeAttrs({ reverse: true });

export class NavigationStack {
	readonly painter: Painter;
	private screens: Screen[] = [];
	private history: Screen[][] = [];
	private lastStatus?: string;

	constructor(painter: Painter) {
		this.painter = painter;
	}

	/** 屏幕可用的行数（不含状态栏） */
	get rows(): number {
		return this.painter.rows - 1;
	}

	get columns(): number {
		return this.painter.columns;
	}

	/** 历史中保存的屏幕组数量 */
	get depth(): number {
		return this.history.length;
	}

	get currentStatus(): string {
		return this.lastStatus ?? "";
	}

	/** 替换当前屏幕组并清空历史 */
	replace(screens: readonly Screen[]): void {
		this.screens = [...screens];
		this.history = [];
		this.drawAll();
	}

	/** 保存当前屏幕组，显示新的一组 */
	push(screens: readonly Screen[]): void {
		if (this.screens.length > 0) {
			this.history.push(this.screens);
		}
		this.screens = [...screens];
		this.drawAll();
	}

	/** 回到之前的屏幕组并重绘；历史为空时什么都不做 */
	pop(depth = 1): void {
		let restored: Screen[] | undefined;
		for (let i = 0; i < depth; i++) {
			const previous = this.history.pop();
			if (!previous) break;
			restored = previous;
		}
		if (!restored) return;
		this.screens = restored;
		this.drawAll();
	}

	private drawAll(): void {
		for (const screen of this.screens) {
			screen.draw();
		}
	}

	/**
	 * 在最后一行显示状态文本，文本未变化时不发送任何字节。
	 * @returns 之前的状态文本
	 */
	status(text: string): string {
		const previous = this.lastStatus ?? "";
		if (text === this.lastStatus) {
			return previous;
		}
		this.lastStatus = text;

		const { painter } = this;
		const row = painter.rows;
		painter.saveCursor();
		painter.paint(
			[plain(pad(text, painter.columns), STATUS_ATTRS)],
			new BoundingRectangle({ top: row, bottom: row + 1, left: 1, right: painter.columns + 1 }),
		);
		painter.restoreCursor();
		return previous;
	}

	/** 依次把输入交给当前屏幕组；都不处理时 Ctrl-C 结束会话 */
	async processInput(data: string): Promise<Action | undefined> {
		for (const screen of this.screens) {
			const action = await screen.handleInput(data);
			if (action) {
				return action;
			}
		}
		if (matchesKey(data, "ctrl+c")) {
			return EXIT_ACTION;
		}
		return undefined;
	}
}
