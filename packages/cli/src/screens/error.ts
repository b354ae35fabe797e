/**
 * @file 错误屏幕
 *
 * 在登录框的位置显示一条按 36 列换行的错误信息和一个按钮。
 * 启动时的错误按钮为 Quit（退出）；会话中上游请求失败时为 OK（返回）。
 */

import {
	type Action,
	BACK_ACTION,
	Button,
	EXIT_ACTION,
	matchesKey,
	type NavigationStack,
	plain,
	rectAt,
	type Screen,
	toDisplayable,
	wordWrap,
} from "@slowterm/tui";
import { clearLogo, dialogLeft, drawDialog, drawLogo } from "./login.js";

export interface ErrorScreenOptions {
	/** 确认后结束会话（默认 true） */
	fatal?: boolean;
	top?: number;
}

const MESSAGE_WIDTH = 36;

export class ErrorScreen implements Screen {
	readonly message: string;
	readonly fatal: boolean;
	private readonly nav: NavigationStack;
	private readonly top: number;
	private readonly left: number;
	readonly lines: string[];
	readonly button: Button;

	constructor(nav: NavigationStack, message: string, options: ErrorScreenOptions = {}) {
		this.nav = nav;
		this.message = message;
		this.fatal = options.fatal ?? true;
		this.top = options.top ?? 1;
		this.left = dialogLeft(nav.columns);

		const text = toDisplayable(message);
		const chars = Array.from(text);
		const room = Math.max(1, nav.rows - this.top - 12);
		this.lines = wordWrap(text, chars, MESSAGE_WIDTH)
			.map((line) => line.text)
			.slice(0, room);

		const buttonRow = this.top + 7 + this.lines.length;
		this.button = new Button(nav.painter, this.fatal ? "Quit" : "OK", buttonRow, this.left + 2, { focused: true });
	}

	draw(): void {
		const { nav, top, left } = this;
		nav.painter.sendCommand("clearScreen");
		drawLogo(nav, top + 2, left);
		drawDialog(nav, top + 4, this.button.row + 3, left);
		nav.painter.paint(
			this.lines.map((line) => plain(line)),
			rectAt(top + 6, left + 2, this.lines.length, MESSAGE_WIDTH),
		);
		this.button.draw();
		nav.status(this.fatal ? "Press Return to quit." : "Press Return to go back.");
	}

	handleInput(data: string): Action | undefined {
		if (matchesKey(data, "enter")) {
			if (this.fatal) return EXIT_ACTION;
			clearLogo(this.nav, this.top + 2);
			return BACK_ACTION;
		}
		return undefined;
	}
}
