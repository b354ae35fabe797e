/**
 * @file 登录屏幕
 *
 * 屏幕中央一个 38 列宽的方框，上方是双倍高度的标题。
 * 登录成功后拉取账号信息和偏好设置，切换到首页时间线。
 */

import { BadLoginError } from "@slowterm/client";
import {
	type Action,
	blankLine,
	boxBottom,
	boxMiddle,
	boxTop,
	Button,
	center,
	EXIT_ACTION,
	FocusRing,
	highlight,
	matchesKey,
	type NavigationStack,
	NULL_ACTION,
	OneLineInput,
	plain,
	rectAt,
	type Screen,
	swapAction,
} from "@slowterm/tui";
import type { SessionContext } from "../context.js";
import { TimelineTabs } from "./timeline-tabs.js";

export const LOGO = "slowterm";
const BOX_WIDTH = 38;

/** 方框左边缘（列） */
export function dialogLeft(columns: number): number {
	return Math.floor(columns / 2) - 20;
}

/** 在 top 行画出双倍高度的标题 */
export function drawLogo(nav: NavigationStack, top: number, left: number): void {
	const { painter } = nav;
	const text = plain(center(LOGO, BOX_WIDTH / 2));
	// Double-width lines address columns in pairs.
	const column = Math.floor(left / 2) + 1;
	painter.moveCursor(top, 1);
	painter.sendCommand("doubleHeightTop");
	painter.paint([text], rectAt(top, column, 1, BOX_WIDTH / 2));
	painter.moveCursor(top + 1, 1);
	painter.sendCommand("doubleHeightBottom");
	painter.paint([text], rectAt(top + 1, column, 1, BOX_WIDTH / 2));
}

/** 把双倍高度的行恢复为普通行 */
export function clearLogo(nav: NavigationStack, top: number): void {
	const { painter } = nav;
	for (const row of [top, top + 1]) {
		painter.clearLine(row);
		painter.sendCommand("normalSize");
	}
}

/** 画出 [top, bottom] 行之间的空方框 */
export function drawDialog(nav: NavigationStack, top: number, bottom: number, left: number): void {
	const lines = [boxTop(BOX_WIDTH)];
	for (let row = top + 1; row < bottom; row++) {
		lines.push(boxMiddle(blankLine(BOX_WIDTH - 2), BOX_WIDTH));
	}
	lines.push(boxBottom(BOX_WIDTH));
	nav.painter.paint(lines, rectAt(top, left + 1, lines.length, BOX_WIDTH));
}

export interface LoginOptions {
	top?: number;
}

export class LoginScreen implements Screen {
	private readonly nav: NavigationStack;
	private readonly ctx: SessionContext;
	private readonly top: number;
	private readonly left: number;
	readonly username: OneLineInput;
	readonly password: OneLineInput;
	readonly loginButton: Button;
	readonly quitButton: Button;
	private readonly ring: FocusRing;

	constructor(nav: NavigationStack, ctx: SessionContext, options: LoginOptions = {}) {
		this.nav = nav;
		this.ctx = ctx;
		this.top = options.top ?? 1;
		this.left = dialogLeft(nav.columns);

		const { painter } = nav;
		const { top, left } = this;
		this.username = new OneLineInput(painter, ctx.username ?? "", top + 6, left + 2, 36);
		this.password = new OneLineInput(painter, ctx.password ?? "", top + 9, left + 2, 36, { obfuscate: true });
		this.loginButton = new Button(painter, "Login", top + 11, left + 2);
		this.quitButton = new Button(painter, "Quit", top + 11, left + 32);

		let focus = 2;
		if (!ctx.username) focus = 0;
		else if (!ctx.password) focus = 1;
		this.ring = new FocusRing([this.username, this.password, this.loginButton, this.quitButton], focus);
	}

	private get host(): string {
		return this.ctx.client.server.replace(/^[a-z]+:\/\//, "");
	}

	draw(): void {
		const { nav, top, left } = this;
		nav.painter.sendCommand("clearScreen");
		drawLogo(nav, top + 2, left);
		drawDialog(nav, top + 4, top + 15, left);
		nav.painter.paint([highlight("Username:")], rectAt(top + 5, left + 2, 1, 36));
		nav.painter.paint([highlight("Password:")], rectAt(top + 8, left + 2, 1, 36));

		this.username.draw();
		this.password.draw();
		this.loginButton.draw();
		this.quitButton.draw();
		nav.status(`Please enter your credentials for ${this.host}.`);
		this.ring.focus();
	}

	private async login(): Promise<Action> {
		const { ctx, nav } = this;
		const username = this.username.text;
		const password = this.password.text;
		nav.status("Logging in...");
		try {
			await ctx.client.login(username, password);
		} catch (error) {
			if (error instanceof BadLoginError) {
				nav.status("Invalid username or password!");
				this.ring.focus();
				return NULL_ACTION;
			}
			throw error;
		}

		ctx.username = username;
		ctx.password = password;
		ctx.account = await ctx.client.getAccountInfo();
		ctx.prefs = await ctx.client.getPreferences();

		const tabs = new TimelineTabs(nav, ctx);
		const timeline = await tabs.open("home");
		clearLogo(nav, this.top + 2);
		return swapAction((stack) => stack.replace([tabs, timeline]));
	}

	async handleInput(data: string): Promise<Action | undefined> {
		const { ring } = this;
		const current = ring.current;

		if (matchesKey(data, "tab")) {
			ring.next(true);
			return NULL_ACTION;
		}
		if (matchesKey(data, "up")) {
			ring.previous();
			return NULL_ACTION;
		}
		if (matchesKey(data, "down")) {
			ring.next();
			return NULL_ACTION;
		}
		if (matchesKey(data, "enter")) {
			if (current === this.loginButton) return this.login();
			if (current === this.quitButton) return EXIT_ACTION;
			ring.next();
			return NULL_ACTION;
		}
		return ring.handleInput(data);
	}
}
