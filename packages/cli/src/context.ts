/**
 * @file 会话上下文
 *
 * 屏幕之间共享的状态。断线重连时保留，新的会话从登录屏幕重新开始。
 */

import type { Account, ContentSource, Preferences, Status, Visibility } from "@slowterm/client";
import { TimelineKeybindingsManager, type TimelineKeybindingsConfig } from "@slowterm/tui";
import { DEFAULT_TIMELINE_LIMIT } from "./config.js";

export interface SessionContext {
	readonly client: ContentSource;
	readonly keybindings: TimelineKeybindingsManager;
	/** 每次拉取的帖子数 */
	readonly timelineLimit: number;
	/** 帖子时间的时区，undefined 为本地时区 */
	readonly timeZone?: string;
	username?: string;
	password?: string;
	account?: Account;
	prefs?: Preferences;
	/** 刚发出的帖子，时间线重绘时提示一次 */
	lastPost?: Status;
	/** 启动时的致命错误，有值时只显示错误屏幕 */
	startupError?: string;
}

export interface ContextOptions {
	username?: string;
	password?: string;
	keybindings?: TimelineKeybindingsConfig;
	timelineLimit?: number;
	timeZone?: string;
}

export function createContext(client: ContentSource, options: ContextOptions = {}): SessionContext {
	return {
		client,
		keybindings: new TimelineKeybindingsManager(options.keybindings),
		timelineLimit: options.timelineLimit ?? DEFAULT_TIMELINE_LIMIT,
		timeZone: options.timeZone,
		username: options.username,
		password: options.password,
	};
}

/** 用户设置的默认可见范围，无效值按 public 处理 */
export function defaultVisibility(ctx: SessionContext): Visibility {
	const value = ctx.prefs?.["posting:default:visibility"];
	switch (value) {
		case "unlisted":
		case "private":
		case "direct":
			return value;
		default:
			return "public";
	}
}

/** 是否默认展开内容警告 */
export function expandSpoilers(ctx: SessionContext): boolean {
	return ctx.prefs?.["reading:expand:spoilers"] === true;
}
