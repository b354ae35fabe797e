/**
 * @file 时间线快捷键绑定管理
 *
 * 本文件定义了时间线屏幕支持的所有动作类型（TimelineAction），
 * 以及对应的默认快捷键绑定。用户可以通过配置文件中的
 * keybindings 字段（TimelineKeybindingsConfig）自定义快捷键映射。
 *
 * TimelineKeybindingsManager 负责管理快捷键配置，支持：
 * - 基于默认配置的初始化
 * - 用户自定义配置的覆盖
 * - 输入数据与动作的匹配检查
 */

import { type KeyId, matchesKey } from "./keys.js";

/** 所有可绑定的时间线动作 */
export const TIMELINE_ACTIONS = [
	// 滚动
	"scrollUp",
	"scrollDown",
	"nextPost",
	"previousPost",
	"top",
	// 时间线切换
	"homeTimeline",
	"localTimeline",
	"globalTimeline",
	// 操作
	"refresh",
	"compose",
	"help",
	"quit",
] as const;

/**
 * 可绑定到快捷键的时间线动作类型
 */
export type TimelineAction = (typeof TIMELINE_ACTIONS)[number];

export type { KeyId };

/**
 * 时间线快捷键配置类型。
 * 每个动作可以绑定单个按键或多个按键。
 */
export type TimelineKeybindingsConfig = {
	[K in TimelineAction]?: KeyId | KeyId[];
};

/**
 * 默认时间线快捷键绑定配置
 */
export const DEFAULT_TIMELINE_KEYBINDINGS: Required<TimelineKeybindingsConfig> = {
	scrollUp: "up",
	scrollDown: "down",
	nextPost: "n",
	previousPost: "p",
	top: "t",
	homeTimeline: "h",
	localTimeline: "l",
	globalTimeline: "g",
	refresh: "r",
	compose: "c",
	help: "?",
	quit: "q",
};

function toArray(keys: KeyId | KeyId[]): KeyId[] {
	return Array.isArray(keys) ? [...keys] : [keys];
}

/**
 * 时间线快捷键管理器。
 * 管理动作到按键的映射，支持默认配置和用户自定义覆盖。
 */
export class TimelineKeybindingsManager {
	/** 动作到按键数组的映射 */
	private actionToKeys = new Map<TimelineAction, KeyId[]>();

	constructor(config: TimelineKeybindingsConfig = {}) {
		this.buildMaps(config);
	}

	private buildMaps(config: TimelineKeybindingsConfig): void {
		this.actionToKeys.clear();
		for (const action of TIMELINE_ACTIONS) {
			// User config replaces the default binding of an action entirely.
			this.actionToKeys.set(action, toArray(config[action] ?? DEFAULT_TIMELINE_KEYBINDINGS[action]));
		}
	}

	/**
	 * 检查输入是否匹配指定的动作。
	 */
	matches(data: string, action: TimelineAction): boolean {
		const keys = this.actionToKeys.get(action);
		if (!keys) return false;
		return keys.some((key) => matchesKey(data, key));
	}

	/** 返回输入匹配的第一个动作 */
	actionFor(data: string): TimelineAction | undefined {
		return TIMELINE_ACTIONS.find((action) => this.matches(data, action));
	}

	/**
	 * 获取绑定到指定动作的所有按键。
	 */
	getKeys(action: TimelineAction): KeyId[] {
		return this.actionToKeys.get(action) ?? [];
	}

	/**
	 * 更新快捷键配置。
	 */
	setConfig(config: TimelineKeybindingsConfig): void {
		this.buildMaps(config);
	}
}
