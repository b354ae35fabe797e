/**
 * @file 配置管理模块
 *
 * 本文件负责：
 * - 定位配置目录（SLOWTERM_CONFIG_DIR 环境变量，默认 ~/.slowterm），不存在时创建
 * - 读取并校验 settings.json，文件无效时报告问题并使用默认值
 * - 把文件设置和命令行参数合并为会话选项
 *
 * 应用注册凭据也保存在同一目录中（见 CredentialStore）。
 */

import { type Static, Type } from "@sinclair/typebox";
import { TypeCompiler } from "@sinclair/typebox/compiler";
import { TIMELINE_ACTIONS, type TimelineKeybindingsConfig } from "@slowterm/tui";
import { existsSync, mkdirSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

const KeySpecSchema = Type.Union([Type.String(), Type.Array(Type.String())]);

export const SettingsSchema = Type.Object({
	/** 默认服务器 */
	server: Type.Optional(Type.String()),
	/** 默认用户名 */
	username: Type.Optional(Type.String()),
	/** 串口设备路径，不设置时使用标准输入输出 */
	port: Type.Optional(Type.String()),
	baud: Type.Optional(Type.Integer({ minimum: 50 })),
	/** 启用 XON/XOFF 流控 */
	flow: Type.Optional(Type.Boolean()),
	/** 132 列模式 */
	wide: Type.Optional(Type.Boolean()),
	/** 每次拉取的帖子数 */
	timelineLimit: Type.Optional(Type.Integer({ minimum: 1, maximum: 40 })),
	/** 时间线快捷键覆盖 */
	keybindings: Type.Optional(Type.Record(Type.String(), KeySpecSchema)),
});

export type Settings = Static<typeof SettingsSchema>;

const settingsCheck = TypeCompiler.Compile(SettingsSchema);

export const DEFAULT_TIMELINE_LIMIT = 20;

/** 读取结果，problems 为空表示文件有效或不存在 */
export interface LoadedSettings {
	settings: Settings;
	path: string;
	problems: string[];
}

/**
 * 获取配置目录路径，不存在时创建
 */
export function getConfigDir(): string {
	const configDir = process.env.SLOWTERM_CONFIG_DIR || join(homedir(), ".slowterm");
	if (!existsSync(configDir)) {
		mkdirSync(configDir, { recursive: true });
	}
	return configDir;
}

export function getSettingsPath(configDir: string): string {
	return join(configDir, "settings.json");
}

/**
 * 加载 settings.json。
 * 文件不存在时返回空设置；无法解析或不符合结构时返回空设置并列出问题。
 */
export function loadSettings(configDir: string): LoadedSettings {
	const path = getSettingsPath(configDir);
	if (!existsSync(path)) {
		return { settings: {}, path, problems: [] };
	}

	let data: unknown;
	try {
		data = JSON.parse(readFileSync(path, "utf-8"));
	} catch (e) {
		return { settings: {}, path, problems: [`Cannot parse ${path}: ${e instanceof Error ? e.message : String(e)}`] };
	}

	if (!settingsCheck.Check(data)) {
		const problems = Array.from(settingsCheck.Errors(data)).map((error) => `${error.path || "/"}: ${error.message}`);
		return { settings: {}, path, problems };
	}
	return { settings: data, path, problems: [] };
}

function isTimelineAction(name: string): name is (typeof TIMELINE_ACTIONS)[number] {
	return TIMELINE_ACTIONS.some((action) => action === name);
}

/**
 * 把设置中的快捷键转换为时间线快捷键配置，返回不认识的动作名
 */
export function keybindingsFrom(settings: Settings): { config: TimelineKeybindingsConfig; unknown: string[] } {
	const config: TimelineKeybindingsConfig = {};
	const unknown: string[] = [];
	for (const [name, keys] of Object.entries(settings.keybindings ?? {})) {
		if (isTimelineAction(name)) {
			config[name] = keys;
		} else {
			unknown.push(name);
		}
	}
	return { config, unknown };
}
