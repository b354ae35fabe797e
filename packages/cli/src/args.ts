/**
 * @file 命令行参数解析
 *
 * slowterm [--port PATH] [--baud N] [--flow] [--wide] SERVER [USERNAME] [PASSWORD]
 *
 * 命令行参数优先于 settings.json 中的同名设置。
 */

import { DEFAULT_TIMELINE_LIMIT, type Settings } from "./config.js";

/** 合并后的会话选项 */
export interface SessionOptions {
	server: string;
	username?: string;
	password?: string;
	/** 串口设备路径，undefined 表示使用标准输入输出 */
	port?: string;
	baud?: number;
	flow: boolean;
	/** undefined 表示不切换列宽模式 */
	wide?: boolean;
	timelineLimit: number;
}

export type ParsedArgs =
	| { kind: "help" }
	| { kind: "version" }
	| { kind: "error"; message: string }
	| { kind: "run"; options: SessionOptions };

/**
 * 解析参数（不含 node 和脚本路径）并与文件设置合并
 */
export function parseArgs(args: readonly string[], settings: Settings = {}): ParsedArgs {
	if (args.includes("--help") || args.includes("-h")) {
		return { kind: "help" };
	}
	if (args.includes("--version") || args.includes("-v")) {
		return { kind: "version" };
	}

	let port = settings.port;
	let baud = settings.baud;
	let flow = settings.flow ?? false;
	let wide = settings.wide;
	const positional: string[] = [];

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === "--port") {
			const value = args[i + 1];
			if (value === undefined) {
				return { kind: "error", message: "--port requires a device path" };
			}
			port = value;
			i++;
		} else if (arg === "--baud") {
			const value = Number(args[i + 1]);
			if (!Number.isInteger(value) || value <= 0) {
				return { kind: "error", message: "--baud requires a positive integer" };
			}
			baud = value;
			i++;
		} else if (arg === "--flow") {
			flow = true;
		} else if (arg === "--wide") {
			wide = true;
		} else if (arg.startsWith("-")) {
			return { kind: "error", message: `Unknown option: ${arg}` };
		} else {
			positional.push(arg);
		}
	}

	if (positional.length > 3) {
		return { kind: "error", message: `Unexpected argument: ${positional[3]}` };
	}

	const server = positional[0] ?? settings.server;
	if (!server) {
		return { kind: "error", message: "No server given" };
	}

	return {
		kind: "run",
		options: {
			server,
			username: positional[1] ?? settings.username,
			password: positional[2],
			port,
			baud,
			flow,
			wide,
			timelineLimit: settings.timelineLimit ?? DEFAULT_TIMELINE_LIMIT,
		},
	};
}
