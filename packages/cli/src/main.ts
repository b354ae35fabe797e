/**
 * @file 会话循环
 *
 * 本文件负责：
 * - 打开设备（标准输入输出或串口），设备无应答时每秒重试
 * - 每条连接创建新的 Painter 和导航栈，从登录屏幕（或启动错误屏幕）开始
 * - 逐个读取输入，等待屏幕处理完成后再读取下一个；连续按住的方向键合并为一次
 * - 上游请求失败时显示错误屏幕，链路断开时重新连接
 */

import { ApiError, CredentialStore, MastodonClient } from "@slowterm/client";
import {
	type Action,
	matchesKey,
	NavigationStack,
	Painter,
	type Screen,
	type Terminal,
	TerminalDisconnectedError,
	Vt100Terminal,
} from "@slowterm/tui";
import { spawnSync } from "node:child_process";
import { createReadStream, createWriteStream } from "node:fs";
import type { Readable, Writable } from "node:stream";
import { setTimeout as sleep } from "node:timers/promises";
import type { SessionOptions } from "./args.js";
import { keybindingsFrom, type Settings } from "./config.js";
import { createContext, type SessionContext } from "./context.js";
import { logDebug, logError, logInfo, logStartup, logWarning, writeLogPath } from "./log.js";
import { ErrorScreen } from "./screens/error.js";
import { LoginScreen } from "./screens/login.js";

/** 一条设备连接 */
export interface Connection {
	terminal: Terminal;
	/** 释放连接占用的流 */
	dispose(): void;
}

export type Connector = () => Promise<Connection>;

export interface RunOptions {
	/** 连接失败后的重试间隔（毫秒） */
	retryDelayMs?: number;
}

/** 连接并等待设备应答光标位置查询，失败时按间隔重试 */
async function connectWithRetry(
	connect: Connector,
	retryDelayMs: number,
): Promise<{ connection: Connection; cursor: { row: number; col: number } }> {
	for (;;) {
		let connection: Connection | undefined;
		try {
			connection = await connect();
			const cursor = await connection.terminal.fetchCursor();
			logDebug(`Terminal answered, cursor at ${cursor.row};${cursor.col}`);
			return { connection, cursor };
		} catch (error) {
			connection?.terminal.close();
			connection?.dispose();
			logWarning("Terminal is not answering, retrying", error instanceof Error ? error.message : String(error));
			await sleep(retryDelayMs);
		}
	}
}

function firstScreen(nav: NavigationStack, ctx: SessionContext): Screen {
	if (ctx.startupError) {
		return new ErrorScreen(nav, ctx.startupError);
	}
	return new LoginScreen(nav, ctx);
}

/**
 * 在一条连接上运行，直到用户退出。链路断开时抛出 TerminalDisconnectedError。
 */
export async function serve(ctx: SessionContext, terminal: Terminal, cursor: { row: number; col: number }): Promise<void> {
	const painter = new Painter(terminal, cursor);
	const nav = new NavigationStack(painter);
	nav.replace([firstScreen(nav, ctx)]);

	for (;;) {
		const data = await terminal.recvInput();

		// Held arrow keys queue up faster than the link can redraw; only the last one counts.
		if (matchesKey(data, "up") || matchesKey(data, "down")) {
			while (terminal.peekInput() === data) {
				await terminal.recvInput();
			}
		}

		let action: Action | undefined;
		try {
			action = await nav.processInput(data);
		} catch (error) {
			if (!(error instanceof ApiError)) {
				throw error;
			}
			logError("Upstream request failed", error);
			nav.push([new ErrorScreen(nav, error.message, { fatal: false })]);
			continue;
		}

		if (!action) continue;
		switch (action.type) {
			case "exit":
				return;
			case "back":
				nav.pop(action.depth ?? 1);
				break;
			case "swap":
				action.swap(nav);
				break;
			case "null":
				break;
		}
	}
}

/**
 * 运行会话直到用户退出，链路断开后重新连接。
 */
export async function runSession(ctx: SessionContext, connect: Connector, options: RunOptions = {}): Promise<void> {
	const retryDelayMs = options.retryDelayMs ?? 1000;
	for (;;) {
		const { connection, cursor } = await connectWithRetry(connect, retryDelayMs);
		const { terminal } = connection;
		try {
			await serve(ctx, terminal, cursor);
			terminal.reset();
			return;
		} catch (error) {
			if (!(error instanceof TerminalDisconnectedError)) {
				throw error;
			}
			logWarning("Terminal disconnected, reconnecting", error.message);
		} finally {
			terminal.close();
			connection.dispose();
		}
	}
}

/** 用 stty 设置串口参数，失败时只警告 */
function configurePort(port: string, baud: number | undefined, flow: boolean): void {
	const args = ["-F", port];
	if (baud) args.push(String(baud));
	args.push("raw", "-echo", ...(flow ? ["ixon", "ixoff"] : ["-ixon", "-ixoff"]));
	const result = spawnSync("stty", args, { encoding: "utf-8" });
	if (result.error || result.status !== 0) {
		logWarning(`Could not configure ${port}`, result.error?.message ?? result.stderr.trim());
	}
}

/** 按选项打开设备 */
export function deviceConnector(options: SessionOptions): Connector {
	return async () => {
		let input: Readable;
		let output: Writable;
		let dispose = (): void => {};
		const { port } = options;
		if (port) {
			configurePort(port, options.baud, options.flow);
			const readStream = createReadStream(port);
			const writeStream = createWriteStream(port);
			input = readStream;
			output = writeStream;
			dispose = () => {
				readStream.destroy();
				writeStream.destroy();
			};
		} else {
			input = process.stdin;
			output = process.stdout;
		}

		const terminal = new Vt100Terminal({
			input,
			output,
			wide: options.wide,
			writeLogPath: writeLogPath() || undefined,
		});
		terminal.start();
		return { terminal, dispose };
	};
}

/**
 * 程序主流程：读取配置、注册应用、运行会话
 */
export async function main(options: SessionOptions, settings: Settings, configDir: string): Promise<void> {
	const { config: keybindings, unknown } = keybindingsFrom(settings);
	if (unknown.length > 0) {
		logWarning(`Unknown keybinding actions: ${unknown.join(", ")}`);
	}

	logStartup(options.server, options.port ?? "stdio", options.baud);

	const client = new MastodonClient(options.server, { credentials: new CredentialStore(configDir) });
	const ctx = createContext(client, {
		username: options.username,
		password: options.password,
		keybindings,
		timelineLimit: options.timelineLimit,
	});

	try {
		await client.register();
		logInfo(`Registered with ${client.server}`);
	} catch (error) {
		if (!(error instanceof ApiError)) {
			throw error;
		}
		logError(`Could not register with ${client.server}`, error);
		ctx.startupError = `Cannot connect to ${client.host}: ${error.message}`;
	}

	await runSession(ctx, deviceConnector(options));
	logInfo("Session ended");
}
