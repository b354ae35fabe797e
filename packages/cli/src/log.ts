/**
 * @file log.ts - 控制台日志输出模块
 *
 * 标准输出可能就是设备本身，因此所有日志都写到 stderr。
 *
 * 日志颜色约定：
 * - 蓝色：会话信息（连接、登录、切换屏幕）
 * - 黄色：警告（设备无应答、重连）
 * - 红色：错误
 * - 灰色：调试信息，仅在 SLOWTERM_DEBUG=1 时输出
 */

import chalk from "chalk";

/**
 * 生成当前时间戳字符串
 * @returns 格式为 [HH:MM:SS] 的时间戳
 */
function timestamp(): string {
	const now = new Date();
	const hh = String(now.getHours()).padStart(2, "0");
	const mm = String(now.getMinutes()).padStart(2, "0");
	const ss = String(now.getSeconds()).padStart(2, "0");
	return `[${hh}:${mm}:${ss}]`;
}

function write(line: string): void {
	process.stderr.write(`${line}\n`);
}

/** 是否输出调试日志 */
export function debugEnabled(): boolean {
	return process.env.SLOWTERM_DEBUG === "1";
}

/** 设备写入日志路径（SLOWTERM_WRITE_LOG），未设置时为空 */
export function writeLogPath(): string {
	return process.env.SLOWTERM_WRITE_LOG ?? "";
}

export function logInfo(message: string): void {
	write(chalk.blue(`${timestamp()} ${message}`));
}

export function logWarning(message: string, detail?: string): void {
	write(chalk.yellow(`${timestamp()} ⚠ ${message}`));
	if (detail) {
		write(chalk.dim(`           ${detail}`));
	}
}

export function logError(message: string, error?: unknown): void {
	write(chalk.red(`${timestamp()} ✗ ${message}`));
	if (error instanceof Error && error.stack && debugEnabled()) {
		write(chalk.dim(error.stack));
	} else if (error !== undefined) {
		write(chalk.dim(`           ${error instanceof Error ? error.message : String(error)}`));
	}
}

export function logDebug(message: string): void {
	if (!debugEnabled()) return;
	write(chalk.gray(`${timestamp()} ${message}`));
}

/** 会话启动信息 */
export function logStartup(server: string, port: string, baud: number | undefined): void {
	write(chalk.blue(`${timestamp()} Starting slowterm for ${server}`));
	write(chalk.dim(`           device: ${port}${baud ? ` @ ${baud} baud` : ""}`));
}
