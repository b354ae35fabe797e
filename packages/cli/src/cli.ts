#!/usr/bin/env -S node --import tsx
/**
 * @file CLI 入口文件
 *
 * 解析命令行参数，读取配置后启动会话。
 */
import chalk from "chalk";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "./args.js";
import { getConfigDir, loadSettings } from "./config.js";
import { logError, logWarning } from "./log.js";
import { main } from "./main.js";

/** 当前文件所在目录的绝对路径 */
const here = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
	const data: unknown = JSON.parse(readFileSync(join(here, "../package.json"), "utf-8"));
	if (typeof data === "object" && data !== null && "version" in data && typeof data.version === "string") {
		return data.version;
	}
	return "unknown";
}

function printHelp(): void {
	console.log(`slowterm v${readVersion()} - Read timelines on a VT-100 class terminal

Usage:
  slowterm [options] SERVER [USERNAME] [PASSWORD]

Options:
  --port <path>    Serial device to use instead of stdin/stdout
  --baud <rate>    Line speed set on the serial device with stty
  --flow           Enable XON/XOFF flow control on the serial device
  --wide           Switch the terminal to 132 columns
  --help, -h       Show this help
  --version, -v    Show the version

Environment:
  SLOWTERM_CONFIG_DIR   Config directory (default: ~/.slowterm)
  SLOWTERM_DEBUG        Set to 1 for debug logging
  SLOWTERM_WRITE_LOG    Append every byte sent to the terminal to this file`);
}

const configDir = getConfigDir();
const loaded = loadSettings(configDir);
for (const problem of loaded.problems) {
	logWarning(`Ignoring invalid settings in ${loaded.path}`, problem);
}

const parsed = parseArgs(process.argv.slice(2), loaded.settings);
switch (parsed.kind) {
	case "help":
		printHelp();
		process.exit(0);
		break;
	case "version":
		console.log(readVersion());
		process.exit(0);
		break;
	case "error":
		console.error(chalk.red(parsed.message));
		console.error("Run slowterm --help for usage.");
		process.exit(1);
		break;
	case "run":
		try {
			await main(parsed.options, loaded.settings, configDir);
			process.exit(0);
		} catch (error) {
			logError("slowterm crashed", error);
			process.exit(1);
		}
}
