/**
 * @file 应用注册凭据存储
 *
 * 每个服务器只需注册一次应用。凭据按主机名保存为目录下的一个 JSON 文件，
 * 文件损坏或格式不对时视为不存在，下次连接会重新注册。
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { type AppCredentials, validators } from "./schemas.js";

export class CredentialStore {
	readonly dir: string;

	constructor(dir: string) {
		this.dir = dir;
	}

	/** 凭据文件路径 */
	pathFor(host: string): string {
		return join(this.dir, `${host}.clientcred.json`);
	}

	load(host: string): AppCredentials | undefined {
		const path = this.pathFor(host);
		if (!existsSync(path)) {
			return undefined;
		}
		let data: unknown;
		try {
			data = JSON.parse(readFileSync(path, "utf-8"));
		} catch {
			return undefined;
		}
		return validators.appCredentials.Check(data) ? data : undefined;
	}

	save(host: string, credentials: AppCredentials): void {
		mkdirSync(this.dir, { recursive: true });
		const { client_id, client_secret } = credentials;
		writeFileSync(this.pathFor(host), `${JSON.stringify({ client_id, client_secret }, null, 2)}\n`, { mode: 0o600 });
	}
}
