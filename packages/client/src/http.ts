/**
 * @file JSON 请求辅助
 */

import type { Static, TSchema } from "@sinclair/typebox";
import type { TypeCheck } from "@sinclair/typebox/compiler";
import { ApiError } from "./errors.js";

export type FetchFn = typeof fetch;

/**
 * 发送请求并解析 JSON。
 * 网络失败和非 2xx 响应都抛出 ApiError，后者带状态码。
 */
export async function fetchJson(fetchImpl: FetchFn, url: string, init: RequestInit): Promise<unknown> {
	let response: Response;
	try {
		response = await fetchImpl(url, init);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ApiError(`Request to ${new URL(url).host} failed: ${reason}`);
	}
	if (!response.ok) {
		const text = await response.text();
		throw new ApiError(`${response.status} ${response.statusText}: ${text}`, response.status);
	}
	try {
		return await response.json();
	} catch {
		throw new ApiError(`Invalid JSON from ${new URL(url).host}`, response.status);
	}
}

/** 校验响应结构，不符合时列出前几个错误 */
export function expectShape<T extends TSchema>(check: TypeCheck<T>, value: unknown, what: string): Static<T> {
	if (check.Check(value)) {
		return value;
	}
	const problems = Array.from(check.Errors(value))
		.slice(0, 3)
		.map((error) => `${error.path || "/"}: ${error.message}`);
	throw new ApiError(`Unexpected ${what} response (${problems.join("; ")})`);
}
