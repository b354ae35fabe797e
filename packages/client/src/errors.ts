/**
 * @file 上游错误类型
 */

/** 上游请求失败，或返回了无法识别的数据 */
export class ApiError extends Error {
	/** HTTP 状态码；响应格式错误时为 undefined */
	readonly status?: number;

	constructor(message: string, status?: number) {
		super(message);
		this.name = "ApiError";
		this.status = status;
	}
}

/** 用户名或密码错误 */
export class BadLoginError extends Error {
	constructor(message = "Bad username or password!") {
		super(message);
		this.name = "BadLoginError";
	}
}

/** 没能在服务器上注册应用，客户端不可用 */
export class InvalidClientError extends Error {
	constructor(server: string) {
		super(`Invalid client for ${server}`);
		this.name = "InvalidClientError";
	}
}
