/**
 * Tides 结构化错误类型
 * 统一错误码和消息格式
 */

export type TidesErrorCode =
	| "VALIDATION"
	| "STORAGE_UNAVAILABLE"
	| "INTERNAL";

/**
 * Tides 业务错误基类
 */
export class TidesError extends Error {
	readonly code: TidesErrorCode;

	constructor(message: string, options?: { code?: TidesErrorCode; cause?: unknown }) {
		super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
		this.name = "TidesError";
		this.code = options?.code ?? "INTERNAL";
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/** 参数 / patch 校验失败 */
export class ValidationError extends TidesError {
	constructor(message: string) {
		super(message, { code: "VALIDATION" });
		this.name = "ValidationError";
	}
}

/** 存储目录无法创建或访问，启动即失败 */
export class StorageUnavailableError extends TidesError {
	readonly directory: string;

	constructor(message: string, directory: string, cause?: unknown) {
		super(message, { code: "STORAGE_UNAVAILABLE", cause });
		this.name = "StorageUnavailableError";
		this.directory = directory;
	}
}

/**
 * 从 unknown 安全提取错误消息
 */
export function getErrorMessage(error: unknown): string {
	if (error instanceof Error) return error.message;
	if (typeof error === "string") return error;
	return String(error);
}
