/**
 * Tides 统一日志工具
 * 格式: [timestamp] [LEVEL] [module] message
 * stdio 模式下 stdout 用于 MCP 协议，所有级别都输出到 stderr
 * 级别由启动时的 TidesConfig.logLevel 决定（cli 调用 setLogLevel），默认 info
 */

import type { LogLevel } from "./config";

const LEVELS: Record<LogLevel, number> = {
	info: 0,
	warn: 1,
	error: 2,
};

let minLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
	minLevel = level;
}

export function getLogLevel(): LogLevel {
	return minLevel;
}

function shouldLog(level: LogLevel): boolean {
	return LEVELS[level] >= LEVELS[minLevel];
}

function formatArg(arg: unknown): string {
	if (arg instanceof Error) {
		return arg.stack ?? arg.message;
	}
	if (typeof arg === "object" && arg !== null) {
		return JSON.stringify(arg);
	}
	return String(arg);
}

export function formatMessage(
	module: string,
	level: LogLevel,
	args: unknown[]
): string {
	const timestamp = new Date().toISOString();
	const prefix = `[${timestamp}] [Tides][${module}]`;
	const msg = args.map(formatArg).join(" ");
	const levelTag = level === "info" ? "" : ` [${level.toUpperCase()}] `;
	return `${prefix}${levelTag}${msg}`;
}

export interface TidesLogger {
	info(...args: unknown[]): void;
	warn(...args: unknown[]): void;
	error(...args: unknown[]): void;
}

/**
 * 创建带模块名的日志器
 */
export function createLogger(module: string): TidesLogger {
	return {
		info(...args: unknown[]) {
			if (shouldLog("info")) {
				console.error(formatMessage(module, "info", args));
			}
		},
		warn(...args: unknown[]) {
			if (shouldLog("warn")) {
				console.error(formatMessage(module, "warn", args));
			}
		},
		error(...args: unknown[]) {
			if (shouldLog("error")) {
				console.error(formatMessage(module, "error", args));
			}
		},
	};
}
