import { describe, it, expect } from "vitest";
import {
	getErrorMessage,
	TidesError,
	ValidationError,
	StorageUnavailableError,
} from "./errors";

describe("getErrorMessage", () => {
	it("Error 返回 message", () => {
		expect(getErrorMessage(new Error("test"))).toBe("test");
	});

	it("string 原样返回", () => {
		expect(getErrorMessage("hello")).toBe("hello");
	});

	it("其它类型转 String", () => {
		expect(getErrorMessage(123)).toBe("123");
		expect(getErrorMessage(null)).toBe("null");
	});
});

describe("TidesError 子类", () => {
	it("默认错误码为 INTERNAL", () => {
		const err = new TidesError("x");
		expect(err.name).toBe("TidesError");
		expect(err.code).toBe("INTERNAL");
	});

	it("ValidationError 正确继承", () => {
		const err = new ValidationError("x");
		expect(err).toBeInstanceOf(TidesError);
		expect(err.code).toBe("VALIDATION");
	});

	it("StorageUnavailableError 记录目录与原因", () => {
		const cause = new Error("EACCES");
		const err = new StorageUnavailableError("cannot create", "/tmp/x", cause);
		expect(err).toBeInstanceOf(TidesError);
		expect(err.code).toBe("STORAGE_UNAVAILABLE");
		expect(err.directory).toBe("/tmp/x");
		expect(err.cause).toBe(cause);
	});
});
