import { describe, expect, it } from "vitest";
import {
	AdapterError,
	ConfigurationError,
	Err,
	flatMapResult,
	fromPromise,
	LoadstoneError,
	mapResult,
	Ok,
	SchemaMismatchError,
	toError,
	unwrapOrThrow,
} from "../../result";

describe("Result", () => {
	it("Ok/Err have correct discriminants", () => {
		const ok = Ok(42);
		const err = Err(new LoadstoneError("fail", "TEST"));

		expect(ok.ok).toBe(true);
		if (ok.ok) expect(ok.value).toBe(42);
		expect(err.ok).toBe(false);
		if (!err.ok) expect(err.error).toBeInstanceOf(LoadstoneError);
	});

	it("mapResult transforms Ok, passes through Err", () => {
		const mapped = mapResult(Ok(10), (v) => v * 2);
		expect(mapped.ok).toBe(true);
		if (mapped.ok) expect(mapped.value).toBe(20);

		const mappedErr = mapResult(Err(new LoadstoneError("fail", "TEST")), (v: number) => v * 2);
		expect(mappedErr.ok).toBe(false);
	});

	it("flatMapResult chains correctly", () => {
		const half = (n: number) =>
			n % 2 === 0 ? Ok(n / 2) : Err(new LoadstoneError("odd", "ODD"));

		const chained = flatMapResult(Ok(8), half);
		expect(chained).toEqual({ ok: true, value: 4 });

		const failed = flatMapResult(Ok(3), half);
		expect(failed.ok).toBe(false);
		if (!failed.ok) expect(failed.error.code).toBe("ODD");
	});

	it("unwrapOrThrow returns the value or throws the error", () => {
		expect(unwrapOrThrow(Ok("x"))).toBe("x");
		expect(() => unwrapOrThrow(Err(new ConfigurationError("bad")))).toThrow("bad");
	});

	it("fromPromise wraps resolution and rejection", async () => {
		const ok = await fromPromise(Promise.resolve(1));
		expect(ok).toEqual({ ok: true, value: 1 });

		const err = await fromPromise(Promise.reject("boom"));
		expect(err.ok).toBe(false);
		if (!err.ok) expect(err.error.message).toBe("boom");
	});
});

describe("errors", () => {
	it("subclasses carry their code, name and cause", () => {
		const cause = new Error("socket hang up");
		const err = new AdapterError("insert failed", cause);

		expect(err).toBeInstanceOf(LoadstoneError);
		expect(err.code).toBe("ADAPTER_ERROR");
		expect(err.name).toBe("AdapterError");
		expect(err.cause).toBe(cause);
		expect(new SchemaMismatchError("x").code).toBe("SCHEMA_MISMATCH");
	});

	it("toError keeps Error instances and wraps anything else", () => {
		const original = new Error("a");
		expect(toError(original)).toBe(original);
		expect(toError(42).message).toBe("42");
	});
});
