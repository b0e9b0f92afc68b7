import { describe, it, expect } from "vitest";
import { Ok, Err, toError, tryCatchAsync } from "../src/result.js";

describe("Result", () => {
  it("Ok wraps a value", () => {
    expect(Ok(42)).toEqual({ ok: true, value: 42 });
  });

  it("Err wraps an error", () => {
    const error = new Error("boom");
    const result = Err(error);
    expect(result.ok).toBe(false);
    expect(result.error).toBe(error);
  });

  it("toError keeps errors and wraps anything else", () => {
    const error = new TypeError("bad");
    expect(toError(error)).toBe(error);
    expect(toError("plain").message).toBe("plain");
    expect(toError(404).message).toBe("404");
  });

  it("tryCatchAsync captures rejections", async () => {
    expect(await tryCatchAsync(async () => "read")).toEqual({ ok: true, value: "read" });

    const failed = await tryCatchAsync(() => Promise.reject(new Error("ENOENT")));
    expect(failed.ok).toBe(false);
    if (!failed.ok) expect(failed.error.message).toBe("ENOENT");
  });
});
