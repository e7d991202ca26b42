import { describe, expect, it } from "vitest";
import { execCommand, quote } from "./exec";

describe("quote", () => {
  it("wraps a value in single quotes", () => {
    expect(quote("hello world")).toBe("'hello world'");
  });

  it("escapes embedded single quotes", () => {
    expect(quote("it's")).toBe("'it'\\''s'");
  });
});

describe("execCommand", () => {
  it("collects output and streams complete lines", async () => {
    const stdoutLines: string[] = [];
    const stderrLines: string[] = [];

    const result = await execCommand("printf 'a\\nb\\n'; printf 'c' >&2", {
      onLine: (line, stream) => (stream === "stdout" ? stdoutLines : stderrLines).push(line),
    });

    expect(result).toEqual({ stdout: "a\nb\n", stderr: "c", code: 0 });
    expect(stdoutLines).toEqual(["a", "b"]);
    expect(stderrLines).toEqual(["c"]);
  });

  it("keeps multi-byte characters split across output chunks", async () => {
    const lines: string[] = [];

    const result = await execCommand("printf '\\303'; sleep 0.2; printf '\\251t\\n'", {
      onLine: (line) => lines.push(line),
    });

    expect(result.stdout).toBe("\u00e9t\n");
    expect(lines).toEqual(["\u00e9t"]);
  });

  it("resolves with a non-zero exit code", async () => {
    const result = await execCommand("exit 3");
    expect(result.code).toBe(3);
  });

  it("runs in the given directory", async () => {
    const result = await execCommand("pwd", { cwd: "/" });
    expect(result.stdout).toBe("/\n");
  });

  it("rejects when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(execCommand("echo never", { signal: controller.signal })).rejects.toThrow(
      "Command aborted before start"
    );
  });

  it("rejects on timeout", async () => {
    await expect(execCommand("sleep 5", { timeout: 50 })).rejects.toThrow("Command timeout after 50ms");
  });
});
