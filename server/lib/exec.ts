import { spawn } from "node:child_process";

export interface ExecResult {
  stdout: string;
  stderr: string;
  code: number;
}

export type OutputStream = "stdout" | "stderr";

export interface ExecOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number;
  signal?: AbortSignal;
  /** Called once per complete output line, in arrival order */
  onLine?: (line: string, stream: OutputStream) => void;
}

/**
 * Anything able to run a shell command line. Actions only talk to this,
 * so tests can swap in a recording fake.
 */
export interface Executor {
  run(command: string, options?: ExecOptions): Promise<ExecResult>;
}

const DEFAULT_TIMEOUT = 30000;

/**
 * Run a command line through `sh -c`.
 * A non-zero exit resolves; spawn errors, timeouts and aborts reject.
 */
export async function execCommand(
  command: string,
  options: ExecOptions = {}
): Promise<ExecResult> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;

  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new Error("Command aborted before start"));
      return;
    }

    let stdout = "";
    let stderr = "";
    const partial: Record<OutputStream, string> = { stdout: "", stderr: "" };

    const child = spawn("sh", ["-c", command], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const emitLines = (stream: OutputStream, chunk: string, flush: boolean) => {
      if (!options.onLine) return;
      const text = partial[stream] + chunk;
      const lines = text.split("\n");
      partial[stream] = flush ? "" : lines.pop() ?? "";
      for (const line of lines) {
        if (flush && line === "") continue;
        options.onLine(line, stream);
      }
    };

    const timeoutId = setTimeout(() => {
      console.log(`[exec] TIMEOUT after ${timeout}ms: ${command}`);
      child.kill("SIGTERM");
      reject(new Error(`Command timeout after ${timeout}ms`));
    }, timeout);

    const onAbort = () => {
      console.log(`[exec] Aborted: ${command}`);
      child.kill("SIGTERM");
      clearTimeout(timeoutId);
      reject(new Error("Command aborted"));
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    // Decode as a stream so characters split across chunks survive
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");

    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
      emitLines("stdout", chunk, false);
    });

    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
      emitLines("stderr", chunk, false);
    });

    child.on("close", (code) => {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener("abort", onAbort);
      emitLines("stdout", "", true);
      emitLines("stderr", "", true);
      resolve({ stdout, stderr, code: code ?? 1 });
    });

    child.on("error", (err) => {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener("abort", onAbort);
      console.log(`[exec] ERROR:`, err.message);
      reject(err);
    });
  });
}

export const shellExecutor: Executor = {
  run: execCommand,
};

/**
 * Quote a value as a single shell word
 */
export function quote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
