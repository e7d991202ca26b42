import type { ConsoleServer } from "../index";
import yargs, { type Argv, type Arguments } from "yargs";
import { updateBuildStatus } from "../lib/ci/build-status";
import { type AppConfig, loadConfig } from "../lib/config";
import { type Executor, shellExecutor } from "../lib/exec";
import { FirmwareBuild } from "../lib/firmware/build-pipeline";
import { createBuildPlan } from "../lib/firmware/build-plan";
import { fetchDeviceCatalog, writeDeviceCatalog } from "../lib/firmware/device-catalog";
import { LOCK_CONTENTION_LINE } from "../lib/runner/action-log";
import { ActionRunner, CLEAR_LOG_ACTION } from "../lib/runner/action-runner";
import { LockHeldError } from "../lib/runner/lock-file";
import type { IO } from "./io";

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface CliOptions {
  argv: string[];
  io: IO;
  env?: NodeJS.ProcessEnv;
  exec?: Executor;
  fetch?: typeof fetch;
  signals?: SignalSource;
  startServer?: (config: AppConfig) => Promise<ConsoleServer>;
}

const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
  SIGINT: 130,
  SIGTERM: 143,
};

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.map((v) => String(v)) : [];
}

function optionalString(value: unknown): string | undefined {
  return value === undefined || value === "" ? undefined : String(value);
}

/**
 * CLI adapter: parse commands → runner, server, CI and firmware helpers
 *
 * Commands:
 * - run <action> [args..]
 * - serve
 * - build-status --project --user --build --status [--url]
 * - firmware build --target --profile --version --theme [...]
 * - firmware devices [--output <file>]
 */
export async function runCli(opts: CliOptions): Promise<number> {
  const { argv, io } = opts;
  const exec = opts.exec ?? shellExecutor;
  const fetchImpl = opts.fetch ?? fetch;
  const signals = opts.signals ?? process;
  let exitCode = 0;

  const config = (): AppConfig => loadConfig(opts.env ?? process.env);

  const parser = yargs(argv)
    .scriptName("router-console")
    .version(false)
    .command(
      "run <action> [args..]",
      "Run one action under the runner lock",
      (y: Argv) =>
        y
          .positional("action", { type: "string", demandOption: true })
          .positional("args", { type: "string", array: true }),
      async (args: Arguments) => {
        const action = String(args.action);
        const runner = new ActionRunner({ config: config(), exec, fetch: fetchImpl, source: "cli" });

        if (action === CLEAR_LOG_ACTION) {
          await runner.clearLog();
          return;
        }

        const interrupted: { signal: NodeJS.Signals | null } = { signal: null };
        const onSignal = (signal: NodeJS.Signals) => {
          interrupted.signal = signal;
          if (!runner.abort()) runner.lock.releaseSync();
        };
        signals.on("SIGINT", onSignal);
        signals.on("SIGTERM", onSignal);

        try {
          const outcome = await runner.run(action, stringList(args.args));
          exitCode = interrupted.signal ? SIGNAL_EXIT_CODES[interrupted.signal] ?? 1 : outcome.code;
        } catch (err) {
          if (err instanceof LockHeldError) {
            io.stderr(`${LOCK_CONTENTION_LINE}\n`);
            exitCode = 1;
            return;
          }
          throw err;
        } finally {
          signals.off("SIGINT", onSignal);
          signals.off("SIGTERM", onSignal);
        }
      }
    )
    .command(
      "serve",
      "Start the HTTP API and dashboard sync server",
      (y: Argv) => y,
      async () => {
        const start = opts.startServer ?? (await import("../index")).startServer;
        const app = await start(config());
        io.stdout("Press Ctrl+C to stop.\n");

        let onSignal: (signal: NodeJS.Signals) => void = () => undefined;
        const interrupted = new Promise<NodeJS.Signals>((resolve) => {
          onSignal = resolve;
        });
        const closed = new Promise<null>((resolve) => app.server.once("close", () => resolve(null)));
        signals.on("SIGINT", onSignal);
        signals.on("SIGTERM", onSignal);

        try {
          const signal = await Promise.race([interrupted, closed]);
          if (signal) {
            console.log(`[server] ${signal} received, shutting down`);
            await app.shutdown();
            exitCode = SIGNAL_EXIT_CODES[signal] ?? 1;
          }
        } finally {
          signals.off("SIGINT", onSignal);
          signals.off("SIGTERM", onSignal);
        }
      }
    )
    .command(
      "build-status",
      "Record a firmware build result in Firestore",
      (y: Argv) =>
        y
          .option("project", { type: "string", demandOption: true })
          .option("user", { type: "string", demandOption: true })
          .option("build", { type: "string", demandOption: true })
          .option("status", { type: "string", demandOption: true })
          .option("url", { type: "string" }),
      async (args: Arguments) => {
        await updateBuildStatus(
          {
            projectId: String(args.project),
            userId: String(args.user),
            buildId: String(args.build),
            status: String(args.status),
            downloadUrl: optionalString(args.url),
          },
          exec
        );
      }
    )
    .command(
      "firmware <action>",
      "Firmware image tooling",
      (y: Argv) =>
        y
          .positional("action", { type: "string", choices: ["build", "devices"] as const, demandOption: true })
          .option("target", { type: "string" })
          .option("profile", { type: "string" })
          .option("version", { type: "string" })
          .option("theme", { type: "string", default: "luci-theme-bootstrap" })
          .option("packages", { type: "string", default: "" })
          .option("workspace", { type: "string", default: process.cwd() })
          .option("prefix", { type: "string" })
          .option("key", { type: "string" })
          .option("ipk-repo", { type: "string", array: true })
          .option("upload-host", { type: "string" })
          .option("upload-user", { type: "string", default: "root" })
          .option("upload-dir", { type: "string" })
          .option("ssh-key", { type: "string" })
          .option("output", { type: "string", default: "devices.json" }),
      async (args: Arguments) => {
        const action = String(args.action);

        if (action === "devices") {
          const devices = await fetchDeviceCatalog(undefined, fetchImpl);
          await writeDeviceCatalog(String(args.output), devices);
          io.stdout(`${devices.length} devices written to ${String(args.output)}\n`);
          return;
        }

        const target = optionalString(args.target);
        const profile = optionalString(args.profile);
        const version = optionalString(args.version);
        if (!target || !profile || !version) {
          throw new Error("firmware build requires --target, --profile and --version");
        }

        const plan = createBuildPlan({
          target,
          profile,
          version,
          theme: String(args.theme),
          extraPackages: String(args.packages),
          workspace: String(args.workspace),
          outputPrefix: optionalString(args.prefix),
          customKeyFile: optionalString(args.key),
          ipkRepos: stringList(args["ipk-repo"]),
        });

        const uploadHost = optionalString(args["upload-host"]);
        const uploadDir = optionalString(args["upload-dir"]);
        if (uploadHost && !uploadDir) {
          throw new Error("--upload-host requires --upload-dir");
        }

        const result = await new FirmwareBuild(plan, {
          exec,
          fetch: fetchImpl,
          upload:
            uploadHost && uploadDir
              ? {
                  host: uploadHost,
                  user: String(args["upload-user"]),
                  remoteDir: uploadDir,
                  sshKey: optionalString(args["ssh-key"]),
                }
              : undefined,
        }).run();

        for (const file of result.files) {
          io.stdout(`${result.outputDir}/${file}\n`);
        }
      }
    )
    .demandCommand(1)
    .strict()
    .help()
    .exitProcess(false)
    .fail((msg: string | undefined, err: Error | undefined) => {
      throw err ?? new Error(msg ?? "Invalid command");
    });

  try {
    await parser.parseAsync();
    return exitCode;
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}
