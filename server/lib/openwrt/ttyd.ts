// Web terminal (ttyd) lookup for the dashboard's terminal tab

import type { Executor } from "../exec";
import { getOption, parseUCIShow } from "./uci-parser";

export interface TerminalInfo {
  port: string;
  ssl: boolean;
}

export const DEFAULT_TTYD_PORT = "7681";

export function terminalInfoFromUCI(output: string): TerminalInfo {
  const sections = parseUCIShow(output);
  const section =
    sections.find((s) => s.name === "core") ?? sections.find((s) => s.type === "ttyd");

  return {
    port: getOption(section, "port") || DEFAULT_TTYD_PORT,
    ssl: getOption(section, "ssl") === "1",
  };
}

/**
 * Read the ttyd port and TLS flag; defaults when ttyd is not configured
 */
export async function getTerminalInfo(exec: Executor): Promise<TerminalInfo> {
  const result = await exec.run("uci show ttyd", { timeout: 10000 });
  if (result.code !== 0) {
    console.log(`[ttyd] uci show ttyd failed (${result.code}), using defaults`);
    return { port: DEFAULT_TTYD_PORT, ssl: false };
  }
  return terminalInfoFromUCI(result.stdout);
}
