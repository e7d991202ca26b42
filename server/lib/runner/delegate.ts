// Delegation of unknown actions to the remotely maintained service runner

import { SystemCommands } from "../openwrt/commands/system";
import { type ActionContext, downloadScript, runLogged } from "./action-context";

export const SERVICE_RUNNER_FILE = "service_runner.sh";

export async function delegateAction(ctx: ActionContext, action: string): Promise<number> {
  await ctx.log.append(`>>> Action '${action}' not found locally. Delegating to Service Runner...`);

  let script: string;
  try {
    script = await downloadScript(ctx, ctx.config.serviceRunnerUrl, SERVICE_RUNNER_FILE);
  } catch (err) {
    console.error("[runner] Service runner download failed:", err instanceof Error ? err.message : err);
    await ctx.log.append("ERROR: Failed to download the service runner script from GitHub.");
    return 1;
  }

  await ctx.log.append(`--- Executing External Service Runner for: ${action} ---`);
  const code = await runLogged(ctx, SystemCommands.runScript(script, [action]));
  await ctx.log.append("--- Service Runner Finished ---");
  return code;
}
