import { describe, expect, it } from "vitest";
import { FakeExecutor } from "../../testing/fakes";
import { DEFAULT_TTYD_PORT, getTerminalInfo, terminalInfoFromUCI } from "./ttyd";
import { getOption, parseUCIShow } from "./uci-parser";

describe("parseUCIShow", () => {
  it("groups options under their sections", () => {
    const sections = parseUCIShow(
      [
        "ttyd.core=ttyd",
        "ttyd.core.interface='@lan'",
        "ttyd.core.command='/bin/login'",
        "ttyd.@ttyd[1]=ttyd",
        "ttyd.@ttyd[1].port='7682'",
      ].join("\n")
    );

    expect(sections).toEqual([
      { type: "ttyd", name: "core", options: { interface: "@lan", command: "/bin/login" } },
      { type: "ttyd", name: "@ttyd[1]", options: { port: "7682" } },
    ]);
  });

  it("reads list options as arrays", () => {
    const [section] = parseUCIShow("network.wan=interface\nnetwork.wan.dns='1.1.1.1' '8.8.8.8'\n");

    expect(section.options.dns).toEqual(["1.1.1.1", "8.8.8.8"]);
    expect(getOption(section, "dns")).toBe("1.1.1.1");
    expect(getOption(section, "missing")).toBeUndefined();
  });
});

describe("terminal info", () => {
  it("reads port and TLS from the core section", () => {
    expect(terminalInfoFromUCI("ttyd.core=ttyd\nttyd.core.port='8022'\nttyd.core.ssl='1'\n")).toEqual({
      port: "8022",
      ssl: true,
    });
  });

  it("falls back to the first ttyd section and default port", () => {
    expect(terminalInfoFromUCI("ttyd.cfg01=ttyd\nttyd.cfg01.interface='@lan'\n")).toEqual({
      port: DEFAULT_TTYD_PORT,
      ssl: false,
    });
  });

  it("uses defaults when ttyd is not configured", async () => {
    const exec = new FakeExecutor(() => ({ code: 1 }));

    expect(await getTerminalInfo(exec)).toEqual({ port: "7681", ssl: false });
    expect(exec.commands).toEqual(["uci show ttyd"]);
  });
});
