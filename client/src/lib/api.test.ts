import { describe, expect, it } from "vitest";
import { refusalMessage } from "./api";

describe("refusalMessage", () => {
  it("is null for an accepted run", () => {
    expect(refusalMessage({ success: true })).toBeNull();
  });

  it("passes the server's reason through", () => {
    expect(refusalMessage({ success: false, error: "Another action is already running" })).toBe(
      "Another action is already running"
    );
  });

  it("falls back to a generic reason", () => {
    expect(refusalMessage({ success: false })).toBe("The action could not be started.");
  });
});
