import { describe, it, expect, afterEach } from "vitest";
import { initContext, isJsonMode, isQuietMode, resetContext, shouldAutoConfirm } from "./cli-context.js";

describe("cli-context", () => {
  afterEach(() => {
    resetContext();
  });

  it("defaults to interactive human output", () => {
    const ctx = initContext(["node", "help-mirror"], {});

    expect(ctx).toEqual({ json: false, quiet: false, yes: false });
  });

  it("--json implies quiet", () => {
    initContext(["node", "help-mirror", "--json"], {});

    expect(isJsonMode()).toBe(true);
    expect(isQuietMode()).toBe(true);
  });

  it("--no-input implies yes", () => {
    initContext(["node", "help-mirror", "--no-input"], {});

    expect(shouldAutoConfirm()).toBe(true);
  });

  it("CI and HELP_MIRROR_NO_INPUT skip confirmations", () => {
    expect(initContext(["node", "help-mirror"], { CI: "true" }).yes).toBe(true);
    expect(initContext(["node", "help-mirror"], { HELP_MIRROR_NO_INPUT: "1" }).yes).toBe(true);
  });

  it("reads HELP_MIRROR_* flags from the environment", () => {
    const ctx = initContext(["node", "help-mirror"], { HELP_MIRROR_JSON: "1", HELP_MIRROR_YES: "true" });

    expect(ctx.json).toBe(true);
    expect(ctx.yes).toBe(true);
  });
});
