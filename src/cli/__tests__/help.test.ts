import { describe, expect, it } from "vitest";

import { formatColumns, renderCliHelp, SUPPORTED_CLI_COMMANDS } from "../index";

describe("renderCliHelp", () => {
  it("produces a multi-section help message", () => {
    const help = renderCliHelp();

    expect(help.startsWith("sitewarden - website availability and content monitor\n")).toBe(true);
    expect(help).toContain("Usage:");
    expect(help).toContain("Commands:");
    expect(help).toContain("Options:");
    expect(help).toContain("Exit codes:");
    expect(help).toContain("Examples:");
    expect(help.endsWith("\n")).toBe(true);
  });

  it("mentions every supported command", () => {
    const help = renderCliHelp();

    for (const command of SUPPORTED_CLI_COMMANDS) {
      expect(help).toContain(`  ${command}`);
    }
  });
});

describe("formatColumns", () => {
  it("pads the left column to the widest entry", () => {
    expect(
      formatColumns([
        { left: "  stop", right: "Stop it." },
        { left: "  restart", right: "Restart it." },
      ]),
    ).toBe("  stop     Stop it.\n  restart  Restart it.");
  });
});
