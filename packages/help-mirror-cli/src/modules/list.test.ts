import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import chalk from "chalk";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { listPages } from "./list.js";
import { initContext, resetContext } from "../lib/cli-context.js";

const CATALOG = `
- id: produce-lesson
  helpCategoryId: produce
  name: Lessons
  detailUrl: https://help.example.test/lesson
  order: 2
- id: achievement-list
  helpCategoryId: achievement
  name: Achievement list
  detailUrl: https://help.example.test/achievements
- id: produce-intro
  helpCategoryId: produce
  name: Introduction
  detailUrl: https://help.example.test/intro
  order: 1
- id: produce-draft
  helpCategoryId: produce
  name: Draft
`;

describe("list module", () => {
  let dir: string;
  let catalogPath: string;
  let settingsPath: string;
  let logSpy: MockInstance;

  beforeEach(() => {
    resetContext();
    chalk.level = 0;
    dir = mkdtempSync(join(tmpdir(), "help-mirror-list-"));
    catalogPath = join(dir, "HelpContent.yaml");
    settingsPath = join(dir, "settings.yaml");
    writeFileSync(catalogPath, CATALOG, "utf-8");
    writeFileSync(settingsPath, "logging:\n  level: error\n", "utf-8");
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    resetContext();
  });

  it("prints pages grouped by category in display order", () => {
    listPages({ catalog: catalogPath, settings: settingsPath });

    const lines = logSpy.mock.calls.map((call) => (call.length > 0 ? String(call[0]) : ""));
    expect(lines).toEqual([
      "3 help pages:",
      "",
      "[achievement]",
      "   achievement-list - Achievement list",
      "",
      "[produce]",
      "   produce-intro - Introduction",
      "   produce-lesson - Lessons",
      "",
    ]);
  });

  it("outputs JSON with --json", () => {
    initContext(["node", "help-mirror", "list", "--json"], {});

    listPages({ catalog: catalogPath, settings: settingsPath });

    const output = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(output.success).toBe(true);
    expect(output.data.total).toBe(3);
    expect(output.data.categories[1]).toEqual({
      category: "produce",
      entries: [
        { id: "produce-intro", name: "Introduction", url: "https://help.example.test/intro", order: 1 },
        { id: "produce-lesson", name: "Lessons", url: "https://help.example.test/lesson", order: 2 },
      ],
    });
    expect(output.data.excluded).toEqual([{ id: "produce-draft", reason: "missing-url", position: 4 }]);
  });

  it("throws CONFIG_NOT_FOUND for a missing catalog", () => {
    expect(() => listPages({ catalog: join(dir, "missing.yaml"), settings: settingsPath })).toThrow(
      /Can't find the catalog/
    );
  });
});
