/**
 * @fileoverview Tests for exercise pages.
 */

import path from "node:path";
import * as cheerio from "cheerio";
import { afterEach, describe, it, expect } from "vitest";
import { parseLocator } from "../../src/crawler/locator.js";
import { classify } from "../../src/crawler/resource.js";
import { parseExercisePage, syncExercise, uniqueFileName } from "../../src/handlers/exercise.js";
import { PageStructureError } from "../../src/utils/errors.js";
import { BASE_URL, fakeFetch, makeTempDir, removeDir, testContext, type TestContext } from "../helpers.js";

function row(href: string, name?: string): string {
  const label = name === undefined ? "" : `<div class="il_InfoScreenProperty">${name}</div>`;
  return `<div class="form-group">${label}<a href="${href}">Download</a></div>`;
}

const download = (file: string, cmd = "downloadFile") =>
  `ilias.php?ref_id=7&amp;cmd=${cmd}&amp;file=${file}&amp;baseClass=ilExerciseHandlerGUI`;

describe("uniqueFileName", () => {
  it("numbers repeated names before the extension", () => {
    const taken = new Set<string>();
    expect(uniqueFileName("a.pdf", taken)).toBe("a.pdf");
    expect(uniqueFileName("a.pdf", taken)).toBe("a2.pdf");
    expect(uniqueFileName("a.pdf", taken)).toBe("a3.pdf");
    expect(uniqueFileName("README", taken)).toBe("README");
    expect(uniqueFileName("README", taken)).toBe("README2");
  });
});

describe("parseExercisePage", () => {
  it("turns download rows into uniquely named files", () => {
    const $ = cheerio.load(
      [
        row(download("1"), " sheet01.pdf "),
        row(download("2", "downloadFeedbackFile"), "sheet01.pdf"),
        row(download("3", "downloadGlobalFeedbackFile"), "solutions 1/2.pdf"),
        row("ilias.php?ref_id=7&amp;cmd=showOverview", "Overview"),
        '<div class="form-group"><span>no link</span></div>',
      ].join(""),
    );

    const downloads = parseExercisePage($, BASE_URL);

    expect(downloads.map((entry) => entry.fileName)).toEqual([
      "sheet01.pdf",
      "sheet012.pdf",
      "solutions 1-2.pdf",
    ]);
    expect(downloads[0]?.resource).toEqual({
      type: "File",
      name: "sheet01.pdf",
      locator: parseLocator(
        "ilias.php?ref_id=7&cmd=downloadFile&file=1&baseClass=ilExerciseHandlerGUI",
        BASE_URL,
      ),
    });
  });

  it("rejects a download row without a file name", () => {
    const $ = cheerio.load(row(download("1")));
    expect(() => parseExercisePage($, BASE_URL)).toThrow(PageStructureError);
    expect(() => parseExercisePage($, BASE_URL)).toThrow(
      `link without file name: ${BASE_URL}ilias.php?ref_id=7&cmd=downloadFile&file=1&baseClass=ilExerciseHandlerGUI`,
    );
  });
});

describe("syncExercise", () => {
  let outputDir: string | undefined;
  let test: TestContext | undefined;

  afterEach(async () => {
    test?.limiter.stop();
    if (outputDir !== undefined) {
      await removeDir(outputDir);
    }
  });

  it("creates the directory and submits every download", async () => {
    outputDir = await makeTempDir();
    const href = "ilias.php?ref_id=7&cmd=showOverview&baseClass=ilExerciseHandlerGUI";
    test = testContext(
      fakeFetch({
        [`${BASE_URL}${href}`]: { body: row(download("1"), "a.pdf") + row(download("2"), "a.pdf") },
      }),
      { outputDir },
    );
    const dir = path.join(outputDir, "Exercise 1");
    const resource = classify(parseLocator(href, BASE_URL), "Exercise 1", BASE_URL);
    if (resource.type !== "ExerciseHandler") {
      throw new Error(`expected an exercise, got ${resource.type}`);
    }

    await syncExercise(test.ctx, dir, resource);
    await test.ctx.scheduler.idle();

    expect(test.submitted.map((unit) => unit.path)).toEqual([
      path.join(dir, "a.pdf"),
      path.join(dir, "a2.pdf"),
    ]);
    expect(test.submitted.map((unit) => unit.resource.type)).toEqual(["File", "File"]);
  });
});
