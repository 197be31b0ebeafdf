import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { parseLocator } from "../../src/crawler/locator.js";
import type { File } from "../../src/crawler/resource.js";
import { syncFile } from "../../src/handlers/file.js";
import { pathExists } from "../../src/utils/fs.js";
import { BASE_URL, fakeFetch, makeTempDir, removeDir, testContext, type TestContext } from "../helpers.js";

const FILE_URL = `${BASE_URL}goto.php?target=file_11_download`;

const file: File = {
  type: "File",
  name: "Slides_v1.pdf",
  locator: parseLocator(FILE_URL, BASE_URL),
};

describe("syncFile", () => {
  let outputDir: string;
  let target: string;
  let test: TestContext | undefined;

  beforeEach(async () => {
    outputDir = await makeTempDir();
    target = path.join(outputDir, "Slides_v1.pdf");
  });

  afterEach(async () => {
    test?.limiter.stop();
    test = undefined;
    await removeDir(outputDir);
  });

  it("downloads a missing file", async () => {
    test = testContext(fakeFetch({ [FILE_URL]: { body: "pdf-bytes" } }), { outputDir });

    await syncFile(test.ctx, target, file);

    expect(await readFile(target, "utf8")).toBe("pdf-bytes");
    expect(test.logger.out).toContain("Writing Slides_v1.pdf");
  });

  it("keeps an existing file", async () => {
    await writeFile(target, "old");
    const transport = fakeFetch({ [FILE_URL]: { body: "new" } });
    test = testContext(transport, { outputDir });

    await syncFile(test.ctx, target, file);

    expect(await readFile(target, "utf8")).toBe("old");
    expect(transport).not.toHaveBeenCalled();
    expect(test.logger.out).toContain("Skipping download, file exists already");
  });

  it("replaces an existing file when forced", async () => {
    await writeFile(target, "old");
    test = testContext(fakeFetch({ [FILE_URL]: { body: "new" } }), { outputDir, force: true });

    await syncFile(test.ctx, target, file);

    expect(await readFile(target, "utf8")).toBe("new");
  });

  it("downloads nothing when files are skipped", async () => {
    const transport = fakeFetch({ [FILE_URL]: { body: "new" } });
    test = testContext(transport, { outputDir, skipFiles: true });

    await syncFile(test.ctx, target, file);

    expect(await pathExists(target)).toBe(false);
    expect(transport).not.toHaveBeenCalled();
  });

  it("does not create a file for a failed download", async () => {
    test = testContext(fakeFetch({}), { outputDir });

    await expect(syncFile(test.ctx, target, file)).rejects.toMatchObject({ statusCode: 404 });
    expect(await pathExists(target)).toBe(false);
  });
});
