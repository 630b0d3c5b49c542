import { access, writeFile } from "fs/promises";
import { dirname } from "path";
import { borrowedResource, createStagingFile, withStagedResource } from "../../src/shared/staging/stagedResource";

const exists = (path: string) =>
  access(path).then(
    () => true,
    () => false
  );

describe("staged resources", () => {
  it("removes the staging directory on release, even when called twice", async () => {
    const staged = await createStagingFile("staging-test-");
    await writeFile(staged.path, "payload");

    await staged.release();
    await staged.release();

    expect(await exists(dirname(staged.path))).toBe(false);
  });

  it("releases after use, also when use throws", async () => {
    const staged = await createStagingFile("staging-test-");
    await writeFile(staged.path, "payload");

    await expect(withStagedResource(staged, async () => {
      throw new Error("use failed");
    })).rejects.toThrow("use failed");

    expect(await exists(staged.path)).toBe(false);
  });

  it("never removes a borrowed file", async () => {
    const staged = await createStagingFile("staging-test-");
    await writeFile(staged.path, "payload");

    const value = await withStagedResource(borrowedResource(staged.path), async ({ path }) => path);

    expect(value).toBe(staged.path);
    expect(await exists(staged.path)).toBe(true);
    await staged.release();
  });
});
