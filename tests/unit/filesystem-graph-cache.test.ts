import { mkdir, mkdtemp, readdir, readFile, rm, stat, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { FileSystemGraphCache } from "../../src/infrastructure/filesystem/FileSystemGraphCache";

describe("FileSystemGraphCache", () => {
  let baseDir: string;
  let cache: FileSystemGraphCache;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), "graph-cache-test-"));
    cache = new FileSystemGraphCache(baseDir);
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it("lays out feeds under graphs/<graph>/", () => {
    const layout = new FileSystemGraphCache("/var/otp");

    expect(layout.graphDir("berlin")).toBe("/var/otp/graphs/berlin");
    expect(layout.feedPath("berlin", "vbb")).toBe("/var/otp/graphs/berlin/vbb.zip");
    expect(layout.feedInfoPath("berlin", "vbb")).toBe("/var/otp/graphs/berlin/vbb_feed_info.txt");
  });

  it("reports whether the graph directory had to be created", async () => {
    expect(await cache.ensureGraphDir("berlin")).toBe(true);
    expect(await cache.ensureGraphDir("berlin")).toBe(false);
    expect((await stat(cache.graphDir("berlin"))).isDirectory()).toBe(true);
  });

  it("returns no modification time for a missing file", async () => {
    expect(await cache.modifiedAt(cache.feedPath("berlin", "vbb"))).toBeUndefined();
  });

  it("installs and replaces payloads without leaving partial files", async () => {
    await cache.ensureGraphDir("berlin");
    const source = join(baseDir, "download");
    const target = cache.feedPath("berlin", "vbb");

    await writeFile(source, "v1");
    await cache.install(source, target);
    await writeFile(source, "v2");
    await cache.install(source, target);

    expect(await readFile(target, "utf8")).toBe("v2");
    expect(await readdir(cache.graphDir("berlin"))).toEqual(["vbb.zip"]);
    expect(await cache.modifiedAt(target)).toBeInstanceOf(Date);
  });

  it("keeps the previous payload when the copy fails", async () => {
    await cache.ensureGraphDir("berlin");
    const target = cache.feedPath("berlin", "vbb");
    await writeFile(target, "v1");

    await expect(cache.install(join(baseDir, "missing"), target)).rejects.toMatchObject({ code: "ENOENT" });

    expect(await readFile(target, "utf8")).toBe("v1");
    expect(await readdir(cache.graphDir("berlin"))).toEqual(["vbb.zip"]);
  });

  it("removes a graph directory recursively and tolerates a missing one", async () => {
    await mkdir(join(cache.graphDir("berlin"), "nested"), { recursive: true });
    await writeFile(join(cache.graphDir("berlin"), "nested", "graph.obj"), "x");

    await cache.removeGraph("berlin");
    await cache.removeGraph("paris");

    expect(await readdir(join(baseDir, "graphs"))).toEqual([]);
  });
});
