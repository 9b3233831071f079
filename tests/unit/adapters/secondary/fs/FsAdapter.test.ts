import * as fs from "fs";
import * as os from "os";
import * as nodePath from "path";
import { FsAdapter } from "../../../../../src/adapters/secondary/fs/FsAdapter";

describe("FsAdapter", () => {
  let tmpDir: string;
  const adapter = new FsAdapter();

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(nodePath.join(os.tmpdir(), "fs-adapter-"));
    fs.mkdirSync(nodePath.join(tmpDir, "src"));
    fs.writeFileSync(nodePath.join(tmpDir, "README.md"), "# readme\n");
    fs.symlinkSync(
      nodePath.join(tmpDir, "src"),
      nodePath.join(tmpDir, "src-link"),
      "dir"
    );
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("stat method", () => {
    test("should classify a regular file", async () => {
      expect(await adapter.stat(nodePath.join(tmpDir, "README.md"))).toEqual({
        isFile: true,
        isDirectory: false,
        isSymbolicLink: false,
      });
    });

    test("should classify a directory", async () => {
      expect(await adapter.stat(nodePath.join(tmpDir, "src"))).toEqual({
        isFile: false,
        isDirectory: true,
        isSymbolicLink: false,
      });
    });

    test("should not follow symbolic links", async () => {
      expect(await adapter.stat(nodePath.join(tmpDir, "src-link"))).toEqual({
        isFile: false,
        isDirectory: false,
        isSymbolicLink: true,
      });
    });

    test("should return null for a missing path", async () => {
      expect(await adapter.stat(nodePath.join(tmpDir, "missing"))).toBeNull();
    });
  });

  describe("listDirectoryEntries method", () => {
    test("should list immediate entries with their kinds", async () => {
      const entries = await adapter.listDirectoryEntries(tmpDir);
      const summary = entries
        .map((entry) => ({
          name: entry.name,
          isFile: entry.isFile(),
          isDirectory: entry.isDirectory(),
          isSymbolicLink: entry.isSymbolicLink(),
        }))
        .sort((a, b) => a.name.localeCompare(b.name));

      expect(summary).toEqual([
        {
          name: "README.md",
          isFile: true,
          isDirectory: false,
          isSymbolicLink: false,
        },
        {
          name: "src",
          isFile: false,
          isDirectory: true,
          isSymbolicLink: false,
        },
        {
          name: "src-link",
          isFile: false,
          isDirectory: false,
          isSymbolicLink: true,
        },
      ]);
    });

    test("should reject when the directory cannot be read", async () => {
      await expect(
        adapter.listDirectoryEntries(nodePath.join(tmpDir, "missing"))
      ).rejects.toMatchObject({ code: "ENOENT" });
    });
  });
});
