import * as fs from "fs";
import * as os from "os";
import * as nodePath from "path";
import { createContainer, getRepoStructure } from "../../src/container";
import { GetRepoStructure } from "../../src/application/use-cases/structure/GetRepoStructure";

describe("createContainer", () => {
  test("should wire the structure use case with default options", () => {
    const container = createContainer();

    expect(container.structureUseCase).toBeInstanceOf(GetRepoStructure);
    expect(container.defaultOptions).toEqual({
      maxDepth: null,
      extraExclusions: [],
      includeGitIgnore: true,
      enumerationTimeoutMs: null,
    });
  });
});

describe("getRepoStructure", () => {
  let root: string;

  beforeAll(() => {
    root = fs.mkdtempSync(nodePath.join(os.tmpdir(), "container-"));
    fs.mkdirSync(nodePath.join(root, "lib"));
    fs.writeFileSync(nodePath.join(root, "lib", "main.ts"), "");
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("should merge caller options over the defaults", async () => {
    const result = await getRepoStructure({ rootPath: root, maxDepth: 1 });

    expect(result).toStrictEqual({
      ok: true,
      tree: {
        name: nodePath.basename(root),
        type: "directory",
        children: [{ name: "lib", type: "directory" }],
      },
    });
  });
});
