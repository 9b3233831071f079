import * as nodePath from "path";
import {
  RepositoryAcquirer,
  authenticatedUrl,
} from "../../../../../src/application/use-cases/acquire/RepositoryAcquirer";
import { GitPort } from "../../../../../src/application/ports/driven/GitPort";
import { ProgressReporter } from "../../../../../src/application/ports/driven/ProgressReporter";
import { InvalidOptionsError } from "../../../../../src/domain/errors/StructureErrors";

describe("authenticatedUrl", () => {
  test("should leave the URL untouched without a token", () => {
    expect(authenticatedUrl("git@example.com:org/repo.git")).toBe(
      "git@example.com:org/repo.git"
    );
  });

  test("should insert the token after the https scheme", () => {
    expect(
      authenticatedUrl("https://example.com/org/repo.git", "test-token")
    ).toBe("https://test-token@example.com/org/repo.git");
  });

  test("should percent-encode reserved characters in the token", () => {
    expect(
      authenticatedUrl("https://example.com/org/repo.git", "user:p@ss/word")
    ).toBe("https://user%3Ap%40ss%2Fword@example.com/org/repo.git");
  });

  test("should reject a token for non-https URLs", () => {
    expect(() =>
      authenticatedUrl("http://example.com/org/repo.git", "test-token")
    ).toThrow(InvalidOptionsError);
  });
});

describe("RepositoryAcquirer", () => {
  let acquirer: RepositoryAcquirer;
  let mockGit: jest.Mocked<GitPort>;
  let mockLogger: jest.Mocked<ProgressReporter>;

  beforeEach(() => {
    mockGit = {
      getIgnorePatterns: jest.fn(),
      isGitRepository: jest.fn().mockResolvedValue(false),
      clone: jest.fn().mockResolvedValue(undefined),
    };
    mockLogger = {
      startOperation: jest.fn(),
      endOperation: jest.fn(),
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
    };
    acquirer = new RepositoryAcquirer(mockGit, mockLogger);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  test("should not clone when the target already holds a repository", async () => {
    mockGit.isGitRepository.mockResolvedValue(true);

    const clonePath = await acquirer.acquire({
      url: "https://example.com/org/repo.git",
      clonePath: "/work/repo",
    });

    expect(clonePath).toBe("/work/repo");
    expect(mockGit.clone).not.toHaveBeenCalled();
    expect(mockLogger.info).toHaveBeenCalledWith(
      "Repository already cloned at: /work/repo"
    );
  });

  test("should clone with credentials but log the bare URL", async () => {
    await acquirer.acquire({
      url: "https://example.com/org/repo.git",
      clonePath: "/work/repo",
      token: "test-token",
    });

    expect(mockGit.clone).toHaveBeenCalledWith(
      {
        url: "https://test-token@example.com/org/repo.git",
        targetPath: "/work/repo",
      },
      mockLogger
    );
    expect(mockLogger.info).toHaveBeenCalledWith(
      "Cloning repository from https://example.com/org/repo.git into /work/repo"
    );
    expect(mockLogger.endOperation).toHaveBeenCalledWith(
      "RepositoryAcquirer.clone"
    );
  });

  test("should resolve a relative clone path", async () => {
    const clonePath = await acquirer.acquire({
      url: "https://example.com/org/repo.git",
      clonePath: "checkouts/repo",
    });

    expect(clonePath).toBe(nodePath.resolve("checkouts/repo"));
    expect(mockGit.isGitRepository).toHaveBeenCalledWith(
      nodePath.resolve("checkouts/repo")
    );
  });

  test("should end the clone timer when the clone fails", async () => {
    mockGit.clone.mockRejectedValue(new Error("network down"));

    await expect(
      acquirer.acquire({
        url: "https://example.com/org/repo.git",
        clonePath: "/work/repo",
      })
    ).rejects.toThrow("network down");
    expect(mockLogger.endOperation).toHaveBeenCalledWith(
      "RepositoryAcquirer.clone"
    );
  });
});
