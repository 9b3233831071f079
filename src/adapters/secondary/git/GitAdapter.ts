import * as cp from "child_process";
import * as fs from "fs";
import * as path from "path";
import {
  CloneRequest,
  GitPort,
} from "../../../application/ports/driven/GitPort";
import { ProgressReporter } from "../../../application/ports/driven/ProgressReporter";
import { GitCommandError } from "../../../domain/errors/StructureErrors";

export interface GitRunResult {
  exitCode: number | null;
  stderr: string;
}

/** Ejecuta git con los argumentos dados, entregando stderr línea a línea */
export type GitRunner = (
  args: string[],
  onStderrLine: (line: string) => void
) => Promise<GitRunResult>;

export interface CloneProgress {
  phase: string;
  percent: number;
  current: number;
  total: number;
}

const PROGRESS_LINE =
  /^(?:remote:\s+)?([A-Za-z][A-Za-z ]*?):\s+(\d{1,3})%\s+\((\d+)\/(\d+)\)/;

/**
 * Interpreta una línea de progreso de `git clone --progress`,
 * p. ej. "Receiving objects:  45% (9/20), 1.00 KiB | 1.00 MiB/s"
 */
export function parseCloneProgress(line: string): CloneProgress | null {
  const match = PROGRESS_LINE.exec(line.trim());
  if (!match) return null;
  return {
    phase: match[1],
    percent: Number(match[2]),
    current: Number(match[3]),
    total: Number(match[4]),
  };
}

/** Oculta las credenciales embebidas en URLs dentro de un texto */
export function redactCredentials(text: string): string {
  return text.replace(/([a-z][a-z0-9+.-]*:\/\/)[^@/\s]+@/gi, "$1***@");
}

export const spawnGit: GitRunner = (args, onStderrLine) =>
  new Promise((resolve, reject) => {
    const child = cp.spawn("git", args, {
      stdio: ["ignore", "ignore", "pipe"],
      env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
    });
    let stderr = "";
    let pending = "";

    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
      // git reescribe la línea de progreso con \r
      const lines = (pending + chunk).split(/[\r\n]/);
      pending = lines.pop() ?? "";
      lines.filter((l) => l.trim() !== "").forEach(onStderrLine);
    });
    child.on("error", reject);
    child.on("close", (exitCode) => {
      if (pending.trim() !== "") onStderrLine(pending);
      resolve({ exitCode, stderr });
    });
  });

/**
 * Adaptador para Git
 */
export const DEFAULT_IGNORE_CACHE_SIZE = 64;

export class GitAdapter implements GitPort {
  private readonly ignoreCache = new Map<
    string,
    { mtime: number; patterns: string[] }
  >();

  constructor(
    private readonly runGit: GitRunner = spawnGit,
    private readonly ignoreCacheSize = DEFAULT_IGNORE_CACHE_SIZE
  ) {}

  /**
   * Obtiene las reglas del .gitignore de la raíz
   * @param rootPath Ruta raíz del proyecto
   * @returns Lista de reglas, o null si no existe .gitignore
   */
  async getIgnorePatterns(rootPath: string): Promise<string[] | null> {
    const filePath = path.join(rootPath, ".gitignore");

    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(filePath);
    } catch {
      return null;
    }
    if (!stat.isFile()) return null;

    const mtime = stat.mtimeMs;
    const cached = this.ignoreCache.get(rootPath);
    if (cached && cached.mtime === mtime) {
      // reinsertar para que el Map conserve el orden de uso
      this.ignoreCache.delete(rootPath);
      this.ignoreCache.set(rootPath, cached);
      return cached.patterns;
    }

    const content = await fs.promises.readFile(filePath, "utf-8");
    const patterns = content
      .split(/\r?\n/)
      .filter((l) => l.trim() !== "" && !l.startsWith("#"));

    this.ignoreCache.delete(rootPath);
    this.ignoreCache.set(rootPath, { mtime, patterns });
    while (this.ignoreCache.size > this.ignoreCacheSize) {
      const oldest = this.ignoreCache.keys().next();
      if (oldest.done) break;
      this.ignoreCache.delete(oldest.value);
    }
    return patterns;
  }

  /**
   * Verifica si un directorio ya contiene un clon (.git presente)
   * @param rootPath Ruta del directorio a verificar
   */
  async isGitRepository(rootPath: string): Promise<boolean> {
    try {
      await fs.promises.access(path.join(rootPath, ".git"));
      return true;
    } catch {
      return false;
    }
  }

  async clone(request: CloneRequest, reporter: ProgressReporter): Promise<void> {
    // "--" impide que una URL con "-" inicial se lea como opción de git
    const args = ["clone", "--progress", "--", request.url, request.targetPath];
    const command = `git clone --progress -- ${redactCredentials(
      request.url
    )} ${request.targetPath}`;

    let lastPhase = "";
    const { exitCode, stderr } = await this.runGit(args, (line) => {
      const progress = parseCloneProgress(line);
      if (progress === null) {
        reporter.debug(redactCredentials(line));
        return;
      }
      if (progress.phase !== lastPhase) {
        lastPhase = progress.phase;
        reporter.info(`${progress.phase}...`);
      }
      reporter.debug(
        `${progress.phase}: ${progress.percent}% (${progress.current}/${progress.total})`
      );
    });

    if (exitCode !== 0) {
      throw new GitCommandError(
        `git clone failed with exit code ${String(exitCode)}`,
        command,
        redactCredentials(stderr),
        exitCode
      );
    }
  }
}
