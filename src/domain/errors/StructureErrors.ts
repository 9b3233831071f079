/** La raíz no existe o no es un directorio */
export class InvalidRootError extends Error {
  constructor(
    public readonly rootPath: string,
    public readonly reason: "missing" | "not-a-directory" | "unreadable"
  ) {
    super(InvalidRootError.describe(rootPath, reason));
    this.name = "InvalidRootError";
  }

  private static describe(
    rootPath: string,
    reason: InvalidRootError["reason"]
  ): string {
    switch (reason) {
      case "missing":
        return `Root path does not exist or is not accessible: ${rootPath}`;
      case "not-a-directory":
        return `Root path is not a directory: ${rootPath}`;
      case "unreadable":
        return `Root directory could not be read: ${rootPath}`;
    }
  }
}

/** Opción de estructura con un valor no válido */
export class InvalidOptionsError extends Error {
  constructor(message: string, public readonly field: string) {
    super(message);
    this.name = "InvalidOptionsError";
  }
}

/** Error al ejecutar un comando git */
export class GitCommandError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly stderr: string,
    public readonly exitCode: number | null
  ) {
    super(message);
    this.name = "GitCommandError";
  }
}
