import * as path from "path";
import { InvalidOptionsError } from "../../../domain/errors/StructureErrors";
import { STRUCTURE_MESSAGES } from "../../../shared/constants/structureMessages";
import { GitPort } from "../../ports/driven/GitPort";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";

export interface AcquisitionRequest {
  url: string;
  clonePath: string;
  token?: string;
}

const HTTPS_PREFIX = "https://";

/** Inserta el token en una URL https (https://<token>@host/...) */
export function authenticatedUrl(url: string, token?: string): string {
  if (!token) return url;
  if (!url.startsWith(HTTPS_PREFIX)) {
    throw new InvalidOptionsError(
      STRUCTURE_MESSAGES.ERRORS.TOKEN_REQUIRES_HTTPS,
      "source.token"
    );
  }
  return `${HTTPS_PREFIX}${encodeURIComponent(token)}@${url.slice(
    HTTPS_PREFIX.length
  )}`;
}

/**
 * Materializa un repositorio remoto en disco antes del recorrido.
 * Si el destino ya contiene un clon, no se vuelve a clonar.
 */
export class RepositoryAcquirer {
  constructor(
    private readonly gitPort: GitPort,
    private readonly logger: ProgressReporter
  ) {}

  /** @returns Ruta absoluta del clon */
  async acquire(request: AcquisitionRequest): Promise<string> {
    const clonePath = path.resolve(request.clonePath);

    if (await this.gitPort.isGitRepository(clonePath)) {
      this.logger.info(STRUCTURE_MESSAGES.INFO.ALREADY_CLONED(clonePath));
      return clonePath;
    }

    const url = authenticatedUrl(request.url, request.token);
    this.logger.info(STRUCTURE_MESSAGES.INFO.CLONING(request.url, clonePath));

    this.logger.startOperation("RepositoryAcquirer.clone");
    try {
      await this.gitPort.clone({ url, targetPath: clonePath }, this.logger);
    } finally {
      this.logger.endOperation("RepositoryAcquirer.clone");
    }
    return clonePath;
  }
}
