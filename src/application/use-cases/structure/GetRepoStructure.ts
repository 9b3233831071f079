import { StructureUseCase } from "../../ports/driving/StructureUseCase";
import { StructureOptions } from "../../ports/driving/StructureOptions";
import {
  StructureErrorCode,
  StructureResult,
} from "../../ports/driving/StructureResult";
import { FileSystemPort } from "../../ports/driven/FileSystemPort";
import { GitPort } from "../../ports/driven/GitPort";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { ConsoleProgressReporter } from "../../../adapters/secondary/reporting/ConsoleProgressReporter";
import {
  InvalidOptionsError,
  InvalidRootError,
} from "../../../domain/errors/StructureErrors";
import { isExclusionPreset } from "../../../shared/utils/exclusionPresets";
import { STRUCTURE_MESSAGES } from "../../../shared/constants/structureMessages";
import { resolveExclusions } from "../../services/filter/ExclusionPolicy";
import { RepositoryAcquirer } from "../acquire/RepositoryAcquirer";
import {
  StructureRequest,
  StructureService,
} from "./services/StructureService";

export class GetRepoStructure implements StructureUseCase {
  private readonly logger: ProgressReporter;
  private readonly structureSvc: StructureService;
  private readonly acquirer: RepositoryAcquirer;

  constructor(
    private readonly fsPort: FileSystemPort,
    private readonly gitPort: GitPort,
    logger?: ProgressReporter
  ) {
    this.logger = logger ?? new ConsoleProgressReporter(false, false);
    this.structureSvc = new StructureService(
      this.fsPort,
      this.gitPort,
      this.logger
    );
    this.acquirer = new RepositoryAcquirer(this.gitPort, this.logger);
  }

  async execute(options: StructureOptions): Promise<StructureResult> {
    this.logger.startOperation("GetRepoStructure.execute");
    this.logger.info(STRUCTURE_MESSAGES.INFO.STARTED(options.rootPath));

    try {
      const request = this.buildRequest(options);

      const acquisitionFailure = await this.acquire(options);
      if (acquisitionFailure) return acquisitionFailure;

      const tree = await this.structureSvc.getStructure(request);
      this.logger.info(STRUCTURE_MESSAGES.INFO.COMPLETED);
      return { ok: true, tree };
    } catch (err) {
      return this.fail(err, this.codeFor(err));
    } finally {
      this.logger.endOperation("GetRepoStructure.execute");
    }
  }

  /** Clona el origen si se indicó; devuelve el fallo o null si todo fue bien */
  private async acquire(
    options: StructureOptions
  ): Promise<StructureResult | null> {
    if (!options.source) return null;
    try {
      await this.acquirer.acquire({
        url: options.source.url,
        token: options.source.token,
        clonePath: options.rootPath,
      });
      return null;
    } catch (err) {
      if (err instanceof InvalidOptionsError) throw err;
      return this.fail(err, "ACQUISITION_FAILED");
    }
  }

  private buildRequest(options: StructureOptions): StructureRequest {
    if (!options.rootPath) {
      throw new InvalidOptionsError(
        STRUCTURE_MESSAGES.ERRORS.ROOT_REQUIRED,
        "rootPath"
      );
    }

    const maxDepth = options.maxDepth ?? null;
    if (maxDepth !== null && (!Number.isInteger(maxDepth) || maxDepth < 0)) {
      throw new InvalidOptionsError(
        STRUCTURE_MESSAGES.ERRORS.INVALID_MAX_DEPTH(maxDepth),
        "maxDepth"
      );
    }

    const enumerationTimeoutMs = options.enumerationTimeoutMs ?? null;
    if (
      enumerationTimeoutMs !== null &&
      !(Number.isFinite(enumerationTimeoutMs) && enumerationTimeoutMs > 0)
    ) {
      throw new InvalidOptionsError(
        STRUCTURE_MESSAGES.ERRORS.INVALID_TIMEOUT(enumerationTimeoutMs),
        "enumerationTimeoutMs"
      );
    }

    const preset = options.excludePreset;
    if (preset !== undefined && !isExclusionPreset(preset)) {
      throw new InvalidOptionsError(
        STRUCTURE_MESSAGES.ERRORS.UNKNOWN_PRESET(String(preset)),
        "excludePreset"
      );
    }

    const source = options.source;
    if (source !== undefined && (!source.url || source.url.startsWith("-"))) {
      throw new InvalidOptionsError(
        STRUCTURE_MESSAGES.ERRORS.INVALID_SOURCE_URL(source.url),
        "source.url"
      );
    }

    return {
      rootPath: options.rootPath,
      maxDepth,
      exclusions: resolveExclusions(preset, options.extraExclusions),
      includeGitIgnore: options.includeGitIgnore ?? true,
      enumerationTimeoutMs,
    };
  }

  private codeFor(err: unknown): StructureErrorCode {
    if (err instanceof InvalidRootError) return "INVALID_ROOT";
    if (err instanceof InvalidOptionsError) return "INVALID_OPTIONS";
    return "UNEXPECTED";
  }

  private fail(err: unknown, code: StructureErrorCode): StructureResult {
    const errorMessage = err instanceof Error ? err.message : String(err);
    this.logger.error(
      `❌ GetRepoStructure: ${code}: ${errorMessage}`,
      err instanceof Error ? err.stack : undefined
    );
    return { ok: false, error: errorMessage, code };
  }
}
