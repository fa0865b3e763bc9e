import { Inject, Injectable } from "@nestjs/common";
import { LoggerService } from "../../io/logger.service";
import { loadVaultPassword, type VaultSettings } from "../secrets/vault-key";
import { FileTransport } from "../transport/file.transport";
import { HttpTransport } from "../transport/http.transport";
import { FragmentLoader } from "./fragment-loader";

export interface FragmentLoaderOptions {
  timeoutMs?: number;
  vault?: VaultSettings;
}

/**
 * Creates a loader for one invocation: transports bound to the configured
 * timeout and the vault password read once up front.
 */
@Injectable()
export class FragmentLoaderFactory {
  constructor(
    @Inject(LoggerService) private readonly loggerService: LoggerService
  ) {}

  async create(options: FragmentLoaderOptions = {}): Promise<FragmentLoader> {
    const logger = this.loggerService.getLogger("fragments");
    const fileTransport = new FileTransport();
    const password = await loadVaultPassword(
      options.vault ?? {},
      logger,
      fileTransport
    );
    return new FragmentLoader(
      [fileTransport, new HttpTransport(options.timeoutMs)],
      password,
      logger
    );
  }
}
