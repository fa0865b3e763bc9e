import { Inject, Injectable } from "@nestjs/common";
import { LoggerService } from "../../io/logger.service";
import {
  FragmentLoaderFactory,
  type FragmentLoaderOptions,
} from "../fragments/fragment-loader.factory";
import { InventoryError } from "../errors";
import { InventoryBuilder } from "./inventory-builder";
import { parseRootConfig } from "./root-config";

export interface OpenInventoryOptions extends FragmentLoaderOptions {
  /** Absolute URI of the root configuration document. */
  uri: string;
}

@Injectable()
export class InventoryService {
  constructor(
    @Inject(FragmentLoaderFactory)
    private readonly loaderFactory: FragmentLoaderFactory,
    @Inject(LoggerService) private readonly loggerService: LoggerService
  ) {}

  /** Fetches and parses the root configuration; any failure is fatal. */
  async open(options: OpenInventoryOptions): Promise<InventoryBuilder> {
    const logger = this.loggerService.getLogger("inventory");
    const loader = await this.loaderFactory.create(options);

    logger.debug({ uri: options.uri }, "Loading root configuration");
    try {
      const document = await loader.load(options.uri);
      return new InventoryBuilder(
        parseRootConfig(document, options.uri),
        loader,
        logger
      );
    } catch (error) {
      if (error instanceof InventoryError) {
        error.withContext({ uri: options.uri });
      }
      throw error;
    }
  }
}
