import type { Logger } from "pino";
import { UnsupportedSchemeError } from "../errors";
import {
  getCodec,
  inferFormat,
  normalizeFormat,
} from "../formats/format-codec";
import { decryptVault, isVaultEncrypted } from "../secrets/vault-cipher";
import type { FragmentTransport } from "../transport/transport.types";
import type { TreeValue } from "../tree/tree-value";
import { parseUri } from "../uri/uri-resolver";

export class FragmentLoader {
  constructor(
    private readonly transports: readonly FragmentTransport[],
    private readonly vaultPassword: string | undefined,
    private readonly logger: Logger
  ) {}

  get decryptionEnabled(): boolean {
    return this.vaultPassword !== undefined;
  }

  /**
   * Fetches `uri` and parses it with `format`, or with the format implied by
   * its suffix. Vault blobs are decrypted first; without a password they
   * load as an empty mapping. Empty documents also load as an empty mapping.
   */
  async load(uri: string, format?: string): Promise<TreeValue> {
    const codec = getCodec(
      format === undefined ? inferFormat(uri) : normalizeFormat(format, uri)
    );
    const transport = this.selectTransport(uri);

    let text = await transport.read(uri);
    if (isVaultEncrypted(text)) {
      if (this.vaultPassword === undefined) {
        this.logger.warn(
          { uri },
          "Fragment is vault encrypted but no vault password is available, treating it as empty"
        );
        return {};
      }
      text = decryptVault(text, this.vaultPassword, { uri });
    }

    const tree = codec.parse(text, uri);
    this.logger.debug({ uri, format: codec.format }, "Loaded fragment");
    return tree ?? {};
  }

  private selectTransport(uri: string): FragmentTransport {
    const scheme = parseUri(uri).scheme ?? "file";
    const transport = this.transports.find((candidate) =>
      candidate.schemes.includes(scheme)
    );
    if (!transport) {
      throw new UnsupportedSchemeError(scheme, { uri });
    }
    return transport;
  }
}
