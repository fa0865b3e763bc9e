import type { Logger } from "pino";
import { NotFoundError } from "../errors";
import { FileTransport } from "../transport/file.transport";

export const DISABLED_PASSWORD_FILE = "/dev/null";

/** Where the password file setting came from; `default` is the home fallback. */
export type PasswordFileSource = "flag" | "env" | "default";

export interface VaultSettings {
  /** Password file; `/dev/null` or no value disables decryption. */
  passwordFile?: string;
  source?: PasswordFileSource;
}

/**
 * Reads the vault password once per invocation. Only the default password
 * file may be missing, which disables decryption; a file that was asked for
 * by flag or environment must exist.
 */
export async function loadVaultPassword(
  settings: VaultSettings,
  logger: Logger,
  transport: FileTransport = new FileTransport()
): Promise<string | undefined> {
  const { passwordFile, source } = settings;
  if (passwordFile === undefined || passwordFile === DISABLED_PASSWORD_FILE) {
    logger.debug("Secret decryption disabled");
    return undefined;
  }

  try {
    const password = await transport.read(passwordFile);
    logger.debug({ passwordFile }, "Loaded vault password");
    return password;
  } catch (error) {
    if (error instanceof NotFoundError && source === "default") {
      logger.info(
        { passwordFile },
        "Vault password file not found, secret decryption disabled"
      );
      return undefined;
    }
    throw error;
  }
}
