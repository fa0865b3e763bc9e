import {
  createDecipheriv,
  createHmac,
  pbkdf2Sync,
  timingSafeEqual,
} from "crypto";
import { SecretDecryptError, type InventoryErrorContext } from "../errors";

/*
 * Ansible Vault 1.1/1.2 (AES256) envelope:
 *
 *   $ANSIBLE_VAULT;1.1;AES256[;vault-id]
 *   hex( hex(salt) "\n" hex(hmac) "\n" hex(ciphertext) ), wrapped at 80 columns
 *
 * Keys come from PBKDF2-SHA256 (10000 rounds, 80 bytes): cipher key, HMAC key,
 * counter IV. The plaintext is PKCS#7 padded to the AES block size.
 */
export const VAULT_HEADER_PREFIX = "$ANSIBLE_VAULT;";

const KDF_ITERATIONS = 10_000;
const KEY_LENGTH = 32;
const IV_LENGTH = 16;
const BLOCK_SIZE = 16;
const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

export function isVaultEncrypted(text: string): boolean {
  return text.trimStart().startsWith(VAULT_HEADER_PREFIX);
}

function corrupt(message: string, context: InventoryErrorContext): never {
  throw new SecretDecryptError("CorruptBlob", message, context);
}

function decodeHex(
  value: string | undefined,
  label: string,
  context: InventoryErrorContext
): Buffer {
  const trimmed = value?.trim() ?? "";
  if (!HEX_PATTERN.test(trimmed)) {
    corrupt(`Vault ${label} is not valid hex`, context);
  }
  return Buffer.from(trimmed, "hex");
}

function unpad(data: Buffer, context: InventoryErrorContext): Buffer {
  const padding = data.length > 0 ? data[data.length - 1] : 0;
  if (padding < 1 || padding > BLOCK_SIZE || padding > data.length) {
    corrupt("Vault payload has invalid padding", context);
  }
  for (let index = data.length - padding; index < data.length; index += 1) {
    if (data[index] !== padding) {
      corrupt("Vault payload has invalid padding", context);
    }
  }
  return data.subarray(0, data.length - padding);
}

export function decryptVault(
  blob: string,
  password: string,
  context: InventoryErrorContext = {}
): string {
  const [header = "", ...body] = blob.trim().split(/\r?\n/);
  const fields = header.trim().split(";");
  if (fields[0] !== "$ANSIBLE_VAULT" || fields.length < 3) {
    corrupt("Missing vault header", context);
  }
  const [, version, cipher] = fields;
  if (version !== "1.1" && version !== "1.2") {
    corrupt(`Unsupported vault format version ${version}`, context);
  }
  if (cipher.trim() !== "AES256") {
    corrupt(`Unsupported vault cipher ${cipher}`, context);
  }

  const envelope = decodeHex(body.join(""), "body", context)
    .toString("utf-8")
    .split("\n");
  if (envelope.length !== 3) {
    corrupt("Vault envelope must hold salt, HMAC and ciphertext", context);
  }
  const [saltHex, hmacHex, cipherHex] = envelope;
  const salt = decodeHex(saltHex, "salt", context);
  const expectedHmac = decodeHex(hmacHex, "HMAC", context);
  const ciphertext = decodeHex(cipherHex, "ciphertext", context);

  const derived = pbkdf2Sync(
    Buffer.from(password, "utf-8"),
    salt,
    KDF_ITERATIONS,
    2 * KEY_LENGTH + IV_LENGTH,
    "sha256"
  );
  const cipherKey = derived.subarray(0, KEY_LENGTH);
  const hmacKey = derived.subarray(KEY_LENGTH, 2 * KEY_LENGTH);
  const iv = derived.subarray(2 * KEY_LENGTH);

  const actualHmac = createHmac("sha256", hmacKey).update(ciphertext).digest();
  if (
    actualHmac.length !== expectedHmac.length ||
    !timingSafeEqual(actualHmac, expectedHmac)
  ) {
    throw new SecretDecryptError(
      "BadKey",
      "Vault HMAC verification failed, the password is probably wrong",
      context
    );
  }

  const decipher = createDecipheriv("aes-256-ctr", cipherKey, iv);
  const padded = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  return unpad(padded, context).toString("utf-8");
}
