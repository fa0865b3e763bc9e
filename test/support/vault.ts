import { createCipheriv, createHmac, pbkdf2Sync, randomBytes } from "crypto";

/** Produces an AES256 vault blob the way `ansible-vault encrypt` lays it out. */
export function encryptVault(
  plaintext: string,
  password: string,
  version: "1.1" | "1.2" = "1.1"
): string {
  const salt = randomBytes(32);
  const derived = pbkdf2Sync(Buffer.from(password, "utf-8"), salt, 10_000, 80, "sha256");
  const cipherKey = derived.subarray(0, 32);
  const hmacKey = derived.subarray(32, 64);
  const iv = derived.subarray(64);

  const data = Buffer.from(plaintext, "utf-8");
  const padding = 16 - (data.length % 16);
  const padded = Buffer.concat([data, Buffer.alloc(padding, padding)]);

  const cipher = createCipheriv("aes-256-ctr", cipherKey, iv);
  const ciphertext = Buffer.concat([cipher.update(padded), cipher.final()]);
  const hmac = createHmac("sha256", hmacKey).update(ciphertext).digest();

  const envelope = [salt, hmac, ciphertext].map((part) => part.toString("hex")).join("\n");
  const body = Buffer.from(envelope, "utf-8").toString("hex");
  const lines = body.match(/.{1,80}/g) ?? [];
  const header = version === "1.2" ? `$ANSIBLE_VAULT;1.2;AES256;default` : "$ANSIBLE_VAULT;1.1;AES256";

  return [header, ...lines].join("\n");
}
