import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";

export const writeJsonAtomic = async (filePath: string, payload: unknown): Promise<void> => {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);
  const data = JSON.stringify(payload, null, 2);
  await fs.writeFile(tempPath, data);
  await fs.rename(tempPath, filePath);
};

export const appendJsonLines = async (filePath: string, payloads: unknown[]): Promise<void> => {
  if (payloads.length === 0) return;
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const data = payloads.map((payload) => `${JSON.stringify(payload)}\n`).join("");
  await fs.appendFile(filePath, data);
};

export const hashContent = (parts: ReadonlyArray<string | number | null>, length = 16): string =>
  crypto
    .createHash("sha256")
    .update(parts.map((part) => (part === null ? "\u0000" : String(part))).join("\u001f"))
    .digest("hex")
    .slice(0, length);

// Serialize read-modify-write operations per file.
const pendingWrites = new Map<string, Promise<unknown>>();

export const serializeByKey = async <T>(key: string, fn: () => Promise<T>): Promise<T> => {
  const previous = pendingWrites.get(key) ?? Promise.resolve();
  const next = previous.then(fn, fn);
  pendingWrites.set(key, next);
  try {
    return await next;
  } finally {
    if (pendingWrites.get(key) === next) {
      pendingWrites.delete(key);
    }
  }
};
