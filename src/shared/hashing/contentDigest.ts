import { createHash } from "crypto";
import { createReadStream } from "fs";

const CHUNK_SIZE = 64 * 1024;

export const sha256File = async (path: string): Promise<string> => {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(path, { highWaterMark: CHUNK_SIZE })) {
    hash.update(chunk);
  }
  return hash.digest("hex");
};

/**
 * Content identity: SHA-256 over the full byte stream of both files.
 */
export const isSameContent = async (leftPath: string, rightPath: string): Promise<boolean> => {
  const [left, right] = await Promise.all([sha256File(leftPath), sha256File(rightPath)]);
  return left === right;
};
