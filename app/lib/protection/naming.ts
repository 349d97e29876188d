import { createHash } from "crypto";
import { dirnameOf, extensionOf, joinEntryPath } from "../package/paths";

/** The first 64 bits of md5(salt:path), written with 0 -> I and 1 -> l */
export function confusableName(path: string, salt: string): string {
  const digest = createHash("md5").update(`${salt}:${path}`, "utf8").digest();
  const bin = Array.from(digest.subarray(0, 8), (byte) => byte.toString(2).padStart(8, "0")).join("");
  return bin.replace(/1/g, "l").replace(/0/g, "I");
}

/** Obfuscated entry path: same directory and extension, confusable file name */
export function obfuscatedPath(path: string, salt: string): string {
  return joinEntryPath(dirnameOf(path), confusableName(path, salt) + extensionOf(path));
}
