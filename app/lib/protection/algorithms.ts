import { createHash } from "crypto";
import type { ProtectionAlgorithm } from "../types";

export const ALGORITHM_URIS: Record<ProtectionAlgorithm, string> = {
  basic: "urn:quire:protection#basic",
  idpf: "http://www.idpf.org/2008/embedding",
  adobe: "http://ns.adobe.com/pdf/enc#RC",
};

export function algorithmForUri(uri: string): ProtectionAlgorithm | null {
  for (const [algorithm, known] of Object.entries(ALGORITHM_URIS)) {
    if (known === uri && isProtectionAlgorithm(algorithm)) return algorithm;
  }
  return null;
}

export function isProtectionAlgorithm(value: string): value is ProtectionAlgorithm {
  return value === "basic" || value === "idpf" || value === "adobe";
}

export interface ScrambleParams {
  key: string;
  salt: string;
  /** Original (unprotected) entry path */
  path: string;
}

const IDPF_HEADER_LENGTH = 1040;
const ADOBE_HEADER_LENGTH = 1024;

function xorHeader(bytes: Buffer, mask: Buffer, length: number): Buffer {
  const out = Buffer.from(bytes);
  const end = Math.min(length, out.length);
  for (let i = 0; i < end; i++) out[i] ^= mask[i % mask.length];
  return out;
}

/** md5 blocks, each chained on the previous one and a running counter */
function basicKeystream(params: ScrambleParams, length: number): Buffer {
  const blocks: Buffer[] = [];
  let previous: Buffer = Buffer.alloc(0);
  for (let counter = 0; blocks.length * 16 < length; counter++) {
    previous = createHash("md5")
      .update(previous)
      .update(`${params.key}:${params.salt}:${params.path}:${counter}`, "utf8")
      .digest();
    blocks.push(previous);
  }
  return Buffer.concat(blocks).subarray(0, length);
}

/**
 * Symmetric scramble: applying it twice with the same parameters returns the
 * original bytes.
 */
export function scramble(algorithm: ProtectionAlgorithm, bytes: Buffer, params: ScrambleParams): Buffer {
  switch (algorithm) {
    case "basic": {
      const stream = basicKeystream(params, bytes.length);
      return xorHeader(bytes, stream, bytes.length);
    }
    case "idpf": {
      const mask = createHash("sha1").update(params.key.replace(/\s/g, ""), "utf8").digest();
      return xorHeader(bytes, mask, IDPF_HEADER_LENGTH);
    }
    case "adobe": {
      const mask = createHash("md5").update(params.key, "utf8").digest();
      return xorHeader(bytes, mask, ADOBE_HEADER_LENGTH);
    }
  }
}

export function entryChecksum(key: string, salt: string, bytes: Buffer): string {
  return createHash("md5").update(`${key}:${salt}:`, "utf8").update(bytes).digest("hex");
}
