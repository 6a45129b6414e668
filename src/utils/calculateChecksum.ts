import crypto from "node:crypto";

export function calculateChecksum(content: string): string {
    return crypto.createHash("sha256").update(content, "utf-8").digest("hex");
}

/** Formats the first 128 bits of a checksum as a UUID string. */
export function checksumToUuid(checksum: string): string {
    const hex = checksum.slice(0, 32).padEnd(32, "0");
    return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20, 32)].join("-");
}
