import { createHash } from "node:crypto";

export function sha256(...parts: string[]): string {
    const hash = createHash("sha256");
    // NUL separators keep ("ab", "c") and ("a", "bc") apart
    hash.update(parts.join("\u0000"));
    return hash.digest("hex");
}

/**
 * 32-bit FNV-1a, used for feature hashing
 */
export function fnv1a(text: string): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < text.length; i++) {
        hash ^= text.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
}
