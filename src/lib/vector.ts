export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
    const length = Math.min(a.length, b.length);
    let sum = 0;
    for (let i = 0; i < length; i++) {
        sum += a[i] * b[i];
    }
    return sum;
}

export function magnitude(v: ArrayLike<number>): number {
    return Math.sqrt(dot(v, v));
}

export function l2Normalize(v: Float32Array): Float32Array {
    const norm = magnitude(v);
    if (norm === 0) return v;
    const out = new Float32Array(v.length);
    for (let i = 0; i < v.length; i++) {
        out[i] = v[i] / norm;
    }
    return out;
}

/**
 * Cosine distance in [0, 2]. Zero vectors are maximally uninformative: distance 1.
 */
export function cosineDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
    const denom = magnitude(a) * magnitude(b);
    if (denom === 0) return 1;
    return 1 - dot(a, b) / denom;
}

export function clamp01(value: number): number {
    if (Number.isNaN(value)) return 0;
    return Math.min(1, Math.max(0, value));
}
