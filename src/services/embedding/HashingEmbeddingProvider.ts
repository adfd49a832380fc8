import { fnv1a } from "@/lib/hash";
import { l2Normalize } from "@/lib/vector";
import { tokenize } from "@/search/KeywordExtractor";
import { type EmbeddingProvider, assertEmbeddableTexts } from "./EmbeddingProvider";

/**
 * Deterministic local embeddings by feature hashing.
 *
 * Word unigrams and character trigrams are hashed into a fixed number of
 * buckets with a signed hash, then L2-normalised. Texts that share words end up
 * close in cosine space; no model download or network call is involved.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
    constructor(private readonly dimensions = 256) {
        if (!Number.isInteger(dimensions) || dimensions < 8) {
            throw new RangeError(`Hashing embeddings need at least 8 dimensions, got ${dimensions}`);
        }
    }

    public async embed(text: string): Promise<Float32Array> {
        const [embedding] = await this.embedBatch([text]);
        return embedding;
    }

    public async embedBatch(texts: string[]): Promise<Float32Array[]> {
        assertEmbeddableTexts(texts, this.getModelId());
        return texts.map((text) => this.vectorize(text));
    }

    public async getDimensions(): Promise<number> {
        return this.dimensions;
    }

    public getModelId(): string {
        return `hashing-${this.dimensions}`;
    }

    private vectorize(text: string): Float32Array {
        const vector = new Float32Array(this.dimensions);
        const tokens = tokenize(text);

        for (const token of tokens) {
            this.addFeature(vector, `w:${token}`, 1);
            const padded = ` ${token} `;
            for (let i = 0; i + 3 <= padded.length; i++) {
                this.addFeature(vector, `c:${padded.slice(i, i + 3)}`, 0.5);
            }
        }

        // Emoji and symbols carry no word tokens; hash the raw text instead
        if (tokens.length === 0) {
            for (const char of text.trim()) {
                this.addFeature(vector, `s:${char}`, 1);
            }
        }

        return l2Normalize(vector);
    }

    private addFeature(vector: Float32Array, feature: string, weight: number): void {
        const hash = fnv1a(feature);
        const bucket = hash % this.dimensions;
        const sign = (hash & 0x80000000) === 0 ? 1 : -1;
        vector[bucket] += sign * weight;
    }
}
