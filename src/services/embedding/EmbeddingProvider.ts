import { z } from "zod";
import { EmbeddingGenerationFailedError } from "@/lib/errors";
import { formatAnyError } from "@/lib/error-formatter";

export interface EmbeddingProvider {
    /**
     * Generate embedding for a single text
     */
    embed(text: string): Promise<Float32Array>;

    /**
     * Generate embeddings for multiple texts
     */
    embedBatch(texts: string[]): Promise<Float32Array[]>;

    /**
     * Get the dimension of the embeddings
     */
    getDimensions(): Promise<number>;

    /**
     * Get model identifier
     */
    getModelId(): string;
}

/**
 * @throws EmbeddingGenerationFailedError when any text is empty or whitespace
 */
export function assertEmbeddableTexts(texts: string[], modelId: string): void {
    const emptyIndex = texts.findIndex((text) => text.trim().length === 0);
    if (emptyIndex !== -1) {
        throw new EmbeddingGenerationFailedError(
            `Cannot embed empty text (input ${emptyIndex})`,
            modelId
        );
    }
}

/**
 * OpenAI-compatible embedding provider
 * Works with OpenAI, OpenRouter, and other OpenAI-compatible APIs
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
    private apiKey: string;
    private modelId: string;
    private baseUrl: string;
    private dimensions: number | null = null;

    constructor(apiKey: string, modelId = "text-embedding-3-small", baseUrl = "https://api.openai.com/v1") {
        this.apiKey = apiKey;
        this.modelId = modelId;
        this.baseUrl = baseUrl.replace(/\/$/, ""); // Remove trailing slash
    }

    public async embed(text: string): Promise<Float32Array> {
        const [embedding] = await this.embedBatch([text]);
        return embedding;
    }

    public async embedBatch(texts: string[]): Promise<Float32Array[]> {
        assertEmbeddableTexts(texts, this.modelId);
        if (texts.length === 0) return [];

        let response: Response;
        try {
            response = await fetch(`${this.baseUrl}/embeddings`, {
                method: "POST",
                headers: {
                    "Content-Type": "application/json",
                    Authorization: `Bearer ${this.apiKey}`,
                },
                body: JSON.stringify({
                    model: this.modelId,
                    input: texts,
                }),
            });
        } catch (error) {
            throw new EmbeddingGenerationFailedError(
                `Embedding request failed: ${formatAnyError(error)}`,
                this.modelId,
                { cause: error }
            );
        }

        if (!response.ok) {
            throw new EmbeddingGenerationFailedError(
                `OpenAI API error: ${response.status} ${response.statusText}`,
                this.modelId
            );
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            throw new EmbeddingGenerationFailedError(
                `Malformed embedding response: ${formatAnyError(error)}`,
                this.modelId,
                { cause: error }
            );
        }
        const embeddings = parseEmbeddingResponse(body, this.modelId);
        if (embeddings.length !== texts.length) {
            throw new EmbeddingGenerationFailedError(
                `Expected ${texts.length} embeddings, received ${embeddings.length}`,
                this.modelId
            );
        }

        // Cache dimensions from first successful response
        if (this.dimensions === null && embeddings.length > 0) {
            this.dimensions = embeddings[0].length;
        }

        return embeddings;
    }

    public async getDimensions(): Promise<number> {
        if (this.dimensions !== null) {
            return this.dimensions;
        }
        const probe = await this.embed("dimension probe");
        return probe.length;
    }

    public getModelId(): string {
        return this.modelId;
    }
}

const EmbeddingResponseSchema = z.object({
    data: z.array(z.object({ embedding: z.array(z.number()) })),
});

function parseEmbeddingResponse(body: unknown, modelId: string): Float32Array[] {
    const parsed = EmbeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue.path.length > 0 ? issue.path.join(".") : "body";
        throw new EmbeddingGenerationFailedError(`Malformed embedding response at ${where}: ${issue.message}`, modelId);
    }
    return parsed.data.data.map((item) => Float32Array.from(item.embedding));
}
