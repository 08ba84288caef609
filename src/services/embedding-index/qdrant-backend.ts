import { QdrantClient } from '@qdrant/js-client-rest';
import { logger } from '../../utils/logger.js';
import type { VectorSearchBackend } from './vector-backend.js';

/**
 * The subset of the Qdrant REST client this backend calls.
 */
export interface QdrantCollectionClient {
    getCollections(): Promise<{ collections: Array<{ name: string }> }>;
    createCollection(name: string, args: { vectors: { size: number; distance: 'Cosine' } }): Promise<unknown>;
    upsert(name: string, args: { wait: boolean; points: Array<{ id: number; vector: number[] }> }): Promise<unknown>;
    delete(name: string, args: { wait: boolean; points: number[] }): Promise<unknown>;
    search(name: string, args: { vector: number[]; limit: number; with_payload: boolean }): Promise<Array<{ id: string | number; score: number }>>;
}

export function createQdrantClient(url: string, apiKey: string): QdrantCollectionClient {
    return apiKey ? new QdrantClient({ url, apiKey }) : new QdrantClient({ url });
}

/**
 * Qdrant collection used as the ANN backend of the embedding index.
 * Point ids are interaction ids.
 */
export class QdrantVectorBackend implements VectorSearchBackend {
    readonly name = 'qdrant';
    private ready = false;

    constructor(private readonly client: QdrantCollectionClient, private readonly collectionName: string) { }

    async ensureReady(dimension: number): Promise<void> {
        if (this.ready) return;
        const { collections } = await this.client.getCollections();
        if (!collections.some(col => col.name === this.collectionName)) {
            logger.info(`[QdrantVectorBackend] Creating collection ${this.collectionName} with vector size ${dimension}`);
            await this.client.createCollection(this.collectionName, { vectors: { size: dimension, distance: 'Cosine' } });
        }
        this.ready = true;
    }

    async upsert(points: ReadonlyArray<{ id: number; vector: number[] }>): Promise<void> {
        if (points.length === 0) return;
        await this.client.upsert(this.collectionName, {
            wait: true,
            points: points.map(point => ({ id: point.id, vector: point.vector }))
        });
    }

    async remove(ids: readonly number[]): Promise<void> {
        if (ids.length === 0) return;
        await this.client.delete(this.collectionName, { wait: true, points: [...ids] });
    }

    async search(vector: number[], limit: number): Promise<Array<{ id: number; score: number }>> {
        const hits = await this.client.search(this.collectionName, { vector, limit, with_payload: false });
        return hits
            .map(hit => ({ id: typeof hit.id === 'number' ? hit.id : Number(hit.id), score: hit.score }))
            .filter(hit => Number.isInteger(hit.id));
    }
}
