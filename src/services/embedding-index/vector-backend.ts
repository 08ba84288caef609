/**
 * Accelerated nearest-neighbour backend. The index treats it as a candidate
 * generator only: hits are re-checked against the vectors the index holds.
 */
export interface VectorSearchBackend {
    readonly name: string;
    /** Prepare storage for vectors of `dimension`; called once before first use */
    ensureReady(dimension: number): Promise<void>;
    upsert(points: ReadonlyArray<{ id: number; vector: number[] }>): Promise<void>;
    remove(ids: readonly number[]): Promise<void>;
    search(vector: number[], limit: number): Promise<Array<{ id: number; score: number }>>;
}
