/**
 * Cosine similarity in [-1, 1]. Zero vectors have similarity 0 with everything.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) throw new Error('Embeddings must have the same dimensions');
    let dot = 0, n1 = 0, n2 = 0;
    for (let i = 0; i < a.length; i++) {
        const x = a[i] ?? 0;
        const y = b[i] ?? 0;
        dot += x * y; n1 += x * x; n2 += y * y;
    }
    const mag = Math.sqrt(n1) * Math.sqrt(n2);
    if (mag === 0) return 0;
    // Clamp floating point drift so identical vectors never exceed 1.
    return Math.max(-1, Math.min(1, dot / mag));
}
