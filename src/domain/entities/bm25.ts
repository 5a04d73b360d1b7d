/**
 * BM25 parameters
 * - k1: Term frequency saturation (typical: 1.2-2.0)
 * - b: Length normalization (typical: 0.75)
 */
export interface BM25Parameters {
  k1: number;
  b: number;
}

export const DEFAULT_BM25_PARAMETERS: BM25Parameters = {
  k1: 1.5,
  b: 0.75,
};
