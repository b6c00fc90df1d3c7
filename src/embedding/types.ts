import { EmbeddingStrategyKind } from '../types/graph';

/**
 * One way of turning text into a vector of fixed dimensionality
 */
export interface EmbeddingStrategy {
  readonly kind: EmbeddingStrategyKind;
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}

export interface EmbeddingOutcome {
  vector: number[];
  strategy: EmbeddingStrategyKind;
  /** True when the remote strategy failed and the hash fallback produced the vector */
  degraded: boolean;
}
