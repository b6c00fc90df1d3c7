import { ExtractedEntity, ExtractedRelation, ExtractionStrategyKind } from '../types/graph';

export interface ExtractionOutput {
  entities: ExtractedEntity[];
  /** Endpoints are entity keys of entities in the same output */
  relations: ExtractedRelation[];
}

/**
 * One way of turning a chunk of text into entities and relations
 */
export interface ExtractionStrategy {
  readonly kind: ExtractionStrategyKind;
  extract(text: string): Promise<ExtractionOutput>;
}

export interface ExtractionOutcome extends ExtractionOutput {
  strategy: ExtractionStrategyKind;
  /** True when the remote strategy failed and pattern matching produced the output */
  degraded: boolean;
}
