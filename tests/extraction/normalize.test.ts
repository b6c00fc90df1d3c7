/**
 * Unit tests for extraction output normalization
 */
import { normalizeExtraction, normalizeRelationType } from '../../src/extraction';

describe('normalizeRelationType', () => {
  it('should upper-case and underscore relation labels', () => {
    expect(normalizeRelationType(' works for ')).toBe('WORKS_FOR');
    expect(normalizeRelationType('part-of')).toBe('PART_OF');
  });
});

describe('normalizeExtraction', () => {
  it('should deduplicate entities by text and type', () => {
    const output = normalizeExtraction(
      [
        { text: 'Open  Source', type: 'CONCEPT' },
        { text: 'open source', type: 'CONCEPT' },
        { text: 'open source', type: 'OTHER' },
      ],
      [],
      10
    );

    expect(output.entities).toEqual([
      { text: 'Open Source', type: 'CONCEPT', metadata: {} },
      { text: 'open source', type: 'OTHER', metadata: {} },
    ]);
  });

  it('should drop dangling, unlabeled and duplicate relations and clamp confidence', () => {
    const output = normalizeExtraction(
      [
        { text: 'A', type: 'OTHER' },
        { text: 'B', type: 'OTHER' },
      ],
      [
        { source: 'a|OTHER', target: 'b|OTHER', type: 'links', confidence: -2 },
        { source: 'a|OTHER', target: 'b|OTHER', type: 'LINKS', confidence: 0.5 },
        { source: 'a|OTHER', target: 'c|OTHER', type: 'LINKS', confidence: 0.5 },
        { source: 'b|OTHER', target: 'a|OTHER', type: '  ', confidence: 0.5 },
        { source: 'b|OTHER', target: 'a|OTHER', type: 'BACK', confidence: Number.NaN },
      ],
      10
    );

    expect(output.relations).toEqual([
      { source: 'a|OTHER', target: 'b|OTHER', type: 'LINKS', confidence: 0 },
      { source: 'b|OTHER', target: 'a|OTHER', type: 'BACK', confidence: 0 },
    ]);
  });
});
