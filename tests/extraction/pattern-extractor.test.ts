/**
 * Unit tests for pattern-based extraction
 */
import { extractWithPatterns, PatternExtractionStrategy } from '../../src/extraction';

describe('extractWithPatterns', () => {
  it('should find organizations, technologies and concepts', () => {
    const output = extractWithPatterns('Google developed TensorFlow for machine learning research.', 10);

    expect(output.entities).toEqual([
      { text: 'Google', type: 'ORGANIZATION', metadata: { strategy: 'pattern' } },
      { text: 'TensorFlow', type: 'TECHNOLOGY', metadata: { strategy: 'pattern' } },
      { text: 'Machine Learning', type: 'CONCEPT', metadata: { strategy: 'pattern' } },
    ]);
  });

  it('should link every pair of co-occurring entities', () => {
    const output = extractWithPatterns('Google developed TensorFlow for machine learning research.', 10);

    expect(output.relations).toEqual([
      { source: 'google|ORGANIZATION', target: 'tensorflow|TECHNOLOGY', type: 'RELATED_TO', confidence: 0.3 },
      { source: 'google|ORGANIZATION', target: 'machine learning|CONCEPT', type: 'RELATED_TO', confidence: 0.3 },
      { source: 'tensorflow|TECHNOLOGY', target: 'machine learning|CONCEPT', type: 'RELATED_TO', confidence: 0.3 },
    ]);
  });

  it('should classify people and suffixed organizations', () => {
    const output = extractWithPatterns('Dr. Sarah Johnson joined Acme Robotics Inc. in 2021.', 10);

    expect(output.entities.map((e) => [e.text, e.type])).toEqual([
      ['Sarah Johnson', 'PERSON'],
      ['Acme Robotics Inc', 'ORGANIZATION'],
    ]);
  });

  it('should ignore capitalized words in heading lines', () => {
    const output = extractWithPatterns('Future Challenges\nBob Smith met Alice Walker.', 10);

    expect(output.entities.map((e) => e.text)).toEqual(['Bob Smith', 'Alice Walker']);
  });

  it('should scan a final line cut off without punctuation', () => {
    const output = extractWithPatterns('the keynote by Grace Hopper', 10);

    expect(output.entities.map((e) => [e.text, e.type])).toEqual([['Grace Hopper', 'PERSON']]);
  });

  it('should recognize technology suffixes', () => {
    const output = extractWithPatterns('The API runs on Node.js with PostgreSQL and MongoDB.', 10);

    expect(output.entities.map((e) => [e.text, e.type])).toEqual([
      ['Node.js', 'TECHNOLOGY'],
      ['PostgreSQL', 'TECHNOLOGY'],
      ['MongoDB', 'TECHNOLOGY'],
    ]);
    expect(output.relations).toHaveLength(3);
  });

  it('should prefer the longest keyword and skip names inside it', () => {
    const output = extractWithPatterns(
      'Deep learning and natural language processing power Google Assistant.',
      10
    );

    expect(output.entities.map((e) => [e.text, e.type])).toEqual([
      ['Deep Learning', 'CONCEPT'],
      ['Natural Language Processing', 'CONCEPT'],
      ['Google Assistant', 'TECHNOLOGY'],
    ]);
  });

  it('should cap the number of entities and keep relations within the cap', () => {
    const output = extractWithPatterns('The API runs on Node.js with PostgreSQL and MongoDB.', 2);

    expect(output.entities.map((e) => e.text)).toEqual(['Node.js', 'PostgreSQL']);
    expect(output.relations).toEqual([
      { source: 'node.js|TECHNOLOGY', target: 'postgresql|TECHNOLOGY', type: 'RELATED_TO', confidence: 0.3 },
    ]);
  });

  it('should return nothing for text without entities', () => {
    expect(extractWithPatterns('', 10)).toEqual({ entities: [], relations: [] });
    expect(extractWithPatterns('just some lowercase words here.', 10)).toEqual({ entities: [], relations: [] });
  });

  it('should never return a relation to an unreturned entity', () => {
    const samples = [
      'Microsoft and OpenAI collaborate on GPT models hosted on Azure.',
      'Researchers at Stanford University use PyTorch, Docker and Kubernetes.',
      '### Notes\n\n* Git\n* GitHub\n* Continuous Integration',
      '!!! ??? 12345',
    ];

    for (const sample of samples) {
      const output = extractWithPatterns(sample, 4);
      const keys = new Set(output.entities.map((e) => `${e.text.toLowerCase()}|${e.type}`));

      expect(output.entities.length).toBeLessThanOrEqual(4);
      for (const relation of output.relations) {
        expect(keys.has(relation.source)).toBe(true);
        expect(keys.has(relation.target)).toBe(true);
      }
    }
  });
});

describe('PatternExtractionStrategy', () => {
  it('should resolve with the pattern output', async () => {
    const strategy = new PatternExtractionStrategy(10);

    await expect(strategy.extract('Docker runs on Linux.')).resolves.toEqual({
      entities: [
        { text: 'Docker', type: 'TECHNOLOGY', metadata: { strategy: 'pattern' } },
        { text: 'Linux', type: 'TECHNOLOGY', metadata: { strategy: 'pattern' } },
      ],
      relations: [{ source: 'docker|TECHNOLOGY', target: 'linux|TECHNOLOGY', type: 'RELATED_TO', confidence: 0.3 }],
    });
    expect(strategy.kind).toBe('pattern');
  });
});
