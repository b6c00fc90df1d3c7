/**
 * Pattern-based extraction - the offline fallback strategy
 *
 * Recognizes entities from surface patterns only:
 * - curated technology and concept keywords (longest match wins)
 * - tokens ending in a technology suffix such as ".js" or "SQL"
 * - capitalized word sequences, classified as ORGANIZATION (known names or
 *   organization suffixes) or PERSON (two or three plain capitalized words)
 *
 * Every pair of entities found in the same chunk is linked by a low-confidence
 * RELATED_TO relation. This strategy never throws.
 */
import keywords from './keywords.json';
import { entityKey, EntityType } from '../types/graph';
import { CandidateEntity, CandidateRelation, normalizeExtraction } from './normalize';
import { ExtractionOutput, ExtractionStrategy } from './types';

export const CO_OCCURRENCE_RELATION = 'RELATED_TO';
export const CO_OCCURRENCE_CONFIDENCE = 0.3;

interface Span {
  start: number;
  end: number;
}

interface LocatedEntity extends Span {
  entity: CandidateEntity;
}

interface KeywordMatcher {
  canonical: string;
  type: EntityType;
  pattern: RegExp;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Multi-word keywords and concepts match case-insensitively; single-word
// technology names only with their exact casing ("React", not "react").
const KEYWORD_MATCHERS: KeywordMatcher[] = [
  ...keywords.technologies.map((canonical) => ({
    canonical,
    type: 'TECHNOLOGY' as const,
    ignoreCase: /\s/.test(canonical),
  })),
  ...keywords.concepts.map((canonical) => ({ canonical, type: 'CONCEPT' as const, ignoreCase: true })),
]
  .sort((a, b) => b.canonical.length - a.canonical.length)
  .map(({ canonical, type, ignoreCase }) => ({
    canonical,
    type,
    pattern: new RegExp(`(?<![A-Za-z0-9])${escapeRegExp(canonical)}(?![A-Za-z0-9+#])`, ignoreCase ? 'gi' : 'g'),
  }));

const KNOWN_ORGANIZATIONS = new Map(keywords.organizations.map((name) => [name.toLowerCase(), name]));
const ORGANIZATION_SUFFIXES = new Set(keywords.organizationSuffixes);
const STOP_WORDS = new Set(keywords.stopWords);

const TOKEN = /(?<![A-Za-z0-9.])[A-Za-z][A-Za-z0-9]*(?:\.[A-Za-z]+)?(?![A-Za-z0-9])/g;
const CAPITALIZED_SEQUENCE =
  /(?<![A-Za-z0-9])[A-Z][A-Za-z0-9&'-]*(?:[ \t]+(?:(?:of|for)[ \t]+)?[A-Z][A-Za-z0-9&'-]*)*/g;
const PERSON_WORD = /^[A-Z][a-z]+(?:['-][A-Za-z]+)?$/;
const LEADING_WORD = /^(\S+)[ \t]+/;

function overlaps(span: Span, taken: Span[]): boolean {
  return taken.some((other) => span.start < other.end && other.start < span.end);
}

/**
 * A short newline-terminated line without sentence punctuation is treated
 * as a heading; capitalized words in headings are not names. The last
 * line of a chunk may be cut mid-sentence, so it is never a heading.
 */
function isHeadingLine(text: string, position: number): boolean {
  const newline = text.indexOf('\n', position);
  if (newline === -1) {
    return false;
  }

  const lineStart = text.lastIndexOf('\n', position - 1) + 1;
  const line = text.slice(lineStart, newline).trim();

  return line !== '' && !/[.!?,;:]/.test(line) && line.split(/\s+/).length <= 8;
}

function hasTechnologySuffix(token: string): boolean {
  return keywords.technologySuffixes.some((suffix) => token.length > suffix.length && token.endsWith(suffix));
}

function classifySequence(sequence: string, start: number): LocatedEntity | null {
  let phrase = sequence;
  let offset = start;

  for (let lead = LEADING_WORD.exec(phrase); lead && STOP_WORDS.has(lead[1]); lead = LEADING_WORD.exec(phrase)) {
    offset += lead[0].length;
    phrase = phrase.slice(lead[0].length);
  }

  if (STOP_WORDS.has(phrase)) {
    return null;
  }

  const words = phrase.split(/[ \t]+/);
  const located = (text: string, type: EntityType, at = offset): LocatedEntity => ({
    entity: { text, type, metadata: { strategy: 'pattern' } },
    start: at,
    end: at + text.length,
  });

  const known = KNOWN_ORGANIZATIONS.get(phrase.toLowerCase());
  if (known) {
    return located(known, 'ORGANIZATION');
  }

  if (words.length < 2) {
    return null;
  }

  if (words.some((word) => ORGANIZATION_SUFFIXES.has(word))) {
    return located(words.join(' '), 'ORGANIZATION');
  }

  const knownWord = words.find((word) => KNOWN_ORGANIZATIONS.has(word.toLowerCase()));
  if (knownWord) {
    const canonical = KNOWN_ORGANIZATIONS.get(knownWord.toLowerCase()) ?? knownWord;
    return located(canonical, 'ORGANIZATION', offset + phrase.indexOf(knownWord));
  }

  if (words.length <= 3 && words.every((word) => PERSON_WORD.test(word))) {
    return located(words.join(' '), 'PERSON');
  }

  return null;
}

/**
 * Extract entities and co-occurrence relations from text using surface patterns
 */
export function extractWithPatterns(text: string, maxEntities: number): ExtractionOutput {
  const found: LocatedEntity[] = [];
  const taken: Span[] = [];

  const take = (candidate: LocatedEntity): void => {
    found.push(candidate);
    taken.push({ start: candidate.start, end: candidate.end });
  };

  for (const matcher of KEYWORD_MATCHERS) {
    for (const match of text.matchAll(matcher.pattern)) {
      const start = match.index ?? 0;
      const span = { start, end: start + match[0].length };
      if (!overlaps(span, taken)) {
        take({ ...span, entity: { text: matcher.canonical, type: matcher.type, metadata: { strategy: 'pattern' } } });
      }
    }
  }

  for (const match of text.matchAll(TOKEN)) {
    const start = match.index ?? 0;
    const span = { start, end: start + match[0].length };
    if (hasTechnologySuffix(match[0]) && !overlaps(span, taken)) {
      take({ ...span, entity: { text: match[0], type: 'TECHNOLOGY', metadata: { strategy: 'pattern' } } });
    }
  }

  for (const match of text.matchAll(CAPITALIZED_SEQUENCE)) {
    const start = match.index ?? 0;
    if (isHeadingLine(text, start)) {
      continue;
    }

    const candidate = classifySequence(match[0], start);
    if (candidate && !overlaps(candidate, taken)) {
      take(candidate);
    }
  }

  found.sort((a, b) => a.start - b.start);

  const { entities } = normalizeExtraction(
    found.map((f) => f.entity),
    [],
    maxEntities
  );

  const keys = entities.map((entity) => entityKey(entity.text, entity.type));
  const relations: CandidateRelation[] = [];
  for (let i = 0; i < keys.length; i++) {
    for (let j = i + 1; j < keys.length; j++) {
      relations.push({
        source: keys[i],
        target: keys[j],
        type: CO_OCCURRENCE_RELATION,
        confidence: CO_OCCURRENCE_CONFIDENCE,
      });
    }
  }

  return normalizeExtraction(entities, relations, maxEntities);
}

export class PatternExtractionStrategy implements ExtractionStrategy {
  readonly kind = 'pattern' as const;

  constructor(private readonly maxEntities: number) {}

  async extract(text: string): Promise<ExtractionOutput> {
    return extractWithPatterns(text, this.maxEntities);
  }
}
