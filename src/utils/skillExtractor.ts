import * as fuzz from 'fuzzball';
import type { FuzzballBaseOptions } from 'fuzzball';
import { EvidenceRecord, SkillEvidence, SkillTerm } from '../interfaces/domain/SkillGap';

export const MAX_EVIDENCE_LINES = 5;

const NO_EVIDENCE: SkillEvidence = { occurrences: 0, bestScore: 0 };

// fuzzball's typings omit the substitution cost its distance function reads
interface IndelOptions extends FuzzballBaseOptions {
  subcost: number;
}

// Substitution costs two edits, which makes this an insert/delete distance
const INDEL_OPTIONS: IndelOptions = { full_process: false, subcost: 2 };

function normalizedSimilarity(a: string, b: string): number {
  const lensum = a.length + b.length;
  if (!a || !b) {
    return 0;
  }
  return (100 * (lensum - fuzz.distance(a, b, INDEL_OPTIONS))) / lensum;
}

/**
 * Token-set similarity (0-100) of two fragments, case-insensitive and unrounded.
 * Tokens are whitespace-delimited and compared as-is, so "c++" stays "c++".
 */
export function tokenSetScore(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (!left.trim() || !right.trim()) {
    return 0;
  }

  const leftTokens = fuzz.unique_tokens(left);
  const rightTokens = fuzz.unique_tokens(right);
  const shared = leftTokens.filter(token => rightTokens.includes(token)).sort();
  const leftOnly = leftTokens.filter(token => !rightTokens.includes(token)).sort();
  const rightOnly = rightTokens.filter(token => !leftTokens.includes(token)).sort();

  const sect = shared.join(' ');
  const combinedLeft = [...shared, ...leftOnly].join(' ');
  const combinedRight = [...shared, ...rightOnly].join(' ');

  return Math.max(
    normalizedSimilarity(sect, combinedLeft),
    normalizedSimilarity(sect, combinedRight),
    normalizedSimilarity(combinedLeft, combinedRight)
  );
}

/** Non-overlapping count; callers pass already lower-cased strings. */
function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count += 1;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

function nonEmptyLines(text: string): string[] {
  return text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

export function findSkillEvidence(skill: SkillTerm, text: string): SkillEvidence {
  if (!skill || !text) {
    return { ...NO_EVIDENCE };
  }

  const skillLower = skill.toLowerCase();
  const occurrences = countOccurrences(text.toLowerCase(), skillLower);

  let bestScore = 0;
  for (const line of nonEmptyLines(text)) {
    const score = tokenSetScore(skillLower, line);
    if (score > bestScore) {
      bestScore = score;
    }
  }

  return { occurrences, bestScore };
}

export function extractSkillsFromText(text: string, skills: readonly SkillTerm[]): EvidenceRecord[] {
  return skills.map(skill => ({
    skill,
    ...findSkillEvidence(skill, text)
  }));
}

/**
 * Lines of `text` that mention the skill literally or score at least
 * `threshold` against it, trimmed, in document order, at most `limit` of them.
 */
export function findEvidenceLines(
  skill: SkillTerm,
  text: string,
  threshold: number,
  limit = MAX_EVIDENCE_LINES
): string[] {
  const skillLower = skill.toLowerCase();
  if (!skillLower) {
    return [];
  }

  const evidence: string[] = [];
  for (const line of nonEmptyLines(text)) {
    if (evidence.length >= limit) {
      break;
    }
    if (line.toLowerCase().includes(skillLower) || tokenSetScore(skillLower, line) >= threshold) {
      evidence.push(line);
    }
  }
  return evidence;
}

export function indexEvidenceBySkill(records: readonly EvidenceRecord[]): Map<string, SkillEvidence> {
  const lookup = new Map<string, SkillEvidence>();
  for (const record of records) {
    lookup.set(record.skill.toLowerCase(), {
      occurrences: record.occurrences,
      bestScore: record.bestScore
    });
  }
  return lookup;
}
