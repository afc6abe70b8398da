import { describe, it, expect } from 'vitest';
import { ComparisonEntry, EvidenceRecord, SkillStatus } from '../../interfaces/domain/SkillGap';
import { extractSkillsFromText, indexEvidenceBySkill } from '../../utils/skillExtractor';
import { DEFAULT_THRESHOLDS, SkillGapEngine } from '../../utils/skillGapEngine';

function entry(status: SkillStatus): ComparisonEntry {
  return {
    skill: `skill-${status}`,
    status,
    jdBestScore: 100,
    resumeBestScore: 0,
    resumeOccurrences: 0,
    evidence: []
  };
}

describe('SkillGapEngine', () => {
  const engine = new SkillGapEngine();

  describe('constructor', () => {
    it('uses the documented defaults', () => {
      expect(engine.thresholds).toEqual({ weak: 60, strong: 80, minStrongOccurrences: 2 });
      expect(DEFAULT_THRESHOLDS).toEqual({ weak: 60, strong: 80, minStrongOccurrences: 2 });
    });

    it('merges partial overrides over the defaults', () => {
      const tuned = new SkillGapEngine({ strong: 90 });

      expect(tuned.thresholds).toEqual({ weak: 60, strong: 90, minStrongOccurrences: 2 });
      expect(Object.isFrozen(tuned.thresholds)).toBe(true);
    });
  });

  describe('filterRequired', () => {
    it('drops a skill scoring a fraction under the weak threshold', () => {
      expect(engine.filterRequired([{ skill: 'A', occurrences: 0, bestScore: 59.99 }])).toEqual([]);
    });

    it('keeps mentioned or fuzzily plausible skills in order', () => {
      const evidence: EvidenceRecord[] = [
        { skill: 'A', occurrences: 0, bestScore: 59 },
        { skill: 'B', occurrences: 0, bestScore: 60 },
        { skill: 'C', occurrences: 1, bestScore: 0 },
        { skill: 'D', occurrences: 0, bestScore: 0 }
      ];

      expect(engine.filterRequired(evidence).map(record => record.skill)).toEqual(['B', 'C']);
    });

    it('never keeps an unmentioned skill scoring below the weak threshold', () => {
      const evidence: EvidenceRecord[] = [];
      for (let score = 0; score <= 100; score += 1) {
        evidence.push({ skill: `s${score}`, occurrences: 0, bestScore: score });
      }

      const required = engine.filterRequired(evidence);

      expect(required).toHaveLength(41);
      expect(required.every(record => record.bestScore >= 60)).toBe(true);
    });
  });

  describe('statusFor', () => {
    it.each([
      [{ bestScore: 80, occurrences: 0 }, 'present'],
      [{ bestScore: 79, occurrences: 2 }, 'present'],
      [{ bestScore: 95, occurrences: 1 }, 'present'],
      [{ bestScore: 79, occurrences: 1 }, 'weak'],
      [{ bestScore: 60, occurrences: 0 }, 'weak'],
      [{ bestScore: 10, occurrences: 1 }, 'weak'],
      [{ bestScore: 59, occurrences: 0 }, 'missing']
    ] as const)('classifies %o as %s', (evidence, status) => {
      expect(engine.statusFor(evidence)).toBe(status);
    });

    it('does not round fractional scores up to a threshold', () => {
      expect(engine.statusFor({ bestScore: 79.59, occurrences: 0 })).toBe('weak');
      expect(engine.statusFor({ bestScore: 59.57, occurrences: 0 })).toBe('missing');
    });

    it('follows configured thresholds', () => {
      const strict = new SkillGapEngine({ strong: 90, minStrongOccurrences: 3 });

      expect(strict.statusFor({ bestScore: 85, occurrences: 0 })).toBe('weak');
      expect(strict.statusFor({ bestScore: 0, occurrences: 2 })).toBe('weak');
      expect(strict.statusFor({ bestScore: 0, occurrences: 3 })).toBe('present');
    });
  });

  describe('classify', () => {
    const resumeText = 'python\nPython tools and scripts\nBaking bread';
    const resumeEvidence = indexEvidenceBySkill(extractSkillsFromText(resumeText, ['python', 'Rust']));

    it('looks up resume evidence by lower-cased skill name', () => {
      const [result] = engine.classify(
        [{ skill: 'PYTHON', occurrences: 1, bestScore: 100 }],
        resumeText,
        resumeEvidence
      );

      expect(result).toEqual({
        skill: 'PYTHON',
        status: 'present',
        jdBestScore: 100,
        resumeBestScore: 100,
        resumeOccurrences: 2,
        evidence: ['python', 'Python tools and scripts']
      });
    });

    it('treats a skill without resume evidence as absent', () => {
      const [result] = engine.classify(
        [{ skill: 'Go', occurrences: 2, bestScore: 100 }],
        resumeText,
        new Map()
      );

      expect(result.status).toBe('missing');
      expect(result.resumeOccurrences).toBe(0);
      expect(result.resumeBestScore).toBe(0);
    });

    it('is idempotent', () => {
      const required = [
        { skill: 'python', occurrences: 1, bestScore: 100 },
        { skill: 'Rust', occurrences: 1, bestScore: 100 }
      ];

      const first = engine.classify(required, resumeText, resumeEvidence);
      const second = engine.classify(required, resumeText, resumeEvidence);

      expect(second).toEqual(first);
    });

    it('keeps duplicated vocabulary entries as separate entries', () => {
      const results = engine.classify(
        [
          { skill: 'Python', occurrences: 1, bestScore: 100 },
          { skill: 'python', occurrences: 1, bestScore: 100 }
        ],
        resumeText,
        resumeEvidence
      );

      expect(results.map(result => result.skill)).toEqual(['Python', 'python']);
      expect(results[0].status).toBe(results[1].status);
    });
  });

  describe('score', () => {
    it('weights weak matches at half', () => {
      expect(engine.score([entry('present'), entry('weak'), entry('missing')])).toEqual({
        totalRequired: 3,
        present: 1,
        weak: 1,
        missing: 1,
        gapScorePercent: 50
      });
    });

    it('rounds to one decimal place', () => {
      expect(engine.score([entry('weak'), entry('missing'), entry('missing')]).gapScorePercent).toBe(83.3);
    });

    it('rounds exact halves to the even neighbour', () => {
      const entries = [
        ...Array.from({ length: 3 }, () => entry('weak')),
        ...Array.from({ length: 5 }, () => entry('missing'))
      ];

      expect(engine.score(entries).gapScorePercent).toBe(81.2);
    });

    it('reports 0 when every skill is present', () => {
      expect(engine.score([entry('present'), entry('present')]).gapScorePercent).toBe(0);
    });

    it('reports the maximal gap when nothing is required', () => {
      expect(engine.score([])).toEqual({
        totalRequired: 0,
        present: 0,
        weak: 0,
        missing: 0,
        gapScorePercent: 100
      });
    });

    it('stays within 0 to 100', () => {
      const statuses: SkillStatus[] = ['present', 'weak', 'missing'];
      for (let size = 0; size <= 6; size += 1) {
        for (const status of statuses) {
          const { gapScorePercent } = engine.score(Array.from({ length: size }, () => entry(status)));
          expect(gapScorePercent).toBeGreaterThanOrEqual(0);
          expect(gapScorePercent).toBeLessThanOrEqual(100);
        }
      }
    });
  });

  describe('analyze', () => {
    it('reports both skills covered when the resume mentions them', () => {
      const result = engine.analyze(
        'I used Python daily. Wrote one Docker script.',
        'We need Python and Docker experience.',
        ['Python', 'Docker']
      );

      expect(result.kind).toBe('report');
      if (result.kind !== 'report') return;

      expect(result.summary).toEqual({
        totalRequired: 2,
        present: 2,
        weak: 0,
        missing: 0,
        gapScorePercent: 0
      });
      expect(result.comparison[1]).toEqual({
        skill: 'Docker',
        status: 'present',
        jdBestScore: 100,
        resumeBestScore: 100,
        resumeOccurrences: 1,
        evidence: ['I used Python daily. Wrote one Docker script.']
      });
    });

    it('marks a required skill missing when the resume never mentions it', () => {
      const result = engine.analyze('I bake bread\nI paint walls', 'Kubernetes administration', ['Kubernetes']);

      expect(result.kind).toBe('report');
      if (result.kind !== 'report') return;

      expect(result.comparison).toHaveLength(1);
      expect(result.comparison[0].status).toBe('missing');
      expect(result.comparison[0].resumeOccurrences).toBe(0);
      expect(result.comparison[0].evidence).toEqual([]);
      expect(result.summary.gapScorePercent).toBe(100);
    });

    it('reports a 100 gap when the job description requires nothing', () => {
      const result = engine.analyze('Python developer', 'We bake bread', ['Kubernetes']);

      expect(result).toEqual({
        kind: 'report',
        summary: { totalRequired: 0, present: 0, weak: 0, missing: 0, gapScorePercent: 100 },
        comparison: []
      });
    });

    it('requires nothing when the job description only comes close to the weak threshold', () => {
      const result = engine.analyze(
        'abcdefghijklmn expert',
        'azbzczdzezfzgzhzizjzkzlzmznzzzzzz',
        ['abcdefghijklmn']
      );

      expect(result).toEqual({
        kind: 'report',
        summary: { totalRequired: 0, present: 0, weak: 0, missing: 0, gapScorePercent: 100 },
        comparison: []
      });
    });

    it('does not treat a resume score just under the strong threshold as present', () => {
      const skill = 'abc'.repeat(13);
      const result = engine.analyze(`${skill}${'x'.repeat(20)}`, `Needs ${skill}`, [skill]);
      if (result.kind !== 'report') throw new Error('expected a report');

      expect(result.comparison[0].resumeBestScore).toBeCloseTo(7800 / 98, 6);
      expect(result.comparison[0].resumeOccurrences).toBe(1);
      expect(result.comparison[0].status).toBe('weak');
    });

    it('cuts previews by code point so surrogate pairs stay whole', () => {
      const resumeText = 'a'.repeat(499) + '😀' + 'tail';
      const result = engine.analyze(resumeText, 'jd', []);
      if (result.kind !== 'warning') throw new Error('expected a warning');

      expect(result.resumeSnippet).toBe('a'.repeat(499) + '😀');
    });

    it('returns a warning with 500-character previews when the vocabulary is empty', () => {
      const resumeText = 'r'.repeat(600);
      const jdText = 'short job description';

      expect(engine.analyze(resumeText, jdText, [])).toEqual({
        kind: 'warning',
        warning: 'no vocabulary',
        resumeSnippet: 'r'.repeat(500),
        jdSnippet: 'short job description'
      });
    });

    it('only classifies present skills that meet the present condition', () => {
      const result = engine.analyze(
        'Python\nPython again\nSome SQL\nLinux admin',
        'Python, SQL, Linux and Docker required',
        ['Python', 'SQL', 'Linux', 'Docker', 'Rust']
      );
      if (result.kind !== 'report') throw new Error('expected a report');

      for (const item of result.comparison) {
        if (item.status === 'present') {
          expect(item.resumeBestScore >= 80 || item.resumeOccurrences >= 2).toBe(true);
        }
        if (item.status === 'missing') {
          expect(item.resumeBestScore < 60 && item.resumeOccurrences === 0).toBe(true);
        }
        expect(item.evidence.length).toBeLessThanOrEqual(5);
      }
    });
  });
});
