import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { SkillTerm } from '../interfaces/domain/SkillGap';
import { logger } from './logger';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads the first cell of every CSV row. Rows are kept in file order and
 * duplicates are not removed; blank cells are skipped.
 */
export function parseSkillsCsv(content: string): SkillTerm[] {
  const rows: string[][] = parse(content, {
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true
  });

  const skills: SkillTerm[] = [];
  for (const row of rows) {
    const skill = (row[0] || '').trim();
    if (skill) {
      skills.push(skill);
    }
  }
  return skills;
}

/** Returns an empty list when the file does not exist. */
export async function loadSkillsFromCsv(path: string): Promise<SkillTerm[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      logger.warn('Skills vocabulary file not found', { path });
      return [];
    }
    throw error;
  }

  const skills = parseSkillsCsv(content);
  logger.info('Loaded skills vocabulary', { path, count: skills.length });
  return skills;
}

/** Process-wide read-only cache of the vocabulary, replaced wholesale on reload. */
export class SkillVocabulary {
  private cached: Promise<readonly SkillTerm[]> | null = null;

  constructor(private readonly path: string) {}

  get(): Promise<readonly SkillTerm[]> {
    if (!this.cached) {
      this.cached = this.load();
    }
    return this.cached;
  }

  reload(): Promise<readonly SkillTerm[]> {
    this.cached = this.load();
    return this.cached;
  }

  private async load(): Promise<readonly SkillTerm[]> {
    try {
      const skills = await loadSkillsFromCsv(this.path);
      return Object.freeze(skills);
    } catch (error) {
      this.cached = null;
      throw error;
    }
  }
}
