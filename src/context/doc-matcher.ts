/**
 * Document Matcher
 *
 * Pure matching of local documentation sections against a ticket:
 * components and labels against file paths and headings, title and
 * description keywords against section bodies. Standards documents are
 * reported separately and always included.
 */

import { readFileSync } from 'fs';
import { basename } from 'path';
import { z } from 'zod';
import type { DocSection, DocType, Ticket } from './types.js';

const keywordListsSchema = z.object({
  stopWords: z.array(z.string()),
  actionVerbs: z.array(z.string()),
});

const keywordLists = keywordListsSchema.parse(
  JSON.parse(readFileSync(new URL('../../data/keywords.json', import.meta.url), 'utf8'))
);

const STOP_WORDS = new Set(keywordLists.stopWords);
const ACTION_VERBS = new Set(keywordLists.actionVerbs);

const MAX_KEYWORDS = 10;

const STANDARDS_FILENAMES = new Set(['claude.md', '.cursorrules', 'contributing.md', 'conventions.md']);
const STANDARDS_DIRECTORIES = ['standards/', 'conventions/', 'guidelines/'];

/**
 * Distinct keywords, longest first then alphabetical, at most ten.
 * Drops stop words, common ticket verbs and words under three characters.
 */
export function extractKeywords(text: string): string[] {
  if (!text) return [];

  const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  const keywords = [
    ...new Set(words.filter((word) => word.length >= 3 && !STOP_WORDS.has(word) && !ACTION_VERBS.has(word))),
  ];

  keywords.sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));
  return keywords.slice(0, MAX_KEYWORDS);
}

function normalizePath(relativePath: string): string {
  return relativePath.replace(/\\/g, '/').toLowerCase();
}

export function isStandardsDocument(relativePath: string, standardsPath?: string): boolean {
  const path = normalizePath(relativePath);
  if (standardsPath && path.startsWith(normalizePath(standardsPath))) {
    return true;
  }
  if (STANDARDS_FILENAMES.has(basename(path))) {
    return true;
  }
  return STANDARDS_DIRECTORIES.some((dir) => path.startsWith(dir) || path.includes(`/${dir}`));
}

export function classifyDocument(relativePath: string, standardsPath?: string): DocType {
  if (isStandardsDocument(relativePath, standardsPath)) return 'standards';

  const path = normalizePath(relativePath);
  if (path.includes('/adr/') || path.startsWith('adr/') || /(^|\/)adr-\d+/.test(path)) return 'adr';
  if (path.includes('architecture') || path.includes('design')) return 'architecture';
  return 'other';
}

/**
 * Split a markdown document on headings. Text before the first heading
 * becomes a section without a title; empty sections are dropped.
 */
export function splitSections(filePath: string, content: string, docType: DocType): DocSection[] {
  const sections: DocSection[] = [];
  let title: string | null = null;
  let lines: string[] = [];

  const flush = (): void => {
    const body = lines.join('\n').trim();
    if (body) {
      sections.push({ filePath, sectionTitle: title, content: body, docType });
    }
  };

  for (const line of content.split(/\r?\n/)) {
    const heading = /^#{1,6}\s+(.+?)\s*#*\s*$/.exec(line);
    if (heading) {
      flush();
      title = heading[1];
      lines = [];
    } else {
      lines.push(line);
    }
  }
  flush();

  return sections;
}

function termVariants(term: string): string[] {
  const lower = term.toLowerCase().trim();
  if (!lower) return [];
  const hyphenated = lower.replace(/[\s_]+/g, '-');
  return [...new Set([lower, hyphenated, hyphenated.replace(/-/g, '_')])];
}

export interface SectionMatch {
  section: DocSection;
  score: number;
  matchedTerms: string[];
}

export interface DocMatchResult {
  matches: SectionMatch[];
  standards: DocSection[];
  keywords: string[];
}

export interface DocMatchOptions {
  maxSections: number;
  maxStandards?: number;
}

/**
 * Rank non-standards sections for a ticket. A component or label found in
 * a path or heading scores 2, each keyword found in the body scores 1.
 */
export function matchDocuments(
  sections: readonly DocSection[],
  ticket: Pick<Ticket, 'title' | 'description' | 'components' | 'labels'>,
  options: DocMatchOptions
): DocMatchResult {
  const keywords = extractKeywords(`${ticket.title} ${ticket.description ?? ''}`);
  const structuralTerms = [...ticket.components, ...ticket.labels];

  const matches: SectionMatch[] = [];
  const standards: DocSection[] = [];

  for (const section of sections) {
    if (section.docType === 'standards') {
      standards.push(section);
      continue;
    }

    const location = `${normalizePath(section.filePath)} ${(section.sectionTitle ?? '').toLowerCase()}`;
    const body = section.content.toLowerCase();
    let score = 0;
    const matchedTerms: string[] = [];

    for (const term of structuralTerms) {
      if (termVariants(term).some((variant) => location.includes(variant))) {
        score += 2;
        matchedTerms.push(term);
      }
    }
    for (const keyword of keywords) {
      if (body.includes(keyword)) {
        score += 1;
        matchedTerms.push(keyword);
      }
    }

    if (score > 0) {
      matches.push({ section, score, matchedTerms });
    }
  }

  matches.sort(
    (a, b) =>
      b.score - a.score ||
      a.section.filePath.localeCompare(b.section.filePath) ||
      (a.section.sectionTitle ?? '').localeCompare(b.section.sectionTitle ?? '')
  );

  return {
    matches: matches.slice(0, options.maxSections),
    standards: standards.slice(0, options.maxStandards ?? standards.length),
    keywords,
  };
}

/**
 * Markdown for a set of sections, grouped under their file paths
 */
export function formatSections(sections: readonly DocSection[]): string {
  return sections
    .map((section) => {
      const heading = section.sectionTitle
        ? `#### ${section.filePath} > ${section.sectionTitle}`
        : `#### ${section.filePath}`;
      return `${heading}\n\n${section.content}`;
    })
    .join('\n\n');
}
