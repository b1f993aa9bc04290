/**
 * Local Docs Adapter
 *
 * Markdown and text documentation read from configured directories.
 * Sections are matched against the ticket from the primary context; standards
 * documents (CLAUDE.md, .cursorrules, standards/...) are served separately.
 */

import { readdir, readFile, stat } from 'fs/promises';
import { extname, join, relative, sep } from 'path';
import type { SourcesConfig } from '../lib/config.js';
import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import {
  classifyDocument,
  extractKeywords,
  formatSections,
  isStandardsDocument,
  matchDocuments,
  splitSections,
} from '../context/doc-matcher.js';
import { createSourceContext, findTicket } from '../context/source-context.js';
import type { DocSection, SearchResult, SourceContext, Ticket } from '../context/types.js';
import type { Adapter, AdapterFetchOptions, DocumentSearcher } from './types.js';

const logger = createLogger('adapters:local-docs');

const SUPPORTED_EXTENSIONS = new Set(['.md', '.markdown', '.txt', '.rst']);
const MAX_FILE_BYTES = 1_000_000;
const MAX_FILES = 100;
const SECTION_LIMIT = { standard: 5, deep: 10 } as const;
const BROAD_SECTION_LIMIT = 20;
const FETCH_STANDARDS_LIMIT = 3;
const BROAD_STANDARDS_LIMIT = 5;
const SKIPPED_DIRECTORIES = new Set(['node_modules', 'dist', 'build']);

export type LocalDocsConfig = SourcesConfig['docs'];

function toPosix(path: string): string {
  return path.split(sep).join('/');
}

export class LocalDocsAdapter implements Adapter, DocumentSearcher {
  readonly name = 'local_docs';
  readonly sourceType = 'documentation' as const;
  readonly isPrimary = false;
  readonly needsPrimaryContext = true;

  constructor(private readonly config: LocalDocsConfig) {}

  async fetchTaskContext(taskId: string, options: AdapterFetchOptions): Promise<SourceContext> {
    const sections = await this.loadSections();
    const ticket = options.primaryHint ? findTicket([options.primaryHint]) : null;

    if (!ticket) {
      // No ticket to match against: sections naming the task id
      const needle = taskId.toLowerCase();
      const mentioned = sections.filter((section) => section.content.toLowerCase().includes(needle));
      return this.docsContext(mentioned.slice(0, SECTION_LIMIT[options.depth]), [], []);
    }

    const result = matchDocuments(sections, ticket, {
      maxSections: SECTION_LIMIT[options.depth],
      maxStandards: FETCH_STANDARDS_LIMIT,
    });
    return this.docsContext(
      result.matches.map((match) => match.section),
      result.standards,
      result.keywords
    );
  }

  /**
   * Wider match used by the preprocessing pipeline
   */
  async broadSearch(ticket: Ticket): Promise<SourceContext> {
    const sections = await this.loadSections();
    const result = matchDocuments(sections, ticket, {
      maxSections: BROAD_SECTION_LIMIT,
      maxStandards: BROAD_STANDARDS_LIMIT,
    });

    logger.debug(
      { taskId: ticket.taskId, matches: result.matches.length, standards: result.standards.length },
      'Broad documentation search'
    );

    return this.docsContext(
      result.matches.map((match) => match.section),
      result.standards,
      result.keywords
    );
  }

  async getStandards(area?: string): Promise<SourceContext> {
    const standards = (await this.loadSections()).filter((section) => section.docType === 'standards');
    const needle = area?.trim().toLowerCase();
    const selected = needle
      ? standards.filter(
          (section) =>
            section.filePath.toLowerCase().includes(needle) ||
            (section.sectionTitle ?? '').toLowerCase().includes(needle)
        )
      : standards;

    return createSourceContext({
      sourceName: this.name,
      sourceType: this.sourceType,
      data: { kind: 'docs', sections: selected },
      rawText: formatSections(selected),
      metadata: { area: area ?? null, matchCount: selected.length },
    });
  }

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    const keywords = extractKeywords(query);
    const phrase = query.trim().toLowerCase();
    const sections = await this.loadSections();

    const results: SearchResult[] = [];
    for (const section of sections) {
      const body = section.content.toLowerCase();
      const hits = keywords.filter((keyword) => body.includes(keyword)).length;
      const phraseHit = phrase.length > 0 && body.includes(phrase);
      if (hits === 0 && !phraseHit) continue;

      const keywordShare = keywords.length > 0 ? hits / keywords.length : 0;
      results.push({
        sourceName: this.name,
        sourceType: this.sourceType,
        title: section.sectionTitle ? `${section.filePath} > ${section.sectionTitle}` : section.filePath,
        excerpt: section.content.slice(0, 300),
        url: null,
        relevanceScore: Math.round(Math.min(1, keywordShare * 0.8 + (phraseHit ? 0.2 : 0)) * 100) / 100,
      });
    }

    results.sort((a, b) => b.relevanceScore - a.relevanceScore);
    return results.slice(0, maxResults);
  }

  async healthCheck(): Promise<boolean> {
    if (this.config.paths.length === 0) {
      return false;
    }
    const checks = await Promise.all(
      this.config.paths.map(async (path) => {
        try {
          return (await stat(path)).isDirectory();
        } catch {
          return false;
        }
      })
    );
    return checks.some(Boolean);
  }

  async close(): Promise<void> {
    // nothing held open
  }

  /**
   * Every section of every supported file under the configured roots
   */
  async loadSections(): Promise<DocSection[]> {
    const files: { root: string; path: string }[] = [];
    for (const root of this.config.paths) {
      await this.collectFiles(root, root, files);
    }

    const sections: DocSection[] = [];
    for (const file of files.slice(0, MAX_FILES)) {
      const relativePath = toPosix(relative(file.root, file.path));
      try {
        const info = await stat(file.path);
        if (info.size > MAX_FILE_BYTES) {
          logger.debug({ path: relativePath, size: info.size }, 'Skipping oversized document');
          continue;
        }
        const content = await readFile(file.path, 'utf8');
        const docType = classifyDocument(relativePath, this.config.standardsPath);
        sections.push(...splitSections(relativePath, content, docType));
      } catch (error) {
        logger.warn({ path: relativePath, error: errorMessage(error) }, 'Failed to read document');
      }
    }

    return sections;
  }

  private async collectFiles(root: string, dir: string, files: { root: string; path: string }[]): Promise<void> {
    if (files.length >= MAX_FILES) return;

    let entries;
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      logger.warn({ dir, error: errorMessage(error) }, 'Failed to list documentation directory');
      return;
    }

    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      if (files.length >= MAX_FILES) return;
      const path = join(dir, entry.name);

      if (entry.isDirectory()) {
        if (!entry.name.startsWith('.') && !SKIPPED_DIRECTORIES.has(entry.name)) {
          await this.collectFiles(root, path, files);
        }
      } else if (entry.isFile()) {
        const relativePath = toPosix(relative(root, path));
        const supported =
          SUPPORTED_EXTENSIONS.has(extname(entry.name).toLowerCase()) ||
          isStandardsDocument(relativePath, this.config.standardsPath);
        if (supported) {
          files.push({ root, path });
        }
      }
    }
  }

  private docsContext(sections: DocSection[], standards: DocSection[], keywords: string[]): SourceContext {
    const all = [...sections, ...standards];
    const parts: string[] = [];
    if (sections.length > 0) {
      parts.push(formatSections(sections));
    }
    if (standards.length > 0) {
      parts.push(`Standards:\n\n${formatSections(standards)}`);
    }

    return createSourceContext({
      sourceName: this.name,
      sourceType: this.sourceType,
      data: { kind: 'docs', sections: all },
      rawText: parts.join('\n\n'),
      metadata: { matchCount: sections.length, standardsCount: standards.length, keywords },
    });
  }
}
