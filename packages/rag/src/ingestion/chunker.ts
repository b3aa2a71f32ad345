/**
 * Structure-Aware Chunker
 *
 * Splits document text into overlapping chunks for embedding:
 * - Fenced code blocks stay whole; tables stay whole or are split by rows
 *   with the header repeated
 * - Markdown headings start a new section, and chunks never span sections
 * - Inside a section, paragraphs are packed up to the token limit; sentences
 *   (then words) are only used for paragraphs that do not fit on their own
 * - Consecutive chunks of a section share `overlapTokens` of trailing text
 *
 * @module @docpilot/rag/ingestion/chunker
 */

export type TokenLanguage = 'en' | 'zh' | 'mixed';

export interface ChunkerConfig {
  /** Chunks below this size are merged with their neighbour when possible */
  minTokens: number;
  /** Upper bound per chunk, overlap included (atomic blocks may exceed it) */
  maxTokens: number;
  /** Trailing tokens of a chunk repeated at the start of the next one */
  overlapTokens: number;
  language: TokenLanguage;
  /** Rows per piece when a table has to be split */
  tableRowsPerChunk: number;
}

export interface TextChunk {
  index: number;
  text: string;
  tokenCount: number;
  /** Nearest heading, if any */
  section: string | null;
}

export interface Section {
  level: number;
  header: string;
  content: string;
  headerPath: string[];
}

const DEFAULT_CONFIG: ChunkerConfig = {
  minTokens: 100,
  maxTokens: 800,
  overlapTokens: 50,
  language: 'mixed',
  tableRowsPerChunk: 20,
};

// ============================================================================
// Token Counting
// ============================================================================

/**
 * Estimate token count: ~4 characters per token for Latin text, ~1.5 for CJK.
 */
export function countTokens(text: string, language: TokenLanguage = 'mixed'): number {
  if (!text) return 0;

  if (language === 'en') {
    return Math.ceil(text.length / 4);
  }

  if (language === 'zh') {
    return Math.ceil(text.length / 1.5);
  }

  const cjkChars = text.match(/[一-鿿]/g)?.length ?? 0;
  const otherChars = text.length - cjkChars;

  return Math.ceil(cjkChars / 1.5 + otherChars / 4);
}

// ============================================================================
// Protected Blocks
// ============================================================================

interface ProtectedBlock {
  kind: 'code' | 'table';
  placeholder: string;
  text: string;
}

const PLACEHOLDER = /<<<BLOCK_(\d+)>>>/g;

/**
 * Split a markdown table into pieces of `rowsPerPiece` body rows, each carrying
 * the header and separator lines.
 */
export function splitTable(table: string, rowsPerPiece: number): string[] {
  const lines = table.trim().split('\n');
  const hasSeparator = lines.length > 1 && /^\|[\s:|-]+\|$/.test(lines[1].trim());
  const headerLines = hasSeparator ? lines.slice(0, 2) : lines.slice(0, 1);
  const rows = lines.slice(headerLines.length);

  if (rows.length <= rowsPerPiece) {
    return [lines.join('\n')];
  }

  const pieces: string[] = [];
  for (let i = 0; i < rows.length; i += rowsPerPiece) {
    pieces.push([...headerLines, ...rows.slice(i, i + rowsPerPiece)].join('\n'));
  }
  return pieces;
}

/**
 * Replace code blocks and tables with placeholders so paragraph and sentence
 * splitting cannot cut through them. Each placeholder becomes its own paragraph.
 */
export function protectBlocks(
  content: string,
  config: Pick<ChunkerConfig, 'maxTokens' | 'language' | 'tableRowsPerChunk'>
): { content: string; blocks: ProtectedBlock[] } {
  const blocks: ProtectedBlock[] = [];
  const register = (kind: ProtectedBlock['kind'], text: string) => {
    const placeholder = `<<<BLOCK_${blocks.length}>>>`;
    blocks.push({ kind, placeholder, text });
    return placeholder;
  };

  let result = content.replace(/```[^\n]*\n[\s\S]*?\n```/g, (match) => `\n\n${register('code', match)}\n\n`);

  result = result.replace(/(?:^\|[^\n]*\|[ \t]*(?:\n|$))+/gm, (match) => {
    const table = match.trimEnd();
    if (table.split('\n').length < 2) return match;

    const pieces =
      countTokens(table, config.language) > config.maxTokens
        ? splitTable(table, config.tableRowsPerChunk)
        : [table];
    return `\n\n${pieces.map((piece) => register('table', piece)).join('\n\n')}\n\n`;
  });

  return { content: result, blocks };
}

function restoreBlocks(text: string, blocks: ProtectedBlock[]): string {
  return text.replace(PLACEHOLDER, (match, index: string) => blocks[Number(index)]?.text ?? match);
}

// ============================================================================
// Sections
// ============================================================================

/**
 * Split markdown content at ATX headings. The heading line stays at the top of
 * its section's content.
 */
export function splitIntoSections(content: string): Section[] {
  const headerRegex = /^(#{1,6})\s+(.+?)\s*#*$/gm;
  const headers: Array<{ level: number; text: string; index: number }> = [];

  let match;
  while ((match = headerRegex.exec(content)) !== null) {
    headers.push({ level: match[1].length, text: match[2].trim(), index: match.index });
  }

  if (headers.length === 0) {
    return [{ level: 0, header: '', content: content.trim(), headerPath: [] }];
  }

  const sections: Section[] = [];
  const preamble = content.slice(0, headers[0].index).trim();
  if (preamble) {
    sections.push({ level: 0, header: '', content: preamble, headerPath: [] });
  }

  const pathStack: Array<{ level: number; text: string }> = [];
  headers.forEach((header, i) => {
    const end = i < headers.length - 1 ? headers[i + 1].index : content.length;

    while (pathStack.length > 0 && pathStack[pathStack.length - 1].level >= header.level) {
      pathStack.pop();
    }
    pathStack.push(header);

    sections.push({
      level: header.level,
      header: header.text,
      content: content.slice(header.index, end).trim(),
      headerPath: pathStack.map((p) => p.text),
    });
  });

  return sections;
}

// ============================================================================
// Packing
// ============================================================================

function splitIntoSentences(text: string): string[] {
  const sentences = text.match(/[^.!?。！？]+(?:[.!?。！？]+|$)/g) ?? [];
  const trimmed = sentences.map((s) => s.trim()).filter(Boolean);
  return trimmed.length > 0 ? trimmed : [text];
}

function splitByWords(text: string, limit: number, language: TokenLanguage): string[] {
  const pieces: string[] = [];
  let current = '';

  for (const word of text.split(/\s+/).filter(Boolean)) {
    const candidate = current ? `${current} ${word}` : word;
    if (current && countTokens(candidate, language) > limit) {
      pieces.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }

  if (current) pieces.push(current);
  return pieces;
}

/**
 * Pack text into pieces of at most `limit` tokens, measuring protected blocks at
 * their real size. Paragraph breaks are preferred; oversized paragraphs fall back
 * to sentences, oversized sentences to words. A protected block is never split.
 */
export function packText(
  text: string,
  limit: number,
  language: TokenLanguage,
  blocks: ProtectedBlock[] = []
): string[] {
  const measure = (t: string) => countTokens(restoreBlocks(t, blocks), language);
  const pieces: string[] = [];
  let current = '';
  let separator = '\n\n';

  const push = (unit: string, joiner: string) => {
    const candidate = current ? `${current}${joiner}${unit}` : unit;
    if (current && measure(candidate) > limit) {
      pieces.push(current);
      current = unit;
    } else {
      current = candidate;
    }
  };

  for (const paragraph of text.split(/\n\s*\n/).map((p) => p.trim()).filter(Boolean)) {
    const isBlock = /^<<<BLOCK_\d+>>>$/.test(paragraph);

    if (isBlock || measure(paragraph) <= limit) {
      push(paragraph, separator);
      separator = '\n\n';
      continue;
    }

    for (const sentence of splitIntoSentences(paragraph)) {
      const units =
        measure(sentence) > limit ? splitByWords(sentence, limit, language) : [sentence];
      for (const unit of units) {
        push(unit, separator);
        separator = ' ';
      }
    }
    separator = '\n\n';
  }

  if (current) pieces.push(current);
  return pieces;
}

function mergeSmallPieces(
  pieces: string[],
  minTokens: number,
  maxTokens: number,
  language: TokenLanguage
): string[] {
  if (pieces.length <= 1) return pieces;

  const merged: string[] = [];
  let current = pieces[0];

  for (const next of pieces.slice(1)) {
    const combined = `${current}\n\n${next}`;
    if (countTokens(current, language) < minTokens && countTokens(combined, language) <= maxTokens) {
      current = combined;
    } else {
      merged.push(current);
      current = next;
    }
  }

  merged.push(current);
  return merged;
}

/**
 * Trailing words of `text` totalling at most `tokens` tokens
 */
export function tailTokens(text: string, tokens: number, language: TokenLanguage): string {
  if (tokens <= 0) return '';

  const words = text.split(/\s+/).filter(Boolean);
  let tail = '';

  for (let i = words.length - 1; i >= 0; i--) {
    const candidate = tail ? `${words[i]} ${tail}` : words[i];
    if (countTokens(candidate, language) > tokens) break;
    tail = candidate;
  }

  return tail;
}

// ============================================================================
// Chunker
// ============================================================================

export class DocumentChunker {
  private config: ChunkerConfig;

  constructor(config: Partial<ChunkerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.overlapTokens >= this.config.maxTokens) {
      throw new Error('overlapTokens must be smaller than maxTokens');
    }
  }

  chunk(content: string): TextChunk[] {
    const { minTokens, maxTokens, overlapTokens, language } = this.config;
    const bodyLimit = maxTokens - overlapTokens;
    const { content: protectedContent, blocks } = protectBlocks(content, this.config);
    const chunks: TextChunk[] = [];

    for (const section of splitIntoSections(protectedContent)) {
      if (!section.content.trim()) continue;

      const bodies = mergeSmallPieces(
        packText(section.content, bodyLimit, language, blocks).map((piece) =>
          restoreBlocks(piece, blocks)
        ),
        minTokens,
        bodyLimit,
        language
      );

      bodies.forEach((body, i) => {
        const overlap = i > 0 ? tailTokens(bodies[i - 1], overlapTokens, language) : '';
        const text = overlap ? `${overlap}\n\n${body}` : body;

        chunks.push({
          index: chunks.length,
          text,
          tokenCount: countTokens(text, language),
          section: section.header || null,
        });
      });
    }

    return chunks;
  }

  getConfig(): ChunkerConfig {
    return { ...this.config };
  }
}

export function createChunker(config?: Partial<ChunkerConfig>): DocumentChunker {
  return new DocumentChunker(config);
}
