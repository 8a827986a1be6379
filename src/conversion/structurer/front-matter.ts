/**
 * Chapter front matter: the part heading, number, title, authors, abstract
 * and keywords. The blocks they came from leave the body flow.
 */

import type { LabelTable } from '../../config.js';
import type { ConversionContext } from '../context.js';
import { plainText, unwrapSoleFormat } from '../inline.js';
import type { Block, Contributor, FrontMatter, PartHeading, TextBlock } from '../types.js';
import { escapeRegExp } from './match-keys.js';

export interface FrontMatterResult {
    frontMatter: FrontMatter;
    blocks: Block[];
}

function headingText(block: Block): string | null {
    if (block.type !== 'text' || (block.role !== 'heading' && block.role !== 'paragraph')) return null;
    return plainText(block.content).trim().replace(/\s*:$/, '');
}

function isLabel(value: string | null, words: readonly string[]): value is string {
    return value !== null && words.some((w) => w.toLowerCase() === value.toLowerCase());
}

function isBodyParagraph(block: Block | undefined): block is TextBlock {
    return block !== undefined && block.type === 'text' && block.role === 'paragraph';
}

/** "Jane Q. Doe, John Roe and Ann Poe" → three contributors, last word as surname. */
export function parseAuthors(value: string): Contributor[] {
    return value
        .split(/\s*,\s*|\s+and\s+|\s*&\s*/)
        .map((name) => name.trim())
        .filter((name) => name !== '')
        .map((name): Contributor => {
            const words = name.split(/\s+/);
            const surname = words.pop() ?? name;
            return { kind: 'person', surname, givenNames: words.length > 0 ? words.join(' ') : null };
        });
}

export function splitKeywords(value: string): string[] {
    const separator = value.includes(',') ? ',' : ';';
    return value
        .split(separator)
        .map((term) => term.trim().replace(/\.$/, ''))
        .filter((term) => term !== '');
}

function parseChapterNumber(value: string, labels: LabelTable): { label: string; number: string | null } {
    const words = labels.chapter.map(escapeRegExp).join('|');
    const match = new RegExp(`^(?:${words})\\s+([0-9A-Za-z][0-9A-Za-z.\\-]*)`, 'i').exec(value);
    if (match) return { label: value, number: match[1].replace(/\.$/, '') };
    if (/^\d+$/.test(value)) return { label: `${labels.chapter[0]} ${value}`, number: value };
    return { label: value, number: null };
}

/** "Part II" or "Section 3"; null without a configured part word and number. */
export function parsePartNumber(value: string, labels: LabelTable): Pick<PartHeading, 'label' | 'number'> | null {
    if (labels.part.length === 0) return null;
    const words = labels.part.map(escapeRegExp).join('|');
    const match = new RegExp(`^((?:${words})\\s+([0-9A-Za-z.\\-]+))\\s*$`, 'i').exec(value);
    return match ? { label: match[1], number: match[2].replace(/\.$/, '') } : null;
}

export function extractFrontMatter(blocks: Block[], context: ConversionContext): FrontMatterResult {
    const labels = context.config.labels;
    const frontMatter: FrontMatter = {
        part: null,
        chapterLabel: null,
        chapterNumber: null,
        title: null,
        authors: [],
        abstract: null,
        keywords: null,
    };
    const rest: Block[] = [];
    // abstract and keywords are only looked for ahead of the first body heading
    let inBody = false;

    for (let i = 0; i < blocks.length; i++) {
        const block = blocks[i];
        const next = blocks[i + 1];

        if (block.type === 'text' && block.role === 'part-number' && frontMatter.part === null) {
            const value = plainText(block.content).trim();
            const parsed = parsePartNumber(value, labels);
            if (parsed) {
                frontMatter.part = { ...parsed, title: null };
                continue;
            }
            context.report('structural-anomaly', `part number "${value}" has no part label and number`, { text: value });
        }
        if (block.type === 'text' && block.role === 'part-title') {
            if (frontMatter.part && frontMatter.part.title === null) {
                frontMatter.part.title = unwrapSoleFormat(block.content, 'bold');
                continue;
            }
            context.report('structural-anomaly', 'part title without a preceding part number', { text: plainText(block.content) });
        }
        if (block.type === 'text' && block.role === 'chapter-number' && frontMatter.chapterLabel === null) {
            const parsed = parseChapterNumber(plainText(block.content).trim(), labels);
            frontMatter.chapterLabel = parsed.label;
            frontMatter.chapterNumber = parsed.number;
            if (parsed.number) context.setChapterNumber(parsed.number);
            continue;
        }
        if (block.type === 'text' && block.role === 'chapter-title' && frontMatter.title === null) {
            frontMatter.title = unwrapSoleFormat(block.content, 'bold');
            continue;
        }
        if (block.type === 'text' && block.role === 'chapter-author') {
            frontMatter.authors.push(...parseAuthors(plainText(block.content)));
            continue;
        }

        const heading = headingText(block);
        if (!inBody && frontMatter.abstract === null && isLabel(heading, labels.abstract) && isBodyParagraph(next)) {
            frontMatter.abstract = { title: heading, content: next.content };
            i++;
            continue;
        }
        if (!inBody && frontMatter.keywords === null && isLabel(heading, labels.keywords) && isBodyParagraph(next)) {
            frontMatter.keywords = { title: heading, terms: splitKeywords(plainText(next.content)) };
            i++;
            continue;
        }
        if (!inBody && frontMatter.keywords === null && block.type === 'text' && block.role === 'paragraph') {
            const inline = inlineKeywords(plainText(block.content), labels);
            if (inline) {
                frontMatter.keywords = inline;
                continue;
            }
        }
        if (block.type === 'text' && block.role === 'heading') inBody = true;
        rest.push(block);
    }
    return { frontMatter, blocks: rest };
}

/** "Keywords: a, b, c" on a single line. */
function inlineKeywords(value: string, labels: LabelTable): { title: string; terms: string[] } | null {
    if (labels.keywords.length === 0) return null;
    const words = labels.keywords.map(escapeRegExp).join('|');
    const match = new RegExp(`^\\s*(${words})\\s*:\\s*(.+)$`, 'i').exec(value);
    return match ? { title: match[1], terms: splitKeywords(match[2]) } : null;
}
