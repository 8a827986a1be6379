/**
 * Per-conversion state: configuration, sequence counters and diagnostics.
 *
 * A fresh context is created for every document so that concurrent
 * conversions never share identifier sequences.
 */

import type { ConversionConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { DEFAULT_CHAPTER_NUMBER } from './constants.js';
import type { Diagnostic, DiagnosticKind } from './types.js';

export type SequenceName = 'section' | 'figure' | 'table' | 'reference' | 'box' | 'term';

export class ConversionContext {
    readonly diagnostics: Diagnostic[] = [];
    private readonly sequences = new Map<SequenceName, number>();
    private chapter: string;

    constructor(
        readonly config: ConversionConfig,
        chapterNumber: string = DEFAULT_CHAPTER_NUMBER,
        readonly documentName: string = '(document)',
    ) {
        this.chapter = chapterNumber;
    }

    get chapterNumber(): string {
        return this.chapter;
    }

    /** Adopt the chapter number discovered in the front matter. */
    setChapterNumber(value: string): void {
        this.chapter = value;
    }

    /** Next 1-based value of a named sequence. */
    next(name: SequenceName): number {
        const value = (this.sequences.get(name) ?? 0) + 1;
        this.sequences.set(name, value);
        return value;
    }

    report(kind: DiagnosticKind, message: string, detail?: Record<string, unknown>): void {
        this.diagnostics.push(detail ? { kind, message, detail } : { kind, message });
        logger.warn(`${this.documentName}: ${kind}: ${message}`);
    }

    count(kind: DiagnosticKind): number {
        return this.diagnostics.filter((d) => d.kind === kind).length;
    }
}
