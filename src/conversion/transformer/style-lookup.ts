/**
 * Case-insensitive view of the configured style map.
 *
 * A paragraph style with a box prefix and no entry of its own is looked up
 * without the prefix, for both the paragraph map and the list patterns.
 */

import type { StyleMap } from '../../config.js';
import type { BlockRole, InlineRole, ListType } from '../types.js';

export interface ParagraphStyleRule {
    role: BlockRole;
    level?: number;
}

export interface ListStyleMatch {
    listType: ListType;
    /** Level taken from the style name; null when the pattern carries none. */
    level: number | null;
}

function lowerKeys<V>(record: Record<string, V>): Map<string, V> {
    return new Map(Object.entries(record).map(([key, value]) => [key.toLowerCase(), value]));
}

export class StyleLookup {
    private readonly paragraphStyles: Map<string, ParagraphStyleRule>;
    private readonly characterStyles: Map<string, InlineRole>;
    private readonly listPatterns: Array<{ pattern: RegExp; listType: ListType }>;
    private readonly placeholderStyles: Set<string>;
    private readonly headerCellStyles: Set<string>;
    private readonly boxPrefixes: string[];

    constructor(readonly styleMap: StyleMap) {
        this.paragraphStyles = lowerKeys(styleMap.paragraphStyles);
        this.characterStyles = lowerKeys(styleMap.characterStyles);
        this.listPatterns = styleMap.listStyles.map((rule) => ({ pattern: new RegExp(rule.pattern, 'i'), listType: rule.listType }));
        this.placeholderStyles = new Set(styleMap.placeholderStyles.map((s) => s.toLowerCase()));
        this.headerCellStyles = new Set(styleMap.headerCellStyles.map((s) => s.toLowerCase()));
        this.boxPrefixes = styleMap.boxStylePrefixes.map((prefix) => prefix.toLowerCase()).filter((prefix) => prefix !== '');
    }

    /** The style itself, then the style with its box prefix removed. */
    private candidates(styleClass: string): string[] {
        const lower = styleClass.toLowerCase();
        const prefix = this.boxPrefixes.find((p) => lower.startsWith(p) && lower.length > p.length);
        return prefix ? [styleClass, styleClass.slice(prefix.length)] : [styleClass];
    }

    get defaultListType(): ListType {
        return this.styleMap.defaultListType;
    }

    paragraphRule(styleClass: string): ParagraphStyleRule | null {
        for (const candidate of this.candidates(styleClass)) {
            const rule = this.paragraphStyles.get(candidate.toLowerCase());
            if (rule) return rule;
        }
        return null;
    }

    characterRole(styleClass: string): InlineRole | null {
        return styleClass ? this.characterStyles.get(styleClass.toLowerCase()) ?? null : null;
    }

    listStyle(styleClass: string): ListStyleMatch | null {
        if (!styleClass) return null;
        for (const candidate of this.candidates(styleClass)) {
            for (const { pattern, listType } of this.listPatterns) {
                const match = pattern.exec(candidate);
                if (!match) continue;
                const level = match[1] ? parseInt(match[1], 10) : NaN;
                return { listType, level: Number.isNaN(level) ? null : level };
            }
        }
        return null;
    }

    isPlaceholder(styleClass: string): boolean {
        return this.placeholderStyles.has(styleClass.toLowerCase());
    }

    /** Header-cell styles match with any trailing digits ignored. */
    isHeaderCellStyle(styleClass: string): boolean {
        return styleClass !== '' && this.headerCellStyles.has(styleClass.replace(/\d+$/, '').toLowerCase());
    }
}
