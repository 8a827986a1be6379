import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { BLOCK_ROLES, INLINE_ROLES, LIST_TYPES, MAX_NESTING_LEVEL } from './conversion/constants.js';
import { ConversionError, ConversionErrorCode, withErrorContextSync } from './conversion/errors.js';

const MODULE_DIR = path.dirname(fileURLToPath(import.meta.url));

// data/ sits beside src/ in the checkout and beside dist/ once built
export const DATA_DIR_CANDIDATES = [
    path.resolve(MODULE_DIR, '../data'),
    path.resolve(MODULE_DIR, '../../data'),
];

export const STYLE_MAP_FILE = 'style-map.json';
export const LABELS_FILE = 'labels.json';

function isValidPattern(pattern: string): boolean {
    try {
        new RegExp(pattern, 'i');
        return true;
    } catch {
        return false;
    }
}

export const ParagraphStyleSchema = z.object({
    role: z.enum(BLOCK_ROLES),
    level: z.number().int().min(1).max(MAX_NESTING_LEVEL).optional(),
});

export const ListStyleSchema = z.object({
    // Optional first capture group carries the 1-based nesting level
    pattern: z.string().refine(isValidPattern, { message: 'not a valid regular expression' }),
    listType: z.enum(LIST_TYPES),
});

export const StyleMapSchema = z.object({
    paragraphStyles: z.record(ParagraphStyleSchema),
    listStyles: z.array(ListStyleSchema).default([]),
    characterStyles: z.record(z.enum(INLINE_ROLES)),
    placeholderStyles: z.array(z.string()).default([]),
    headerCellStyles: z.array(z.string()).default([]),
    defaultListType: z.enum(LIST_TYPES).default('bullet'),
    // CaseStudy-Para-FL is looked up as Para-FL when it has no entry of its own
    boxStylePrefixes: z.array(z.string()).default([]),
});

export const LabelTableSchema = z.object({
    language: z.string().default('en'),
    chapter: z.array(z.string()).min(1),
    figure: z.array(z.string()).min(1),
    table: z.array(z.string()).min(1),
    abstract: z.array(z.string()).default([]),
    keywords: z.array(z.string()).default([]),
    part: z.array(z.string()).default(['Part', 'Section']),
    caseStudy: z.array(z.string()).default(['Case Study']),
    connectors: z.array(z.string()).default(['and', '&']),
    rangeWords: z.array(z.string()).default(['to']),
});

export type StyleMap = z.infer<typeof StyleMapSchema>;
export type LabelTable = z.infer<typeof LabelTableSchema>;

export interface ConversionConfig {
    styleMap: StyleMap;
    labels: LabelTable;
}

export interface ConfigOverrides {
    styleMapPath?: string;
    labelsPath?: string;
}

/** Locate a bundled data file, trying each candidate data directory in turn. */
export function resolveDataFile(fileName: string): string {
    for (const dir of DATA_DIR_CANDIDATES) {
        const candidate = path.join(dir, fileName);
        if (fs.existsSync(candidate)) return candidate;
    }
    throw new ConversionError(`Bundled configuration file not found: ${fileName}`, ConversionErrorCode.INVALID_CONFIG, {
        searched: DATA_DIR_CANDIDATES,
    });
}

function readJsonFile(filePath: string): unknown {
    return withErrorContextSync((): unknown => JSON.parse(fs.readFileSync(filePath, 'utf8')), ConversionErrorCode.INVALID_CONFIG, {
        filePath,
    });
}

function parseConfigFile<S extends z.ZodTypeAny>(schema: S, filePath: string): z.infer<S> {
    const result = schema.safeParse(readJsonFile(filePath));
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConversionError(`Invalid configuration in ${filePath}: ${issues.join('; ')}`, ConversionErrorCode.INVALID_CONFIG, {
            filePath,
            issues,
        });
    }
    return result.data;
}

/**
 * Load the style map and label table.
 * Override files replace the bundled tables wholesale.
 */
export function loadConversionConfig(overrides: ConfigOverrides = {}): ConversionConfig {
    const styleMapPath = overrides.styleMapPath ?? resolveDataFile(STYLE_MAP_FILE);
    const labelsPath = overrides.labelsPath ?? resolveDataFile(LABELS_FILE);
    return {
        styleMap: parseConfigFile(StyleMapSchema, styleMapPath),
        labels: parseConfigFile(LabelTableSchema, labelsPath),
    };
}

let bundledConfig: ConversionConfig | null = null;

/** The bundled configuration, read once. */
export function getDefaultConfig(): ConversionConfig {
    if (!bundledConfig) bundledConfig = loadConversionConfig();
    return bundledConfig;
}
