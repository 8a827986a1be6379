/**
 * Run formatting lookup.
 *
 * Every combination of the five character toggles and the three vertical
 * positions maps to one fixed wrapper chain, outermost first:
 * vertical position, bold, italic, underline, strike, small caps.
 * A named character role always wraps the chain.
 */

import { FormatFlag } from '../constants.js';
import type { FormatFlags, Inline, InlineFormat, InlineRole } from '../types.js';

const CHAIN_ORDER: ReadonlyArray<readonly [number, InlineFormat]> = [
    [FormatFlag.SUPERSCRIPT, 'superscript'],
    [FormatFlag.SUBSCRIPT, 'subscript'],
    [FormatFlag.BOLD, 'bold'],
    [FormatFlag.ITALIC, 'italic'],
    [FormatFlag.UNDERLINE, 'underline'],
    [FormatFlag.STRIKE, 'strike'],
    [FormatFlag.SMALL_CAPS, 'small-caps'],
];

export const FORMAT_MASK = CHAIN_ORDER.reduce((mask, [flag]) => mask | flag, 0);

/** Drop unknown bits; superscript wins when both vertical positions are set. */
export function canonicalFlags(flags: FormatFlags): FormatFlags {
    const masked = flags & FORMAT_MASK;
    return masked & FormatFlag.SUPERSCRIPT ? masked & ~FormatFlag.SUBSCRIPT : masked;
}

function buildChains(): ReadonlyMap<FormatFlags, readonly InlineFormat[]> {
    const chains = new Map<FormatFlags, readonly InlineFormat[]>();
    for (let flags = 0; flags <= FORMAT_MASK; flags++) {
        const key = canonicalFlags(flags);
        if (key !== flags || chains.has(key)) continue;
        chains.set(
            key,
            CHAIN_ORDER.filter(([flag]) => key & flag).map(([, format]) => format),
        );
    }
    return chains;
}

/** Canonical flag set → wrapper chain (96 entries). */
export const FORMAT_CHAINS = buildChains();

export function formatChain(flags: FormatFlags): readonly InlineFormat[] {
    return FORMAT_CHAINS.get(canonicalFlags(flags)) ?? [];
}

/** Wrap a text run in its role and format chain. */
export function wrapRunText(value: string, flags: FormatFlags, role: InlineRole | null): Inline {
    let node: Inline = { type: 'text', value };
    const chain = formatChain(flags);
    for (let i = chain.length - 1; i >= 0; i--) {
        node = { type: 'format', format: chain[i], children: [node] };
    }
    return role ? { type: 'role', role, children: [node] } : node;
}
