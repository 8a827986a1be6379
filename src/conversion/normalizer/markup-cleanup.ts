/**
 * In-place cleanup of editing artifacts in a document.xml body.
 *
 * Works on the xmldom tree before it is read into DocNodes:
 *  - tracked deletions and revision history are dropped
 *  - tracked insertions and transparent wrappers are unwrapped
 *  - style references that start with a digit get an "A" prefix
 *  - horizontal merges are folded into the origin cell's w:gridSpan
 */

import { NAMESPACES } from '../constants.js';
import {
    findDescendants,
    getDirectChild,
    getDirectChildren,
    getWordAttribute,
    removeElement,
    unwrapElement,
} from '../dom.js';

/** Elements removed together with their content. */
const REMOVED_ELEMENTS = [
    'del',
    'moveFrom',
    'delText',
    'delInstrText',
    'proofErr',
    'rPrChange',
    'pPrChange',
    'tblPrChange',
    'tcPrChange',
    'trPrChange',
    'sectPrChange',
    'tblGridChange',
    'numberingChange',
    'moveFromRangeStart',
    'moveFromRangeEnd',
    'moveToRangeStart',
    'moveToRangeEnd',
] as const;

/** Elements replaced by their children. */
const UNWRAPPED_ELEMENTS = ['ins', 'moveTo', 'smartTag', 'customXml'] as const;

const STYLE_REFERENCES = ['pStyle', 'rStyle', 'tblStyle'] as const;

export interface CleanupSummary {
    removed: number;
    unwrapped: number;
    restyled: number;
    foldedCells: number;
}

function dropDeletedRows(body: Element): number {
    let count = 0;
    for (const tr of findDescendants(body, ['tr'])) {
        const trPr = getDirectChild(tr, 'trPr');
        if (trPr && getDirectChild(trPr, 'del')) {
            removeElement(tr);
            count++;
        }
    }
    return count;
}

/** Structured document tags are read through their content. */
function unwrapContentControls(body: Element): number {
    const sdts = findDescendants(body, ['sdt']);
    for (const sdt of sdts) {
        const content = getDirectChild(sdt, 'sdtContent');
        const parent = sdt.parentNode;
        if (content && parent) {
            while (content.firstChild) parent.insertBefore(content.firstChild, sdt);
        }
        removeElement(sdt);
    }
    return sdts.length;
}

function gridSpanOf(tcPr: Element | null): number {
    const span = tcPr ? getDirectChild(tcPr, 'gridSpan') : null;
    const value = span ? parseInt(getWordAttribute(span, 'val') ?? '1', 10) : 1;
    return Number.isNaN(value) || value < 1 ? 1 : value;
}

function setGridSpan(tc: Element, span: number): void {
    const doc = tc.ownerDocument;
    let tcPr = getDirectChild(tc, 'tcPr');
    if (!tcPr) {
        tcPr = doc.createElementNS(NAMESPACES.W, 'w:tcPr');
        tc.insertBefore(tcPr, tc.firstChild);
    }
    let gridSpan = getDirectChild(tcPr, 'gridSpan');
    if (!gridSpan) {
        gridSpan = doc.createElementNS(NAMESPACES.W, 'w:gridSpan');
        tcPr.appendChild(gridSpan);
    }
    gridSpan.setAttributeNS(NAMESPACES.W, 'w:val', String(span));
}

function foldHorizontalMerges(body: Element): number {
    let folded = 0;
    for (const tr of findDescendants(body, ['tr'])) {
        let origin: Element | null = null;
        for (const tc of getDirectChildren(tr, 'tc')) {
            const tcPr = getDirectChild(tc, 'tcPr');
            const hMerge = tcPr ? getDirectChild(tcPr, 'hMerge') : null;
            const continues = hMerge !== null && getWordAttribute(hMerge, 'val') !== 'restart';
            if (continues && origin) {
                setGridSpan(origin, gridSpanOf(getDirectChild(origin, 'tcPr')) + gridSpanOf(tcPr));
                removeElement(tc);
                folded++;
                continue;
            }
            if (hMerge) removeElement(hMerge);
            origin = tc;
        }
    }
    return folded;
}

function prefixNumericStyles(body: Element): number {
    let count = 0;
    for (const ref of findDescendants(body, STYLE_REFERENCES)) {
        const val = getWordAttribute(ref, 'val');
        if (val && /^\d/.test(val)) {
            ref.setAttributeNS(NAMESPACES.W, 'w:val', `A${val}`);
            count++;
        }
    }
    return count;
}

/** Clean a <w:body> in place. Idempotent. */
export function cleanupMarkup(body: Element): CleanupSummary {
    let removed = dropDeletedRows(body);

    for (const el of findDescendants(body, REMOVED_ELEMENTS)) {
        removeElement(el);
        removed++;
    }

    let unwrapped = unwrapContentControls(body);
    for (const el of findDescendants(body, UNWRAPPED_ELEMENTS)) {
        unwrapElement(el);
        unwrapped++;
    }

    return {
        removed,
        unwrapped,
        restyled: prefixNumericStyles(body),
        foldedCells: foldHorizontalMerges(body),
    };
}
