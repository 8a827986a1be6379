/**
 * DOM utilities for WordprocessingML markup.
 *
 * XML parsing, namespace-aware navigation and the few in-place mutations the
 * style normalizer needs. No file I/O: every function works on in-memory
 * DOM nodes.
 *
 * Uses @xmldom/xmldom so that document order is always preserved.
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { logger } from '../utils/logger.js';
import { NAMESPACES } from './constants.js';
import { ConversionError, ConversionErrorCode } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════
// XML parse / serialize
// ═══════════════════════════════════════════════════════════════════════

export function parseXml(xmlStr: string, sourceName = 'XML'): Document {
    const errors: string[] = [];
    let doc: Document;
    try {
        doc = new DOMParser({
            errorHandler: {
                warning: (msg: string) => logger.debug(`${sourceName}: ${msg}`),
                error: (msg: string) => errors.push(msg),
                fatalError: (msg: string) => errors.push(msg),
            },
        }).parseFromString(xmlStr, 'application/xml');
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConversionError(`${sourceName} is not well-formed: ${message}`, ConversionErrorCode.INVALID_DOCUMENT);
    }
    if (!doc.documentElement) {
        throw new ConversionError(`${sourceName} is not well-formed: ${errors.join('; ') || 'no root element'}`, ConversionErrorCode.INVALID_DOCUMENT);
    }
    for (const msg of errors) logger.warn(`${sourceName}: ${msg}`);
    return doc;
}

export function serializeXml(node: Node): string {
    return new XMLSerializer().serializeToString(node);
}

// ═══════════════════════════════════════════════════════════════════════
// Generic DOM helpers
// ═══════════════════════════════════════════════════════════════════════

export function isElement(node: Node | null): node is Element {
    return node !== null && node.nodeType === 1;
}

/** Direct element children in document order. */
export function elementChildren(parent: Node): Element[] {
    const out: Element[] = [];
    for (let i = 0; i < parent.childNodes.length; i++) {
        const child = parent.childNodes.item(i);
        if (isElement(child)) out.push(child);
    }
    return out;
}

export function isWordElement(el: Element, localName: string): boolean {
    return el.localName === localName && el.namespaceURI === NAMESPACES.W;
}

export function getDirectChild(parent: Element, localName: string, ns: string = NAMESPACES.W): Element | null {
    for (const el of elementChildren(parent)) {
        if (el.localName === localName && el.namespaceURI === ns) return el;
    }
    return null;
}

export function getDirectChildren(parent: Element, localName: string, ns: string = NAMESPACES.W): Element[] {
    return elementChildren(parent).filter((el) => el.localName === localName && el.namespaceURI === ns);
}

/** All WordprocessingML descendants with one of the given local names, in document order. */
export function findDescendants(root: Element, localNames: readonly string[]): Element[] {
    const wanted = new Set(localNames);
    const out: Element[] = [];
    const walk = (node: Element): void => {
        for (const el of elementChildren(node)) {
            if (el.namespaceURI === NAMESPACES.W && wanted.has(el.localName)) out.push(el);
            walk(el);
        }
    };
    walk(root);
    return out;
}

/**
 * Read a w:-qualified attribute. xmldom answers '' for absent attributes,
 * so empty values are reported as null.
 */
export function getWordAttribute(el: Element, localName: string): string | null {
    const value = el.getAttributeNS(NAMESPACES.W, localName) || el.getAttribute(`w:${localName}`);
    return value ? value : null;
}

/** Value of `<parent><w:localName w:val="…"/></parent>`, or null. */
export function getChildValue(parent: Element | null, localName: string): string | null {
    if (!parent) return null;
    const child = getDirectChild(parent, localName);
    return child ? getWordAttribute(child, 'val') : null;
}

/**
 * Toggle properties (w:b, w:i, …): present means on unless w:val says
 * otherwise.
 */
export function isToggleOn(parent: Element | null, localName: string): boolean {
    if (!parent) return false;
    const child = getDirectChild(parent, localName);
    if (!child) return false;
    const val = getWordAttribute(child, 'val');
    return val === null || !['0', 'false', 'off', 'none'].includes(val);
}

// ═══════════════════════════════════════════════════════════════════════
// Mutation
// ═══════════════════════════════════════════════════════════════════════

export function removeElement(el: Element): void {
    el.parentNode?.removeChild(el);
}

/** Replace an element by its own children. */
export function unwrapElement(el: Element): void {
    const parent = el.parentNode;
    if (!parent) return;
    while (el.firstChild) parent.insertBefore(el.firstChild, el);
    parent.removeChild(el);
}

// ═══════════════════════════════════════════════════════════════════════
// Body access
// ═══════════════════════════════════════════════════════════════════════

/** Return the single <w:body> element from a parsed document.xml DOM. */
export function getBody(doc: Document): Element {
    const root = doc.documentElement;
    const body = root ? getDirectChild(root, 'body') : null;
    if (!body) {
        throw new ConversionError('Invalid document: missing <w:body>', ConversionErrorCode.INVALID_DOCUMENT);
    }
    return body;
}
