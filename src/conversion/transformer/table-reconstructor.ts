/**
 * Table Reconstructor
 *
 * Turns source tables (horizontal spans already folded into gridSpan,
 * vertical merges still marked per cell) into rectangular output tables
 * with explicit rowSpan/colSpan.
 *
 * Every row of the result must occupy exactly the declared column count.
 * When the source merges cannot produce that, the whole table falls back
 * to unmerged 1×1 cells and a merge-inconsistency diagnostic is recorded.
 */

import type { ConversionContext } from '../context.js';
import { JUSTIFICATION_ALIGNMENT, SHADING_ALIGNMENT } from '../constants.js';
import type { CellAlignment, CellNode, Inline, ReconstructedCell, ReconstructedRow, ReconstructedTable, TableNode } from '../types.js';
import type { StyleLookup } from './style-lookup.js';

export type CellContentConverter = (cell: CellNode) => Inline[][];

function cellAt(table: TableNode, rowIndex: number, gridColumn: number): CellNode | undefined {
    return table.children[rowIndex]?.children.find((cell) => cell.gridColumn === gridColumn);
}

function cellAlignment(cell: CellNode): CellAlignment | null {
    if (cell.shading) {
        const shaded = SHADING_ALIGNMENT[cell.shading];
        if (shaded) return shaded;
    }
    const jc = cell.children.find((p) => p.justification !== null)?.justification;
    return jc ? JUSTIFICATION_ALIGNMENT[jc] ?? null : null;
}

/** Column count a table must satisfy: declared, else grid, else widest row. */
export function expectedColumns(table: TableNode): number {
    if (table.declaredColumns !== null) return table.declaredColumns;
    if (table.columnWidths.length > 0) return table.columnWidths.length;
    return Math.max(0, ...table.children.map((row) => row.gridBefore + row.children.reduce((sum, c) => sum + c.gridSpan, 0) + row.gridAfter));
}

export function columnPercentages(widths: readonly number[]): number[] {
    const total = widths.reduce((sum, w) => sum + w, 0);
    if (total <= 0) return [];
    return widths.map((w) => Math.round((w / total) * 100));
}

interface PlacedCell {
    source: CellNode | null;
    rowIndex: number;
    gridColumn: number;
    rowSpan: number;
    colSpan: number;
}

/** Resolve vertical merges into origin cells with row spans. */
function placeCells(table: TableNode, context: ConversionContext): PlacedCell[] {
    const consumed = new Set<CellNode>();
    const placed: PlacedCell[] = [];

    table.children.forEach((row, rowIndex) => {
        if (row.gridBefore > 0) {
            placed.push({ source: null, rowIndex, gridColumn: 0, rowSpan: 1, colSpan: row.gridBefore });
        }
        for (const cell of row.children) {
            if (consumed.has(cell)) continue;
            if (cell.verticalMerge === 'continue') {
                context.report('structural-anomaly', 'vertical merge continuation without an origin cell', {
                    row: rowIndex,
                    column: cell.gridColumn,
                });
            }
            let rowSpan = 1;
            for (let below = rowIndex + 1; below < table.children.length; below++) {
                const next = cellAt(table, below, cell.gridColumn);
                if (!next || next.verticalMerge !== 'continue' || next.gridSpan !== cell.gridSpan) break;
                consumed.add(next);
                rowSpan++;
            }
            placed.push({ source: cell, rowIndex, gridColumn: cell.gridColumn, rowSpan, colSpan: cell.gridSpan });
        }
        if (row.gridAfter > 0) {
            const end = row.children.reduce((column, cell) => column + cell.gridSpan, row.gridBefore);
            placed.push({ source: null, rowIndex, gridColumn: end, rowSpan: 1, colSpan: row.gridAfter });
        }
    });
    return placed;
}

/** Row indexes whose occupancy differs from `columns`. */
function invalidRows(placed: readonly PlacedCell[], rowCount: number, columns: number): number[] {
    const occupancy = new Array<number>(rowCount).fill(0);
    for (const cell of placed) {
        for (let r = cell.rowIndex; r < cell.rowIndex + cell.rowSpan; r++) occupancy[r] += cell.colSpan;
    }
    return occupancy.flatMap((count, rowIndex) => (count === columns ? [] : [rowIndex]));
}

function unmerged(table: TableNode): PlacedCell[] {
    return table.children.flatMap((row, rowIndex) =>
        row.children.map((cell, index) => ({ source: cell, rowIndex, gridColumn: index, rowSpan: 1, colSpan: 1 })),
    );
}

export function reconstructTable(
    table: TableNode,
    convertCell: CellContentConverter,
    lookup: StyleLookup,
    context: ConversionContext,
): ReconstructedTable {
    const rowCount = table.children.length;
    let columns = expectedColumns(table);
    let placed = placeCells(table, context);
    let spanFallback = false;

    const mismatched = invalidRows(placed, rowCount, columns);
    if (mismatched.length > 0) {
        context.report('merge-inconsistency', `table rows ${mismatched.join(', ')} do not occupy ${columns} columns`, {
            rows: mismatched,
            columns,
        });
        placed = unmerged(table);
        columns = Math.max(0, ...table.children.map((row) => row.children.length));
        spanFallback = true;
    }

    const headerRows = table.children.map(
        (row) =>
            row.isHeader ||
            (row.children.length > 0 &&
                row.children.every((cell) => cell.children.length > 0 && cell.children.every((p) => lookup.isHeaderCellStyle(p.styleClass)))),
    );

    const rows: ReconstructedRow[] = table.children.map((_, rowIndex) => ({ header: headerRows[rowIndex], cells: [] }));
    for (const cell of placed) {
        const source = cell.source;
        const out: ReconstructedCell = {
            gridColumn: cell.gridColumn,
            rowSpan: cell.rowSpan,
            colSpan: cell.colSpan,
            align: source ? cellAlignment(source) : null,
            rowSeparator: !source?.suppressedBorders.includes('bottom'),
            columnSeparator: !source?.suppressedBorders.includes('right'),
            header: headerRows[cell.rowIndex],
            paragraphs: source ? convertCell(source) : [],
        };
        rows[cell.rowIndex].cells.push(out);
    }

    let headerRowCount = 0;
    while (headerRowCount < rowCount && headerRows[headerRowCount]) headerRowCount++;

    return {
        columnCount: columns,
        columnWidths: spanFallback ? [] : columnPercentages(table.columnWidths),
        headerRowCount,
        rows,
        spanFallback,
    };
}
