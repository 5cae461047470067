/*******************************************************************************
 * Copyright (c) 2025 Maxprograms.
 *
 * This program and the accompanying materials
 * are made available under the terms of the Eclipse   License 1.0
 * which accompanies this distribution, and is available at
 * https://www.eclipse.org/org/documents/epl-v10.html
 *
 * Contributors:
 *     Maxprograms - initial API and implementation
 *******************************************************************************/

export type Row = Record<string, string>;

export class OutputTable {

    readonly rows: ReadonlyArray<Row>;
    readonly columns: ReadonlyArray<string>;

    /**
     * Columns are the union of every row's keys in first-seen order.
     */
    constructor(rows: Row[]) {
        const columns: string[] = [];
        const seen: Set<string> = new Set<string>();
        rows.forEach((row: Row) => {
            Object.keys(row).forEach((column: string) => {
                if (!seen.has(column)) {
                    seen.add(column);
                    columns.push(column);
                }
            });
        });
        this.rows = rows;
        this.columns = columns;
    }

    get size(): number {
        return this.rows.length;
    }

    getValue(rowIndex: number, column: string): string {
        return this.rows[rowIndex]?.[column] ?? '';
    }

    /**
     * One array per row, aligned with `columns`; cells a row does not have are ''.
     */
    toGrid(): string[][] {
        return this.rows.map((_row: Row, i: number) => this.columns.map((column: string) => this.getValue(i, column)));
    }
}
