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

import type { FieldMapping } from "./fieldSelection.js";
import type { OutputTable } from "./outputTable.js";

export interface RenamedTable {
    headers: string[];
    rows: string[][]; // aligned with headers by position; headers may repeat after renaming
}

export interface ColumnParts {
    language: string;
    field: string;
    suffix: string; // '' or '_N'
}

export class ColumnRenamer {

    /**
     * Splits `en_termNote_status_2` into language `en`, field `termNote_status` and suffix `_2`.
     * A field key that itself ends in `_<digits>` cannot be told apart from an index suffix.
     */
    static splitColumn(column: string): ColumnParts | null {
        if (!column.includes('_')) {
            return null;
        }
        const parts: string[] = column.split('_');
        const language: string = parts[0];
        const last: string = parts[parts.length - 1];
        if (parts.length >= 3 && /^\d+$/.test(last)) {
            return { language, field: parts.slice(1, -1).join('_'), suffix: '_' + last };
        }
        return { language, field: parts.slice(1).join('_'), suffix: '' };
    }

    static renameColumn(column: string, mapping: FieldMapping): string {
        const parts: ColumnParts | null = ColumnRenamer.splitColumn(column);
        if (parts) {
            const mapped: string | undefined = ColumnRenamer.lookup(mapping, parts.field);
            if (mapped) {
                return parts.language + '_' + mapped + parts.suffix;
            }
        }
        return ColumnRenamer.lookup(mapping, column) ?? column;
    }

    static renameColumns(columns: ReadonlyArray<string>, mapping: FieldMapping): string[] {
        return columns.map((column: string) => ColumnRenamer.renameColumn(column, mapping));
    }

    static renameTable(table: OutputTable, mapping: FieldMapping): RenamedTable {
        return {
            headers: ColumnRenamer.renameColumns(table.columns, mapping),
            rows: table.toGrid()
        };
    }

    private static lookup(mapping: FieldMapping, key: string): string | undefined {
        if (!Object.prototype.hasOwnProperty.call(mapping, key)) {
            return undefined;
        }
        const value: string = mapping[key];
        return value.length > 0 ? value : undefined;
    }
}
