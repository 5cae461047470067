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

import { FieldClassifier } from "./fieldClassifier.js";
import type { FieldKey } from "./fieldClassifier.js";
import { OutputTable } from "./outputTable.js";
import type { Row } from "./outputTable.js";
import type { TermEntry, TermRecord } from "./termEntry.js";

export class RowFlattener {

    /**
     * `en_term` for the first term of a language, `en_term_2` for the second, and so on.
     */
    static columnName(language: string, field: FieldKey, termIndex: number): string {
        return termIndex === 0 ? language + '_' + field : language + '_' + field + '_' + (termIndex + 1);
    }

    static flattenEntry(entry: TermEntry, selectedFields: ReadonlyArray<FieldKey>): Row {
        const row: Row = {};
        if (selectedFields.includes(FieldClassifier.ENTRY_ID)) {
            row[FieldClassifier.ENTRY_ID] = entry.id;
        }
        selectedFields.forEach((field: FieldKey) => {
            if (FieldClassifier.isEntryLevel(field) && field !== FieldClassifier.ENTRY_ID) {
                row[field] = entry.fields[field] ?? '';
            }
        });
        entry.languages.forEach((terms: TermRecord[], language: string) => {
            terms.forEach((term: TermRecord, termIndex: number) => {
                selectedFields.forEach((field: FieldKey) => {
                    if (FieldClassifier.isEntryLevel(field)) {
                        return;
                    }
                    row[RowFlattener.columnName(language, field, termIndex)] = term[field] ?? '';
                });
            });
        });
        return row;
    }

    /**
     * One row per entry, in the order given. Entries without terms keep their row
     * with entry-level columns only.
     */
    static flatten(entries: ReadonlyArray<TermEntry>, selectedFields: ReadonlyArray<FieldKey>): OutputTable {
        return new OutputTable(entries.map((entry: TermEntry) => RowFlattener.flattenEntry(entry, selectedFields)));
    }
}
