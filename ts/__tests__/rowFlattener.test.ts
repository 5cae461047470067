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

import { describe, expect, it } from 'vitest';
import type { OutputTable, Row } from '../outputTable.js';
import { RowFlattener } from '../rowFlattener.js';
import type { TermEntry, TermRecord } from '../termEntry.js';

function entry(id: string, languages: Array<[string, TermRecord[]]>, fields: Record<string, string> = {}): TermEntry {
    return { id, fields, languages: new Map<string, TermRecord[]>(languages) };
}

const CAT: TermEntry = entry('E1', [
    ['en', [
        { language: 'en', term: 'cat', termNote_status: 'preferred' },
        { language: 'en', term: 'feline', termNote_status: '' }
    ]]
]);

const DOG: TermEntry = entry('E2', [
    ['en', [{ language: 'en', term: 'dog', termNote_status: 'preferred' }]],
    ['de', [{ language: 'de', term: 'Hund', termNote_status: 'admitted' }]]
], {});

describe('RowFlattener.columnName', () => {
    it('suffixes every term after the first with its 1-based position', () => {
        expect(RowFlattener.columnName('en', 'term', 0)).toBe('en_term');
        expect(RowFlattener.columnName('en', 'term', 1)).toBe('en_term_2');
        expect(RowFlattener.columnName('de', 'termNote_status', 4)).toBe('de_termNote_status_5');
    });
});

describe('RowFlattener.flattenEntry', () => {
    it('spreads duplicate-free terms over indexed columns', () => {
        const row: Row = RowFlattener.flattenEntry(CAT, ['entry_id', 'term']);
        expect(row).toEqual({ entry_id: 'E1', en_term: 'cat', en_term_2: 'feline' });
        expect('en_term_3' in row).toBe(false);
    });

    it('keeps entry-level columns for an entry without terms', () => {
        expect(RowFlattener.flattenEntry(entry('E1', []), ['entry_id', 'term'])).toEqual({ entry_id: 'E1' });
    });

    it('blanks selected entry-level fields the entry does not have', () => {
        const row: Row = RowFlattener.flattenEntry(entry('E9', []), ['entry_id', 'entry_descrip_definition', 'term']);
        expect(row).toEqual({ entry_id: 'E9', entry_descrip_definition: '' });
    });

    it('omits entry_id when it is not selected', () => {
        expect(RowFlattener.flattenEntry(entry('E1', []), ['term'])).toEqual({});
    });

    it('blanks fields a record never received', () => {
        const row: Row = RowFlattener.flattenEntry(entry('E1', [['en', [{ language: 'en', term: 'cat' }]]]), ['term', 'definition']);
        expect(row).toEqual({ en_term: 'cat', en_definition: '' });
    });

    it('orders columns by language, then term, then selected field', () => {
        const row: Row = RowFlattener.flattenEntry(DOG, ['termNote_status', 'term', 'entry_id']);
        expect(Object.keys(row)).toEqual(['entry_id', 'en_termNote_status', 'en_term', 'de_termNote_status', 'de_term']);
    });
});

describe('RowFlattener.flatten', () => {
    it('produces one row per entry with columns in first-seen order', () => {
        const table: OutputTable = RowFlattener.flatten([CAT, DOG, entry('E3', [])], ['entry_id', 'term', 'termNote_status']);
        expect(table.size).toBe(3);
        expect(table.columns).toEqual([
            'entry_id',
            'en_term',
            'en_termNote_status',
            'en_term_2',
            'en_termNote_status_2',
            'de_term',
            'de_termNote_status'
        ]);
        expect(table.toGrid()).toEqual([
            ['E1', 'cat', 'preferred', 'feline', '', '', ''],
            ['E2', 'dog', 'preferred', '', '', 'Hund', 'admitted'],
            ['E3', '', '', '', '', '', '']
        ]);
        expect(table.getValue(2, 'de_term')).toBe('');
    });
});
