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
import { FieldSelectionError } from '../errors.js';
import { FieldSelection } from '../fieldSelection.js';

const AVAILABLE: string[] = ['entry_id', 'language', 'term'];

describe('FieldSelection.parseSelection', () => {
    it('selects everything for all', () => {
        expect(FieldSelection.parseSelection('all', AVAILABLE)).toEqual(AVAILABLE);
        expect(FieldSelection.parseSelection(' ALL ', AVAILABLE)).toEqual(AVAILABLE);
    });

    it('maps 1-based numbers in the order given', () => {
        expect(FieldSelection.parseSelection('3, 1', AVAILABLE)).toEqual(['term', 'entry_id']);
    });

    it('selects a repeated number once', () => {
        expect(FieldSelection.parseSelection('3,3,2', AVAILABLE)).toEqual(['term', 'language']);
    });

    it('rejects numbers outside the listing', () => {
        expect(() => FieldSelection.parseSelection('0,4', AVAILABLE)).toThrow('Invalid numbers: 0, 4. Please enter numbers between 1 and 3');
    });

    it('rejects anything that is not a number', () => {
        expect(() => FieldSelection.parseSelection('1,two', AVAILABLE)).toThrow(FieldSelectionError);
        expect(() => FieldSelection.parseSelection('', AVAILABLE)).toThrow('Invalid input. Please enter numbers separated by commas or type \'all\'');
    });
});

describe('FieldSelection mappings', () => {
    it('builds the identity mapping', () => {
        expect(FieldSelection.identityMapping(['term', 'language'])).toEqual({ term: 'term', language: 'language' });
    });

    it('fills unmapped and blank names with the original', () => {
        expect(FieldSelection.resolveMapping(['term', 'language'], { term: ' Headword ', language: '  ' })).toEqual({
            term: 'Headword',
            language: 'language'
        });
    });

    it('carries over full column names', () => {
        expect(FieldSelection.resolveMapping(['term'], { en_term_2: 'Synonym' })).toEqual({ en_term_2: 'Synonym', term: 'term' });
    });

    it('handles field names that shadow object members', () => {
        expect(FieldSelection.resolveMapping(['constructor'])).toEqual({ constructor: 'constructor' });
    });
});

describe('FieldSelection.validateSelection', () => {
    it('requires at least one field', () => {
        expect(() => FieldSelection.validateSelection([], {})).toThrow('At least one field must be selected');
    });

    it('requires a name for every selected field', () => {
        expect(() => FieldSelection.validateSelection(['term', 'language'], { term: 'Headword' })).toThrow('Missing names for selected fields: language');
    });

    it('accepts a complete mapping', () => {
        expect(() => FieldSelection.validateSelection(['term'], { term: 'term' })).not.toThrow();
    });
});
