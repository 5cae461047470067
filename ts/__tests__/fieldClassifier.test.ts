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
import { FieldClassifier } from '../fieldClassifier.js';
import { element } from './helpers.js';

describe('FieldClassifier.classify', () => {
    it('recognizes the term element', () => {
        expect(FieldClassifier.classify(element('<term>cat</term>'))).toEqual({ key: 'term', generic: false });
    });

    it('builds termNote keys from the type attribute', () => {
        expect(FieldClassifier.classify(element('<termNote type="partOfSpeech">noun</termNote>'))?.key).toBe('termNote_partOfSpeech');
        expect(FieldClassifier.classify(element('<adminNote type="source">ISO</adminNote>'))?.key).toBe('termNote_source');
    });

    it('falls back to the generic note type', () => {
        expect(FieldClassifier.classify(element('<termNote>x</termNote>'))?.key).toBe('termNote_note');
        expect(FieldClassifier.classify(element('<note>informal</note>'))).toEqual({ key: 'termNote_note', generic: false });
    });

    it('keeps an empty type attribute as given', () => {
        expect(FieldClassifier.classify(element('<termNote type="">x</termNote>'))?.key).toBe('termNote_');
    });

    it('builds descrip keys with the description default', () => {
        expect(FieldClassifier.classify(element('<descrip type="definition">A small animal</descrip>'))?.key).toBe('descrip_definition');
        expect(FieldClassifier.classify(element('<descripGrp/>'))?.key).toBe('descrip_description');
    });

    it('classifies descripNote as a note', () => {
        expect(FieldClassifier.classify(element('<descripNote type="source">x</descripNote>'))?.key).toBe('termNote_source');
    });

    it('uses the lower-cased tag for plain fields', () => {
        expect(FieldClassifier.classify(element('<definition>x</definition>'))).toEqual({ key: 'definition', generic: false });
        expect(FieldClassifier.classify(element('<Context>x</Context>'))?.key).toBe('context');
    });

    it('marks substring matches as generic', () => {
        expect(FieldClassifier.classify(element('<usageNote type="register">formal</usageNote>'))).toEqual({
            key: 'termNote_register',
            generic: true
        });
        expect(FieldClassifier.classify(element('<extraDescription>x</extraDescription>'))).toEqual({
            key: 'descrip_description',
            generic: true
        });
    });

    it('ignores the namespace prefix', () => {
        const note = element('<tbx:termNote xmlns:tbx="urn:iso:std:iso:30042:ed-2" type="grammaticalGender">f</tbx:termNote>');
        expect(FieldClassifier.classify(note)?.key).toBe('termNote_grammaticalGender');
    });

    it('returns null for structural elements', () => {
        expect(FieldClassifier.classify(element('<tig/>'))).toBeNull();
        expect(FieldClassifier.classify(element('<admin type="source">x</admin>'))).toBeNull();
    });
});

describe('FieldClassifier.classifyEntryLevel', () => {
    it('prefixes descriptions with entry_', () => {
        expect(FieldClassifier.classifyEntryLevel(element('<descrip type="subjectField">zoology</descrip>'))).toBe('entry_descrip_subjectField');
        expect(FieldClassifier.classifyEntryLevel(element('<descripNote>x</descripNote>'))).toBe('entry_descrip_description');
    });

    it('maps subject elements to entry_subject', () => {
        expect(FieldClassifier.classifyEntryLevel(element('<subjectField>biology</subjectField>'))).toBe('entry_subject');
    });

    it('returns null for anything else', () => {
        expect(FieldClassifier.classifyEntryLevel(element('<term>cat</term>'))).toBeNull();
    });
});

describe('FieldClassifier.isEntryLevel', () => {
    it('treats entry_ keys as entry-level', () => {
        expect(FieldClassifier.isEntryLevel('entry_id')).toBe(true);
        expect(FieldClassifier.isEntryLevel('entry_descrip_subjectField')).toBe(true);
        expect(FieldClassifier.isEntryLevel('termNote_status')).toBe(false);
    });
});
