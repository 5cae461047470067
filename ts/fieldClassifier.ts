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

import type { XMLElement } from "typesxml";
import { Utils } from "./utils.js";

export type FieldKey = string;

export interface FieldClassification {
    key: FieldKey;
    // true when the tag was matched by the substring fallback instead of a known variant
    generic: boolean;
}

export class FieldClassifier {

    static readonly ENTRY_ID: FieldKey = 'entry_id';
    static readonly LANGUAGE: FieldKey = 'language';
    static readonly TERM: FieldKey = 'term';
    static readonly ENTRY_SUBJECT: FieldKey = 'entry_subject';
    static readonly ENTRY_PREFIX: string = 'entry_';

    static readonly DEFAULT_NOTE_TYPE: string = 'note';
    static readonly DEFAULT_DESCRIP_TYPE: string = 'description';

    static readonly BASELINE_FIELDS: ReadonlyArray<FieldKey> = ['entry_id', 'language', 'term'];

    static readonly FALLBACK_FIELDS: ReadonlyArray<FieldKey> = [
        'entry_id', 'language', 'term', 'termNote_status', 'termNote_forbidden', 'termNote_preferred'
    ];

    private static readonly TERM_TAGS: ReadonlySet<string> = new Set<string>(['term']);
    private static readonly NOTE_TAGS: ReadonlySet<string> = new Set<string>(['termnote', 'note', 'adminnote', 'transacnote', 'descripnote']);
    private static readonly DESCRIP_TAGS: ReadonlySet<string> = new Set<string>(['descrip', 'descripgrp']);
    private static readonly PLAIN_TAGS: ReadonlySet<string> = new Set<string>(['definition', 'context', 'example']);

    /**
     * Maps a term-level element to its FieldKey, or null when the element carries no field.
     */
    static classify(element: XMLElement): FieldClassification | null {
        const tag: string = Utils.localName(element.getName()).toLowerCase();
        if (FieldClassifier.TERM_TAGS.has(tag)) {
            return { key: FieldClassifier.TERM, generic: false };
        }
        if (FieldClassifier.NOTE_TAGS.has(tag)) {
            return { key: FieldClassifier.noteKey(element), generic: false };
        }
        if (FieldClassifier.DESCRIP_TAGS.has(tag)) {
            return { key: FieldClassifier.descripKey(element), generic: false };
        }
        if (FieldClassifier.PLAIN_TAGS.has(tag)) {
            return { key: tag, generic: false };
        }
        if (tag.includes('note')) {
            return { key: FieldClassifier.noteKey(element), generic: true };
        }
        if (tag.includes('descrip')) {
            return { key: FieldClassifier.descripKey(element), generic: true };
        }
        return null;
    }

    /**
     * Maps an element found anywhere below an entry to its entry-level FieldKey.
     */
    static classifyEntryLevel(element: XMLElement): FieldKey | null {
        const tag: string = Utils.localName(element.getName()).toLowerCase();
        if (FieldClassifier.DESCRIP_TAGS.has(tag) || tag.includes('descrip')) {
            return FieldClassifier.ENTRY_PREFIX + FieldClassifier.descripKey(element);
        }
        if (tag.includes('subject')) {
            return FieldClassifier.ENTRY_SUBJECT;
        }
        return null;
    }

    static isEntryLevel(field: FieldKey): boolean {
        return field.startsWith(FieldClassifier.ENTRY_PREFIX);
    }

    private static noteKey(element: XMLElement): FieldKey {
        return 'termNote_' + FieldClassifier.typeOf(element, FieldClassifier.DEFAULT_NOTE_TYPE);
    }

    private static descripKey(element: XMLElement): FieldKey {
        return 'descrip_' + FieldClassifier.typeOf(element, FieldClassifier.DEFAULT_DESCRIP_TYPE);
    }

    private static typeOf(element: XMLElement, fallback: string): string {
        return element.getAttribute('type')?.getValue() ?? fallback;
    }
}
