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
import type { XMLElement } from 'typesxml';
import { Utils } from '../utils.js';
import { element } from './helpers.js';

describe('Utils.getPureText', () => {
    it('keeps the text of inline highlighting and drops other markup', () => {
        const term: XMLElement = element('<term>data <hi type="italics">base</hi> entry<bpt i="1">&lt;b&gt;</bpt></term>');
        expect(Utils.getPureText(term)).toBe('data base entry');
    });

    it('includes CDATA sections', () => {
        expect(Utils.getTrimmedText(element('<term> <![CDATA[R&D]]> </term>'))).toBe('R&D');
    });
});

describe('Utils names', () => {
    it('splits prefix and local name', () => {
        expect(Utils.localName('tbx:termEntry')).toBe('termEntry');
        expect(Utils.prefix('tbx:termEntry')).toBe('tbx');
        expect(Utils.localName('termEntry')).toBe('termEntry');
        expect(Utils.prefix('termEntry')).toBe('');
    });
});

describe('Utils.descendants', () => {
    it('lists descendants in document order without the element itself', () => {
        const root: XMLElement = element('<a><b><c/></b><d/></a>');
        expect(Utils.descendants(root).map((child: XMLElement) => child.getName())).toEqual(['b', 'c', 'd']);
    });

    it('treats an empty attribute as absent', () => {
        expect(Utils.readAttribute(element('<termEntry id=""/>'), 'id')).toBeUndefined();
        expect(Utils.readAttribute(element('<termEntry id="E1"/>'), 'id')).toBe('E1');
    });
});
