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

import { existsSync } from "node:fs";
import type { XMLElement } from "typesxml";
import { errorMessage, TBXInputError } from "./errors.js";
import { NamespaceResolver } from "./namespaceResolver.js";
import type { NamespaceTable } from "./namespaceTable.js";
import { TBXReader } from "./tbxReader.js";
import { Utils } from "./utils.js";

export class TBXDocument {

    static readonly STRING_SOURCE: string = '<string>';

    readonly root: XMLElement;
    readonly namespaces: NamespaceTable;
    readonly source: string;

    private constructor(root: XMLElement, source: string) {
        this.root = root;
        this.namespaces = NamespaceResolver.resolve(root);
        this.source = source;
    }

    static fromFile(filePath: string): TBXDocument {
        if (!existsSync(filePath)) {
            throw new TBXInputError('File not found: ' + filePath, filePath);
        }
        try {
            return new TBXDocument(new TBXReader().parseFile(filePath), filePath);
        } catch (err: unknown) {
            throw new TBXInputError('Error parsing XML in ' + filePath + ': ' + errorMessage(err), filePath, err);
        }
    }

    static fromString(xml: string, source: string = TBXDocument.STRING_SOURCE): TBXDocument {
        try {
            return new TBXDocument(new TBXReader().parseString(xml), source);
        } catch (err: unknown) {
            throw new TBXInputError('Error parsing XML in ' + source + ': ' + errorMessage(err), source, err);
        }
    }

    /**
     * Entry elements in document order. Tries `termEntry`, its namespace-qualified
     * form, TBX 2019 `conceptEntry`, and finally any tag containing "termentry".
     */
    findEntries(): XMLElement[] {
        let entries: XMLElement[] = Utils.findByName(this.root, 'termEntry');
        if (entries.length === 0) {
            entries = this.namespaces.findQualified(this.root, 'termEntry');
        }
        if (entries.length === 0) {
            entries = Utils.uniqueElements([
                ...Utils.findByName(this.root, 'conceptEntry'),
                ...this.namespaces.findQualified(this.root, 'conceptEntry')
            ]);
        }
        if (entries.length === 0) {
            entries = Utils.findByLocalName(this.root, (localName: string) => localName.includes('termentry'));
        }
        return entries;
    }
}
