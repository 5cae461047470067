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

import { DOMBuilder, SAXParser } from "typesxml";
import type { XMLDocument, XMLElement } from "typesxml";

export class TBXReader {

    parser: SAXParser;
    builder: DOMBuilder;

    constructor() {
        this.parser = new SAXParser();
        this.builder = new DOMBuilder();
        this.parser.setContentHandler(this.builder);
    }

    parseFile(filePath: string): XMLElement {
        this.parser.parseFile(filePath);
        return this.getRoot();
    }

    parseString(xml: string): XMLElement {
        this.parser.parseString(xml);
        return this.getRoot();
    }

    private getRoot(): XMLElement {
        const document: XMLDocument | undefined = this.builder.getDocument();
        if (document) {
            const root: XMLElement | undefined = document.getRoot();
            if (root) {
                return root;
            }
        }
        throw new Error('Parser produced no root element');
    }
}
