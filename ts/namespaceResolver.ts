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

import type { XMLAttribute, XMLElement } from "typesxml";
import { NamespaceTable } from "./namespaceTable.js";

export class NamespaceResolver {

    static readonly TBX_NAMESPACE: string = 'http://www.lisa.org/TBX-Specification.33.0.html';
    static readonly TBX_2019_NAMESPACE: string = 'urn:iso:std:iso:30042:ed-2';
    static readonly XML_NAMESPACE: string = 'http://www.w3.org/XML/1998/namespace';
    static readonly XLINK_NAMESPACE: string = 'http://www.w3.org/1999/xlink';

    static conventionalNamespaces(): Map<string, string> {
        return new Map<string, string>([
            ['', NamespaceResolver.TBX_NAMESPACE],
            ['xml', NamespaceResolver.XML_NAMESPACE],
            ['xlink', NamespaceResolver.XLINK_NAMESPACE],
            ['tbx', NamespaceResolver.TBX_2019_NAMESPACE]
        ]);
    }

    /**
     * Seeds the conventional TBX namespaces and lets the root element's
     * `xmlns` and `xmlns:*` declarations override or extend them.
     */
    static resolve(root: XMLElement): NamespaceTable {
        const namespaces: Map<string, string> = NamespaceResolver.conventionalNamespaces();
        root.getAttributes().forEach((attribute: XMLAttribute) => {
            const name: string = attribute.getName();
            if (name === 'xmlns') {
                namespaces.set('', attribute.getValue());
            } else if (name.startsWith('xmlns:')) {
                namespaces.set(name.substring('xmlns:'.length), attribute.getValue());
            }
        });
        return new NamespaceTable(namespaces);
    }
}
