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

/**
 * Prefix to qualifier lookup. Qualifiers use the `{uri}` form, so a qualified
 * tag name reads `{uri}localName`. The default namespace is stored under ''.
 */
export class NamespaceTable {

    private readonly qualifiers: Map<string, string>;

    constructor(namespaces: Map<string, string>) {
        this.qualifiers = new Map<string, string>();
        namespaces.forEach((uri: string, prefix: string) => {
            this.qualifiers.set(prefix, '{' + uri + '}');
        });
    }

    getQualifier(prefix: string): string | undefined {
        return this.qualifiers.get(prefix);
    }

    getUri(prefix: string): string | undefined {
        const qualifier: string | undefined = this.qualifiers.get(prefix);
        return qualifier ? qualifier.substring(1, qualifier.length - 1) : undefined;
    }

    has(prefix: string): boolean {
        return this.qualifiers.has(prefix);
    }

    prefixes(): string[] {
        return Array.from(this.qualifiers.keys());
    }

    /**
     * Returns the `{uri}local` form of a tag or attribute name, or undefined
     * when its prefix is not known.
     */
    qualify(name: string): string | undefined {
        const qualifier: string | undefined = this.qualifiers.get(Utils.prefix(name));
        return qualifier ? qualifier + Utils.localName(name) : undefined;
    }

    /**
     * True when `name` is `localName` under a prefix this table resolves.
     */
    isQualified(name: string, localName: string): boolean {
        return Utils.localName(name) === localName && this.has(Utils.prefix(name));
    }

    /**
     * Descendants of `scope` named `localName` under a resolvable prefix, in document order.
     */
    findQualified(scope: XMLElement, localName: string): XMLElement[] {
        return Utils.descendants(scope).filter((element: XMLElement) => this.isQualified(element.getName(), localName));
    }

    toRecord(): Record<string, string> {
        const record: Record<string, string> = {};
        this.qualifiers.forEach((qualifier: string, prefix: string) => {
            record[prefix] = qualifier;
        });
        return record;
    }
}
