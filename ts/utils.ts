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

import { CData, TextNode, XMLElement } from "typesxml";
import type { XMLNode } from "typesxml";

export class Utils {

    // inline markup whose text belongs to the enclosing element
    static readonly INLINE_ELEMENTS: ReadonlyArray<string> = ['hi', 'foreign'];

    static getPureText(element: XMLElement): string {
        let text: string = '';
        const content: XMLNode[] = element.getContent();
        content.forEach((node: XMLNode) => {
            if (node instanceof TextNode) {
                text += node.getValue();
            }
            if (node instanceof CData) {
                text += node.getValue();
            }
            if (node instanceof XMLElement) {
                const child: XMLElement = node;
                if (Utils.INLINE_ELEMENTS.includes(Utils.localName(child.getName()))) {
                    text += Utils.getPureText(child);
                }
            }
        });
        return text;
    }

    static getTrimmedText(element: XMLElement): string {
        return Utils.getPureText(element).trim();
    }

    static localName(name: string): string {
        const index: number = name.indexOf(':');
        return index === -1 ? name : name.substring(index + 1);
    }

    static prefix(name: string): string {
        const index: number = name.indexOf(':');
        return index === -1 ? '' : name.substring(0, index);
    }

    static readAttribute(element: XMLElement, name: string): string | undefined {
        const value: string | undefined = element.getAttribute(name)?.getValue();
        return value !== undefined && value.length > 0 ? value : undefined;
    }

    /**
     * Every element below `element` in document order. The element itself is not included.
     */
    static descendants(element: XMLElement): XMLElement[] {
        const result: XMLElement[] = [];
        element.getChildren().forEach((child: XMLElement) => {
            result.push(child);
            result.push(...Utils.descendants(child));
        });
        return result;
    }

    static findByName(scope: XMLElement, name: string): XMLElement[] {
        return Utils.descendants(scope).filter((element: XMLElement) => element.getName() === name);
    }

    static findByLocalName(scope: XMLElement, predicate: (localName: string) => boolean): XMLElement[] {
        return Utils.descendants(scope).filter((element: XMLElement) => predicate(Utils.localName(element.getName()).toLowerCase()));
    }

    static uniqueElements(elements: XMLElement[]): XMLElement[] {
        const seen: Set<XMLElement> = new Set<XMLElement>();
        return elements.filter((element: XMLElement) => {
            if (seen.has(element)) {
                return false;
            }
            seen.add(element);
            return true;
        });
    }
}
