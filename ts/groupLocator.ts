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
import type { NamespaceTable } from "./namespaceTable.js";
import { Utils } from "./utils.js";

export class GroupLocator {

    // TBX 2008 langSet, older MARTIF langGrp, TBX 2019 langSec
    static readonly LANGUAGE_GROUP_TAGS: ReadonlyArray<string> = ['langSet', 'langGrp', 'langSec'];
    static readonly TERM_GROUP_TAGS: ReadonlyArray<string> = ['tig', 'termGrp', 'termSec'];

    /**
     * Language groups of an entry: the first tag variant that matches wins; when none
     * does, any element whose tag mentions "lang" together with "grp" or "set".
     */
    static languageGroups(entry: XMLElement, namespaces: NamespaceTable): XMLElement[] {
        for (const tag of GroupLocator.LANGUAGE_GROUP_TAGS) {
            const groups: XMLElement[] = GroupLocator.findTag(entry, tag, namespaces);
            if (groups.length > 0) {
                return groups;
            }
        }
        return Utils.findByLocalName(entry, (localName: string) => {
            return localName.includes('lang') && (localName.includes('grp') || localName.includes('set'));
        });
    }

    /**
     * Every language group of every known variant, used when sampling fields.
     */
    static allLanguageGroups(entry: XMLElement, namespaces: NamespaceTable): XMLElement[] {
        const groups: XMLElement[] = [];
        GroupLocator.LANGUAGE_GROUP_TAGS.forEach((tag: string) => {
            groups.push(...GroupLocator.findTag(entry, tag, namespaces));
        });
        return Utils.uniqueElements(groups);
    }

    /**
     * Term groups of a language group, grouped by tag variant, each variant in document order.
     */
    static termGroups(languageGroup: XMLElement, namespaces: NamespaceTable): XMLElement[] {
        const groups: XMLElement[] = [];
        GroupLocator.TERM_GROUP_TAGS.forEach((tag: string) => {
            groups.push(...GroupLocator.findTag(languageGroup, tag, namespaces));
        });
        return Utils.uniqueElements(groups);
    }

    /**
     * The element holding the term text: a plain `term`, a namespace-qualified `term`,
     * or the first descendant whose tag contains "term".
     */
    static termElement(termGroup: XMLElement, namespaces: NamespaceTable): XMLElement | undefined {
        const plain: XMLElement[] = Utils.findByName(termGroup, 'term');
        if (plain.length > 0) {
            return plain[0];
        }
        const qualified: XMLElement[] = namespaces.findQualified(termGroup, 'term');
        if (qualified.length > 0) {
            return qualified[0];
        }
        return Utils.findByLocalName(termGroup, (localName: string) => localName.includes('term'))[0];
    }

    static languageOf(languageGroup: XMLElement, namespaces: NamespaceTable): string {
        const xmlLang: string | undefined = Utils.readAttribute(languageGroup, 'xml:lang');
        if (xmlLang) {
            return xmlLang;
        }
        const lang: string | undefined = Utils.readAttribute(languageGroup, 'lang');
        if (lang) {
            return lang;
        }
        const qualifiedName: string = '{' + namespaces.getUri('xml') + '}lang';
        for (const attribute of languageGroup.getAttributes()) {
            if (namespaces.qualify(attribute.getName()) === qualifiedName && attribute.getValue().length > 0) {
                return attribute.getValue();
            }
        }
        return '';
    }

    private static findTag(scope: XMLElement, tag: string, namespaces: NamespaceTable): XMLElement[] {
        return Utils.uniqueElements([...Utils.findByName(scope, tag), ...namespaces.findQualified(scope, tag)]);
    }
}
