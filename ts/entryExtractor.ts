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
import { FieldClassifier } from "./fieldClassifier.js";
import type { FieldClassification, FieldKey } from "./fieldClassifier.js";
import { GroupLocator } from "./groupLocator.js";
import type { NamespaceTable } from "./namespaceTable.js";
import type { LanguageGroup, TermEntry, TermRecord } from "./termEntry.js";
import { Utils } from "./utils.js";

export class EntryExtractor {

    private readonly namespaces: NamespaceTable;
    private readonly selectedFields: ReadonlyArray<FieldKey>;
    private readonly selected: ReadonlySet<FieldKey>;
    private readonly verbose: boolean;

    constructor(namespaces: NamespaceTable, selectedFields: ReadonlyArray<FieldKey>, verbose: boolean = false) {
        if (selectedFields.length === 0) {
            throw new Error('At least one field must be selected for extraction');
        }
        this.namespaces = namespaces;
        this.selectedFields = selectedFields;
        this.selected = new Set<FieldKey>(selectedFields);
        this.verbose = verbose;
    }

    /**
     * @param index 1-based position of the entry in document order
     */
    entryId(entry: XMLElement, index: number): string {
        return Utils.readAttribute(entry, 'id') ?? 'entry_' + index;
    }

    extractEntry(entry: XMLElement, index: number): TermEntry {
        const id: string = this.entryId(entry, index);
        const result: TermEntry = {
            id,
            fields: this.extractEntryFields(entry),
            languages: new Map<string, TermRecord[]>()
        };
        const languageGroups: XMLElement[] = GroupLocator.languageGroups(entry, this.namespaces);
        this.log('  Found ' + languageGroups.length + ' language groups');
        languageGroups.forEach((element: XMLElement) => {
            const group: LanguageGroup = this.extractLanguageGroup(element);
            if (group.language !== '' && group.terms.length > 0) {
                // a repeated language code replaces the earlier records but keeps its position
                result.languages.set(group.language, group.terms);
            }
        });
        if (result.languages.size === 0) {
            this.log('  Warning: No terms found for entry ' + id);
        }
        return result;
    }

    extractLanguageGroup(languageGroup: XMLElement): LanguageGroup {
        const language: string = GroupLocator.languageOf(languageGroup, this.namespaces);
        this.log('  Processing language group: ' + language);
        const termGroups: XMLElement[] = GroupLocator.termGroups(languageGroup, this.namespaces);
        const terms: TermRecord[] = [];
        const seenTerms: Set<string> = new Set<string>();
        termGroups.forEach((termGroup: XMLElement) => {
            const termElement: XMLElement | undefined = GroupLocator.termElement(termGroup, this.namespaces);
            if (!termElement) {
                this.log('    Warning: No term element found in term group');
                return;
            }
            const termText: string = Utils.getTrimmedText(termElement);
            if (termText === '' || seenTerms.has(termText)) {
                return;
            }
            seenTerms.add(termText);
            terms.push(this.extractTerm(termGroup, language, termText));
        });
        return { language, terms, termGroupCount: termGroups.length };
    }

    private extractTerm(termGroup: XMLElement, language: string, termText: string): TermRecord {
        const record: TermRecord = this.emptyRecord(language);
        if (this.selected.has(FieldClassifier.TERM)) {
            record[FieldClassifier.TERM] = termText;
        }
        [termGroup, ...Utils.descendants(termGroup)].forEach((element: XMLElement) => {
            const classification: FieldClassification | null = FieldClassifier.classify(element);
            if (!classification || !this.selected.has(classification.key)) {
                return;
            }
            const text: string = Utils.getTrimmedText(element);
            if (text === '') {
                return;
            }
            if (classification.generic) {
                this.log('    Generic field match: <' + element.getName() + '> read as ' + classification.key);
            }
            record[classification.key] = text;
        });
        return record;
    }

    private extractEntryFields(entry: XMLElement): Record<FieldKey, string> {
        const fields: Record<FieldKey, string> = {};
        Utils.descendants(entry).forEach((element: XMLElement) => {
            const field: FieldKey | null = FieldClassifier.classifyEntryLevel(element);
            if (!field || !this.selected.has(field)) {
                return;
            }
            const text: string = Utils.getTrimmedText(element);
            if (text !== '') {
                fields[field] = text;
            }
        });
        return fields;
    }

    private emptyRecord(language: string): TermRecord {
        const record: TermRecord = { language };
        this.selectedFields.forEach((field: FieldKey) => {
            if (!FieldClassifier.isEntryLevel(field)) {
                record[field] = '';
            }
        });
        record[FieldClassifier.LANGUAGE] = language;
        return record;
    }

    private log(message: string): void {
        if (this.verbose) {
            console.log(message);
        }
    }
}
