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
import { errorMessage } from "./errors.js";
import { FieldClassifier } from "./fieldClassifier.js";
import type { FieldClassification, FieldKey } from "./fieldClassifier.js";
import { GroupLocator } from "./groupLocator.js";
import type { TBXDocument } from "./tbxDocument.js";
import { Utils } from "./utils.js";

export interface DiscoveryResult {
    fields: FieldKey[];
    sampledEntries: number;
    totalEntries: number;
    complete: boolean; // every entry was sampled
    fallback: boolean; // discovery failed and `fields` is the fixed default set
}

export class FieldDiscovery {

    static readonly DEFAULT_SAMPLE_SIZE: number = 3;

    /**
     * Samples the first `sampleSize` entries and returns the sorted FieldKeys found,
     * always including the baseline fields. Only the sampled entries are examined,
     * so fields that first appear later in the document are not reported.
     */
    static discover(document: TBXDocument, sampleSize: number = FieldDiscovery.DEFAULT_SAMPLE_SIZE): DiscoveryResult {
        const fields: Set<FieldKey> = new Set<FieldKey>();
        const entries: XMLElement[] = document.findEntries();
        const sample: XMLElement[] = entries.slice(0, sampleSize);
        sample.forEach((entry: XMLElement) => {
            FieldDiscovery.scanEntry(entry, document).forEach((field: FieldKey) => fields.add(field));
        });
        FieldClassifier.BASELINE_FIELDS.forEach((field: FieldKey) => fields.add(field));
        return {
            fields: FieldDiscovery.sortFields(fields),
            sampledEntries: sample.length,
            totalEntries: entries.length,
            complete: sample.length === entries.length,
            fallback: false
        };
    }

    /**
     * Same as `discover`, but never throws: any failure, including one raised while
     * loading the document, yields the fixed fallback field set.
     */
    static discoverSafely(load: () => TBXDocument, sampleSize: number = FieldDiscovery.DEFAULT_SAMPLE_SIZE): DiscoveryResult {
        try {
            return FieldDiscovery.discover(load(), sampleSize);
        } catch (err: unknown) {
            console.error('Error scanning file: ' + errorMessage(err));
            return FieldDiscovery.fallbackResult();
        }
    }

    static fallbackResult(): DiscoveryResult {
        return {
            fields: FieldDiscovery.sortFields(new Set<FieldKey>(FieldClassifier.FALLBACK_FIELDS)),
            sampledEntries: 0,
            totalEntries: 0,
            complete: false,
            fallback: true
        };
    }

    static scanEntry(entry: XMLElement, document: TBXDocument): Set<FieldKey> {
        const fields: Set<FieldKey> = new Set<FieldKey>();
        GroupLocator.allLanguageGroups(entry, document.namespaces).forEach((languageGroup: XMLElement) => {
            GroupLocator.termGroups(languageGroup, document.namespaces).forEach((termGroup: XMLElement) => {
                [termGroup, ...Utils.descendants(termGroup)].forEach((element: XMLElement) => {
                    const classification: FieldClassification | null = FieldClassifier.classify(element);
                    if (classification) {
                        fields.add(classification.key);
                    }
                });
            });
        });
        Utils.descendants(entry).forEach((element: XMLElement) => {
            const field: FieldKey | null = FieldClassifier.classifyEntryLevel(element);
            if (field) {
                fields.add(field);
            }
        });
        return fields;
    }

    static sortFields(fields: Iterable<FieldKey>): FieldKey[] {
        // code point order, so listings match across locales
        return Array.from(fields).sort((a: FieldKey, b: FieldKey) => (a < b ? -1 : a > b ? 1 : 0));
    }
}
