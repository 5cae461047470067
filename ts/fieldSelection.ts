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

import { FieldSelectionError } from "./errors.js";
import type { FieldKey } from "./fieldClassifier.js";

// original FieldKey, or exceptionally a full column name, to display name
export type FieldMapping = Record<string, string>;

export class FieldSelection {

    static readonly ALL: string = 'all';

    /**
     * Parses `all` or a comma separated list of 1-based positions in `available`.
     */
    static parseSelection(input: string, available: ReadonlyArray<FieldKey>): FieldKey[] {
        const trimmed: string = input.trim();
        if (trimmed.toLowerCase() === FieldSelection.ALL) {
            return [...available];
        }
        const numbers: number[] = trimmed.split(',').map((part: string) => {
            const value: string = part.trim();
            if (!/^\d+$/.test(value)) {
                throw new FieldSelectionError('Invalid input. Please enter numbers separated by commas or type \'all\'', input);
            }
            return Number.parseInt(value, 10);
        });
        const invalid: number[] = numbers.filter((n: number) => n < 1 || n > available.length);
        if (invalid.length > 0) {
            throw new FieldSelectionError('Invalid numbers: ' + invalid.join(', ') + '. Please enter numbers between 1 and ' + available.length, input);
        }
        // repeated numbers select a field once
        return Array.from(new Set<FieldKey>(numbers.map((n: number) => available[n - 1])));
    }

    static identityMapping(fields: ReadonlyArray<FieldKey>): FieldMapping {
        const mapping: FieldMapping = {};
        fields.forEach((field: FieldKey) => {
            mapping[field] = field;
        });
        return mapping;
    }

    /**
     * Completes a partial mapping: unmapped fields and blank names keep the original name.
     * Extra keys (full column names) are carried over as given.
     */
    static resolveMapping(fields: ReadonlyArray<FieldKey>, partial: FieldMapping = {}): FieldMapping {
        const mapping: FieldMapping = {};
        Object.entries(partial).forEach(([key, value]: [string, string]) => {
            const name: string = value.trim();
            if (name.length > 0) {
                mapping[key] = name;
            }
        });
        fields.forEach((field: FieldKey) => {
            if (!Object.prototype.hasOwnProperty.call(mapping, field)) {
                mapping[field] = field;
            }
        });
        return mapping;
    }

    static validateSelection(fields: ReadonlyArray<FieldKey>, mapping: FieldMapping): void {
        if (fields.length === 0) {
            throw new FieldSelectionError('At least one field must be selected', '');
        }
        const unmapped: FieldKey[] = fields.filter((field: FieldKey) => !Object.prototype.hasOwnProperty.call(mapping, field));
        if (unmapped.length > 0) {
            throw new FieldSelectionError('Missing names for selected fields: ' + unmapped.join(', '), unmapped.join(','));
        }
    }
}
