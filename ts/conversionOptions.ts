/*******************************************************************************
 * Copyright (c) 2025-2026 Maxprograms.
 *
 * This program and the accompanying materials
 * are made available under the terms of the Eclipse   License 1.0
 * which accompanies this distribution, and is available at
 * https://www.eclipse.org/org/documents/epl-v10.html
 *
 * Contributors:
 *     Maxprograms - initial API and implementation
 *******************************************************************************/

export interface ConversionOptions {
    sampleSize?: number;
    verbose?: boolean;
    sheetName?: string;
    maxColumnWidth?: number;
}

export type ResolvedConversionOptions = Required<ConversionOptions>;

export const DEFAULT_CONVERSION_OPTIONS: ResolvedConversionOptions = {
    sampleSize: 3,
    verbose: false,
    sheetName: 'Terminology',
    maxColumnWidth: 50
};

export function resolveConversionOptions(options?: ConversionOptions): ResolvedConversionOptions {
    // an option given as undefined keeps its default
    const resolved: ResolvedConversionOptions = {
        sampleSize: options?.sampleSize ?? DEFAULT_CONVERSION_OPTIONS.sampleSize,
        verbose: options?.verbose ?? DEFAULT_CONVERSION_OPTIONS.verbose,
        sheetName: options?.sheetName ?? DEFAULT_CONVERSION_OPTIONS.sheetName,
        maxColumnWidth: options?.maxColumnWidth ?? DEFAULT_CONVERSION_OPTIONS.maxColumnWidth
    };
    if (!Number.isInteger(resolved.sampleSize) || resolved.sampleSize < 1) {
        throw new Error('sampleSize must be a positive integer, got ' + resolved.sampleSize);
    }
    if (!Number.isInteger(resolved.maxColumnWidth) || resolved.maxColumnWidth < 1) {
        throw new Error('maxColumnWidth must be a positive integer, got ' + resolved.maxColumnWidth);
    }
    return resolved;
}
