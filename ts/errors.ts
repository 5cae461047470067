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

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * The input file is missing or is not well-formed XML. Conversion stops.
 */
export class TBXInputError extends Error {

    readonly source: string;

    constructor(message: string, source: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'TBXInputError';
        this.source = source;
    }
}

export class FieldSelectionError extends Error {

    readonly input: string;

    constructor(message: string, input: string) {
        super(message);
        this.name = 'FieldSelectionError';
        this.input = input;
    }
}

export class ExcelWriteError extends Error {

    readonly path: string;

    constructor(message: string, path: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'ExcelWriteError';
        this.path = path;
    }
}
