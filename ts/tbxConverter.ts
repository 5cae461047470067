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

import { format as formatPath, parse as parsePath } from "node:path";
import type { ParsedPath } from "node:path";
import type { XMLElement } from "typesxml";
import { ColumnRenamer } from "./columnRenamer.js";
import type { RenamedTable } from "./columnRenamer.js";
import { resolveConversionOptions } from "./conversionOptions.js";
import type { ConversionOptions, ResolvedConversionOptions } from "./conversionOptions.js";
import { EntryExtractor } from "./entryExtractor.js";
import { ExcelWriter } from "./excelWriter.js";
import type { ExcelWriteResult } from "./excelWriter.js";
import { FieldClassifier } from "./fieldClassifier.js";
import type { FieldKey } from "./fieldClassifier.js";
import { FieldDiscovery } from "./fieldDiscovery.js";
import type { DiscoveryResult } from "./fieldDiscovery.js";
import { FieldSelection } from "./fieldSelection.js";
import type { FieldMapping } from "./fieldSelection.js";
import type { OutputTable } from "./outputTable.js";
import { RowFlattener } from "./rowFlattener.js";
import { TBXDocument } from "./tbxDocument.js";
import type { TermEntry } from "./termEntry.js";

export type ConversionResult =
    | { status: 'ok'; entries: TermEntry[]; table: OutputTable; renamed: RenamedTable }
    | { status: 'no-data'; reason: 'no-entries' | 'no-rows'; entries: TermEntry[] };

export interface ConversionSummary {
    totalEntries: number;
    columns: string[];
    languagesDetected: string[];
}

export class TBXConverter {

    readonly filePath: string;
    private readonly options: ResolvedConversionOptions;
    private document: TBXDocument | null = null;
    private discovery: DiscoveryResult | null = null;
    private selectedFields: FieldKey[] = [];
    private fieldMapping: FieldMapping = {};

    constructor(filePath: string, options?: ConversionOptions) {
        this.filePath = filePath;
        this.options = resolveConversionOptions(options);
    }

    // ============================
    // CONFIGURATION
    // ============================

    /**
     * Samples the file for available fields. Never throws: a file that cannot be read
     * yields the fallback field set, and the failure resurfaces in `parse`.
     */
    scanAvailableFields(): DiscoveryResult {
        if (!this.discovery) {
            this.discovery = FieldDiscovery.discoverSafely(() => this.loadDocument(), this.options.sampleSize);
        }
        return this.discovery;
    }

    configure(fields: ReadonlyArray<FieldKey>, mapping: FieldMapping = {}): void {
        const resolved: FieldMapping = FieldSelection.resolveMapping(fields, mapping);
        FieldSelection.validateSelection(fields, resolved);
        this.selectedFields = [...fields];
        this.fieldMapping = resolved;
    }

    /**
     * Auto mode: every discovered field under its original name.
     */
    useAllFields(): void {
        const fields: FieldKey[] = this.scanAvailableFields().fields;
        this.configure(fields, FieldSelection.identityMapping(fields));
    }

    getSelectedFields(): FieldKey[] {
        return [...this.selectedFields];
    }

    getFieldMapping(): FieldMapping {
        return { ...this.fieldMapping };
    }

    // ============================
    // CONVERSION
    // ============================

    parse(): TermEntry[] {
        this.ensureConfigured();
        const document: TBXDocument = this.loadDocument();
        const entries: XMLElement[] = document.findEntries();
        this.log('Root element: ' + document.root.getName());
        this.log('Registered namespaces: ' + document.namespaces.prefixes().join(', '));
        this.log('Found ' + entries.length + ' term entries');
        const extractor: EntryExtractor = new EntryExtractor(document.namespaces, this.selectedFields, this.options.verbose);
        return entries.map((entry: XMLElement, i: number) => {
            const index: number = i + 1;
            this.log('Processing entry ' + index + ' of ' + entries.length + ': ' + extractor.entryId(entry, index));
            return extractor.extractEntry(entry, index);
        });
    }

    flatten(entries: ReadonlyArray<TermEntry>): OutputTable {
        this.ensureConfigured();
        const table: OutputTable = RowFlattener.flatten(entries, this.selectedFields);
        this.log('Total rows created: ' + table.size);
        return table;
    }

    rename(table: OutputTable): RenamedTable {
        return ColumnRenamer.renameTable(table, this.fieldMapping);
    }

    convert(): ConversionResult {
        const entries: TermEntry[] = this.parse();
        if (entries.length === 0) {
            return { status: 'no-data', reason: 'no-entries', entries };
        }
        const table: OutputTable = this.flatten(entries);
        if (table.size === 0) {
            return { status: 'no-data', reason: 'no-rows', entries };
        }
        return { status: 'ok', entries, table, renamed: this.rename(table) };
    }

    getSummary(table: OutputTable): ConversionSummary {
        const languages: string[] = [];
        table.columns.forEach((column: string) => {
            if (column.includes('_') && !FieldClassifier.isEntryLevel(column)) {
                const language: string = column.split('_')[0];
                if (!languages.includes(language)) {
                    languages.push(language);
                }
            }
        });
        return {
            totalEntries: table.size,
            columns: [...table.columns],
            languagesDetected: languages
        };
    }

    // ============================
    // OUTPUT
    // ============================

    defaultOutputPath(): string {
        const parsed: ParsedPath = parsePath(this.filePath);
        return formatPath({ dir: parsed.dir, name: parsed.name, ext: '.xlsx' });
    }

    toExcel(renamed: RenamedTable, outputPath?: string): ExcelWriteResult {
        const writer: ExcelWriter = new ExcelWriter({
            sheetName: this.options.sheetName,
            maxColumnWidth: this.options.maxColumnWidth
        });
        return writer.write(renamed, outputPath ?? this.defaultOutputPath());
    }

    private loadDocument(): TBXDocument {
        if (!this.document) {
            this.document = TBXDocument.fromFile(this.filePath);
        }
        return this.document;
    }

    private ensureConfigured(): void {
        if (this.selectedFields.length === 0) {
            throw new Error('No fields selected; call configure() or useAllFields() first');
        }
    }

    private log(message: string): void {
        if (this.options.verbose) {
            console.log(message);
        }
    }
}
