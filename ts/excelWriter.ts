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

import { mkdirSync, statSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import * as XLSX from "xlsx";
import type { RenamedTable } from "./columnRenamer.js";
import { errorMessage, ExcelWriteError } from "./errors.js";

export interface ExcelWriterOptions {
    sheetName: string;
    maxColumnWidth: number;
}

export interface ExcelWriteResult {
    path: string;
    bytes: number;
    rows: number;
    columns: number;
}

export class ExcelWriter {

    private readonly options: ExcelWriterOptions;

    constructor(options: ExcelWriterOptions) {
        this.options = options;
    }

    /**
     * Header length or longest value plus two, capped at `maxColumnWidth`.
     */
    static columnWidths(table: RenamedTable, maxColumnWidth: number): number[] {
        return table.headers.map((header: string, column: number) => {
            let longest: number = header.length;
            table.rows.forEach((row: string[]) => {
                longest = Math.max(longest, (row[column] ?? '').length);
            });
            return Math.min(longest + 2, maxColumnWidth);
        });
    }

    buildWorkbook(table: RenamedTable, withColumnWidths: boolean): XLSX.WorkBook {
        const data: string[][] = [table.headers, ...table.rows];
        const worksheet: XLSX.WorkSheet = XLSX.utils.aoa_to_sheet(data);
        if (withColumnWidths) {
            worksheet['!cols'] = ExcelWriter.columnWidths(table, this.options.maxColumnWidth).map((width: number) => ({ wch: width }));
        }
        const workbook: XLSX.WorkBook = XLSX.utils.book_new();
        XLSX.utils.book_append_sheet(workbook, worksheet, this.options.sheetName);
        return workbook;
    }

    /**
     * Writes the table, retrying once with a plain workbook when the first attempt fails.
     */
    write(table: RenamedTable, outputPath: string): ExcelWriteResult {
        mkdirSync(dirname(outputPath), { recursive: true });
        try {
            this.writeWorkbook(this.buildWorkbook(table, true), outputPath, true);
        } catch (err: unknown) {
            console.error('Error writing Excel file: ' + errorMessage(err));
            console.log('Trying alternative Excel writer (plain workbook)...');
            try {
                this.writeWorkbook(this.buildWorkbook(table, false), outputPath, false);
            } catch (retryErr: unknown) {
                throw new ExcelWriteError('Unable to write Excel file ' + outputPath + ': ' + errorMessage(retryErr), outputPath, retryErr);
            }
        }
        return {
            path: outputPath,
            bytes: statSync(outputPath).size,
            rows: table.rows.length,
            columns: table.headers.length
        };
    }

    private writeWorkbook(workbook: XLSX.WorkBook, outputPath: string, compression: boolean): void {
        const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx', compression });
        writeFileSync(outputPath, buffer);
    }
}
