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

import { existsSync } from "node:fs";
import { parseArgs } from "node:util";
import { errorMessage, FieldSelectionError } from "./errors.js";
import type { ExcelWriteResult } from "./excelWriter.js";
import type { FieldKey } from "./fieldClassifier.js";
import type { DiscoveryResult } from "./fieldDiscovery.js";
import { FieldSelection } from "./fieldSelection.js";
import type { FieldMapping } from "./fieldSelection.js";
import { TBXConverter } from "./tbxConverter.js";
import type { ConversionResult, ConversionSummary } from "./tbxConverter.js";

export interface CommandLineArgs {
    inputFile: string;
    output?: string;
    summary: boolean;
    auto: boolean;
    sampleSize?: number;
    verbose: boolean;
}

export interface Prompter {
    ask(question: string): Promise<string>;
}

export const USAGE: string = 'Usage: tbx2xlsx <input.tbx> [-o|--output <file.xlsx>] [-s|--summary] [--auto] [--sample-size <n>] [--verbose]';

const RULE: string = '='.repeat(60);

export function parseCommandLine(argv: string[]): CommandLineArgs {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            output: { type: 'string', short: 'o' },
            summary: { type: 'boolean', short: 's', default: false },
            auto: { type: 'boolean', default: false },
            'sample-size': { type: 'string' },
            verbose: { type: 'boolean', default: false }
        }
    });
    if (positionals.length !== 1) {
        throw new Error(USAGE);
    }
    let sampleSize: number | undefined;
    const rawSampleSize: string | undefined = values['sample-size'];
    if (rawSampleSize !== undefined) {
        if (!/^\d+$/.test(rawSampleSize) || Number.parseInt(rawSampleSize, 10) < 1) {
            throw new Error('--sample-size must be a positive integer');
        }
        sampleSize = Number.parseInt(rawSampleSize, 10);
    }
    return {
        inputFile: positionals[0],
        output: values.output,
        summary: values.summary === true,
        auto: values.auto === true,
        sampleSize,
        verbose: values.verbose === true
    };
}

async function askUntilValid<T>(prompter: Prompter, question: string, accept: (answer: string) => T | undefined, retryMessage: string): Promise<T> {
    for (;;) {
        const answer: string = (await prompter.ask(question)).trim();
        const value: T | undefined = accept(answer);
        if (value !== undefined) {
            return value;
        }
        console.log(retryMessage);
    }
}

export async function selectFields(prompter: Prompter, available: FieldKey[]): Promise<FieldKey[]> {
    console.log('\nFound ' + available.length + ' available data fields in your TBX file:');
    console.log(RULE);
    available.forEach((field: FieldKey, i: number) => {
        console.log(String(i + 1).padStart(2) + '. ' + field);
    });
    console.log('\nWhich fields would you like to include in the Excel output?');
    console.log('Enter the numbers separated by commas (e.g., 1,3,5,7) or type \'all\' for all fields:');
    for (;;) {
        const answer: string = await prompter.ask('> ');
        try {
            const selected: FieldKey[] = FieldSelection.parseSelection(answer, available);
            console.log('\nSelected ' + selected.length + ' fields:');
            selected.forEach((field: FieldKey) => console.log('  - ' + field));
            return selected;
        } catch (err: unknown) {
            if (!(err instanceof FieldSelectionError)) {
                throw err;
            }
            console.log(err.message);
        }
    }
}

export async function renameFields(prompter: Prompter, fields: FieldKey[]): Promise<FieldMapping> {
    console.log('\nWould you like to keep the original field names or rename them? (keep/rename)');
    const choice: string = await askUntilValid(prompter, '> ', (answer: string) => {
        const lower: string = answer.toLowerCase();
        return lower === 'keep' || lower === 'rename' ? lower : undefined;
    }, 'Please enter \'keep\' or \'rename\'');
    if (choice === 'keep') {
        console.log('Using original field names.');
        return FieldSelection.identityMapping(fields);
    }
    console.log('\nWould you like to rename each field individually? (y/n)');
    const individual: boolean = await askUntilValid(prompter, '> ', (answer: string) => {
        const lower: string = answer.toLowerCase();
        if (lower === 'y' || lower === 'yes') {
            return true;
        }
        return lower === 'n' || lower === 'no' ? false : undefined;
    }, 'Please enter \'y\' or \'n\'');
    if (!individual) {
        console.log('Using original field names.');
        return FieldSelection.identityMapping(fields);
    }
    console.log('\nRenaming fields individually:');
    console.log('Press Enter to keep the original name for any field.');
    const partial: FieldMapping = {};
    for (const field of fields) {
        console.log('\nCurrent name: \'' + field + '\'');
        const newName: string = (await prompter.ask('New name (or press Enter to keep \'' + field + '\'): ')).trim();
        if (newName.length > 0) {
            partial[field] = newName;
            console.log('  Renamed \'' + field + '\' → \'' + newName + '\'');
        } else {
            console.log('  Keeping \'' + field + '\'');
        }
    }
    return FieldSelection.resolveMapping(fields, partial);
}

function printDiscovery(discovery: DiscoveryResult): void {
    if (discovery.fallback) {
        console.log('Field scan failed; offering the default field set.');
    } else if (!discovery.complete) {
        console.log('Sampled ' + discovery.sampledEntries + ' of ' + discovery.totalEntries + ' entries; fields used only by later entries are not listed.');
    }
}

function printSummary(summary: ConversionSummary): void {
    console.log('\n' + RULE);
    console.log('CONVERSION SUMMARY');
    console.log(RULE);
    console.log('Total entries: ' + summary.totalEntries);
    console.log('Languages detected: ' + summary.languagesDetected.join(', '));
    console.log('Final columns: ' + summary.columns.length);
    if (summary.columns.length > 0) {
        console.log('Column names:');
        summary.columns.forEach((column: string) => console.log('  - ' + column));
    }
}

/**
 * Runs one conversion and returns the process exit code.
 */
export async function run(args: CommandLineArgs, prompter: Prompter): Promise<number> {
    if (!existsSync(args.inputFile)) {
        console.error('Error: Input file \'' + args.inputFile + '\' not found.');
        return 1;
    }
    const converter: TBXConverter = new TBXConverter(args.inputFile, {
        sampleSize: args.sampleSize,
        verbose: args.verbose
    });
    console.log('Processing TBX file: ' + args.inputFile);
    if (args.auto) {
        console.log('Auto mode: using all available fields with original names');
        printDiscovery(converter.scanAvailableFields());
        converter.useAllFields();
    } else {
        console.log(RULE);
        console.log('TBX TO EXCEL CONVERTER - CONFIGURATION');
        console.log(RULE);
        const discovery: DiscoveryResult = converter.scanAvailableFields();
        printDiscovery(discovery);
        const fields: FieldKey[] = await selectFields(prompter, discovery.fields);
        converter.configure(fields, await renameFields(prompter, fields));
        console.log('\nConfiguration complete!');
        console.log('Ready to extract ' + fields.length + ' fields from your TBX file.');
        console.log(RULE);
    }

    console.log('\nStarting conversion...');
    const result: ConversionResult = converter.convert();
    if (result.status === 'no-data') {
        console.error('Error: No data was extracted from the TBX file (' + result.reason + ').');
        return 1;
    }

    let written: ExcelWriteResult;
    try {
        written = converter.toExcel(result.renamed, args.output);
    } catch (err: unknown) {
        console.error('Error: Failed to create Excel file. ' + errorMessage(err));
        return 1;
    }
    console.log('✓ Successfully converted TBX to Excel: ' + written.path);
    console.log('✓ File size: ' + written.bytes.toLocaleString() + ' bytes');
    console.log('✓ Total entries: ' + written.rows);
    console.log('✓ Columns: ' + written.columns);

    if (args.summary || !args.auto) {
        printSummary(converter.getSummary(result.table));
    }
    return 0;
}
