#!/usr/bin/env node
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

import { createInterface } from "node:readline/promises";
import type { Interface } from "node:readline/promises";
import { parseCommandLine, run } from "./commandLine.js";
import type { CommandLineArgs } from "./commandLine.js";

async function main(): Promise<void> {
    const args: CommandLineArgs = parseCommandLine(process.argv.slice(2));
    const rl: Interface = createInterface({ input: process.stdin, output: process.stdout });
    try {
        process.exitCode = await run(args, { ask: (question: string) => rl.question(question) });
    } finally {
        rl.close();
    }
}

main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
