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

import type { FieldKey } from "./fieldClassifier.js";

// one term occurrence within a language group; always carries `language`
export type TermRecord = Record<FieldKey, string> & { language: string };

export interface LanguageGroup {
    language: string;
    terms: TermRecord[];
    termGroupCount: number;
}

export interface TermEntry {
    id: string;
    fields: Record<FieldKey, string>; // entry-level values, entry_descrip_* and entry_subject
    languages: Map<string, TermRecord[]>; // insertion order is first-encounter order
}
