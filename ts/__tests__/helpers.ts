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

import { fileURLToPath } from "node:url";
import type { XMLElement } from "typesxml";
import { TBXDocument } from "../tbxDocument.js";
import { TBXReader } from "../tbxReader.js";

export const GLOSSARY_PATH: string = fileURLToPath(new URL('./fixtures/glossary.tbx', import.meta.url));

export function element(xml: string): XMLElement {
    return new TBXReader().parseString(xml);
}

export function tbx(body: string, rootAttributes: string = ''): TBXDocument {
    return TBXDocument.fromString('<?xml version="1.0" encoding="UTF-8"?>\n<martif type="TBX"' + rootAttributes + '><text><body>' + body + '</body></text></martif>');
}
