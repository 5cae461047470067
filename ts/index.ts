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

export { ColumnRenamer } from "./columnRenamer.js";
export type { ColumnParts, RenamedTable } from "./columnRenamer.js";
export { DEFAULT_CONVERSION_OPTIONS, resolveConversionOptions } from "./conversionOptions.js";
export type { ConversionOptions, ResolvedConversionOptions } from "./conversionOptions.js";
export { EntryExtractor } from "./entryExtractor.js";
export { ExcelWriteError, FieldSelectionError, TBXInputError } from "./errors.js";
export { ExcelWriter } from "./excelWriter.js";
export type { ExcelWriteResult, ExcelWriterOptions } from "./excelWriter.js";
export { FieldClassifier } from "./fieldClassifier.js";
export type { FieldClassification, FieldKey } from "./fieldClassifier.js";
export { FieldDiscovery } from "./fieldDiscovery.js";
export type { DiscoveryResult } from "./fieldDiscovery.js";
export { FieldSelection } from "./fieldSelection.js";
export type { FieldMapping } from "./fieldSelection.js";
export { GroupLocator } from "./groupLocator.js";
export { NamespaceResolver } from "./namespaceResolver.js";
export { NamespaceTable } from "./namespaceTable.js";
export { OutputTable } from "./outputTable.js";
export type { Row } from "./outputTable.js";
export { RowFlattener } from "./rowFlattener.js";
export { TBXConverter } from "./tbxConverter.js";
export type { ConversionResult, ConversionSummary } from "./tbxConverter.js";
export { TBXDocument } from "./tbxDocument.js";
export { TBXReader } from "./tbxReader.js";
export type { LanguageGroup, TermEntry, TermRecord } from "./termEntry.js";
export { Utils } from "./utils.js";
