import type { ParseResult, WavDocument } from '../../src';

export function expectDocument(result: ParseResult): WavDocument {
  if (!result.ok) throw new Error(`Expected a successful parse, got ${result.error.kind}: ${result.error.message}`);
  return result.document;
}

/** The decoded records only, without the chunk index. */
export function decodedRecords(document: WavDocument) {
  const { riffSize, format, data, fact, cue, warnings } = document;
  return { riffSize, format, data, fact, cue, warnings };
}
