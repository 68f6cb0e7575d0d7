export { parseLiteral, LiteralSyntaxError } from "./literalParser";
export { parsePhraseRecords } from "./phraseRecords";
export { cleanPhrase } from "./cleaning";
export { bracketKeyword, keywordPattern } from "./bracketing";
export { extractPhrases, dedupePhrases } from "./extractor";
export type { ExtractOptions } from "./extractor";
