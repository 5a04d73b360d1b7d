/**
 * Lexicon Infrastructure
 */

export { loadLexicon, parseLexicon, toLexicon } from "./lexiconLoader";
