export { JsonCorpusSource, type JsonCorpusSourceOptions } from "./jsonCorpusSource";
