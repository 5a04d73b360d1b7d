export {
  watchCorpus,
  type CorpusWatcher,
  type CorpusChangeEvent,
  type WatchOptions,
} from "./watcher";
