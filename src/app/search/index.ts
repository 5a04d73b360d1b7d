export {
  SearchService,
  type SearchServiceOptions,
  type IndexSnapshot,
  type RebuildResult,
} from "./searchService";
