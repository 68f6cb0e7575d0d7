export {
  SelectionCriteriaError,
  buildCategoryFilter,
  buildWordLookup,
  hasSelectionCriteria,
  selectCandidates,
  sortByFrequency,
} from "./candidateSelector";
export type { CategoryFilter } from "./candidateSelector";
export { parseWordList, readWordList } from "./wordList";
