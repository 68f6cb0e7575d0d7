export { parseFrequencyCorpus, loadFrequencyTable, rankOf } from "./ranker";
