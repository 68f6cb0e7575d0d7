export { generateWordlist, NoEntriesError } from "./generateWordlist";
